import path from "node:path";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { nanoid } from "nanoid";
import type {
  VersionedWorkspace,
  WorkspaceMergeOptions,
  WorkspaceMergeOutcome,
} from "../core/types";

export type CommandRunner = Pick<ExtensionAPI, "exec">;

export const toWorkspaceSlug = (name: string): string =>
  name
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 40) || "workspace";

/**
 * Workspaces are git worktrees on `review/<id>` branches. Merges land in the
 * main checkout, which must have the workspace's base branch out.
 */
export class GitWorktreeWorkspace implements VersionedWorkspace {
  constructor(
    private readonly pi: CommandRunner,
    private readonly repoDir: string,
    private readonly worktreeDir: string,
  ) {}

  branchFor(workspaceId: string): string {
    return `review/${workspaceId}`;
  }

  pathFor(workspaceId: string): string {
    return path.join(this.worktreeDir, workspaceId);
  }

  private async git(
    args: string[],
    signal?: AbortSignal,
  ): Promise<{ code: number; stdout: string; stderr: string }> {
    const result = await this.pi.exec(
      "git",
      ["-C", this.repoDir, ...args],
      signal ? { signal } : {},
    );
    return { code: result.code, stdout: result.stdout, stderr: result.stderr };
  }

  async createWorkspace(base: string, name = "workspace"): Promise<string> {
    const workspaceId = `${toWorkspaceSlug(name)}-${nanoid(8)}`;
    const result = await this.git([
      "worktree",
      "add",
      "-b",
      this.branchFor(workspaceId),
      this.pathFor(workspaceId),
      base,
    ]);
    if (result.code !== 0) {
      throw new Error(
        `git worktree add failed for ${workspaceId}: ${result.stderr.trim()}`,
      );
    }
    return workspaceId;
  }

  async mergeWorkspace(
    workspaceId: string,
    options: WorkspaceMergeOptions,
  ): Promise<WorkspaceMergeOutcome> {
    if (options.base) {
      const head = await this.git(
        ["rev-parse", "--abbrev-ref", "HEAD"],
        options.signal,
      );
      if (head.code !== 0) {
        throw new Error(`git rev-parse failed: ${head.stderr.trim()}`);
      }
      const current = head.stdout.trim();
      if (current !== options.base) {
        return {
          status: "conflict",
          details: `${this.repoDir} has ${current} checked out, not ${options.base}`,
        };
      }
    }

    const merge = await this.git(
      ["merge", "--no-ff", "-m", options.summary, this.branchFor(workspaceId)],
      options.signal,
    );
    if (merge.code !== 0) {
      const details = `${merge.stdout}\n${merge.stderr}`.trim();
      const abort = await this.git(["merge", "--abort"]);
      return {
        status: "conflict",
        details:
          abort.code === 0
            ? details
            : `${details}\n(merge --abort failed: ${abort.stderr.trim()})`,
      };
    }

    const head = await this.git(["rev-parse", "HEAD"]);
    if (head.code !== 0) {
      throw new Error(`git rev-parse HEAD failed: ${head.stderr.trim()}`);
    }
    return { status: "merged", commitRef: head.stdout.trim() };
  }

  async removeWorkspace(workspaceId: string): Promise<void> {
    const worktree = await this.git([
      "worktree",
      "remove",
      "--force",
      this.pathFor(workspaceId),
    ]);
    if (worktree.code !== 0) {
      throw new Error(
        `git worktree remove failed for ${workspaceId}: ${worktree.stderr.trim()}`,
      );
    }

    const branch = await this.git(["branch", "-D", this.branchFor(workspaceId)]);
    if (branch.code !== 0) {
      throw new Error(
        `git branch -D failed for ${workspaceId}: ${branch.stderr.trim()}`,
      );
    }
  }
}
