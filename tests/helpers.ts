import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import pino from "pino";
import { SessionStore } from "../src/core/session-store";
import type {
  VersionedWorkspace,
  WorkflowPolicy,
  WorkspaceMergeOptions,
  WorkspaceMergeOutcome,
} from "../src/core/types";
import { defaultWorkflowPolicy } from "../src/project/policy";

export const silentLogger = pino({ level: "silent" });

export const makeTempDir = (prefix = "review-board-"): string =>
  fs.mkdtempSync(path.join(os.tmpdir(), prefix));

/** Advances one second per call so created_at values sort predictably. */
export const steppingClock = (start = Date.UTC(2026, 0, 1)) => {
  let tick = 0;
  return () => new Date(start + tick++ * 1000);
};

export const makeStore = (
  policy: WorkflowPolicy = defaultWorkflowPolicy,
  root = makeTempDir(),
): SessionStore => {
  const store = new SessionStore(root, {
    policy,
    logger: silentLogger,
    now: steppingClock(),
  });
  store.ensure();
  return store;
};

type MergeImpl = (
  workspaceId: string,
  options: WorkspaceMergeOptions,
) => Promise<WorkspaceMergeOutcome>;

export class FakeWorkspace implements VersionedWorkspace {
  readonly created: Array<{ base: string; name?: string }> = [];
  readonly merges: string[] = [];
  readonly mergeBases: Array<string | undefined> = [];
  readonly removed: string[] = [];
  mergeImpl: MergeImpl = async () => ({
    status: "merged",
    commitRef: "c0ffee",
  });
  removeError: Error | undefined;

  async createWorkspace(base: string, name?: string): Promise<string> {
    this.created.push({ base, name });
    return `${name ?? "workspace"}-${this.created.length}`;
  }

  mergeWorkspace(
    workspaceId: string,
    options: WorkspaceMergeOptions,
  ): Promise<WorkspaceMergeOutcome> {
    this.merges.push(workspaceId);
    this.mergeBases.push(options.base);
    return this.mergeImpl(workspaceId, options);
  }

  async removeWorkspace(workspaceId: string): Promise<void> {
    if (this.removeError) {
      throw this.removeError;
    }
    this.removed.push(workspaceId);
  }
}

type ExecReply = { code: number; stdout?: string; stderr?: string };

/** Records `exec` calls and answers each with `reply`. */
export const fakePi = (reply: (bin: string, args: string[]) => ExecReply) => {
  const calls: Array<{ bin: string; args: string[] }> = [];
  const pi = {
    exec: async (bin: string, args: string[]) => {
      calls.push({ bin, args });
      const result = reply(bin, args);
      return {
        code: result.code,
        stdout: result.stdout ?? "",
        stderr: result.stderr ?? "",
        killed: false,
      };
    },
  } as unknown as ExtensionAPI;
  return { pi, calls };
};
