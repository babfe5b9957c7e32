import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { DriftEntry, RemoteSync, SessionId } from "../core/types";
import type { CommandRunner } from "./git-worktree";

const DriftReportSchema = Type.Array(
  Type.Object({
    itemId: Type.String(),
    reason: Type.String(),
  }),
);

export const shellEscape = (value: string): string =>
  value.replace(/'/g, "'\\''");

/**
 * Runs a project-supplied command that compares the shared baseline with the
 * remote content system. The session id is passed as the last argument.
 */
export class DriftCommandSync implements RemoteSync {
  constructor(
    private readonly pi: CommandRunner,
    private readonly command: string,
    private readonly cwd: string,
  ) {}

  async checkDrift(sessionId: SessionId): Promise<DriftEntry[]> {
    const result = await this.pi.exec(
      "bash",
      [
        "-lc",
        `cd '${shellEscape(this.cwd)}' && ${this.command} '${shellEscape(sessionId)}'`,
      ],
      {},
    );
    if (result.code !== 0) {
      throw new Error(
        `drift command exited with ${result.code}: ${result.stderr.trim()}`,
      );
    }

    const raw = result.stdout.trim();
    let parsed: unknown;
    try {
      parsed = raw ? JSON.parse(raw) : [];
    } catch {
      throw new Error(`drift command printed invalid JSON: ${raw.slice(0, 200)}`);
    }
    if (!Value.Check(DriftReportSchema, parsed)) {
      throw new Error("drift command output must be [{ itemId, reason }]");
    }
    return parsed.map(({ itemId, reason }) => ({ itemId, reason }));
  }
}
