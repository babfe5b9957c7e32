import { describe, expect, it } from "vitest";
import { asSessionId } from "../src/core/types";
import { DriftCommandSync } from "../src/workspace/drift-command";
import { fakePi } from "./helpers";

describe("DriftCommandSync", () => {
  it("runs the drift command with the session id and parses its report", async () => {
    const { pi, calls } = fakePi(() => ({
      code: 0,
      stdout: '[{"itemId":"page:intro","reason":"edited remotely","extra":1}]',
    }));
    const sync = new DriftCommandSync(pi, "./scripts/drift", "/repo");

    await expect(sync.checkDrift(asSessionId("ws-1"))).resolves.toEqual([
      { itemId: "page:intro", reason: "edited remotely" },
    ]);
    expect(calls).toEqual([
      {
        bin: "bash",
        args: ["-lc", "cd '/repo' && ./scripts/drift 'ws-1'"],
      },
    ]);
  });

  it("treats empty output as no drift", async () => {
    const { pi } = fakePi(() => ({ code: 0, stdout: "\n" }));
    const sync = new DriftCommandSync(pi, "true", "/repo");
    await expect(sync.checkDrift(asSessionId("ws-1"))).resolves.toEqual([]);
  });

  it("rejects output that is not a drift report", async () => {
    const { pi } = fakePi(() => ({ code: 0, stdout: '{"itemId":"x"}' }));
    const sync = new DriftCommandSync(pi, "./scripts/drift", "/repo");
    await expect(sync.checkDrift(asSessionId("ws-1"))).rejects.toThrow(
      "drift command output must be [{ itemId, reason }]",
    );
  });

  it("reports a failing command", async () => {
    const { pi } = fakePi(() => ({ code: 2, stderr: "no remote\n" }));
    const sync = new DriftCommandSync(pi, "./scripts/drift", "/repo");
    await expect(sync.checkDrift(asSessionId("ws-1"))).rejects.toThrow(
      "drift command exited with 2: no remote",
    );
  });
});
