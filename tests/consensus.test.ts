import { describe, expect, it } from "vitest";
import { evaluateConsensus, latestPasses } from "../src/core/consensus";
import {
  type Decision,
  HUMAN_OVERRIDE,
  type ItemTypePolicy,
  type ReviewPass,
  asReviewerId,
} from "../src/core/types";

const pass = (
  reviewer: string,
  kind: string,
  decision: Decision,
): ReviewPass => ({
  pass_kind: kind,
  reviewer_id: asReviewerId(reviewer),
  decision,
  reasoning: decision === "rejected" ? "needs another look" : "",
  references: [],
  timestamp: "2026-01-01T00:00:00.000Z",
});

const styleAndFacts: ItemTypePolicy = {
  requiredPasses: ["style", "fact_check"],
  requiredApprovals: 1,
};

describe("evaluateConsensus", () => {
  it("returns the same status on every recomputation", () => {
    const passes = [
      pass("r1", "style", "approved"),
      pass("r2", "fact_check", "approved"),
    ];

    const results = [1, 2, 3].map(() =>
      evaluateConsensus(passes, styleAndFacts),
    );
    expect(results).toEqual(["approved", "approved", "approved"]);
  });

  it("lets a single rejection veto approvals in either order", () => {
    expect(
      evaluateConsensus(
        [pass("r1", "style", "approved"), pass("r2", "fact_check", "rejected")],
        styleAndFacts,
      ),
    ).toBe("rejected");
    expect(
      evaluateConsensus(
        [pass("r2", "fact_check", "rejected"), pass("r1", "style", "approved")],
        styleAndFacts,
      ),
    ).toBe("rejected");
  });

  it("counts only the latest pass per reviewer and kind", () => {
    const policy = { requiredPasses: ["style"], requiredApprovals: 1 };
    const passes = [
      pass("r1", "style", "approved"),
      pass("r1", "style", "rejected"),
    ];

    expect(evaluateConsensus(passes, policy)).toBe("rejected");
    expect(evaluateConsensus([...passes].reverse(), policy)).toBe("approved");

    const latest = latestPasses(passes);
    expect(latest.size).toBe(1);
    expect([...latest.values()][0]?.index).toBe(1);
  });

  it("stays pending while a required kind has no pass, even after a rejection", () => {
    expect(
      evaluateConsensus([pass("r1", "style", "rejected")], styleAndFacts),
    ).toBe("pending");
  });

  it("requires distinct approvers to reach the threshold", () => {
    const policy = { requiredPasses: ["style", "fact_check"], requiredApprovals: 2 };
    const sameReviewer = [
      pass("r1", "style", "approved"),
      pass("r1", "fact_check", "approved"),
    ];

    expect(evaluateConsensus(sameReviewer, policy)).toBe("pending");
    expect(
      evaluateConsensus(
        [...sameReviewer, pass("r2", "style", "approved")],
        policy,
      ),
    ).toBe("approved");
  });

  it("ignores passes of kinds the policy does not require", () => {
    expect(
      evaluateConsensus(
        [
          pass("r1", "style", "approved"),
          pass("r2", "fact_check", "approved"),
          pass("r3", "tone", "rejected"),
        ],
        styleAndFacts,
      ),
    ).toBe("approved");
  });

  it("drops vetoes accepted before the outranking index", () => {
    const passes = [
      pass("r1", "style", "approved"),
      pass("r2", "fact_check", "rejected"),
      pass("r3", HUMAN_OVERRIDE, "approved"),
    ];
    const options = { extraRequiredKinds: [HUMAN_OVERRIDE], outrankedBefore: 2 };

    expect(evaluateConsensus(passes, styleAndFacts, options)).toBe("approved");
    expect(
      evaluateConsensus(
        [...passes, pass("r4", "style", "rejected")],
        styleAndFacts,
        options,
      ),
    ).toBe("rejected");
  });
});
