import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/core/errors";
import {
  parseItemId,
  parseReviewPass,
  stampReviewPass,
} from "../src/core/review-pass";
import { asReviewerId } from "../src/core/types";
import { defaultWorkflowPolicy } from "../src/project/policy";

const pagePolicy = defaultWorkflowPolicy.page ?? {
  requiredPasses: [],
  requiredApprovals: 1,
};
const reviewer = asReviewerId("style-bot");

describe("parseItemId", () => {
  it("splits content type and id", () => {
    expect(parseItemId("page:intro")).toEqual({
      itemId: "page:intro",
      contentType: "page",
      contentId: "intro",
    });
    expect(parseItemId("quiz:week-1:q2").contentId).toBe("week-1:q2");
  });

  it.each(["intro", "page:", ":intro", "page: intro"])(
    "rejects %j",
    (value) => {
      expect(() => parseItemId(value)).toThrow(ValidationError);
    },
  );
});

describe("parseReviewPass", () => {
  it("builds a frozen pass draft", () => {
    const draft = parseReviewPass(
      "style",
      reviewer,
      {
        decision: "approved",
        reasoning: "reads well",
        references: ["page:glossary"],
        reviewerRole: "style_agent",
      },
      pagePolicy,
    );

    expect(draft).toEqual({
      pass_kind: "style",
      reviewer_id: "style-bot",
      reviewer_role: "style_agent",
      decision: "approved",
      reasoning: "reads well",
      references: ["page:glossary"],
    });
    expect(Object.isFrozen(draft)).toBe(true);
    expect(Object.isFrozen(draft.references)).toBe(true);
  });

  it("requires reasoning on a rejection", () => {
    expect(() =>
      parseReviewPass(
        "style",
        reviewer,
        { decision: "rejected", reasoning: "   " },
        pagePolicy,
      ),
    ).toThrow("A rejected pass must explain its reasoning");
  });

  it("allows an approval without reasoning", () => {
    expect(
      parseReviewPass(
        "style",
        reviewer,
        { decision: "approved", reasoning: "" },
        pagePolicy,
      ).reasoning,
    ).toBe("");
  });

  it("rejects pass kinds outside the item type's policy", () => {
    expect(() =>
      parseReviewPass(
        "tone",
        reviewer,
        { decision: "approved", reasoning: "" },
        pagePolicy,
      ),
    ).toThrow(ValidationError);
  });

  it("accepts a human override for any item type", () => {
    expect(
      parseReviewPass(
        "human_override",
        asReviewerId("editor"),
        { decision: "approved", reasoning: "confirmed" },
        pagePolicy,
      ).pass_kind,
    ).toBe("human_override");
  });

  it("keeps severity only on rejections", () => {
    const approved = parseReviewPass(
      "style",
      reviewer,
      { decision: "approved", reasoning: "", severity: "high" },
      pagePolicy,
    );
    const rejected = parseReviewPass(
      "style",
      reviewer,
      { decision: "rejected", reasoning: "passive voice", severity: "low" },
      pagePolicy,
    );

    expect(approved.severity).toBeUndefined();
    expect(rejected.severity).toBe("low");
  });

  it("reports malformed input", () => {
    expect(() =>
      parseReviewPass(
        "style",
        reviewer,
        { decision: "maybe", reasoning: "" },
        pagePolicy,
      ),
    ).toThrow(/^Malformed review pass: /);
    expect(() => parseReviewPass("style", reviewer, null, pagePolicy)).toThrow(
      ValidationError,
    );
  });

  it("validates references and reviewer id", () => {
    expect(() =>
      parseReviewPass(
        "style",
        reviewer,
        { decision: "approved", reasoning: "", references: ["glossary"] },
        pagePolicy,
      ),
    ).toThrow(ValidationError);
    expect(() =>
      parseReviewPass(
        "style",
        asReviewerId(" "),
        { decision: "approved", reasoning: "" },
        pagePolicy,
      ),
    ).toThrow("Review pass requires a reviewer id");
  });
});

describe("stampReviewPass", () => {
  it("adds the acceptance timestamp", () => {
    const draft = parseReviewPass(
      "style",
      reviewer,
      { decision: "approved", reasoning: "" },
      pagePolicy,
    );
    const stamped = stampReviewPass(draft, "2026-01-01T00:00:00.000Z");

    expect(stamped.timestamp).toBe("2026-01-01T00:00:00.000Z");
    expect(Object.isFrozen(stamped)).toBe(true);
  });
});
