import { describe, expect, it } from "vitest";
import { RoleAuthorizer } from "../src/project/roles";

const authorizer = new RoleAuthorizer(
  {
    "style-bot": { role: "style_agent", scope: ["page:*", "quiz:*"] },
    "facts-bot": { role: "fact_check_agent", scope: [] },
    approver: { role: "approval_agent", scope: [] },
    viewer: { role: "reader", scope: [] },
    mystery: { role: "unknown_role", scope: [] },
    editor: { role: "human", scope: [] },
  },
  "reader",
);

describe("RoleAuthorizer", () => {
  it("grants each reviewer role only its own pass kind", () => {
    expect(authorizer.isAllowed("style-bot", "submitReview:style")).toBe(true);
    expect(authorizer.isAllowed("style-bot", "submitReview:fact_check")).toBe(
      false,
    );
    expect(authorizer.isAllowed("facts-bot", "submitReview:fact_check")).toBe(
      true,
    );
    expect(authorizer.isAllowed("facts-bot", "approveAndMerge")).toBe(false);
  });

  it("limits agents to their item scope", () => {
    expect(
      authorizer.isAllowed("style-bot", "submitReview:style", "page:intro"),
    ).toBe(true);
    expect(
      authorizer.isAllowed("style-bot", "submitReview:style", "rubric:essay"),
    ).toBe(false);
    expect(
      authorizer.isAllowed("facts-bot", "submitReview:fact_check", "rubric:essay"),
    ).toBe(true);
  });

  it("falls back to the default role for unlisted agents", () => {
    expect(authorizer.roleOf("someone")).toBe("reader");
    expect(authorizer.isAllowed("someone", "listSessions")).toBe(true);
    expect(authorizer.isAllowed("someone", "submitReview:human_override")).toBe(
      false,
    );
    expect(authorizer.isAllowed("someone", "resolveEscalation")).toBe(false);
    expect(authorizer.isAllowed("someone", "approveAndMerge")).toBe(false);
  });

  it("gives listed humans every operation", () => {
    expect(authorizer.isAllowed("editor", "submitReview:human_override")).toBe(
      true,
    );
    expect(authorizer.isAllowed("editor", "resolveEscalation")).toBe(true);
  });

  it("keeps readers and approvers within their operations", () => {
    expect(authorizer.isAllowed("viewer", "getItemHistory")).toBe(true);
    expect(authorizer.isAllowed("viewer", "escalate")).toBe(false);
    expect(authorizer.isAllowed("approver", "approveAndMerge")).toBe(true);
    expect(authorizer.isAllowed("approver", "resolveEscalation")).toBe(false);
    expect(authorizer.isAllowed("mystery", "listSessions")).toBe(false);
  });
});
