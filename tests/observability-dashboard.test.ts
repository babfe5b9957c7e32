import { describe, expect, it } from "vitest";
import {
  type ItemReview,
  type ReviewSession,
  type SessionItem,
  asItemId,
  asReviewerId,
  asSessionId,
} from "../src/core/types";
import {
  buildCommandHelpLines,
  buildConflictLines,
  buildHistoryLines,
  buildSessionLines,
  buildSessionStatusLines,
} from "../src/observability/dashboard";

const item = (overrides: Partial<ItemReview> = {}): ItemReview => ({
  item_id: asItemId("page:intro"),
  item_title: "Intro",
  item_type: "page",
  passes: [],
  status: "approved",
  ...overrides,
});

const session = (overrides: Partial<ReviewSession> = {}): ReviewSession => ({
  session_id: asSessionId("ws-1"),
  record_id: "r-1",
  revision: 1,
  created_at: "2026-01-01T00:00:00.000Z",
  updated_at: "2026-01-01T00:00:00.000Z",
  items: {
    "page:intro": item(),
    "page:outro": item({ item_id: asItemId("page:outro"), status: "pending" }),
  },
  archived_at: null,
  merged_by: null,
  merge_reference: null,
  ...overrides,
});

const entry = (reviewItem: ItemReview): SessionItem => ({
  sessionId: asSessionId("ws-1"),
  createdAt: "2026-01-01T00:00:00.000Z",
  archivedAt: null,
  mergedBy: null,
  mergeReference: null,
  item: reviewItem,
});

describe("observability dashboard helpers", () => {
  it("builds session lines", () => {
    expect(buildSessionLines([])).toEqual(["No review sessions"]);
    expect(
      buildSessionLines([
        session(),
        session({
          session_id: asSessionId("ws-0"),
          archived_at: "2026-01-02T00:00:00.000Z",
          merge_reference: "c0ffee",
        }),
      ]),
    ).toEqual([
      "ws-1: 1/2 approved (active)",
      "ws-0: 1/2 approved (merged c0ffee)",
    ]);
  });

  it("builds status lines with blockers", () => {
    expect(
      buildSessionStatusLines({
        sessionId: asSessionId("ws-1"),
        totalItems: 2,
        approvedCount: 1,
        rejectedCount: 0,
        pendingCount: 0,
        escalatedItems: [asItemId("page:outro")],
        mergeable: false,
        blockers: [
          {
            itemId: asItemId("page:outro"),
            status: "escalation_pending",
            reason: "unresolved escalation",
          },
        ],
        archivedAt: null,
        mergeReference: null,
      }),
    ).toEqual([
      "session=ws-1",
      "items=2 approved=1 rejected=0 pending=0",
      "escalated=page:outro",
      "mergeable=false",
      "blocked: page:outro (unresolved escalation)",
    ]);
  });

  it("builds conflict and history lines", () => {
    const escalated = item({
      status: "escalation_pending",
      passes: [
        {
          pass_kind: "fact_check",
          reviewer_id: asReviewerId("r2"),
          decision: "rejected",
          reasoning: "date conflict",
          severity: "high",
          references: [],
          timestamp: "2026-01-01T00:00:00.000Z",
        },
      ],
      escalation: {
        status: "pending",
        reason: "date conflict",
        evidence: [],
        escalated_by: asReviewerId("r2"),
        escalated_at: "2026-01-01T00:00:00.000Z",
      },
    });

    expect(buildConflictLines([])).toEqual(["No open escalations"]);
    expect(buildConflictLines([entry(escalated)])).toEqual([
      "ws-1/page:intro: date conflict (by r2)",
    ]);
    expect(buildHistoryLines([entry(escalated)])).toEqual([
      "ws-1 (active): escalation_pending",
      "  fact_check r2: rejected [high]",
    ]);
    expect(buildHistoryLines([])).toEqual(["No review history"]);
  });

  it("lists the review commands", () => {
    expect(buildCommandHelpLines()).toContain("/review status <sessionId>");
  });
});
