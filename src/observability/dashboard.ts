import type {
  ReviewSession,
  SessionItem,
  SessionStatusSummary,
} from "../core/types";

export const buildSessionLines = (sessions: ReviewSession[]): string[] =>
  sessions.length > 0
    ? sessions.map((session) => {
        const items = Object.values(session.items);
        const approved = items.filter(
          (item) => item.status === "approved",
        ).length;
        const state = session.archived_at
          ? `merged ${session.merge_reference ?? "?"}`
          : "active";
        return `${session.session_id}: ${approved}/${items.length} approved (${state})`;
      })
    : ["No review sessions"];

export const buildSessionStatusLines = (
  status: SessionStatusSummary,
): string[] => {
  const lines = [
    `session=${status.sessionId}`,
    `items=${status.totalItems} approved=${status.approvedCount} rejected=${status.rejectedCount} pending=${status.pendingCount}`,
    `escalated=${status.escalatedItems.length > 0 ? status.escalatedItems.join(",") : "none"}`,
    `mergeable=${status.mergeable}`,
  ];

  if (status.archivedAt) {
    lines.push(`archived=${status.archivedAt} ref=${status.mergeReference}`);
  }

  for (const blocker of status.blockers) {
    lines.push(`blocked: ${blocker.itemId} (${blocker.reason})`);
  }

  return lines;
};

export const buildConflictLines = (conflicts: SessionItem[]): string[] =>
  conflicts.length > 0
    ? conflicts.map(
        ({ sessionId, item }) =>
          `${sessionId}/${item.item_id}: ${item.escalation?.reason ?? "escalated"} (by ${item.escalation?.escalated_by ?? "?"})`,
      )
    : ["No open escalations"];

export const buildHistoryLines = (history: SessionItem[]): string[] => {
  if (history.length === 0) {
    return ["No review history"];
  }

  return history.flatMap(({ sessionId, archivedAt, item }) => [
    `${sessionId} ${archivedAt ? "(archived)" : "(active)"}: ${item.status}`,
    ...item.passes
      .slice(-5)
      .map(
        (pass) =>
          `  ${pass.pass_kind} ${pass.reviewer_id}: ${pass.decision}${pass.severity ? ` [${pass.severity}]` : ""}`,
      ),
  ]);
};

export const buildCommandHelpLines = (): string[] => [
  "/review sessions [all]",
  "/review status <sessionId>",
  "/review conflicts [sessionId]",
  "/review history <itemId>",
  "/review help",
];
