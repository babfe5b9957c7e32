import { minimatch } from "minimatch";
import type { Authorizer } from "../core/types";
import type { AgentGrant } from "./config";

export type Operation =
  | "createSession"
  | "openWorkspace"
  | `submitReview:${string}`
  | "escalate"
  | "resolveEscalation"
  | "getItemHistory"
  | "getSessionStatus"
  | "getConflicts"
  | "listSessions"
  | "approveAndMerge";

const READ_OPERATIONS: Operation[] = [
  "getItemHistory",
  "getSessionStatus",
  "getConflicts",
  "listSessions",
];

/** `submitReview:*` grants every pass kind. */
export const rolePermissions: Record<string, Operation[]> = {
  reader: READ_OPERATIONS,
  content_agent: [...READ_OPERATIONS, "createSession", "openWorkspace"],
  style_agent: [...READ_OPERATIONS, "submitReview:style"],
  fact_check_agent: [...READ_OPERATIONS, "submitReview:fact_check"],
  consistency_agent: [...READ_OPERATIONS, "submitReview:consistency"],
  approval_agent: [
    ...READ_OPERATIONS,
    "submitReview:style",
    "submitReview:fact_check",
    "submitReview:consistency",
    "escalate",
    "approveAndMerge",
  ],
  human: [
    ...READ_OPERATIONS,
    "createSession",
    "openWorkspace",
    "submitReview:*",
    "escalate",
    "resolveEscalation",
    "approveAndMerge",
  ],
};

export class RoleAuthorizer implements Authorizer {
  constructor(
    private readonly agents: Record<string, AgentGrant>,
    private readonly defaultRole: string,
  ) {}

  roleOf(agentId: string): string {
    return this.agents[agentId]?.role ?? this.defaultRole;
  }

  isAllowed(agentId: string, operation: string, scope?: string): boolean {
    const permissions = rolePermissions[this.roleOf(agentId)] ?? [];
    const granted = permissions.some(
      (permission) =>
        permission === operation ||
        (permission === "submitReview:*" &&
          operation.startsWith("submitReview:")),
    );
    if (!granted) {
      return false;
    }

    const globs = this.agents[agentId]?.scope ?? [];
    if (!scope || globs.length === 0) {
      return true;
    }
    return globs.some((glob) => minimatch(scope, glob));
  }
}
