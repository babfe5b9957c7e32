export type Brand<T, B extends string> = T & { readonly __brand: B };

export type SessionId = Brand<string, "SessionId">;
export type ItemId = Brand<string, "ItemId">;
export type ReviewerId = Brand<string, "ReviewerId">;

export const asSessionId = (value: string): SessionId => value as SessionId;
export const asItemId = (value: string): ItemId => value as ItemId;
export const asReviewerId = (value: string): ReviewerId => value as ReviewerId;

export type Decision = "approved" | "rejected";
export type Severity = "low" | "medium" | "high";

/**
 * Pass kinds are an open set driven by the active workflow policy. The only
 * kind the engine itself knows about is the human override used to resolve
 * escalations.
 */
export type PassKind = string;
export const HUMAN_OVERRIDE: PassKind = "human_override";

export type ConsensusStatus = "pending" | "approved" | "rejected";
export type ItemStatus = ConsensusStatus | "escalation_pending";
export type EscalationStatus = "pending" | "resolved_approved" | "resolved_revise";

export interface ReviewPass {
  readonly pass_kind: PassKind;
  readonly reviewer_id: ReviewerId;
  readonly reviewer_role?: string;
  readonly decision: Decision;
  readonly reasoning: string;
  /** Only present on rejected passes. */
  readonly severity?: Severity;
  readonly references: readonly ItemId[];
  readonly timestamp: string;
}

export type ReviewPassDraft = Omit<ReviewPass, "timestamp">;

export interface Escalation {
  status: EscalationStatus;
  reason: string;
  evidence: string[];
  escalated_by: ReviewerId;
  escalated_at: string;
  resolved_by?: ReviewerId;
  resolved_at?: string;
  resolution?: string;
}

export interface ItemReview {
  item_id: ItemId;
  item_title: string;
  item_type: string;
  /** Acceptance order; never reordered. */
  passes: ReviewPass[];
  status: ItemStatus;
  escalation?: Escalation;
}

export interface ItemMetadata {
  itemTitle?: string;
  itemType?: string;
}

export interface ReviewSession {
  session_id: SessionId;
  record_id: string;
  revision: number;
  created_at: string;
  updated_at: string;
  base?: string;
  items: Record<string, ItemReview>;
  archived_at: string | null;
  merged_by: string | null;
  merge_reference: string | null;
  merge_summary?: string;
  flagged?: {
    reason: string;
    flagged_at: string;
  };
}

export interface ItemTypePolicy {
  requiredPasses: PassKind[];
  requiredApprovals: number;
}

/** Keyed by item type (e.g. "page", "quiz"). */
export type WorkflowPolicy = Record<string, ItemTypePolicy>;

export interface ReviewContext {
  callerId: string;
  role?: string;
  /** Workspace the caller is operating in. */
  sessionId?: string;
}

export interface SessionItem {
  sessionId: SessionId;
  createdAt: string;
  archivedAt: string | null;
  mergedBy: string | null;
  mergeReference: string | null;
  item: ItemReview;
}

export interface MergeBlocker {
  itemId: ItemId;
  status: ItemStatus;
  reason: string;
}

export interface SessionStatusSummary {
  sessionId: SessionId;
  totalItems: number;
  approvedCount: number;
  rejectedCount: number;
  pendingCount: number;
  escalatedItems: ItemId[];
  mergeable: boolean;
  blockers: MergeBlocker[];
  archivedAt: string | null;
  mergeReference: string | null;
}

// --- External collaborators ---

export type WorkspaceMergeOutcome =
  | { status: "merged"; commitRef: string }
  | { status: "conflict"; details: string };

export interface WorkspaceMergeOptions {
  summary: string;
  base?: string;
  signal?: AbortSignal;
}

export interface VersionedWorkspace {
  createWorkspace(base: string, name?: string): Promise<string>;
  /** `base` is the branch the workspace was opened from, when recorded. */
  mergeWorkspace(
    workspaceId: string,
    options: WorkspaceMergeOptions,
  ): Promise<WorkspaceMergeOutcome>;
  removeWorkspace(workspaceId: string): Promise<void>;
}

export interface DriftEntry {
  itemId: string;
  reason: string;
}

export interface RemoteSync {
  checkDrift(sessionId: SessionId): Promise<DriftEntry[]>;
}

export interface Authorizer {
  isAllowed(agentId: string, operation: string, scope?: string): boolean;
}
