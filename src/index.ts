export * from "./core/types";
export * from "./core/errors";
export { evaluateConsensus, latestPasses } from "./core/consensus";
export {
  appendPassToItem,
  deriveItemStatus,
  escalateItem,
  hasPendingEscalation,
} from "./core/escalation";
export {
  type ReviewPassInput,
  ReviewPassInputSchema,
  parseItemId,
  parseReviewPass,
} from "./core/review-pass";
export {
  SessionStore,
  type SessionStoreOptions,
  findMergeBlockers,
} from "./core/session-store";
export { MergeCoordinator, type MergeResult } from "./core/merge-coordinator";
export {
  ReviewEngine,
  type ReviewEngineDeps,
  type SubmitReviewInput,
} from "./core/review-engine";
export { createLogger } from "./observability/logger";
export {
  type ReviewBoardConfig,
  loadReviewBoardConfig,
} from "./project/config";
export { defaultWorkflowPolicy } from "./project/policy";
export { RoleAuthorizer, rolePermissions } from "./project/roles";
export { DriftCommandSync } from "./workspace/drift-command";
export { GitWorktreeWorkspace } from "./workspace/git-worktree";
