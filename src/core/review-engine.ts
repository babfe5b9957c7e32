import type { Logger } from "pino";
import { ValidationError } from "./errors";
import { type MergeResult, MergeCoordinator } from "./merge-coordinator";
import type { ReviewPassInput } from "./review-pass";
import type { SessionStore } from "./session-store";
import {
  type Decision,
  HUMAN_OVERRIDE,
  type ItemMetadata,
  type ItemReview,
  type PassKind,
  type RemoteSync,
  type ReviewContext,
  type ReviewSession,
  type ReviewerId,
  type SessionItem,
  type SessionStatusSummary,
  type VersionedWorkspace,
  asReviewerId,
} from "./types";

export interface ReviewEngineDeps {
  store: SessionStore;
  workspace: VersionedWorkspace;
  remoteSync?: RemoteSync;
  logger: Logger;
  baseBranch: string;
  mergeTimeoutMs: number;
}

export type SubmitReviewInput = ReviewPassInput & ItemMetadata;

const requireCaller = (context: ReviewContext): ReviewerId => {
  if (!context.callerId.trim()) {
    throw new ValidationError("Caller id is required");
  }
  return asReviewerId(context.callerId);
};

const requireContextSession = (context: ReviewContext): string => {
  if (!context.sessionId) {
    throw new ValidationError(
      "No session in caller context; pass the workspace session id",
    );
  }
  return context.sessionId;
};

/**
 * The public operation set. Authorization is the caller's concern; every
 * operation takes the caller's identity explicitly.
 */
export class ReviewEngine {
  private readonly merges: MergeCoordinator;

  constructor(private readonly deps: ReviewEngineDeps) {
    this.merges = new MergeCoordinator({
      store: deps.store,
      workspace: deps.workspace,
      logger: deps.logger,
      mergeTimeoutMs: deps.mergeTimeoutMs,
      ...(deps.remoteSync ? { remoteSync: deps.remoteSync } : {}),
    });
  }

  async createSession(
    context: ReviewContext,
    sessionId: string,
    options: { base?: string } = {},
  ): Promise<ReviewSession> {
    requireCaller(context);
    return this.deps.store.createSession(sessionId, options);
  }

  /** Creates an external workspace and the session that tracks it. */
  async openWorkspace(
    context: ReviewContext,
    options: { base?: string; name?: string } = {},
  ): Promise<ReviewSession> {
    const caller = requireCaller(context);
    const base = options.base ?? this.deps.baseBranch;
    const workspaceId = await this.deps.workspace.createWorkspace(
      base,
      options.name ?? caller,
    );
    this.deps.logger.info({ workspaceId, base, caller }, "workspace opened");
    return this.deps.store.createSession(workspaceId, { base });
  }

  async submitReview(
    context: ReviewContext,
    passKind: PassKind,
    itemId: string,
    input: SubmitReviewInput,
  ): Promise<ItemReview> {
    const reviewerId = requireCaller(context);
    const sessionId = requireContextSession(context);
    const { itemTitle, itemType, ...pass } = input;

    return this.deps.store.appendPass(
      sessionId,
      itemId,
      {
        ...(itemTitle ? { itemTitle } : {}),
        ...(itemType ? { itemType } : {}),
      },
      {
        passKind,
        reviewerId,
        input: {
          ...pass,
          ...(context.role && !pass.reviewerRole
            ? { reviewerRole: context.role }
            : {}),
        },
      },
    );
  }

  async escalate(
    context: ReviewContext,
    sessionId: string,
    itemId: string,
    reason: string,
    evidence: string[] = [],
  ): Promise<ItemReview> {
    const caller = requireCaller(context);
    if (!reason.trim()) {
      throw new ValidationError("An escalation needs a reason");
    }
    return this.deps.store.escalate(sessionId, itemId, {
      reason,
      evidence,
      escalatedBy: caller,
    });
  }

  /** Records the human decision on an escalated item as an override pass. */
  async resolveEscalation(
    context: ReviewContext,
    sessionId: string,
    itemId: string,
    decision: Decision,
    reasoning: string,
  ): Promise<ItemReview> {
    const item = await this.submitReview(
      { ...context, sessionId },
      HUMAN_OVERRIDE,
      itemId,
      { decision, reasoning },
    );
    this.deps.logger.info(
      { sessionId, itemId, decision, resolvedBy: context.callerId },
      "escalation resolved",
    );
    return item;
  }

  getItemHistory(
    context: ReviewContext,
    itemId: string,
    includeArchived = true,
  ): SessionItem[] {
    requireCaller(context);
    return this.deps.store.getItemHistory(itemId, includeArchived);
  }

  getSessionStatus(
    context: ReviewContext,
    sessionId: string,
  ): SessionStatusSummary {
    requireCaller(context);
    return this.deps.store.getSessionStatus(sessionId);
  }

  getConflicts(context: ReviewContext, sessionId?: string): SessionItem[] {
    requireCaller(context);
    return this.deps.store.getConflicts(sessionId);
  }

  listSessions(
    context: ReviewContext,
    options: { includeArchived?: boolean } = {},
  ): ReviewSession[] {
    requireCaller(context);
    return this.deps.store.listSessions(options);
  }

  async approveAndMerge(
    context: ReviewContext,
    sessionId: string,
    summary: string,
  ): Promise<MergeResult> {
    const approver = requireCaller(context);
    return this.merges.approveAndMerge(sessionId, approver, summary);
  }
}
