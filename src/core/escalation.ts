import { evaluateConsensus } from "./consensus";
import { InvalidStateError, InvariantViolationError } from "./errors";
import {
  HUMAN_OVERRIDE,
  type ItemReview,
  type ItemStatus,
  type ItemTypePolicy,
  type ReviewPass,
  type ReviewerId,
} from "./types";

const lastOverrideIndex = (passes: readonly ReviewPass[]): number => {
  for (let index = passes.length - 1; index >= 0; index -= 1) {
    if (passes[index]?.pass_kind === HUMAN_OVERRIDE) {
      return index;
    }
  }
  return -1;
};

/**
 * Status of an item as a pure function of its passes, its escalation record
 * and the policy for its type. Throws InvariantViolationError when the stored
 * state admits no status.
 */
export const deriveItemStatus = (
  item: ItemReview,
  policy: ItemTypePolicy,
): ItemStatus => {
  for (const pass of item.passes) {
    if (pass.decision !== "approved" && pass.decision !== "rejected") {
      throw new InvariantViolationError(
        `Item ${item.item_id} holds a pass with unknown decision "${String(pass.decision)}"`,
      );
    }
  }

  const overrideIndex = lastOverrideIndex(item.passes);
  const escalation = item.escalation;

  if (!escalation) {
    if (overrideIndex >= 0) {
      throw new InvariantViolationError(
        `Item ${item.item_id} has a human override without an escalation`,
      );
    }
    return evaluateConsensus(item.passes, policy);
  }

  if (escalation.status === "pending") {
    return "escalation_pending";
  }

  const override = item.passes[overrideIndex];
  if (!override) {
    throw new InvariantViolationError(
      `Item ${item.item_id} has a resolved escalation but no override pass`,
    );
  }

  return evaluateConsensus(item.passes, policy, {
    extraRequiredKinds: [HUMAN_OVERRIDE],
    outrankedBefore: override.decision === "approved" ? overrideIndex : 0,
  });
};

export interface EscalationInput {
  reason: string;
  evidence: string[];
  escalatedBy: ReviewerId;
  at: string;
}

/** Only a vetoed item may be escalated. */
export const escalateItem = (
  item: ItemReview,
  policy: ItemTypePolicy,
  input: EscalationInput,
): ItemReview => {
  const status = deriveItemStatus(item, policy);
  if (status !== "rejected") {
    throw new InvalidStateError(
      `Item ${item.item_id} is ${status}; only rejected items can be escalated`,
    );
  }

  return {
    ...item,
    status: "escalation_pending",
    escalation: {
      status: "pending",
      reason: input.reason,
      evidence: [...input.evidence],
      escalated_by: input.escalatedBy,
      escalated_at: input.at,
    },
  };
};

/**
 * Append a pass to an item. A human override resolves the pending escalation;
 * any other pass simply joins the history.
 */
export const appendPassToItem = (
  item: ItemReview,
  pass: ReviewPass,
  policy: ItemTypePolicy,
): ItemReview => {
  let escalation = item.escalation;

  if (pass.pass_kind === HUMAN_OVERRIDE) {
    if (!escalation || escalation.status !== "pending") {
      throw new InvalidStateError(
        `Item ${item.item_id} has no pending escalation to override`,
      );
    }
    escalation = {
      ...escalation,
      status:
        pass.decision === "approved" ? "resolved_approved" : "resolved_revise",
      resolved_by: pass.reviewer_id,
      resolved_at: pass.timestamp,
      resolution: pass.reasoning,
    };
  }

  const next: ItemReview = {
    ...item,
    passes: [...item.passes, pass],
    ...(escalation ? { escalation } : {}),
  };
  return { ...next, status: deriveItemStatus(next, policy) };
};

export const hasPendingEscalation = (item: ItemReview): boolean =>
  item.escalation?.status === "pending";
