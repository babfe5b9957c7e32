import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError } from "./errors";
import {
  HUMAN_OVERRIDE,
  type ItemId,
  type ItemTypePolicy,
  type PassKind,
  type ReviewPass,
  type ReviewPassDraft,
  type ReviewerId,
  asItemId,
} from "./types";

export const ReviewPassInputSchema = Type.Object({
  decision: Type.Union([Type.Literal("approved"), Type.Literal("rejected")]),
  reasoning: Type.String({ description: "Why the reviewer decided this way" }),
  severity: Type.Optional(
    Type.Union([
      Type.Literal("low"),
      Type.Literal("medium"),
      Type.Literal("high"),
    ]),
  ),
  references: Type.Optional(
    Type.Array(Type.String(), {
      description: "Item ids cited as evidence (<contentType>:<contentId>)",
    }),
  ),
  reviewerRole: Type.Optional(Type.String()),
});

export type ReviewPassInput = Static<typeof ReviewPassInputSchema>;

const ITEM_ID_PATTERN = /^([^\s:]+):(\S+)$/;

export const parseItemId = (
  value: string,
): { itemId: ItemId; contentType: string; contentId: string } => {
  const match = ITEM_ID_PATTERN.exec(value);
  if (!match?.[1] || !match[2]) {
    throw new ValidationError(
      `Invalid item id "${value}": expected <contentType>:<contentId>`,
    );
  }
  return { itemId: asItemId(value), contentType: match[1], contentId: match[2] };
};

export const isKnownPassKind = (
  passKind: PassKind,
  policy: ItemTypePolicy,
): boolean =>
  passKind === HUMAN_OVERRIDE || policy.requiredPasses.includes(passKind);

/**
 * Validate raw pass input against the item type's policy. The result has no
 * timestamp yet; the store stamps it at acceptance time.
 */
export const parseReviewPass = (
  passKind: PassKind,
  reviewerId: ReviewerId,
  input: unknown,
  policy: ItemTypePolicy,
): ReviewPassDraft => {
  if (!Value.Check(ReviewPassInputSchema, input)) {
    const problems = [...Value.Errors(ReviewPassInputSchema, input)]
      .slice(0, 3)
      .map((error) => `${error.path || "/"} ${error.message}`);
    throw new ValidationError(`Malformed review pass: ${problems.join("; ")}`);
  }

  if (!reviewerId.trim()) {
    throw new ValidationError("Review pass requires a reviewer id");
  }

  if (!isKnownPassKind(passKind, policy)) {
    throw new ValidationError(
      `Pass kind "${passKind}" is not recognized; expected one of ${[
        ...policy.requiredPasses,
        HUMAN_OVERRIDE,
      ].join(", ")}`,
    );
  }

  if (input.decision === "rejected" && !input.reasoning.trim()) {
    throw new ValidationError("A rejected pass must explain its reasoning");
  }

  const references = (input.references ?? []).map(
    (reference) => parseItemId(reference).itemId,
  );

  return Object.freeze({
    pass_kind: passKind,
    reviewer_id: reviewerId,
    ...(input.reviewerRole ? { reviewer_role: input.reviewerRole } : {}),
    decision: input.decision,
    reasoning: input.reasoning,
    ...(input.decision === "rejected" && input.severity
      ? { severity: input.severity }
      : {}),
    references: Object.freeze(references),
  });
};

export const stampReviewPass = (
  draft: ReviewPassDraft,
  timestamp: string,
): ReviewPass => Object.freeze({ ...draft, timestamp });
