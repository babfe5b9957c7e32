import type {
  ConsensusStatus,
  ItemTypePolicy,
  PassKind,
  ReviewPass,
  ReviewerId,
} from "./types";

export interface SurvivingPass {
  pass: ReviewPass;
  /** Position in the item's acceptance-ordered pass list. */
  index: number;
}

export interface ConsensusOptions {
  /**
   * Rejections accepted before this index no longer veto. They still count
   * as the presence of their kind. Used after an approving human override.
   */
  outrankedBefore?: number;
  /** Kinds required in addition to the policy's own. */
  extraRequiredKinds?: PassKind[];
}

/**
 * Latest pass per (reviewer, kind). "Latest" is acceptance order, not the
 * caller's timestamp.
 */
export const latestPasses = (
  passes: readonly ReviewPass[],
): Map<string, SurvivingPass> => {
  const latest = new Map<string, SurvivingPass>();
  passes.forEach((pass, index) => {
    latest.set(`${pass.reviewer_id}\u0000${pass.pass_kind}`, { pass, index });
  });
  return latest;
};

export const evaluateConsensus = (
  passes: readonly ReviewPass[],
  policy: ItemTypePolicy,
  options: ConsensusOptions = {},
): ConsensusStatus => {
  const required = new Set<PassKind>([
    ...policy.requiredPasses,
    ...(options.extraRequiredKinds ?? []),
  ]);
  const outrankedBefore = options.outrankedBefore ?? 0;

  const byKind = new Map<PassKind, SurvivingPass[]>();
  for (const surviving of latestPasses(passes).values()) {
    if (!required.has(surviving.pass.pass_kind)) {
      continue;
    }
    const bucket = byKind.get(surviving.pass.pass_kind) ?? [];
    bucket.push(surviving);
    byKind.set(surviving.pass.pass_kind, bucket);
  }

  for (const kind of required) {
    if ((byKind.get(kind)?.length ?? 0) === 0) {
      return "pending";
    }
  }

  const surviving = [...byKind.values()].flat();
  const vetoed = surviving.some(
    ({ pass, index }) =>
      pass.decision === "rejected" && index >= outrankedBefore,
  );
  if (vetoed) {
    return "rejected";
  }

  const approvers = new Set<ReviewerId>(
    surviving
      .filter(({ pass }) => pass.decision === "approved")
      .map(({ pass }) => pass.reviewer_id),
  );
  return approvers.size >= policy.requiredApprovals ? "approved" : "pending";
};
