import { ValidationError } from "../core/errors";
import type { ItemTypePolicy, WorkflowPolicy } from "../core/types";

export const defaultWorkflowPolicy: WorkflowPolicy = {
  page: {
    requiredPasses: ["style", "fact_check", "consistency"],
    requiredApprovals: 1,
  },
  quiz: {
    requiredPasses: ["style", "fact_check", "consistency"],
    requiredApprovals: 2,
  },
  assignment: {
    requiredPasses: ["fact_check", "consistency", "style"],
    requiredApprovals: 2,
  },
  rubric: {
    requiredPasses: ["consistency", "style"],
    requiredApprovals: 1,
  },
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "string");

/**
 * Accepts both the camelCase shape used in project.ts/project.json and the
 * snake_case shape used in workflow.yaml.
 */
const normalizeItemTypePolicy = (raw: unknown): ItemTypePolicy | null => {
  if (!isRecord(raw)) return null;
  const passes = raw.requiredPasses ?? raw.required_passes;
  const approvals = raw.requiredApprovals ?? raw.required_approvals;
  if (!isStringArray(passes) || passes.length === 0) return null;
  if (passes.some((kind) => kind.trim().length === 0)) return null;
  if (
    typeof approvals !== "number" ||
    !Number.isInteger(approvals) ||
    approvals < 1
  )
    return null;
  return { requiredPasses: [...new Set(passes)], requiredApprovals: approvals };
};

export const normalizeWorkflowPolicy = (
  raw: unknown,
): WorkflowPolicy | undefined => {
  if (!isRecord(raw)) return undefined;
  const result: WorkflowPolicy = {};
  for (const [itemType, value] of Object.entries(raw)) {
    const policy = normalizeItemTypePolicy(value);
    if (policy) result[itemType] = policy;
  }
  return Object.keys(result).length > 0 ? result : undefined;
};

export const policyForItemType = (
  policy: WorkflowPolicy,
  itemType: string,
): ItemTypePolicy => {
  const entry = Object.hasOwn(policy, itemType) ? policy[itemType] : undefined;
  if (!entry) {
    throw new ValidationError(
      `No workflow policy for item type "${itemType}" (known: ${Object.keys(policy).join(", ") || "none"})`,
    );
  }
  return entry;
};
