import fs from "node:fs";
import path from "node:path";
import { createJiti } from "jiti";
import { parse as parseYaml } from "yaml";
import { ValidationError } from "../core/errors";
import type { WorkflowPolicy } from "../core/types";
import { defaultWorkflowPolicy, normalizeWorkflowPolicy } from "./policy";

export interface AgentGrant {
  role: string;
  /** Item-id globs the agent may act on. Empty means unrestricted. */
  scope: string[];
}

export interface ReviewBoardConfig {
  name: string;
  baseBranch: string;
  /** Relative paths resolve against the project directory. */
  stateDir: string;
  worktreeDir: string;
  mergeTimeoutMs: number;
  logLevel: string;
  /**
   * Shell command printing a JSON array of `{ itemId, reason }` drift
   * entries. Run once after every successful merge.
   */
  driftCommand?: string;
  /** Role for agents missing from the roster. Only the roster grants `human`. */
  defaultRole: string;
  agents: Record<string, AgentGrant>;
  workflow: WorkflowPolicy;
}

export const CONFIG_DIR = ".review-board";

export const defaultReviewBoardConfig: ReviewBoardConfig = {
  name: "unknown-project",
  baseBranch: "main",
  stateDir: CONFIG_DIR,
  worktreeDir: path.join(CONFIG_DIR, "worktrees"),
  mergeTimeoutMs: 120_000,
  logLevel: "info",
  defaultRole: "reader",
  agents: {},
  workflow: defaultWorkflowPolicy,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const stringOr = (value: unknown, fallback: string): string =>
  typeof value === "string" && value.trim().length > 0 ? value : fallback;

const normalizeAgentGrant = (entry: unknown): AgentGrant | null => {
  if (!isRecord(entry) || typeof entry.role !== "string") return null;
  return {
    role: entry.role,
    scope: Array.isArray(entry.scope)
      ? entry.scope.filter((s): s is string => typeof s === "string")
      : [],
  };
};

const normalizeAgents = (raw: unknown): Record<string, AgentGrant> => {
  if (!isRecord(raw)) return {};
  const result: Record<string, AgentGrant> = {};
  for (const [agentId, value] of Object.entries(raw)) {
    const grant = normalizeAgentGrant(value);
    if (grant) result[agentId] = grant;
  }
  return result;
};

const normalizeConfig = (parsed: unknown): ReviewBoardConfig => {
  if (!isRecord(parsed)) {
    return defaultReviewBoardConfig;
  }

  const timeout = parsed.mergeTimeoutMs;
  return {
    name: stringOr(parsed.name, defaultReviewBoardConfig.name),
    baseBranch: stringOr(parsed.baseBranch, defaultReviewBoardConfig.baseBranch),
    stateDir: stringOr(parsed.stateDir, defaultReviewBoardConfig.stateDir),
    worktreeDir: stringOr(
      parsed.worktreeDir,
      defaultReviewBoardConfig.worktreeDir,
    ),
    mergeTimeoutMs:
      typeof timeout === "number" && Number.isFinite(timeout) && timeout > 0
        ? timeout
        : defaultReviewBoardConfig.mergeTimeoutMs,
    logLevel: stringOr(parsed.logLevel, defaultReviewBoardConfig.logLevel),
    ...(typeof parsed.driftCommand === "string" && parsed.driftCommand.trim()
      ? { driftCommand: parsed.driftCommand }
      : {}),
    defaultRole: stringOr(
      parsed.defaultRole,
      defaultReviewBoardConfig.defaultRole,
    ),
    agents: normalizeAgents(parsed.agents),
    workflow: {
      ...defaultWorkflowPolicy,
      ...normalizeWorkflowPolicy(parsed.workflow),
    },
  };
};

const loadProjectFile = (cwd: string): unknown => {
  const tsPath = path.join(cwd, CONFIG_DIR, "project.ts");
  if (fs.existsSync(tsPath)) {
    try {
      const jiti = createJiti(import.meta.url);
      const loaded: unknown = jiti(tsPath);
      return isRecord(loaded) && "default" in loaded
        ? (loaded.default ?? loaded)
        : loaded;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Failed to load ${tsPath}: ${message}`);
    }
  }

  const jsonPath = path.join(cwd, CONFIG_DIR, "project.json");
  if (!fs.existsSync(jsonPath)) {
    return undefined;
  }

  try {
    return JSON.parse(fs.readFileSync(jsonPath, "utf8")) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Failed to parse ${jsonPath}: ${message}`);
  }
};

const loadWorkflowYaml = (cwd: string): WorkflowPolicy | undefined => {
  const yamlPath = path.join(cwd, CONFIG_DIR, "workflow.yaml");
  if (!fs.existsSync(yamlPath)) {
    return undefined;
  }

  try {
    return normalizeWorkflowPolicy(parseYaml(fs.readFileSync(yamlPath, "utf8")));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Failed to parse ${yamlPath}: ${message}`);
  }
};

/**
 * `.review-board/project.ts` wins over `project.json`; `workflow.yaml`
 * entries override the project file's workflow per item type.
 */
export const loadReviewBoardConfig = (
  cwd: string,
  env: Record<string, string | undefined> = process.env,
): ReviewBoardConfig => {
  const config = normalizeConfig(loadProjectFile(cwd));
  const yamlWorkflow = loadWorkflowYaml(cwd);

  return {
    ...config,
    ...(env.LOG_LEVEL ? { logLevel: env.LOG_LEVEL } : {}),
    workflow: { ...config.workflow, ...yamlWorkflow },
  };
};

export const resolveProjectPath = (cwd: string, target: string): string =>
  path.isAbsolute(target) ? target : path.join(cwd, target);
