import type {
  ExtensionAPI,
  ExtensionCommandContext,
} from "@mariozechner/pi-coding-agent";
import { Type } from "@sinclair/typebox";
import { NotAuthorizedError, isReviewBoardError } from "../core/errors";
import { ReviewEngine } from "../core/review-engine";
import { ReviewPassInputSchema } from "../core/review-pass";
import { SessionStore } from "../core/session-store";
import type { ReviewContext } from "../core/types";
import {
  buildCommandHelpLines,
  buildConflictLines,
  buildHistoryLines,
  buildSessionLines,
  buildSessionStatusLines,
} from "../observability/dashboard";
import { type Logger, createLogger } from "../observability/logger";
import {
  type ReviewBoardConfig,
  loadReviewBoardConfig,
  resolveProjectPath,
} from "../project/config";
import { type Operation, RoleAuthorizer } from "../project/roles";
import { DriftCommandSync } from "../workspace/drift-command";
import { GitWorktreeWorkspace } from "../workspace/git-worktree";

type ToolPayload =
  | { ok: true; result: unknown }
  | { ok: false; [field: string]: unknown };

const asToolResult = <T>(payload: T) => ({
  content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
  details: payload,
});

const AgentIdParam = Type.String({ description: "Id of the calling agent" });
const SessionIdParam = Type.String({ description: "Review session id" });
const ItemIdParam = Type.String({
  description: "Reviewed item id (<contentType>:<contentId>)",
});

/** Caller used by the interactive `/review` command. */
const OPERATOR: ReviewContext = { callerId: "operator", role: "human" };

export interface ReviewBoardRuntime {
  config: ReviewBoardConfig;
  logger: Logger;
  store: SessionStore;
  engine: ReviewEngine;
  authorizer: RoleAuthorizer;
}

export interface ReviewBoardOptions {
  cwd?: string;
  logger?: Logger;
}

export const createReviewBoardRuntime = (
  pi: ExtensionAPI,
  options: ReviewBoardOptions = {},
): ReviewBoardRuntime => {
  const cwd = options.cwd ?? process.cwd();
  const config = loadReviewBoardConfig(cwd);
  const logger =
    options.logger ?? createLogger({ name: config.name, level: config.logLevel });

  const store = new SessionStore(resolveProjectPath(cwd, config.stateDir), {
    policy: config.workflow,
    logger,
  });
  store.ensure();

  const engine = new ReviewEngine({
    store,
    workspace: new GitWorktreeWorkspace(
      pi,
      cwd,
      resolveProjectPath(cwd, config.worktreeDir),
    ),
    ...(config.driftCommand
      ? { remoteSync: new DriftCommandSync(pi, config.driftCommand, cwd) }
      : {}),
    logger,
    baseBranch: config.baseBranch,
    mergeTimeoutMs: config.mergeTimeoutMs,
  });

  return {
    config,
    logger,
    store,
    engine,
    authorizer: new RoleAuthorizer(config.agents, config.defaultRole),
  };
};

export const registerReviewBoard = (
  pi: ExtensionAPI,
  options: ReviewBoardOptions = {},
): void => {
  let runtime: ReviewBoardRuntime | undefined;
  const initialize = (): ReviewBoardRuntime => {
    runtime ??= createReviewBoardRuntime(pi, options);
    return runtime;
  };

  /**
   * Checks the agent's role, runs the operation and turns domain errors into
   * `{ ok: false, error, message }` results. Anything else propagates.
   */
  const runAs = async (
    tool: string,
    agentId: string,
    operation: Operation,
    scope: string | undefined,
    work: (engine: ReviewEngine, context: ReviewContext) => unknown,
  ) => {
    let logger: Logger | undefined;
    let payload: ToolPayload;
    try {
      const current = initialize();
      logger = current.logger;
      if (!current.authorizer.isAllowed(agentId, operation, scope)) {
        throw new NotAuthorizedError(
          `Agent ${agentId} (${current.authorizer.roleOf(agentId)}) may not ${operation}${scope ? ` on ${scope}` : ""}`,
        );
      }
      const context: ReviewContext = {
        callerId: agentId,
        role: current.authorizer.roleOf(agentId),
      };
      payload = { ok: true, result: await work(current.engine, context) };
    } catch (error) {
      if (!isReviewBoardError(error)) {
        throw error;
      }
      logger?.warn(
        { tool, agentId, error: error.code, message: error.message },
        "review tool rejected",
      );
      payload = { ...error.toJSON(), ok: false };
    }
    return asToolResult(payload);
  };

  pi.on("session_start", async (_event, ctx) => {
    const active = initialize().store.listSessions();
    ctx.ui.setStatus(
      "review-board",
      `review-board: ${active.length} active session(s)`,
    );
  });

  pi.on("session_shutdown", async () => {
    runtime?.logger.flush();
  });

  pi.registerTool({
    name: "review_workspace_open",
    label: "Review Workspace Open",
    description:
      "Create an isolated workspace off the base branch and open a review session for it",
    parameters: Type.Object({
      agentId: AgentIdParam,
      base: Type.Optional(
        Type.String({ description: "Base branch; defaults to the project's" }),
      ),
      name: Type.Optional(Type.String({ description: "Workspace name hint" })),
    }),
    async execute(_toolCallId, params, _signal, _onUpdate, ctx) {
      const result = await runAs(
        "review_workspace_open",
        params.agentId,
        "openWorkspace",
        undefined,
        (engine, context) =>
          engine.openWorkspace(context, {
            ...(params.base ? { base: params.base } : {}),
            ...(params.name ? { name: params.name } : {}),
          }),
      );
      if (result.details.ok) {
        ctx.ui.notify("Review workspace opened", "info");
      }
      return result;
    },
  });

  pi.registerTool({
    name: "review_session_create",
    label: "Review Session Create",
    description: "Open a review session for an existing workspace",
    parameters: Type.Object({
      agentId: AgentIdParam,
      sessionId: SessionIdParam,
      base: Type.Optional(Type.String()),
    }),
    async execute(_toolCallId, params) {
      return runAs(
        "review_session_create",
        params.agentId,
        "createSession",
        undefined,
        (engine, context) =>
          engine.createSession(
            context,
            params.sessionId,
            params.base ? { base: params.base } : {},
          ),
      );
    },
  });

  pi.registerTool({
    name: "review_submit",
    label: "Review Submit",
    description:
      "Record a review pass (approve or reject) for an item in a session",
    parameters: Type.Composite([
      Type.Object({
        agentId: AgentIdParam,
        sessionId: SessionIdParam,
        passKind: Type.String({
          description: "Pass kind, e.g. style, fact_check, consistency",
        }),
        itemId: ItemIdParam,
        itemTitle: Type.Optional(Type.String()),
        itemType: Type.Optional(Type.String()),
      }),
      ReviewPassInputSchema,
    ]),
    async execute(_toolCallId, params) {
      const { agentId, sessionId, passKind, itemId, ...input } = params;
      return runAs(
        "review_submit",
        agentId,
        `submitReview:${passKind}`,
        itemId,
        (engine, context) =>
          engine.submitReview({ ...context, sessionId }, passKind, itemId, input),
      );
    },
  });

  pi.registerTool({
    name: "review_escalate",
    label: "Review Escalate",
    description: "Escalate a rejected item to a human reviewer",
    parameters: Type.Object({
      agentId: AgentIdParam,
      sessionId: SessionIdParam,
      itemId: ItemIdParam,
      reason: Type.String(),
      evidence: Type.Optional(Type.Array(Type.String())),
    }),
    async execute(_toolCallId, params) {
      return runAs(
        "review_escalate",
        params.agentId,
        "escalate",
        params.itemId,
        (engine, context) =>
          engine.escalate(
            context,
            params.sessionId,
            params.itemId,
            params.reason,
            params.evidence ?? [],
          ),
      );
    },
  });

  pi.registerTool({
    name: "review_resolve",
    label: "Review Resolve",
    description: "Resolve an escalated item with a human decision",
    parameters: Type.Object({
      agentId: AgentIdParam,
      sessionId: SessionIdParam,
      itemId: ItemIdParam,
      decision: Type.Union([Type.Literal("approved"), Type.Literal("rejected")]),
      reasoning: Type.String(),
    }),
    async execute(_toolCallId, params) {
      return runAs(
        "review_resolve",
        params.agentId,
        "resolveEscalation",
        params.itemId,
        (engine, context) =>
          engine.resolveEscalation(
            context,
            params.sessionId,
            params.itemId,
            params.decision,
            params.reasoning,
          ),
      );
    },
  });

  pi.registerTool({
    name: "review_item_history",
    label: "Review Item History",
    description: "Every session's review record for an item, oldest first",
    parameters: Type.Object({
      agentId: AgentIdParam,
      itemId: ItemIdParam,
      includeArchived: Type.Optional(Type.Boolean()),
    }),
    async execute(_toolCallId, params) {
      return runAs(
        "review_item_history",
        params.agentId,
        "getItemHistory",
        params.itemId,
        (engine, context) =>
          engine.getItemHistory(
            context,
            params.itemId,
            params.includeArchived ?? true,
          ),
      );
    },
  });

  pi.registerTool({
    name: "review_session_status",
    label: "Review Session Status",
    description: "Summarize a session's item statuses and merge readiness",
    parameters: Type.Object({
      agentId: AgentIdParam,
      sessionId: SessionIdParam,
    }),
    async execute(_toolCallId, params) {
      return runAs(
        "review_session_status",
        params.agentId,
        "getSessionStatus",
        undefined,
        (engine, context) => engine.getSessionStatus(context, params.sessionId),
      );
    },
  });

  pi.registerTool({
    name: "review_conflicts",
    label: "Review Conflicts",
    description: "List items waiting on a human decision",
    parameters: Type.Object({
      agentId: AgentIdParam,
      sessionId: Type.Optional(SessionIdParam),
    }),
    async execute(_toolCallId, params) {
      return runAs(
        "review_conflicts",
        params.agentId,
        "getConflicts",
        undefined,
        (engine, context) => engine.getConflicts(context, params.sessionId),
      );
    },
  });

  pi.registerTool({
    name: "review_sessions",
    label: "Review Sessions",
    description: "List review sessions",
    parameters: Type.Object({
      agentId: AgentIdParam,
      includeArchived: Type.Optional(Type.Boolean()),
    }),
    async execute(_toolCallId, params) {
      return runAs(
        "review_sessions",
        params.agentId,
        "listSessions",
        undefined,
        (engine, context) =>
          engine.listSessions(context, {
            includeArchived: params.includeArchived ?? false,
          }),
      );
    },
  });

  pi.registerTool({
    name: "review_approve_merge",
    label: "Review Approve Merge",
    description:
      "Merge a fully approved session's workspace into the shared baseline and archive it",
    parameters: Type.Object({
      agentId: AgentIdParam,
      sessionId: SessionIdParam,
      summary: Type.String({ description: "Merge commit message" }),
    }),
    async execute(_toolCallId, params, _signal, _onUpdate, ctx) {
      const result = await runAs(
        "review_approve_merge",
        params.agentId,
        "approveAndMerge",
        undefined,
        (engine, context) =>
          engine.approveAndMerge(context, params.sessionId, params.summary),
      );
      if (result.details.ok) {
        ctx.ui.notify(`Merged review session ${params.sessionId}`, "info");
      }
      return result;
    },
  });

  pi.registerCommand("review", {
    description: "Inspect review sessions",
    handler: async (args, ctx) => {
      await handleCommand(args, ctx, () => initialize().engine);
    },
  });
};

export const handleCommand = async (
  args: string,
  ctx: ExtensionCommandContext,
  getEngine: () => ReviewEngine,
): Promise<void> => {
  const [command, ...rest] = args.trim().split(/\s+/);

  try {
    if (!command || command === "sessions") {
      const sessions = getEngine().listSessions(OPERATOR, {
        includeArchived: rest[0] === "all",
      });
      ctx.ui.notify(`review: ${sessions.length} sessions`, "info");
      ctx.ui.setWidget("review-board", buildSessionLines(sessions));
      return;
    }

    if (command === "status") {
      const sessionId = rest[0];
      if (!sessionId) {
        ctx.ui.notify("usage: /review status <sessionId>", "warning");
        return;
      }
      ctx.ui.setWidget(
        "review-board",
        buildSessionStatusLines(getEngine().getSessionStatus(OPERATOR, sessionId)),
      );
      return;
    }

    if (command === "conflicts") {
      const conflicts = getEngine().getConflicts(OPERATOR, rest[0]);
      ctx.ui.notify(`review: ${conflicts.length} open escalations`, "info");
      ctx.ui.setWidget("review-board", buildConflictLines(conflicts));
      return;
    }

    if (command === "history") {
      const itemId = rest[0];
      if (!itemId) {
        ctx.ui.notify("usage: /review history <itemId>", "warning");
        return;
      }
      ctx.ui.setWidget(
        "review-board",
        buildHistoryLines(getEngine().getItemHistory(OPERATOR, itemId)),
      );
      return;
    }

    if (command === "help") {
      ctx.ui.setWidget("review-board", buildCommandHelpLines());
      return;
    }

    ctx.ui.notify(`unknown review command: ${command}`, "warning");
  } catch (error) {
    if (!isReviewBoardError(error)) {
      throw error;
    }
    ctx.ui.notify(`review ${command}: ${error.message}`, "error");
  }
};

export default function (pi: ExtensionAPI): void {
  registerReviewBoard(pi);
}
