import type { Logger } from "pino";
import {
  InvalidStateError,
  MergeConflictError,
  MergeTimeoutError,
  NotMergeableError,
} from "./errors";
import { type SessionStore, findMergeBlockers } from "./session-store";
import type {
  DriftEntry,
  RemoteSync,
  ReviewSession,
  VersionedWorkspace,
  WorkspaceMergeOutcome,
} from "./types";

export interface MergeCoordinatorDeps {
  store: SessionStore;
  workspace: VersionedWorkspace;
  remoteSync?: RemoteSync;
  logger: Logger;
  mergeTimeoutMs: number;
}

export interface MergeResult {
  session: ReviewSession;
  mergeReference: string;
  workspaceRemoved: boolean;
  drift: DriftEntry[] | null;
  driftError?: string;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class MergeCoordinator {
  constructor(private readonly deps: MergeCoordinatorDeps) {}

  /**
   * Re-validates consensus, merges the external workspace and archives the
   * session. Archival is the last irreversible step; anything failing before
   * it leaves the session active and the workspace in place.
   */
  async approveAndMerge(
    sessionId: string,
    approverId: string,
    summary: string,
  ): Promise<MergeResult> {
    const { store, logger } = this.deps;
    store.claimMerge(sessionId);
    try {
      const session = store.requireSession(sessionId);
      if (session.archived_at !== null) {
        throw new InvalidStateError(
          `Session ${sessionId} was already merged at ${session.archived_at}`,
        );
      }

      const blockers = findMergeBlockers(session);
      if (Object.keys(session.items).length === 0) {
        throw new NotMergeableError(
          `Session ${sessionId} has no reviewed items`,
          [],
        );
      }
      if (blockers.length > 0) {
        throw new NotMergeableError(
          `Session ${sessionId} has ${blockers.length} item(s) blocking merge`,
          blockers,
        );
      }

      logger.info({ sessionId, approverId }, "merge started");
      const outcome = await this.mergeWithTimeout(session, summary);
      if (outcome.status === "conflict") {
        logger.warn({ sessionId, details: outcome.details }, "merge conflict");
        throw new MergeConflictError(
          `Workspace ${sessionId} could not be merged cleanly`,
          outcome.details,
        );
      }

      const archived = await store.archive(sessionId, {
        mergedBy: approverId,
        mergeReference: outcome.commitRef,
        summary,
      });
      logger.info(
        { sessionId, mergeReference: outcome.commitRef },
        "session merged and archived",
      );

      const workspaceRemoved = await this.removeWorkspace(sessionId);
      return {
        session: archived,
        mergeReference: outcome.commitRef,
        workspaceRemoved,
        ...(await this.checkDrift(archived)),
      };
    } finally {
      store.releaseMerge(sessionId);
    }
  }

  private async mergeWithTimeout(
    session: ReviewSession,
    summary: string,
  ): Promise<WorkspaceMergeOutcome> {
    const { workspace, mergeTimeoutMs, logger } = this.deps;
    const sessionId = session.session_id;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        logger.warn({ sessionId, mergeTimeoutMs }, "merge timed out");
        // Reject before aborting so a merge that settles on abort loses the race.
        reject(
          new MergeTimeoutError(
            `Merge of ${sessionId} did not finish within ${mergeTimeoutMs}ms`,
            mergeTimeoutMs,
          ),
        );
        controller.abort();
      }, mergeTimeoutMs);
    });

    try {
      return await Promise.race([
        workspace.mergeWorkspace(sessionId, {
          summary,
          ...(session.base ? { base: session.base } : {}),
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async removeWorkspace(sessionId: string): Promise<boolean> {
    try {
      await this.deps.workspace.removeWorkspace(sessionId);
      return true;
    } catch (error) {
      this.deps.logger.warn(
        { sessionId, err: error },
        "workspace cleanup failed; archive kept",
      );
      return false;
    }
  }

  private async checkDrift(
    session: ReviewSession,
  ): Promise<Pick<MergeResult, "drift" | "driftError">> {
    const { remoteSync, logger } = this.deps;
    if (!remoteSync) {
      return { drift: null };
    }

    try {
      return { drift: await remoteSync.checkDrift(session.session_id) };
    } catch (error) {
      logger.warn(
        { sessionId: session.session_id, err: error },
        "remote drift check failed",
      );
      return { drift: null, driftError: describeError(error) };
    }
  }
}
