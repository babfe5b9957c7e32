import fs from "node:fs";
import path from "node:path";
import { nanoid } from "nanoid";
import type { Logger } from "pino";
import { policyForItemType } from "../project/policy";
import {
  ConcurrencyError,
  ConflictError,
  InvalidStateError,
  InvariantViolationError,
  NotFoundError,
  StorageError,
  ValidationError,
} from "./errors";
import {
  type EscalationInput,
  appendPassToItem,
  deriveItemStatus,
  escalateItem,
  hasPendingEscalation,
} from "./escalation";
import { parseItemId, parseReviewPass, stampReviewPass } from "./review-pass";
import {
  type ItemId,
  type ItemMetadata,
  type ItemReview,
  type MergeBlocker,
  type PassKind,
  type ReviewSession,
  type ReviewerId,
  type SessionId,
  type SessionItem,
  type SessionStatusSummary,
  type WorkflowPolicy,
  asSessionId,
} from "./types";
import { KeyedLock } from "./keyed-lock";

export interface SessionStoreOptions {
  policy: WorkflowPolicy;
  logger: Logger;
  now?: () => Date;
  /** Attempts before a write that keeps losing to another writer gives up. */
  maxWriteAttempts?: number;
}

export interface PassSubmission {
  passKind: PassKind;
  reviewerId: ReviewerId;
  input: unknown;
}

export interface ArchiveInput {
  mergedBy: string;
  mergeReference: string;
  summary: string;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

export const parseSessionId = (value: string): SessionId => {
  if (!SESSION_ID_PATTERN.test(value)) {
    throw new ValidationError(
      `Invalid session id "${value}": use letters, digits, ".", "_" or "-"`,
    );
  }
  return asSessionId(value);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/**
 * Items blocking a merge. An item blocks unless its status is approved and it
 * has no unresolved escalation.
 */
export const findMergeBlockers = (session: ReviewSession): MergeBlocker[] =>
  Object.values(session.items).flatMap((item): MergeBlocker[] => {
    if (hasPendingEscalation(item)) {
      return [
        {
          itemId: item.item_id,
          status: item.status,
          reason: "unresolved escalation",
        },
      ];
    }
    if (item.status !== "approved") {
      return [
        {
          itemId: item.item_id,
          status: item.status,
          reason: `status is ${item.status}`,
        },
      ];
    }
    return [];
  });

/**
 * File-backed session records, one JSON file per record under
 * `<root>/sessions/<sessionId>/<recordId>.json`. Writes are serialized per
 * session and land via rename, so readers always see a whole record.
 */
export class SessionStore {
  private readonly locks = new KeyedLock();
  private readonly merging = new Set<SessionId>();
  private readonly now: () => Date;
  private readonly maxWriteAttempts: number;

  constructor(
    private readonly rootDir: string,
    private readonly options: SessionStoreOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.maxWriteAttempts = options.maxWriteAttempts ?? 3;
  }

  ensure(): void {
    fs.mkdirSync(this.sessionsDir(), { recursive: true });
  }

  sessionsDir(): string {
    return path.join(this.rootDir, "sessions");
  }

  sessionDir(sessionId: SessionId): string {
    return path.join(this.sessionsDir(), sessionId);
  }

  recordPath(sessionId: SessionId, recordId: string): string {
    return path.join(this.sessionDir(sessionId), `${recordId}.json`);
  }

  // --- reads ---

  /** The active session, or the most recently created archived one. */
  loadSession(sessionId: string): ReviewSession | null {
    const records = this.readRecords(parseSessionId(sessionId));
    const active = this.pickActive(records);
    const latest = active ?? records.at(-1);
    return latest ? this.checkedView(latest) : null;
  }

  requireSession(sessionId: string): ReviewSession {
    const session = this.loadSession(sessionId);
    if (!session) {
      throw new NotFoundError(`Unknown session: ${sessionId}`);
    }
    return session;
  }

  listSessions(options: { includeArchived?: boolean } = {}): ReviewSession[] {
    const dir = this.sessionsDir();
    if (!fs.existsSync(dir)) {
      return [];
    }

    return fs
      .readdirSync(dir)
      .filter((entry) => SESSION_ID_PATTERN.test(entry))
      .flatMap((entry) => this.readRecords(asSessionId(entry), true))
      .filter((session) => options.includeArchived || !session.archived_at)
      .flatMap((session) => {
        try {
          return [this.checkedView(session)];
        } catch (error) {
          if (
            !(error instanceof InvariantViolationError) &&
            !(error instanceof StorageError)
          ) {
            throw error;
          }
          this.options.logger.error(
            { sessionId: session.session_id, err: error },
            "skipping session that failed its invariants",
          );
          return [];
        }
      })
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  getItemHistory(itemId: string, includeArchived: boolean): SessionItem[] {
    const { itemId: id } = parseItemId(itemId);
    return this.listSessions({ includeArchived }).flatMap((session) => {
      const item = session.items[id];
      return item ? [this.toSessionItem(session, item)] : [];
    });
  }

  getSessionStatus(sessionId: string): SessionStatusSummary {
    const session = this.requireSession(sessionId);
    const items = Object.values(session.items);
    const escalated = items.filter((item) => hasPendingEscalation(item));
    const settled = items.filter((item) => !hasPendingEscalation(item));
    const blockers = findMergeBlockers(session);

    return {
      sessionId: session.session_id,
      totalItems: items.length,
      approvedCount: settled.filter((item) => item.status === "approved")
        .length,
      rejectedCount: settled.filter((item) => item.status === "rejected")
        .length,
      pendingCount: settled.filter((item) => item.status === "pending").length,
      escalatedItems: escalated.map((item) => item.item_id),
      mergeable:
        session.archived_at === null &&
        items.length > 0 &&
        blockers.length === 0,
      blockers,
      archivedAt: session.archived_at,
      mergeReference: session.merge_reference,
    };
  }

  getConflicts(sessionId?: string): SessionItem[] {
    const sessions = sessionId
      ? [this.requireSession(sessionId)]
      : this.listSessions();

    return sessions.flatMap((session) =>
      Object.values(session.items)
        .filter((item) => hasPendingEscalation(item))
        .map((item) => this.toSessionItem(session, item)),
    );
  }

  // --- writes ---

  async createSession(
    sessionId: string,
    meta: { base?: string } = {},
  ): Promise<ReviewSession> {
    const id = parseSessionId(sessionId);
    return this.locks.run(id, () => {
      if (this.pickActive(this.readRecords(id))) {
        throw new ConflictError(`Session ${id} already has an active review`);
      }

      const now = this.now().toISOString();
      const session: ReviewSession = {
        session_id: id,
        record_id: `${now.replace(/[:.]/g, "-")}-${nanoid(6)}`,
        revision: 1,
        created_at: now,
        updated_at: now,
        ...(meta.base ? { base: meta.base } : {}),
        items: {},
        archived_at: null,
        merged_by: null,
        merge_reference: null,
      };
      this.writeAtomic(session);
      this.options.logger.info({ sessionId: id }, "review session created");
      return session;
    });
  }

  async appendPass(
    sessionId: string,
    itemId: string,
    metadata: ItemMetadata,
    submission: PassSubmission,
  ): Promise<ItemReview> {
    const id = parseSessionId(sessionId);
    const parsed = parseItemId(itemId);

    const session = await this.mutate(id, (current) => {
      this.assertNotMerging(id);
      const existing = current.items[parsed.itemId];
      const itemType =
        existing?.item_type ?? metadata.itemType ?? parsed.contentType;
      if (metadata.itemType && metadata.itemType !== itemType) {
        throw new ValidationError(
          `Item ${parsed.itemId} is a ${itemType}, not a ${metadata.itemType}`,
        );
      }

      const policy = policyForItemType(this.options.policy, itemType);
      const draft = parseReviewPass(
        submission.passKind,
        submission.reviewerId,
        submission.input,
        policy,
      );
      const pass = stampReviewPass(
        draft,
        this.nextTimestamp(current, submission.reviewerId),
      );

      const item: ItemReview = existing
        ? {
            ...existing,
            ...(metadata.itemTitle ? { item_title: metadata.itemTitle } : {}),
          }
        : {
            item_id: parsed.itemId,
            item_title: metadata.itemTitle ?? parsed.itemId,
            item_type: itemType,
            passes: [],
            status: "pending",
          };

      return {
        ...current,
        items: {
          ...current.items,
          [parsed.itemId]: appendPassToItem(item, pass, policy),
        },
      };
    });

    const item = this.requireItem(session, parsed.itemId);
    this.options.logger.debug(
      {
        sessionId: id,
        itemId: item.item_id,
        passKind: submission.passKind,
        status: item.status,
      },
      "review pass appended",
    );
    return item;
  }

  async escalate(
    sessionId: string,
    itemId: string,
    input: Omit<EscalationInput, "at">,
  ): Promise<ItemReview> {
    const id = parseSessionId(sessionId);
    const { itemId: key } = parseItemId(itemId);

    const session = await this.mutate(id, (current) => {
      this.assertNotMerging(id);
      const item = this.requireItem(current, key);
      const policy = policyForItemType(this.options.policy, item.item_type);
      return {
        ...current,
        items: {
          ...current.items,
          [key]: escalateItem(item, policy, {
            ...input,
            at: this.now().toISOString(),
          }),
        },
      };
    });

    this.options.logger.info(
      { sessionId: id, itemId: key, reason: input.reason },
      "review escalated",
    );
    return this.requireItem(session, key);
  }

  /** Records the merge. The whole archive block lands in one rename. */
  async archive(sessionId: string, input: ArchiveInput): Promise<ReviewSession> {
    const id = parseSessionId(sessionId);
    return this.mutate(id, (current) => ({
      ...current,
      archived_at: this.now().toISOString(),
      merged_by: input.mergedBy,
      merge_reference: input.mergeReference,
      merge_summary: input.summary,
    }));
  }

  /** At most one merge per session at a time. */
  claimMerge(sessionId: string): void {
    const id = parseSessionId(sessionId);
    if (this.merging.has(id)) {
      throw new ConflictError(`A merge of session ${id} is already in progress`);
    }
    this.merging.add(id);
  }

  releaseMerge(sessionId: string): void {
    this.merging.delete(parseSessionId(sessionId));
  }

  // --- internals ---

  private async mutate(
    sessionId: SessionId,
    apply: (current: ReviewSession) => ReviewSession,
  ): Promise<ReviewSession> {
    return this.locks.run(sessionId, () => {
      for (let attempt = 1; attempt <= this.maxWriteAttempts; attempt += 1) {
        const current = this.requireActiveRecord(sessionId);

        let updated: ReviewSession;
        try {
          updated = apply(this.view(current));
        } catch (error) {
          if (error instanceof InvariantViolationError) {
            this.flag(current, error.message);
          }
          throw error;
        }

        const next: ReviewSession = {
          ...updated,
          revision: current.revision + 1,
          updated_at: this.now().toISOString(),
        };

        if (this.revisionOnDisk(current) === current.revision) {
          this.writeAtomic(next);
          return next;
        }

        this.options.logger.warn(
          { sessionId, attempt },
          "session record changed underneath writer; retrying",
        );
      }

      throw new ConcurrencyError(
        `Session ${sessionId} kept changing during ${this.maxWriteAttempts} write attempts`,
      );
    });
  }

  /** Flags the record on its first invariant failure, then rethrows. */
  private checkedView(session: ReviewSession): ReviewSession {
    try {
      return this.view(session);
    } catch (error) {
      if (error instanceof InvariantViolationError && !session.flagged) {
        this.flag(session, error.message);
      }
      throw error;
    }
  }

  private flag(session: ReviewSession, reason: string): void {
    this.options.logger.error(
      { sessionId: session.session_id, recordId: session.record_id, reason },
      "session record flagged for inspection",
    );
    this.writeAtomic({
      ...session,
      revision: session.revision + 1,
      flagged: { reason, flagged_at: this.now().toISOString() },
    });
  }

  private assertNotMerging(sessionId: SessionId): void {
    if (this.merging.has(sessionId)) {
      throw new ConflictError(
        `Session ${sessionId} is being merged; no further reviews accepted`,
      );
    }
  }

  private requireActiveRecord(sessionId: SessionId): ReviewSession {
    const records = this.readRecords(sessionId);
    const active = this.pickActive(records);
    if (active) {
      return active;
    }
    if (records.length > 0) {
      throw new InvalidStateError(
        `Session ${sessionId} is archived and can no longer change`,
      );
    }
    throw new NotFoundError(`Unknown session: ${sessionId}`);
  }

  private requireItem(session: ReviewSession, itemId: ItemId): ItemReview {
    const item = session.items[itemId];
    if (!item) {
      throw new NotFoundError(
        `Item ${itemId} has no reviews in session ${session.session_id}`,
      );
    }
    return item;
  }

  private pickActive(records: ReviewSession[]): ReviewSession | undefined {
    const active = records.filter((record) => record.archived_at === null);
    if (active.length > 1) {
      throw new InvariantViolationError(
        `Session ${active[0]?.session_id} has ${active.length} active records`,
      );
    }
    return active[0];
  }

  /**
   * Recomputes item statuses of an active session from its passes and the
   * current policy. Archived records are returned as they were sealed.
   */
  private view(session: ReviewSession): ReviewSession {
    if (session.archived_at !== null) {
      return session;
    }

    const items: Record<string, ItemReview> = {};
    for (const [key, item] of Object.entries(session.items)) {
      if (key !== item.item_id) {
        throw new InvariantViolationError(
          `Session ${session.session_id} stores item ${item.item_id} under key ${key}`,
        );
      }
      const policy = policyForItemType(this.options.policy, item.item_type);
      items[key] = { ...item, status: deriveItemStatus(item, policy) };
    }
    return { ...session, items };
  }

  private nextTimestamp(session: ReviewSession, reviewerId: ReviewerId): string {
    const now = this.now().toISOString();
    let latest = now;
    for (const item of Object.values(session.items)) {
      for (const pass of item.passes) {
        if (pass.reviewer_id === reviewerId && pass.timestamp > latest) {
          latest = pass.timestamp;
        }
      }
    }
    return latest;
  }

  private toSessionItem(session: ReviewSession, item: ItemReview): SessionItem {
    return {
      sessionId: session.session_id,
      createdAt: session.created_at,
      archivedAt: session.archived_at,
      mergedBy: session.merged_by,
      mergeReference: session.merge_reference,
      item: structuredClone(item),
    };
  }

  private readRecords(
    sessionId: SessionId,
    skipUnreadable = false,
  ): ReviewSession[] {
    const dir = this.sessionDir(sessionId);
    if (!fs.existsSync(dir)) {
      return [];
    }

    return fs
      .readdirSync(dir)
      .filter((entry) => entry.endsWith(".json"))
      .flatMap((entry) => {
        const file = path.join(dir, entry);
        try {
          return [this.readRecord(file)];
        } catch (error) {
          if (!skipUnreadable) {
            throw error;
          }
          this.options.logger.error(
            { file, err: error },
            "skipping unreadable session record",
          );
          return [];
        }
      })
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  private readRecord(file: string): ReviewSession {
    let parsed: ReviewSession | null;
    try {
      parsed = JSON.parse(fs.readFileSync(file, "utf8")) as ReviewSession | null;
    } catch (error) {
      throw new StorageError(`Failed to read session record ${file}`, error);
    }

    if (
      !isRecord(parsed) ||
      typeof parsed.session_id !== "string" ||
      typeof parsed.record_id !== "string" ||
      typeof parsed.revision !== "number" ||
      !isRecord(parsed.items)
    ) {
      throw new StorageError(`Malformed session record ${file}`);
    }
    return parsed;
  }

  private revisionOnDisk(session: ReviewSession): number | undefined {
    const file = this.recordPath(session.session_id, session.record_id);
    if (!fs.existsSync(file)) {
      return undefined;
    }
    return this.readRecord(file).revision;
  }

  private writeAtomic(session: ReviewSession): void {
    const file = this.recordPath(session.session_id, session.record_id);
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(tmp, JSON.stringify(session, null, 2));
      fs.renameSync(tmp, file);
    } catch (error) {
      fs.rmSync(tmp, { force: true });
      throw new StorageError(
        `Failed to write session ${session.session_id}`,
        error,
      );
    }
  }
}
