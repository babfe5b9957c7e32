import type { MergeBlocker } from "./types";

export type ReviewErrorCode =
  | "validation"
  | "not_found"
  | "conflict"
  | "invalid_state"
  | "not_mergeable"
  | "merge_conflict"
  | "merge_timeout"
  | "storage"
  | "concurrency"
  | "invariant_violation"
  | "not_authorized";

export class ReviewBoardError extends Error {
  constructor(
    readonly code: ReviewErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.code, message: this.message };
  }
}

export class ValidationError extends ReviewBoardError {
  constructor(message: string) {
    super("validation", message);
  }
}

export class NotFoundError extends ReviewBoardError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export class ConflictError extends ReviewBoardError {
  constructor(message: string) {
    super("conflict", message);
  }
}

export class InvalidStateError extends ReviewBoardError {
  constructor(message: string) {
    super("invalid_state", message);
  }
}

export class NotMergeableError extends ReviewBoardError {
  constructor(
    message: string,
    readonly blockers: MergeBlocker[],
  ) {
    super("not_mergeable", message);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), blockers: this.blockers };
  }
}

export class MergeConflictError extends ReviewBoardError {
  constructor(
    message: string,
    readonly details: string,
  ) {
    super("merge_conflict", message);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details };
  }
}

export class MergeTimeoutError extends ReviewBoardError {
  constructor(
    message: string,
    readonly timeoutMs: number,
  ) {
    super("merge_timeout", message);
  }
}

export class StorageError extends ReviewBoardError {
  constructor(message: string, cause?: unknown) {
    super("storage", message, { cause });
  }
}

export class ConcurrencyError extends ReviewBoardError {
  constructor(message: string) {
    super("concurrency", message);
  }
}

/** Stored state that cannot be turned into a status. Never retried. */
export class InvariantViolationError extends ReviewBoardError {
  constructor(message: string) {
    super("invariant_violation", message);
  }
}

export class NotAuthorizedError extends ReviewBoardError {
  constructor(message: string) {
    super("not_authorized", message);
  }
}

export const isReviewBoardError = (value: unknown): value is ReviewBoardError =>
  value instanceof ReviewBoardError;
