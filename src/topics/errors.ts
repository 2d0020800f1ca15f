/**
 * Error taxonomy for topic storage and scheduling.
 *
 * Every error carries a stable `code` for programmatic handling and the
 * process exit code the CLI reports for it.
 */

export type SchedulerErrorCode =
  | "TOPIC_NOT_FOUND"
  | "DUPLICATE_TOPIC"
  | "INVALID_STATE"
  | "PERSISTENCE"
  | "VALIDATION";

export abstract class SchedulerError extends Error {
  abstract readonly code: SchedulerErrorCode;
  abstract readonly exitCode: number;
}

/**
 * An operation referenced a topic name absent from the store.
 */
export class TopicNotFoundError extends SchedulerError {
  readonly code = "TOPIC_NOT_FOUND";
  readonly exitCode = 1;

  constructor(public readonly topicName: string) {
    super(`Topic not found: "${topicName}"`);
    this.name = "TopicNotFoundError";
  }
}

/**
 * addTopic was called with a name that already exists (exact match).
 */
export class DuplicateTopicError extends SchedulerError {
  readonly code = "DUPLICATE_TOPIC";
  readonly exitCode = 2;

  constructor(public readonly topicName: string) {
    super(`Topic already exists: "${topicName}"`);
    this.name = "DuplicateTopicError";
  }
}

/**
 * A persisted record violates a topic invariant.
 * The decoder repairs and logs these by default; see decodeStore().
 */
export class InvalidStateError extends SchedulerError {
  readonly code = "INVALID_STATE";
  readonly exitCode = 3;

  constructor(
    public readonly topicName: string,
    public readonly field: string,
    message: string
  ) {
    super(`Invalid state for "${topicName}" (${field}): ${message}`);
    this.name = "InvalidStateError";
  }
}

/**
 * The store file could not be read, parsed, written or locked.
 * The in-memory state is unchanged when this is thrown, so a retry is safe.
 */
export class PersistenceError extends SchedulerError {
  readonly code = "PERSISTENCE";
  readonly exitCode = 3;

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

/**
 * Caller input is malformed (bad topic name, bad day count).
 */
export class ValidationError extends SchedulerError {
  readonly code = "VALIDATION";
  readonly exitCode = 64;

  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(message);
    this.name = "ValidationError";
  }
}
