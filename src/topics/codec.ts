/**
 * Conversion between the persisted store mapping and in-memory topics.
 *
 * Decoding is lenient per record:
 *   - A record that fails the schema (missing or mistyped fields, or an
 *     unusable name) is skipped with a warning; the rest still load.
 *   - A record that parses but breaks an invariant is repaired: the index is
 *     clamped onto the ladder, nextReviewAt is recomputed from lastReviewAt,
 *     reviewCount is aligned with totalReviews and totalSuccesses is capped.
 *     Each repair is reported as an InvalidStateError and logged.
 *
 * With `repair: false` the first invariant violation is thrown instead.
 */

import type { IntervalLadder } from "../schedule/ladder.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { InvalidStateError, PersistenceError } from "./errors.js";
import {
  TopicNameSchema,
  TopicRecordSchema,
  isStoreMapping,
  type Topic,
  type TopicRecord,
} from "./schema.js";

export interface DecodeOptions {
  ladder: IntervalLadder;
  logger?: Logger;
  /** Repair invariant violations (default) or throw them */
  repair?: boolean;
  /** File path, for messages */
  source?: string;
}

export interface SkippedRecord {
  name: string;
  reasons: string[];
}

export interface DecodeResult {
  topics: Map<string, Topic>;
  repaired: InvalidStateError[];
  skipped: SkippedRecord[];
}

/**
 * Check one parsed record against the ladder and return the violations.
 * Does not modify the record.
 */
function findViolations(
  name: string,
  record: TopicRecord,
  ladder: IntervalLadder
): InvalidStateError[] {
  const violations: InvalidStateError[] = [];

  if (!ladder.isValidIndex(record.intervalIndex)) {
    violations.push(
      new InvalidStateError(
        name,
        "intervalIndex",
        `${record.intervalIndex} is outside [0, ${ladder.maxIndex}]`
      )
    );
  }

  if (record.reviewCount !== record.totalReviews) {
    violations.push(
      new InvalidStateError(
        name,
        "reviewCount",
        `reviewCount ${record.reviewCount} differs from totalReviews ${record.totalReviews}`
      )
    );
  }

  const reviews = Math.max(record.reviewCount, record.totalReviews);
  if (record.totalSuccesses > reviews) {
    violations.push(
      new InvalidStateError(
        name,
        "totalSuccesses",
        `totalSuccesses ${record.totalSuccesses} exceeds totalReviews ${reviews}`
      )
    );
  }

  const expectedNext = ladder.nextReviewAfter(
    new Date(record.lastReviewAt),
    ladder.clampIndex(record.intervalIndex)
  );
  if (new Date(record.nextReviewAt).getTime() !== expectedNext.getTime()) {
    violations.push(
      new InvalidStateError(
        name,
        "nextReviewAt",
        `expected ${expectedNext.toISOString()}, found ${record.nextReviewAt}`
      )
    );
  }

  return violations;
}

/**
 * Build a valid topic from a parsed record, repairing as described above.
 */
function toTopic(name: string, record: TopicRecord, ladder: IntervalLadder): Topic {
  const intervalIndex = ladder.clampIndex(record.intervalIndex);
  const lastReviewAt = new Date(record.lastReviewAt);
  const reviews = Math.max(record.reviewCount, record.totalReviews);

  return {
    name,
    description: record.description,
    createdAt: new Date(record.createdAt),
    lastReviewAt,
    nextReviewAt: ladder.nextReviewAfter(lastReviewAt, intervalIndex),
    intervalIndex,
    reviewCount: reviews,
    successStreak: record.successStreak,
    totalSuccesses: Math.min(record.totalSuccesses, reviews),
    totalReviews: reviews,
  };
}

/**
 * Decode the parsed contents of a store file.
 *
 * @throws PersistenceError if the top level is not a name -> record mapping
 * @throws InvalidStateError on an invariant violation when repair is false
 */
export function decodeStore(input: unknown, options: DecodeOptions): DecodeResult {
  const { ladder, logger = silentLogger, repair = true, source = "(memory)" } = options;

  if (!isStoreMapping(input)) {
    throw new PersistenceError(
      `Store file ${source} must contain a JSON object mapping topic names to records`,
      source
    );
  }

  const topics = new Map<string, Topic>();
  const repaired: InvalidStateError[] = [];
  const skipped: SkippedRecord[] = [];

  for (const [name, value] of Object.entries(input)) {
    const nameCheck = TopicNameSchema.safeParse(name);
    const recordCheck = TopicRecordSchema.safeParse(value);

    const reasons = [
      ...(nameCheck.success ? [] : nameCheck.error.issues.map((i) => `name: ${i.message}`)),
      ...(recordCheck.success
        ? []
        : recordCheck.error.issues.map((i) => `${i.path.join(".") || "(record)"}: ${i.message}`)),
    ];

    if (!recordCheck.success || reasons.length > 0) {
      logger.warn("Skipping unreadable topic record", { topic: name, reasons });
      skipped.push({ name, reasons });
      continue;
    }

    const violations = findViolations(name, recordCheck.data, ladder);
    const [firstViolation] = violations;
    if (firstViolation && !repair) {
      throw firstViolation;
    }
    if (violations.length > 0) {
      for (const violation of violations) {
        logger.warn("Repaired topic record", {
          topic: name,
          field: violation.field,
          problem: violation.message,
        });
      }
      repaired.push(...violations);
    }

    topics.set(name, toTopic(name, recordCheck.data, ladder));
  }

  return { topics, repaired, skipped };
}

export function encodeTopic(topic: Topic): TopicRecord {
  return {
    description: topic.description,
    createdAt: topic.createdAt.toISOString(),
    lastReviewAt: topic.lastReviewAt.toISOString(),
    nextReviewAt: topic.nextReviewAt.toISOString(),
    intervalIndex: topic.intervalIndex,
    reviewCount: topic.reviewCount,
    successStreak: topic.successStreak,
    totalSuccesses: topic.totalSuccesses,
    totalReviews: topic.totalReviews,
  };
}

/**
 * Encode a collection to the persisted mapping, keys in name order so the
 * file diffs cleanly.
 */
export function encodeStore(topics: Iterable<Topic>): Record<string, TopicRecord> {
  const sorted = [...topics].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return Object.fromEntries(sorted.map((topic) => [topic.name, encodeTopic(topic)]));
}
