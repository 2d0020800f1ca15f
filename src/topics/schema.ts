/**
 * Topic schema and type definitions.
 *
 * A topic is one unit of study tracked on the interval ladder. In memory its
 * timestamps are Dates; on disk the store is a single JSON object mapping
 * topic name to a record whose timestamps are ISO-8601 UTC strings.
 *
 * Invariants held by every Topic the store hands out:
 *   1. 0 <= intervalIndex <= ladder.maxIndex
 *   2. nextReviewAt == lastReviewAt + ladder[intervalIndex]
 *   3. totalSuccesses <= totalReviews == reviewCount
 *   4. name is unique within the store
 */

import { z } from "zod";

export const TOPIC_NAME_MAX_LENGTH = 200;

/**
 * Topic names are matched exactly (case-sensitive) and are stored as given.
 */
export const TopicNameSchema = z
  .string()
  .min(1, "Topic name must not be empty")
  .max(TOPIC_NAME_MAX_LENGTH, `Topic name must be at most ${TOPIC_NAME_MAX_LENGTH} characters`)
  .refine((name) => name.trim().length > 0, "Topic name must not be blank");

const IsoTimestamp = z.string().datetime({ offset: true });

const Counter = z.number().int().min(0);

/**
 * Persisted form of one topic (the value under its name in the store file).
 *
 * Only the shape is checked here. Cross-field invariants depend on the
 * ladder and are checked, and repaired, by the codec.
 */
export const TopicRecordSchema = z.object({
  description: z.string().default(""),
  createdAt: IsoTimestamp,
  lastReviewAt: IsoTimestamp,
  nextReviewAt: IsoTimestamp,
  intervalIndex: z.number().int(),
  reviewCount: Counter,
  successStreak: Counter,
  totalSuccesses: Counter,
  totalReviews: Counter,
});

export type TopicRecord = z.infer<typeof TopicRecordSchema>;

/**
 * The whole store file: a plain JSON object. Values stay unknown at this
 * level so that one bad record can be skipped without rejecting the rest.
 *
 * Checked by hand rather than with z.record(), which drops a "__proto__"
 * key; that is a valid topic name and must reach the per-record checks.
 */
export function isStoreMapping(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

export interface Topic {
  readonly name: string;
  readonly description: string;
  readonly createdAt: Date;
  readonly lastReviewAt: Date;
  readonly nextReviewAt: Date;
  readonly intervalIndex: number;
  readonly reviewCount: number;
  readonly successStreak: number;
  readonly totalSuccesses: number;
  readonly totalReviews: number;
}

/**
 * Validate a topic name supplied by a caller.
 *
 * @returns list of problems; empty when the name is acceptable
 */
export function checkTopicName(name: string): string[] {
  const result = TopicNameSchema.safeParse(name);
  return result.success ? [] : result.error.issues.map((issue) => issue.message);
}
