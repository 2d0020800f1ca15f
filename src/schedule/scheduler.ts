/**
 * Review scheduler: the ladder state machine.
 *
 * States are ladder rungs 0..N-1. A success moves one rung up (saturating at
 * N-1), a failure one rung down (saturating at 0). There is no terminal
 * state; a topic on the top rung stays reviewable and stays on the top rung
 * after further successes. Reviews are accepted at any time, whether or not
 * the topic is due.
 */

import type { ReviewOutcome } from "../config/index.js";
import type { Topic } from "../topics/schema.js";
import { DEFAULT_LADDER, type IntervalLadder } from "./ladder.js";

/**
 * Initial state for a new topic: rung 0, never reviewed, due one gap after
 * creation.
 */
export function createTopic(
  name: string,
  description: string,
  now: Date,
  ladder: IntervalLadder = DEFAULT_LADDER
): Topic {
  const createdAt = new Date(now.getTime());
  return {
    name,
    description,
    createdAt,
    lastReviewAt: new Date(createdAt.getTime()),
    nextReviewAt: ladder.nextReviewAfter(createdAt, 0),
    intervalIndex: 0,
    reviewCount: 0,
    successStreak: 0,
    totalSuccesses: 0,
    totalReviews: 0,
  };
}

/**
 * Rung reached from `index` after one outcome.
 */
export function nextIntervalIndex(
  index: number,
  outcome: ReviewOutcome,
  ladder: IntervalLadder = DEFAULT_LADDER
): number {
  switch (outcome) {
    case "success":
      return Math.min(index + 1, ladder.maxIndex);
    case "failure":
      return Math.max(index - 1, 0);
  }
}

/**
 * Apply one review outcome to a topic.
 *
 * Pure: the input topic is not modified. The result satisfies every topic
 * invariant provided the input did.
 */
export function applyReview(
  topic: Topic,
  outcome: ReviewOutcome,
  now: Date,
  ladder: IntervalLadder = DEFAULT_LADDER
): Topic {
  const intervalIndex = nextIntervalIndex(ladder.clampIndex(topic.intervalIndex), outcome, ladder);
  const reviewedAt = new Date(now.getTime());
  const succeeded = outcome === "success";

  return {
    ...topic,
    createdAt: new Date(topic.createdAt.getTime()),
    intervalIndex,
    successStreak: succeeded ? topic.successStreak + 1 : 0,
    totalSuccesses: succeeded ? topic.totalSuccesses + 1 : topic.totalSuccesses,
    reviewCount: topic.reviewCount + 1,
    totalReviews: topic.totalReviews + 1,
    lastReviewAt: reviewedAt,
    nextReviewAt: ladder.nextReviewAfter(reviewedAt, intervalIndex),
  };
}
