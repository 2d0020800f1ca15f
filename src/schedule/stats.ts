/**
 * Per-topic statistics and the overall study summary.
 */

import type { MasteryLabel, MasteryRule } from "../config/index.js";
import { DEFAULT_SCHEDULER_CONFIG } from "../config/index.js";
import type { Topic } from "../topics/schema.js";
import { isDue } from "./due.js";
import { DEFAULT_LADDER, MS_PER_DAY, type IntervalLadder } from "./ladder.js";
import { classify, successRate } from "./mastery.js";

export interface TopicStats {
  name: string;
  description: string;
  /** Percent, one decimal place */
  successRate: number;
  successStreak: number;
  totalReviews: number;
  /** Gap of the current rung, in days */
  currentIntervalDays: number;
  /** Whole days until the next review; 0 when due */
  daysUntilReview: number;
  /** YYYY-MM-DD (UTC) */
  nextReviewDate: string;
  mastery: MasteryLabel;
}

export interface StudySummary {
  totalTopics: number;
  dueNow: number;
  /** Due at or before the end of the current UTC day */
  dueToday: number;
  masteredTopics: number;
  /** Percent over every review of every topic, one decimal place */
  averageSuccessRate: number;
}

function toPercent(rate: number): number {
  return Math.round(rate * 1000) / 10;
}

/**
 * Last millisecond of the UTC day containing `now`.
 */
export function endOfUtcDay(now: Date): Date {
  const end = new Date(now.getTime());
  end.setUTCHours(23, 59, 59, 999);
  return end;
}

export function topicStats(
  topic: Topic,
  now: Date,
  ladder: IntervalLadder = DEFAULT_LADDER,
  rules: readonly MasteryRule[] = DEFAULT_SCHEDULER_CONFIG.masteryRules
): TopicStats {
  const untilMs = topic.nextReviewAt.getTime() - now.getTime();

  return {
    name: topic.name,
    description: topic.description,
    successRate: toPercent(successRate(topic.totalSuccesses, topic.totalReviews)),
    successStreak: topic.successStreak,
    totalReviews: topic.totalReviews,
    currentIntervalDays: ladder.gapDays(topic.intervalIndex),
    daysUntilReview: Math.max(0, Math.floor(untilMs / MS_PER_DAY)),
    nextReviewDate: topic.nextReviewAt.toISOString().slice(0, 10),
    mastery: classify(topic, rules),
  };
}

export function studySummary(
  topics: readonly Topic[],
  now: Date,
  rules: readonly MasteryRule[] = DEFAULT_SCHEDULER_CONFIG.masteryRules
): StudySummary {
  const todayEnd = endOfUtcDay(now);
  let dueNow = 0;
  let dueToday = 0;
  let masteredTopics = 0;
  let reviews = 0;
  let successes = 0;

  for (const topic of topics) {
    if (isDue(topic, now)) dueNow++;
    if (isDue(topic, todayEnd)) dueToday++;
    if (classify(topic, rules) === "Mastered") masteredTopics++;
    reviews += topic.totalReviews;
    successes += topic.totalSuccesses;
  }

  return {
    totalTopics: topics.length,
    dueNow,
    dueToday,
    masteredTopics,
    averageSuccessRate: toPercent(successRate(successes, reviews)),
  };
}
