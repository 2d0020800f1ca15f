/**
 * Mastery classifier.
 *
 * Derives a display label from a topic's rung and its historical success
 * rate. Pure and side-effect free; calling it never touches the topic.
 */

import {
  DEFAULT_SCHEDULER_CONFIG,
  type MasteryLabel,
  type MasteryRule,
} from "../config/index.js";
import type { Topic } from "../topics/schema.js";

/**
 * totalSuccesses / totalReviews, or 0 before the first review.
 */
export function successRate(totalSuccesses: number, totalReviews: number): number {
  return totalReviews > 0 ? totalSuccesses / totalReviews : 0;
}

/**
 * Classify raw progress numbers. Rules are checked top-down and the first
 * match wins; anything below every rule is "Learning".
 */
export function classifyProgress(
  intervalIndex: number,
  totalSuccesses: number,
  totalReviews: number,
  rules: readonly MasteryRule[] = DEFAULT_SCHEDULER_CONFIG.masteryRules
): MasteryLabel {
  const rate = successRate(totalSuccesses, totalReviews);

  for (const rule of rules) {
    if (intervalIndex >= rule.minIntervalIndex && rate >= rule.minSuccessRate) {
      return rule.label;
    }
  }

  return "Learning";
}

export function classify(
  topic: Pick<Topic, "intervalIndex" | "totalSuccesses" | "totalReviews">,
  rules: readonly MasteryRule[] = DEFAULT_SCHEDULER_CONFIG.masteryRules
): MasteryLabel {
  return classifyProgress(topic.intervalIndex, topic.totalSuccesses, topic.totalReviews, rules);
}
