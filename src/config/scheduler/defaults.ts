/**
 * Default scheduler configuration.
 *
 * The ladder is the Leitner-style sequence 1, 3, 5, 11, 25, 44, 88 days.
 * Mastery thresholds are tied to ladder positions so that "Mastered" needs
 * both a long interval and a high success rate.
 */

import type { SchedulerConfig } from "./schema.js";

export const DEFAULT_INTERVALS_DAYS: readonly number[] = [1, 3, 5, 11, 25, 44, 88];

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  intervalsDays: [...DEFAULT_INTERVALS_DAYS],

  masteryRules: [
    { label: "Mastered", minIntervalIndex: 5, minSuccessRate: 0.8 },
    { label: "Advanced", minIntervalIndex: 3, minSuccessRate: 0.7 },
    { label: "Intermediate", minIntervalIndex: 2, minSuccessRate: 0.6 },
    { label: "Beginner", minIntervalIndex: 1, minSuccessRate: 0 },
  ],
};
