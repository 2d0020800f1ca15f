/**
 * Spaced-repetition review scheduler.
 *
 * Topics climb a fixed interval ladder on successful reviews and drop one
 * rung on failures; due lists and mastery labels are derived from that state.
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./topics/index.js";
export * from "./notify/index.js";

export { IntervalLadder, DEFAULT_LADDER, MS_PER_DAY } from "./schedule/ladder.js";
export { applyReview, createTopic, nextIntervalIndex } from "./schedule/scheduler.js";
export { classify, classifyProgress, successRate } from "./schedule/mastery.js";
export { isDue, overdueMs, selectDue, selectDueWithin, selectUpcoming } from "./schedule/due.js";
export {
  endOfUtcDay,
  studySummary,
  topicStats,
  type StudySummary,
  type TopicStats,
} from "./schedule/stats.js";

export { ReviewService, MAX_QUERY_DAYS, type Clock, type ReviewServiceOptions } from "./service.js";
