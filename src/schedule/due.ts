/**
 * Due-item selection.
 *
 * Read-only filters over a set of topics. Nothing here changes a topic, so
 * a notifier or a listing can call these as often as it likes.
 */

import type { Topic } from "../topics/schema.js";
import { MS_PER_DAY } from "./ladder.js";

/**
 * How far past its due time a topic is at `now`, in milliseconds.
 * Negative when the topic is not yet due.
 */
export function overdueMs(topic: Topic, now: Date): number {
  return now.getTime() - topic.nextReviewAt.getTime();
}

export function isDue(topic: Topic, now: Date): boolean {
  return topic.nextReviewAt.getTime() <= now.getTime();
}

/**
 * Most overdue first; equal due times fall back to name order so repeated
 * queries return the same list.
 */
function byOverdueDesc(now: Date): (a: Topic, b: Topic) => number {
  return (a, b) => {
    const diff = overdueMs(b, now) - overdueMs(a, now);
    if (diff !== 0) {
      return diff;
    }
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  };
}

/**
 * Topics with nextReviewAt <= now, most overdue first.
 */
export function selectDue(topics: Iterable<Topic>, now: Date): Topic[] {
  return [...topics].filter((t) => isDue(t, now)).sort(byOverdueDesc(now));
}

/**
 * Topics due at or before now + days, in the same order as selectDue.
 * Includes everything already due.
 */
export function selectDueWithin(topics: Iterable<Topic>, now: Date, days: number): Topic[] {
  const horizon = new Date(now.getTime() + days * MS_PER_DAY);
  return [...topics].filter((t) => isDue(t, horizon)).sort(byOverdueDesc(now));
}

/**
 * Topics not yet due but due within the next `days` days, soonest first.
 */
export function selectUpcoming(topics: Iterable<Topic>, now: Date, days: number): Topic[] {
  const horizon = new Date(now.getTime() + days * MS_PER_DAY);
  return [...topics]
    .filter((t) => !isDue(t, now) && isDue(t, horizon))
    .sort(byOverdueDesc(now));
}
