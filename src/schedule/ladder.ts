/**
 * The interval ladder: an ordered, fixed sequence of review gaps.
 *
 * Rung 0 is the shortest gap (least practiced), rung N-1 the longest. A topic's
 * intervalIndex is its rung; its next review is lastReviewAt plus that gap.
 */

import {
  DEFAULT_INTERVALS_DAYS,
  IntervalsDaysSchema,
  SchedulerConfigError,
  formatZodIssues,
} from "../config/index.js";

export const MS_PER_DAY = 86_400_000;

export class IntervalLadder {
  private readonly _days: readonly number[];

  private constructor(days: readonly number[]) {
    this._days = Object.freeze([...days]);
  }

  /**
   * Build a ladder from gaps in days.
   *
   * @throws SchedulerConfigError unless the gaps are positive whole days in
   *         strictly increasing order
   */
  static fromDays(days: readonly number[]): IntervalLadder {
    const result = IntervalsDaysSchema.safeParse(days);
    if (!result.success) {
      throw new SchedulerConfigError(
        "Invalid interval ladder",
        formatZodIssues(result.error.issues)
      );
    }
    return new IntervalLadder(result.data);
  }

  get days(): readonly number[] {
    return this._days;
  }

  /** Number of rungs (N) */
  get length(): number {
    return this._days.length;
  }

  /** Highest valid index (N-1) */
  get maxIndex(): number {
    return this._days.length - 1;
  }

  isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index <= this.maxIndex;
  }

  /**
   * Clamp any integer into [0, N-1].
   */
  clampIndex(index: number): number {
    return Math.min(Math.max(Math.trunc(index), 0), this.maxIndex);
  }

  /**
   * Gap in days at a rung. Out-of-range indexes are clamped.
   */
  gapDays(index: number): number {
    return this._days[this.clampIndex(index)] ?? this._days[0] ?? 1;
  }

  gapMs(index: number): number {
    return this.gapDays(index) * MS_PER_DAY;
  }

  /**
   * When a topic reviewed at `from` on rung `index` is next due.
   */
  nextReviewAfter(from: Date, index: number): Date {
    return new Date(from.getTime() + this.gapMs(index));
  }
}

export const DEFAULT_LADDER: IntervalLadder = IntervalLadder.fromDays(DEFAULT_INTERVALS_DAYS);
