/**
 * Review service: the operations collaborators call.
 *
 * Every call goes back to the store file, so separate processes (a CLI
 * invocation, a background reminder, a quiz grader) always see each other's
 * changes. Mutations run inside TopicStore.update(), which holds the store
 * lock for the whole read-modify-write cycle; queries load without the lock
 * since writes replace the file atomically.
 */

import {
  DEFAULT_SCHEDULER_CONFIG,
  loadSchedulerConfigFile,
  type AppConfig,
  type MasteryLabel,
  type MasteryRule,
  type ReviewOutcome,
  type SchedulerConfig,
} from "./config/index.js";
import { silentLogger, type Logger } from "./logging/index.js";
import { dispatchDueReminders, type DispatchResult, type Notifier } from "./notify/index.js";
import { IntervalLadder } from "./schedule/ladder.js";
import { classify } from "./schedule/mastery.js";
import { studySummary, topicStats, type StudySummary, type TopicStats } from "./schedule/stats.js";
import { ValidationError } from "./topics/errors.js";
import type { Topic } from "./topics/schema.js";
import { TopicStore } from "./topics/store.js";

export type Clock = () => Date;

export interface ReviewServiceOptions {
  store: TopicStore;
  masteryRules?: readonly MasteryRule[];
  /** Source of "now" (default: wall clock) */
  clock?: Clock;
  logger?: Logger;
}

/** Longest look-ahead a query accepts (about a century) */
export const MAX_QUERY_DAYS = 36_500;

function checkDays(days: number): number {
  if (!Number.isFinite(days) || days < 0 || days > MAX_QUERY_DAYS) {
    throw new ValidationError(
      `Day count must be between 0 and ${MAX_QUERY_DAYS}, got: ${days}`
    );
  }
  return days;
}

export class ReviewService {
  private readonly store: TopicStore;
  private readonly masteryRules: readonly MasteryRule[];
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: ReviewServiceOptions) {
    this.store = options.store;
    this.masteryRules = options.masteryRules ?? DEFAULT_SCHEDULER_CONFIG.masteryRules;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Build a service from application configuration. The ladder and mastery
   * table come from `schedulerConfigPath` when set, otherwise the defaults.
   *
   * @throws SchedulerConfigError if the scheduler configuration is invalid
   */
  static fromConfig(config: AppConfig, logger: Logger = silentLogger, clock?: Clock): ReviewService {
    const scheduler: Readonly<SchedulerConfig> = config.schedulerConfigPath
      ? loadSchedulerConfigFile(config.schedulerConfigPath)
      : DEFAULT_SCHEDULER_CONFIG;

    const store = new TopicStore({
      path: config.storePath,
      ladder: IntervalLadder.fromDays(scheduler.intervalsDays),
      lockTimeoutMs: config.lockTimeoutMs,
      logger: logger.child("store"),
    });

    return new ReviewService({ store, masteryRules: scheduler.masteryRules, clock, logger });
  }

  /**
   * Current time according to the service clock.
   */
  now(): Date {
    return this.clock();
  }

  // ============================================================
  // Mutations (locked)
  // ============================================================

  /**
   * @throws DuplicateTopicError | ValidationError | PersistenceError
   */
  async addTopic(name: string, description = ""): Promise<Readonly<Topic>> {
    const now = this.clock();
    return this.store.update((s) => s.addTopic(name, description, now));
  }

  /**
   * @throws TopicNotFoundError | PersistenceError
   */
  async markReview(name: string, outcome: ReviewOutcome): Promise<Readonly<Topic>> {
    const now = this.clock();
    return this.store.update((s) => s.markReview(name, outcome, now));
  }

  /**
   * @throws TopicNotFoundError | PersistenceError
   */
  async removeTopic(name: string): Promise<void> {
    await this.store.update((s) => s.removeTopic(name));
  }

  // ============================================================
  // Queries
  // ============================================================

  getTopic(name: string): Readonly<Topic> {
    this.store.load();
    return this.store.getTopic(name);
  }

  listAll(): Readonly<Topic>[] {
    this.store.load();
    return this.store.listAll();
  }

  /**
   * Due topics, most overdue first.
   */
  listDue(now: Date = this.clock()): Readonly<Topic>[] {
    this.store.load();
    return this.store.listDue(now);
  }

  listDueWithin(days: number, now: Date = this.clock()): Readonly<Topic>[] {
    checkDays(days);
    this.store.load();
    return this.store.listDueWithin(now, days);
  }

  listUpcoming(days: number, now: Date = this.clock()): Readonly<Topic>[] {
    checkDays(days);
    this.store.load();
    return this.store.listUpcoming(now, days);
  }

  classify(topic: Pick<Topic, "intervalIndex" | "totalSuccesses" | "totalReviews">): MasteryLabel {
    return classify(topic, this.masteryRules);
  }

  topicStats(name: string): TopicStats {
    return this.statsOf(this.getTopic(name));
  }

  /**
   * Statistics for a topic value already in hand, such as the result of
   * markReview(). Does not read the store.
   */
  statsOf(topic: Topic): TopicStats {
    return topicStats(topic, this.clock(), this.store.ladder, this.masteryRules);
  }

  allTopicStats(): TopicStats[] {
    const now = this.clock();
    return this.listAll().map((t) => topicStats(t, now, this.store.ladder, this.masteryRules));
  }

  summary(): StudySummary {
    return studySummary(this.listAll(), this.clock(), this.masteryRules);
  }

  /**
   * Send a reminder for everything due now. Notifier failures are logged
   * and reported in the result; they never reach the store.
   */
  async remind(notifier: Notifier): Promise<DispatchResult> {
    const due = this.listDue();
    return dispatchDueReminders(notifier, due, this.logger.child("notify"));
  }
}
