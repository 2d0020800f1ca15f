/**
 * Topic store: the single owner of every topic.
 *
 * The store keeps the collection in memory and moves it to and from the store
 * file only at explicit boundaries (load, save, update). Callers never hold a
 * live reference to a stored topic: every accessor returns a frozen copy, and
 * every change goes through addTopic / markReview / removeTopic.
 *
 * Cross-process use goes through update(), which wraps
 * lock -> load -> mutate -> save -> unlock:
 *
 *   const topic = await store.update((s) => s.markReview("Calculus", "success", now));
 */

import type { ReviewOutcome } from "../config/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { selectDue, selectDueWithin, selectUpcoming } from "../schedule/due.js";
import { DEFAULT_LADDER, type IntervalLadder } from "../schedule/ladder.js";
import { applyReview, createTopic } from "../schedule/scheduler.js";
import { decodeStore, encodeStore, type DecodeResult } from "./codec.js";
import { DuplicateTopicError, TopicNotFoundError, ValidationError } from "./errors.js";
import { StoreFile } from "./file.js";
import { checkTopicName, type Topic } from "./schema.js";

export interface TopicStoreOptions {
  /** Path of the JSON store file */
  path: string;
  ladder?: IntervalLadder;
  /** Milliseconds to wait for the cross-process lock (default 5000) */
  lockTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Frozen copy of a topic, including fresh Date instances.
 */
function snapshot(topic: Topic): Readonly<Topic> {
  return Object.freeze({
    ...topic,
    createdAt: new Date(topic.createdAt.getTime()),
    lastReviewAt: new Date(topic.lastReviewAt.getTime()),
    nextReviewAt: new Date(topic.nextReviewAt.getTime()),
  });
}

/**
 * Return type accepted by update(): anything but a promise, so the save
 * cannot run ahead of an async callback's changes.
 */
export type SyncResult<T> = [T] extends [PromiseLike<unknown>] ? never : T;

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

export class TopicStore {
  readonly ladder: IntervalLadder;

  private readonly file: StoreFile;
  private readonly logger: Logger;
  private topics = new Map<string, Topic>();

  constructor(options: TopicStoreOptions) {
    this.ladder = options.ladder ?? DEFAULT_LADDER;
    this.logger = options.logger ?? silentLogger;
    this.file = new StoreFile(options.path, {
      lockTimeoutMs: options.lockTimeoutMs ?? 5_000,
      logger: this.logger.child("file"),
    });
  }

  get path(): string {
    return this.file.path;
  }

  get size(): number {
    return this.topics.size;
  }

  // ============================================================
  // Persistence
  // ============================================================

  /**
   * Replace the in-memory collection with the persisted one.
   * A missing file loads as an empty collection.
   *
   * @throws PersistenceError if the file is unreadable or corrupt; the
   *         in-memory collection is left as it was
   */
  load(): ReadonlyMap<string, Readonly<Topic>> {
    const raw = this.file.read();
    const result: DecodeResult =
      raw === undefined
        ? { topics: new Map(), repaired: [], skipped: [] }
        : decodeStore(raw, { ladder: this.ladder, logger: this.logger, source: this.path });

    this.topics = result.topics;
    this.logger.debug("Store loaded", {
      path: this.path,
      topics: result.topics.size,
      repaired: result.repaired.length,
      skipped: result.skipped.length,
    });

    return this.collection();
  }

  /**
   * Persist a collection atomically and make it the in-memory state.
   * Without an argument the current in-memory collection is written.
   *
   * @throws PersistenceError on I/O failure; nothing is partially applied
   */
  save(collection?: Iterable<Topic>): void {
    const next = new Map<string, Topic>();
    for (const topic of collection ?? this.topics.values()) {
      if (next.has(topic.name)) {
        throw new DuplicateTopicError(topic.name);
      }
      next.set(topic.name, topic);
    }

    this.file.write(encodeStore(next.values()));
    this.topics = next;
  }

  /**
   * Run one read-modify-write cycle under the store lock.
   *
   * The collection is reloaded after the lock is taken, `fn` mutates it
   * through the store API, and the result is saved. If `fn` throws, nothing
   * is written and the in-memory collection is restored. `fn` must be
   * synchronous; a callback that returns a promise is rejected with a
   * TypeError and nothing is saved.
   *
   * @throws PersistenceError if the lock cannot be acquired in time or the
   *         store cannot be read or written
   */
  async update<T>(fn: (store: TopicStore) => SyncResult<T>): Promise<T> {
    return this.file.withLock<T>(() => {
      this.load();
      const before = new Map(this.topics);
      try {
        const result = fn(this);
        if (isThenable(result)) {
          result.then(undefined, (err: unknown) =>
            this.logger.warn("Async update callback failed", {
              error: err instanceof Error ? err.message : String(err),
            })
          );
          throw new TypeError("TopicStore.update() callback must be synchronous");
        }
        this.save();
        return result;
      } catch (err) {
        this.topics = before;
        throw err;
      }
    });
  }

  // ============================================================
  // Mutations
  // ============================================================

  /**
   * @throws ValidationError if the name is empty, blank or too long
   * @throws DuplicateTopicError if the name already exists (exact match)
   */
  addTopic(name: string, description: string, now: Date): Readonly<Topic> {
    const problems = checkTopicName(name);
    if (problems.length > 0) {
      throw new ValidationError(`Invalid topic name: ${problems.join("; ")}`, problems);
    }
    if (this.topics.has(name)) {
      throw new DuplicateTopicError(name);
    }

    const topic = createTopic(name, description, now, this.ladder);
    this.topics.set(name, topic);
    this.logger.info("Topic added", { topic: name, nextReviewAt: topic.nextReviewAt.toISOString() });
    return snapshot(topic);
  }

  /**
   * Record one review outcome. Allowed at any time, due or not.
   *
   * @throws TopicNotFoundError if no topic has this name
   */
  markReview(name: string, outcome: ReviewOutcome, now: Date): Readonly<Topic> {
    const current = this.require(name);
    const next = applyReview(current, outcome, now, this.ladder);
    this.topics.set(name, next);
    this.logger.info("Review recorded", {
      topic: name,
      outcome,
      intervalIndex: next.intervalIndex,
      nextReviewAt: next.nextReviewAt.toISOString(),
    });
    return snapshot(next);
  }

  /**
   * Delete a topic permanently.
   *
   * @throws TopicNotFoundError if no topic has this name
   */
  removeTopic(name: string): void {
    this.require(name);
    this.topics.delete(name);
    this.logger.info("Topic removed", { topic: name });
  }

  // ============================================================
  // Queries
  // ============================================================

  /**
   * @throws TopicNotFoundError if no topic has this name
   */
  getTopic(name: string): Readonly<Topic> {
    return snapshot(this.require(name));
  }

  hasTopic(name: string): boolean {
    return this.topics.has(name);
  }

  /**
   * Every topic. No ordering is promised; the current implementation
   * returns them in name order.
   */
  listAll(): Readonly<Topic>[] {
    return [...this.topics.values()]
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map(snapshot);
  }

  /**
   * Topics with nextReviewAt <= now, most overdue first.
   */
  listDue(now: Date): Readonly<Topic>[] {
    return selectDue(this.topics.values(), now).map(snapshot);
  }

  /**
   * Topics due at or before now + days, most overdue first.
   */
  listDueWithin(now: Date, days: number): Readonly<Topic>[] {
    return selectDueWithin(this.topics.values(), now, days).map(snapshot);
  }

  /**
   * Topics not yet due but due within `days`, soonest first.
   */
  listUpcoming(now: Date, days: number): Readonly<Topic>[] {
    return selectUpcoming(this.topics.values(), now, days).map(snapshot);
  }

  private collection(): ReadonlyMap<string, Readonly<Topic>> {
    const out = new Map<string, Readonly<Topic>>();
    for (const [name, topic] of this.topics) {
      out.set(name, snapshot(topic));
    }
    return out;
  }

  private require(name: string): Topic {
    const topic = this.topics.get(name);
    if (topic === undefined) {
      throw new TopicNotFoundError(name);
    }
    return topic;
  }
}
