/**
 * Topic storage module.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ARCHITECTURE OVERVIEW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. SCHEMA: zod schemas describe the persisted record and topic names.
 *
 * 2. CODEC: decodeStore() turns the parsed store file into topics, skipping
 *    records it cannot read and repairing records that break an invariant.
 *    encodeStore() writes the mapping back in name order.
 *
 * 3. FILE: StoreFile reads the JSON, writes it atomically (temp + rename),
 *    and holds the cross-process lock for read-modify-write cycles.
 *
 * 4. STORE: TopicStore owns the collection and exposes addTopic,
 *    markReview, removeTopic, getTopic and the due queries. update() runs
 *    one locked cycle.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EXAMPLE USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   import { TopicStore } from "./topics/index.js";
 *
 *   const store = new TopicStore({ path: "data/review-schedule.json" });
 *   await store.update((s) => s.addTopic("Calculus", "Limits and derivatives", new Date()));
 *
 *   store.load();
 *   for (const topic of store.listDue(new Date())) {
 *     console.log(topic.name);
 *   }
 */

export {
  TopicNameSchema,
  TopicRecordSchema,
  isStoreMapping,
  TOPIC_NAME_MAX_LENGTH,
  checkTopicName,
  type Topic,
  type TopicRecord,
} from "./schema.js";

export {
  SchedulerError,
  TopicNotFoundError,
  DuplicateTopicError,
  InvalidStateError,
  PersistenceError,
  ValidationError,
  type SchedulerErrorCode,
} from "./errors.js";

export {
  decodeStore,
  encodeStore,
  encodeTopic,
  type DecodeOptions,
  type DecodeResult,
  type SkippedRecord,
} from "./codec.js";

export { StoreFile, type StoreFileOptions } from "./file.js";

export { TopicStore, type SyncResult, type TopicStoreOptions } from "./store.js";
