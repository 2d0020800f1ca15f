/**
 * Store codec tests: decoding with repair and skip, encoding.
 *
 * Run: node --import tsx src/topics/codec.test.ts
 */

import { strict as assert } from "node:assert";

import { createLogger, type Logger, type LogLevel } from "../logging/index.js";
import { DEFAULT_LADDER, IntervalLadder, MS_PER_DAY } from "../schedule/ladder.js";
import { decodeStore, encodeStore, encodeTopic } from "./codec.js";
import { InvalidStateError, PersistenceError } from "./errors.js";
import type { TopicRecord } from "./schema.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

/** Rung 1, last reviewed Jan 10, due Jan 13 */
function record(overrides: Partial<TopicRecord> = {}): TopicRecord {
  return {
    description: "Limits and derivatives",
    createdAt: "2024-01-01T00:00:00.000Z",
    lastReviewAt: "2024-01-10T00:00:00.000Z",
    nextReviewAt: "2024-01-13T00:00:00.000Z",
    intervalIndex: 1,
    reviewCount: 3,
    successStreak: 0,
    totalSuccesses: 2,
    totalReviews: 3,
    ...overrides,
  };
}

const LAST_REVIEW_MS = Date.parse("2024-01-10T00:00:00.000Z");

function capture(): { lines: [LogLevel, string][]; logger: Logger } {
  const lines: [LogLevel, string][] = [];
  const logger = createLogger({ level: "debug", sink: (level, line) => lines.push([level, line]) });
  return { lines, logger };
}

// ═══════════════════════════════════════════════════════════════════════════

section("Valid records");

test("decodes timestamps to Dates and keeps counters", () => {
  const result = decodeStore({ Calculus: record() }, { ladder: DEFAULT_LADDER });
  const topic = result.topics.get("Calculus");
  assert.ok(topic);
  assert.equal(topic.name, "Calculus");
  assert.equal(topic.description, "Limits and derivatives");
  assert.equal(topic.createdAt.toISOString(), "2024-01-01T00:00:00.000Z");
  assert.equal(topic.nextReviewAt.toISOString(), "2024-01-13T00:00:00.000Z");
  assert.equal(topic.intervalIndex, 1);
  assert.equal(topic.totalSuccesses, 2);
  assert.deepEqual(result.repaired, []);
  assert.deepEqual(result.skipped, []);
});

test("a missing description decodes as empty", () => {
  const { description: _omit, ...rest } = record();
  const result = decodeStore({ Calculus: rest }, { ladder: DEFAULT_LADDER });
  assert.equal(result.topics.get("Calculus")?.description, "");
});

test("an empty object decodes to an empty collection", () => {
  assert.equal(decodeStore({}, { ladder: DEFAULT_LADDER }).topics.size, 0);
});

test("a topic named __proto__ decodes and encodes like any other", () => {
  const input: unknown = JSON.parse(
    `{"__proto__": ${JSON.stringify(record())}, "Calculus": ${JSON.stringify(record())}}`
  );
  const result = decodeStore(input, { ladder: DEFAULT_LADDER });
  assert.deepEqual([...result.topics.keys()], ["__proto__", "Calculus"]);
  assert.deepEqual(result.skipped, []);

  const encoded = encodeStore(result.topics.values());
  assert.deepEqual(Object.keys(encoded), ["Calculus", "__proto__"]);
  assert.equal(JSON.stringify(encoded).includes('"__proto__":{"description"'), true);
});

section("Repairs");

test("clamps an index past the top rung and recomputes the due time", () => {
  const result = decodeStore({ Calculus: record({ intervalIndex: 9 }) }, { ladder: DEFAULT_LADDER });
  const topic = result.topics.get("Calculus");
  assert.ok(topic);
  assert.equal(topic.intervalIndex, 6);
  assert.equal(topic.nextReviewAt.getTime(), LAST_REVIEW_MS + 88 * MS_PER_DAY);
  assert.deepEqual(
    result.repaired.map((e) => e.field),
    ["intervalIndex", "nextReviewAt"]
  );
});

test("a negative index is clamped to rung 0", () => {
  const result = decodeStore(
    { Calculus: record({ intervalIndex: -2, nextReviewAt: "2024-01-11T00:00:00.000Z" }) },
    { ladder: DEFAULT_LADDER }
  );
  assert.equal(result.topics.get("Calculus")?.intervalIndex, 0);
  assert.deepEqual(
    result.repaired.map((e) => e.field),
    ["intervalIndex"]
  );
});

test("recomputes a due time that does not match the ladder", () => {
  const result = decodeStore(
    { Calculus: record({ nextReviewAt: "2024-02-01T00:00:00.000Z" }) },
    { ladder: DEFAULT_LADDER }
  );
  assert.equal(
    result.topics.get("Calculus")?.nextReviewAt.toISOString(),
    "2024-01-13T00:00:00.000Z"
  );
});

test("aligns reviewCount with totalReviews using the larger value", () => {
  const result = decodeStore({ Calculus: record({ reviewCount: 2 }) }, { ladder: DEFAULT_LADDER });
  const topic = result.topics.get("Calculus");
  assert.equal(topic?.reviewCount, 3);
  assert.equal(topic?.totalReviews, 3);
  assert.deepEqual(
    result.repaired.map((e) => e.field),
    ["reviewCount"]
  );
});

test("caps totalSuccesses at the review count", () => {
  const result = decodeStore({ Calculus: record({ totalSuccesses: 5 }) }, { ladder: DEFAULT_LADDER });
  assert.equal(result.topics.get("Calculus")?.totalSuccesses, 3);
});

test("a shorter ladder clamps stored indexes", () => {
  const ladder = IntervalLadder.fromDays([1, 2]);
  const result = decodeStore(
    { Calculus: record({ intervalIndex: 4, nextReviewAt: "2024-01-12T00:00:00.000Z" }) },
    { ladder }
  );
  const topic = result.topics.get("Calculus");
  assert.equal(topic?.intervalIndex, 1);
  assert.equal(topic?.nextReviewAt.toISOString(), "2024-01-12T00:00:00.000Z");
});

test("each repair is logged as a warning", () => {
  const { lines, logger } = capture();
  decodeStore({ Calculus: record({ reviewCount: 2 }) }, { ladder: DEFAULT_LADDER, logger });
  assert.equal(lines.length, 1);
  const [level, line] = lines[0] ?? ["debug", ""];
  assert.equal(level, "warn");
  assert.ok(line.includes('Repaired topic record {"topic":"Calculus","field":"reviewCount"'));
});

test("with repair disabled the violation is thrown", () => {
  assert.throws(
    () =>
      decodeStore({ Calculus: record({ totalSuccesses: 7 }) }, { ladder: DEFAULT_LADDER, repair: false }),
    (err: unknown) =>
      err instanceof InvalidStateError &&
      err.topicName === "Calculus" &&
      err.field === "totalSuccesses" &&
      err.exitCode === 3
  );
});

section("Skipped records");

test("records failing the schema are skipped, the rest load", () => {
  const { createdAt: _omit, ...noCreatedAt } = record();
  const result = decodeStore(
    {
      Algebra: record(),
      Biology: noCreatedAt,
      "   ": record(),
      Chemistry: 42,
      Drawing: record({ successStreak: -1 }),
    },
    { ladder: DEFAULT_LADDER }
  );

  assert.deepEqual([...result.topics.keys()], ["Algebra"]);
  assert.deepEqual(result.skipped, [
    { name: "Biology", reasons: ["createdAt: Required"] },
    { name: "   ", reasons: ["name: Topic name must not be blank"] },
    { name: "Chemistry", reasons: ["(record): Expected object, received number"] },
    { name: "Drawing", reasons: ["successStreak: Number must be greater than or equal to 0"] },
  ]);
});

test("a skipped record is logged with its reasons", () => {
  const { lines, logger } = capture();
  decodeStore({ Chemistry: "not a record" }, { ladder: DEFAULT_LADDER, logger });
  assert.equal(lines.length, 1);
  assert.ok(
    lines[0]?.[1].endsWith(
      'Skipping unreadable topic record {"topic":"Chemistry","reasons":["(record): Expected object, received string"]}'
    )
  );
});

section("Top-level shape");

test("non-object contents raise PersistenceError", () => {
  for (const input of [null, [], "topics", 3]) {
    assert.throws(
      () => decodeStore(input, { ladder: DEFAULT_LADDER, source: "store.json" }),
      (err: unknown) => err instanceof PersistenceError && err.path === "store.json"
    );
  }
});

section("Encoding");

test("encodes timestamps as ISO strings", () => {
  const topic = decodeStore({ Calculus: record() }, { ladder: DEFAULT_LADDER }).topics.get("Calculus");
  assert.ok(topic);
  assert.deepEqual(encodeTopic(topic), record());
});

test("store keys are written in name order", () => {
  const decoded = decodeStore(
    { Zoology: record(), Algebra: record(), Mechanics: record() },
    { ladder: DEFAULT_LADDER }
  );
  assert.deepEqual(Object.keys(encodeStore(decoded.topics.values())), [
    "Algebra",
    "Mechanics",
    "Zoology",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
