/**
 * Mastery classifier tests.
 *
 * Run: node --import tsx src/schedule/mastery.test.ts
 */

import { strict as assert } from "node:assert";

import { loadSchedulerConfig } from "../config/index.js";
import { classify, classifyProgress, successRate } from "./mastery.js";

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

// ═══════════════════════════════════════════════════════════════════════════

section("successRate");

test("is 0 before any review", () => {
  assert.equal(successRate(0, 0), 0);
});

test("divides successes by reviews", () => {
  assert.equal(successRate(3, 4), 0.75);
  assert.equal(successRate(0, 5), 0);
});

section("Default table");

test("rung 0 is Learning whatever the rate", () => {
  assert.equal(classifyProgress(0, 0, 0), "Learning");
  assert.equal(classifyProgress(0, 10, 10), "Learning");
});

test("rung 1 is Beginner even with no successes recorded", () => {
  assert.equal(classifyProgress(1, 0, 0), "Beginner");
  assert.equal(classifyProgress(1, 1, 1), "Beginner");
});

test("rung 2 needs a 60% rate for Intermediate", () => {
  assert.equal(classifyProgress(2, 3, 5), "Intermediate");
  assert.equal(classifyProgress(2, 1, 2), "Beginner");
});

test("rung 3 needs a 70% rate for Advanced", () => {
  assert.equal(classifyProgress(3, 7, 10), "Advanced");
  assert.equal(classifyProgress(3, 6, 10), "Intermediate");
});

test("rung 5 needs an 80% rate for Mastered", () => {
  assert.equal(classifyProgress(5, 8, 10), "Mastered");
  assert.equal(classifyProgress(6, 7, 10), "Advanced");
  assert.equal(classifyProgress(4, 10, 10), "Advanced");
});

test("low rates fall through to Beginner on high rungs", () => {
  assert.equal(classifyProgress(6, 1, 10), "Beginner");
});

test("classify reads the topic fields", () => {
  assert.equal(classify({ intervalIndex: 5, totalSuccesses: 9, totalReviews: 10 }), "Mastered");
  assert.equal(classify({ intervalIndex: 0, totalSuccesses: 0, totalReviews: 0 }), "Learning");
});

section("Custom tables");

test("rules come from the scheduler configuration", () => {
  const config = loadSchedulerConfig({
    intervalsDays: [1, 2, 4],
    masteryRules: [
      { label: "Mastered", minIntervalIndex: 2, minSuccessRate: 0.5 },
      { label: "Beginner", minIntervalIndex: 1, minSuccessRate: 0 },
    ],
  });
  assert.equal(classifyProgress(2, 1, 2, config.masteryRules), "Mastered");
  assert.equal(classifyProgress(2, 0, 2, config.masteryRules), "Beginner");
  assert.equal(classifyProgress(0, 2, 2, config.masteryRules), "Learning");
});

// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
