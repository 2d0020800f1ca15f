/**
 * Scheduler configuration tests.
 *
 * Run: node --import tsx src/config/scheduler/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DEFAULT_INTERVALS_DAYS, DEFAULT_SCHEDULER_CONFIG } from "./defaults.js";
import {
  loadSchedulerConfig,
  loadSchedulerConfigFile,
  SchedulerConfigError,
  validateSchedulerConfig,
} from "./loader.js";

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

function expectConfigError(fn: () => unknown): SchedulerConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SchedulerConfigError) {
      return err;
    }
    throw err;
  }
  assert.fail("expected SchedulerConfigError");
}

const tempDir = mkdtempSync(join(tmpdir(), "scheduler-config-"));

function writeJson(name: string, content: string): string {
  const path = join(tempDir, name);
  writeFileSync(path, content);
  return path;
}

// ═══════════════════════════════════════════════════════════════════════════

section("Defaults");

test("default ladder is 1, 3, 5, 11, 25, 44, 88 days", () => {
  assert.deepEqual([...DEFAULT_INTERVALS_DAYS], [1, 3, 5, 11, 25, 44, 88]);
});

test("defaults pass validation", () => {
  const result = validateSchedulerConfig(DEFAULT_SCHEDULER_CONFIG);
  assert.equal(result.success, true);
  assert.equal(result.errors, undefined);
});

test("mastery rules are ordered from Mastered down to Beginner", () => {
  assert.deepEqual(
    DEFAULT_SCHEDULER_CONFIG.masteryRules.map((r) => r.label),
    ["Mastered", "Advanced", "Intermediate", "Beginner"]
  );
});

section("Validation");

test("loaded configuration is deeply frozen", () => {
  const config = loadSchedulerConfig({
    intervalsDays: [1, 2],
    masteryRules: [{ label: "Beginner", minIntervalIndex: 1, minSuccessRate: 0 }],
  });
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.intervalsDays));
  assert.ok(Object.isFrozen(config.masteryRules[0]));
});

test("rejects an empty ladder", () => {
  const err = expectConfigError(() =>
    loadSchedulerConfig({ ...DEFAULT_SCHEDULER_CONFIG, intervalsDays: [] })
  );
  assert.deepEqual(err.issues[0]?.path, ["intervalsDays"]);
  assert.equal(err.issues[0]?.message, "Ladder must have at least one rung");
});

test("rejects fractional and non-increasing gaps", () => {
  const fractional = validateSchedulerConfig({ ...DEFAULT_SCHEDULER_CONFIG, intervalsDays: [1, 2.5] });
  assert.equal(fractional.success, false);
  assert.deepEqual(fractional.errors?.[0]?.path, ["intervalsDays", 1]);
  assert.equal(fractional.errors?.[0]?.message, "Ladder intervals must be whole days");

  const flat = validateSchedulerConfig({ ...DEFAULT_SCHEDULER_CONFIG, intervalsDays: [1, 3, 3] });
  assert.equal(flat.success, false);
  assert.equal(flat.errors?.[0]?.message, "Ladder intervals must be strictly increasing");
});

test("rejects Learning as a rule label", () => {
  const result = validateSchedulerConfig({
    ...DEFAULT_SCHEDULER_CONFIG,
    masteryRules: [{ label: "Learning", minIntervalIndex: 0, minSuccessRate: 0 }],
  });
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["masteryRules", 0, "label"]);
});

test("rejects success rates above 1", () => {
  const result = validateSchedulerConfig({
    ...DEFAULT_SCHEDULER_CONFIG,
    masteryRules: [{ label: "Mastered", minIntervalIndex: 5, minSuccessRate: 80 }],
  });
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["masteryRules", 0, "minSuccessRate"]);
});

test("rejects unknown keys", () => {
  const result = validateSchedulerConfig({ ...DEFAULT_SCHEDULER_CONFIG, lockTimeoutMs: 10 });
  assert.equal(result.success, false);
  assert.equal(result.errors?.[0]?.code, "unrecognized_keys");
});

test("format() lists each issue with its path", () => {
  const err = expectConfigError(() =>
    loadSchedulerConfig({ ...DEFAULT_SCHEDULER_CONFIG, intervalsDays: [] })
  );
  assert.equal(
    err.format(),
    "Scheduler configuration validation failed:\n  - intervalsDays: Ladder must have at least one rung"
  );
});

section("Files");

test("missing fields fall back to the defaults", () => {
  const path = writeJson("ladder-only.json", JSON.stringify({ intervalsDays: [2, 4, 8] }));
  const config = loadSchedulerConfigFile(path);
  assert.deepEqual(config.intervalsDays, [2, 4, 8]);
  assert.deepEqual(config.masteryRules, DEFAULT_SCHEDULER_CONFIG.masteryRules);
});

test("a missing file is reported as an io issue", () => {
  const err = expectConfigError(() => loadSchedulerConfigFile(join(tempDir, "absent.json")));
  assert.equal(err.issues[0]?.code, "io");
});

test("invalid JSON is reported as a json issue", () => {
  const path = writeJson("broken.json", "{ intervalsDays: [1, 2");
  const err = expectConfigError(() => loadSchedulerConfigFile(path));
  assert.equal(err.issues[0]?.code, "json");
});

test("a top-level array is rejected", () => {
  const path = writeJson("array.json", "[1, 2, 3]");
  const err = expectConfigError(() => loadSchedulerConfigFile(path));
  assert.equal(err.issues[0]?.code, "invalid_type");
});

rmSync(tempDir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
