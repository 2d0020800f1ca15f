/**
 * Run IDs tag every log line of one process, so that interleaved output from
 * a reviewer, a lister and a background reminder can be told apart.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID: UTC date, process ID and a random suffix
 * (e.g., "20240115-4821-a1b2c3").
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${process.pid}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this execution. Call once at startup.
 * An explicit ID is kept as given.
 */
export function initRunId(runId?: string): string {
  currentRunId = runId ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
