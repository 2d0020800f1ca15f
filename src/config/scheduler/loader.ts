/**
 * Scheduler configuration loader and validator.
 *
 * Responsible for:
 * - Validating raw configuration against the schema
 * - Reading configuration overrides from a JSON file
 * - Producing structured error messages
 * - Freezing configuration so no stage can change the policy mid-run
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { SchedulerConfigSchema, type SchedulerConfig } from "./schema.js";
import { DEFAULT_SCHEDULER_CONFIG } from "./defaults.js";

/**
 * Structured validation error for scheduler configuration.
 */
export class SchedulerConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "SchedulerConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Scheduler configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "io" / "json" for file problems */
  code: string;
}

/**
 * Convert Zod issues to the structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load scheduler configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen SchedulerConfig
 * @throws SchedulerConfigError if validation fails
 */
export function loadSchedulerConfig(input: unknown): Readonly<SchedulerConfig> {
  const result = SchedulerConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new SchedulerConfigError(
      `Invalid scheduler configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate scheduler configuration without loading.
 */
export function validateSchedulerConfig(input: unknown): {
  success: boolean;
  config?: SchedulerConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = SchedulerConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Load scheduler configuration from a JSON file.
 * Fields missing from the file fall back to DEFAULT_SCHEDULER_CONFIG.
 *
 * @throws SchedulerConfigError if the file cannot be read, is not JSON,
 *         or fails validation
 */
export function loadSchedulerConfigFile(path: string): Readonly<SchedulerConfig> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new SchedulerConfigError(`Cannot read scheduler configuration: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "io" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SchedulerConfigError(`Scheduler configuration is not valid JSON: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "json" },
    ]);
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return loadSchedulerConfig(parsed);
  }
  return loadSchedulerConfig({ ...DEFAULT_SCHEDULER_CONFIG, ...parsed });
}
