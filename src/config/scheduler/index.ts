/**
 * Scheduler configuration module.
 *
 * Usage:
 *   import { loadSchedulerConfig, DEFAULT_SCHEDULER_CONFIG } from "./config/scheduler/index.js";
 *
 *   const config = loadSchedulerConfig({
 *     ...DEFAULT_SCHEDULER_CONFIG,
 *     intervalsDays: [1, 2, 4, 8, 16],
 *   });
 */

export { ReviewOutcome, MasteryLabel } from "./enums.js";

export type { SchedulerConfig, MasteryRule } from "./schema.js";

export { SchedulerConfigSchema, MasteryRuleSchema, IntervalsDaysSchema } from "./schema.js";

export {
  loadSchedulerConfig,
  loadSchedulerConfigFile,
  validateSchedulerConfig,
  formatZodIssues,
  SchedulerConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_SCHEDULER_CONFIG, DEFAULT_INTERVALS_DAYS } from "./defaults.js";
