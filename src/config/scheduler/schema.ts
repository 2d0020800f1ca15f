/**
 * Scheduler configuration schema definition.
 *
 * The configuration fixes the review policy for a process: the interval
 * ladder and the mastery thresholds. It is validated once, frozen, and then
 * shared by the store, the scheduler and the classifier. Changing the ladder
 * between runs is allowed; stored topics whose index no longer fits are
 * clamped on the next load.
 */

import { z } from "zod";
import { MasteryLabel } from "./enums.js";

/**
 * Review gaps in whole days, from least practiced (index 0) to most
 * practiced (index N-1).
 */
export const IntervalsDaysSchema = z
  .array(
    z
      .number()
      .int("Ladder intervals must be whole days")
      .positive("Ladder intervals must be at least one day")
  )
  .min(1, "Ladder must have at least one rung")
  .refine(
    (days) => days.every((value, i) => i === 0 || value > (days[i - 1] ?? 0)),
    "Ladder intervals must be strictly increasing"
  )
  .describe("Ordered review gaps in days");

/**
 * One row of the mastery table. Rules are evaluated top-down and the first
 * rule whose index and success-rate minimums are met wins.
 */
export const MasteryRuleSchema = z
  .object({
    label: MasteryLabel.exclude(["Learning"]),

    /** Lowest ladder position that qualifies */
    minIntervalIndex: z.number().int().min(0),

    /** Lowest success rate (0..1) that qualifies; 0 disables the check */
    minSuccessRate: z.number().min(0).max(1),
  })
  .strict();

export type MasteryRule = z.infer<typeof MasteryRuleSchema>;

export const SchedulerConfigSchema = z
  .object({
    intervalsDays: IntervalsDaysSchema,

    /** Mastery table; topics matching no rule are "Learning" */
    masteryRules: z.array(MasteryRuleSchema).min(1),
  })
  .strict();

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
