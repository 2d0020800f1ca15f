/**
 * Closed value sets for the review scheduler.
 *
 * Outcomes and mastery labels are zod enums so that anything read from disk,
 * the command line or a collaborator is checked against the same list the
 * scheduler switches over.
 */

import { z } from "zod";

/**
 * Result of a single review, as reported by the learner or a quiz grader.
 */
export const ReviewOutcome = z.enum(["success", "failure"]);
export type ReviewOutcome = z.infer<typeof ReviewOutcome>;

/**
 * Display-only classification of a topic's progress, lowest to highest.
 */
export const MasteryLabel = z.enum([
  "Learning", // Still on the first rung
  "Beginner",
  "Intermediate",
  "Advanced",
  "Mastered",
]);
export type MasteryLabel = z.infer<typeof MasteryLabel>;
