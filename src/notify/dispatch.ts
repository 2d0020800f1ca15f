/**
 * Reminder dispatch.
 *
 * The boundary between the scheduler and a notifier: whatever the notifier
 * does, its failures stop here and are logged.
 */

import type { Logger } from "../logging/index.js";
import type { Topic } from "../topics/schema.js";
import type { Notifier } from "./notifier.js";

export type DispatchResult =
  | { status: "skipped"; count: 0 }
  | { status: "sent"; count: number }
  | { status: "failed"; count: number; error: string };

/**
 * Send a reminder for the due list. Never throws.
 */
export async function dispatchDueReminders(
  notifier: Notifier,
  due: readonly Topic[],
  logger: Logger
): Promise<DispatchResult> {
  if (due.length === 0) {
    logger.debug("No topics due; reminder skipped", { notifier: notifier.name });
    return { status: "skipped", count: 0 };
  }

  try {
    await notifier.notify(due);
    logger.info("Reminder sent", { notifier: notifier.name, count: due.length });
    return { status: "sent", count: due.length };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    logger.warn("Reminder delivery failed", { notifier: notifier.name, error });
    return { status: "failed", count: due.length, error };
  }
}
