/**
 * Notifier capability.
 *
 * A notifier receives the current due list and tells the learner about it.
 * It only reads the topics it is given; the scheduler never depends on a
 * particular notifier.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Logger } from "../logging/index.js";
import type { Topic } from "../topics/schema.js";

const execFileAsync = promisify(execFile);

/** Upper bound for an external notification command */
const COMMAND_TIMEOUT_MS = 10_000;

export interface Notifier {
  /** Short identifier for logs ("log", "notify-send", "osascript") */
  readonly name: string;
  notify(due: readonly Topic[]): Promise<void>;
}

export interface ReminderMessage {
  title: string;
  body: string;
}

/**
 * Title and body for a due list. Lists at most `maxNames` topic names.
 */
export function formatReminder(due: readonly Topic[], maxNames = 5): ReminderMessage {
  const count = due.length;
  const title = `${count} topic${count === 1 ? "" : "s"} due for review`;
  const names = due.slice(0, maxNames).map((t) => t.name);
  const more = count > maxNames ? ` and ${count - maxNames} more` : "";
  return { title, body: `${names.join(", ")}${more}` };
}

/**
 * Writes reminders to the log. Used where no desktop integration exists.
 */
export class LogNotifier implements Notifier {
  readonly name = "log";

  constructor(private readonly logger: Logger) {}

  async notify(due: readonly Topic[]): Promise<void> {
    const message = formatReminder(due);
    this.logger.info(message.title, { topics: due.map((t) => t.name) });
  }
}

/**
 * Linux desktop notifications through `notify-send`.
 */
export class NotifySendNotifier implements Notifier {
  readonly name = "notify-send";

  constructor(private readonly appName: string) {}

  async notify(due: readonly Topic[]): Promise<void> {
    const { title, body } = formatReminder(due);
    await execFileAsync("notify-send", ["--app-name", this.appName, title, body], {
      timeout: COMMAND_TIMEOUT_MS,
    });
  }
}

/**
 * macOS notifications through `osascript`. Text is passed as script
 * arguments, never spliced into the script source.
 */
export class OsascriptNotifier implements Notifier {
  readonly name = "osascript";

  async notify(due: readonly Topic[]): Promise<void> {
    const { title, body } = formatReminder(due);
    const script = "on run argv\ndisplay notification (item 2 of argv) with title (item 1 of argv)\nend run";
    await execFileAsync("osascript", ["-e", script, title, body], {
      timeout: COMMAND_TIMEOUT_MS,
    });
  }
}

/**
 * Pick the notifier for a platform (`process.platform` values).
 * Platforms without an integration get the log notifier.
 */
export function createPlatformNotifier(
  platform: NodeJS.Platform,
  appName: string,
  logger: Logger
): Notifier {
  switch (platform) {
    case "linux":
      return new NotifySendNotifier(appName);
    case "darwin":
      return new OsascriptNotifier();
    default:
      return new LogNotifier(logger);
  }
}
