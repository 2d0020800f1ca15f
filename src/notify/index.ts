/**
 * Due-review notifications.
 */

export {
  LogNotifier,
  NotifySendNotifier,
  OsascriptNotifier,
  createPlatformNotifier,
  formatReminder,
  type Notifier,
  type ReminderMessage,
} from "./notifier.js";

export { dispatchDueReminders, type DispatchResult } from "./dispatch.js";
