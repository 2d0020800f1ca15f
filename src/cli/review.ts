#!/usr/bin/env node
/**
 * Command-line front end for the review scheduler.
 *
 * Usage:
 *   npx tsx src/cli/review.ts <command> [options]
 *   npm run review -- <command> [options]
 *
 * Commands:
 *   add <name> [-d <text>]           Add a topic; first review is one rung away
 *   review <name> --success|--failure
 *                                    Record a review outcome
 *   list [--urgent] [--within <days>]
 *                                    List all topics, only due ones, or those
 *                                    due within a number of days
 *   stats [--topic <name>]           Study summary, or one topic's statistics
 *   remove <name>                    Delete a topic permanently
 *   remind                           Send a desktop reminder for due topics
 *
 * Exit codes:
 *   0  - Success
 *   1  - Topic not found
 *   2  - Duplicate topic
 *   3  - Persistence failure (unreadable store, lock timeout)
 *   64 - Invalid arguments
 */

import { parseArgs } from "node:util";

import {
  ConfigError,
  SchedulerConfigError,
  loadConfig,
  type AppConfig,
  type ReviewOutcome,
} from "../config/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { createPlatformNotifier, type Notifier } from "../notify/index.js";
import { MS_PER_DAY } from "../schedule/ladder.js";
import { ReviewService } from "../service.js";
import { SchedulerError } from "../topics/errors.js";
import type { Topic } from "../topics/schema.js";

export const EXIT = {
  ok: 0,
  notFound: 1,
  duplicate: 2,
  persistence: 3,
  usage: 64,
} as const;

const HELP = `
Usage: review-scheduler <command> [options]

Commands:
  add <name> [-d <text>]              Add a topic to the review schedule
  review <name> --success|--failure   Record a review outcome
  list [--urgent] [--within <days>]   List topics (all, due now, or due soon)
  stats [--topic <name>]              Show study statistics
  remove <name>                       Remove a topic
  remind                              Send a reminder for due topics

Options:
  -d, --description <text>  Topic description (add)
  --success, --failure      Review outcome (review)
  --urgent                  Only topics due now (list)
  --within <days>           Topics due within this many days (list)
  --topic <name>            Statistics for one topic (stats)
  -h, --help                Show this help message
`;

// ============================================================
// I/O
// ============================================================

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  colors: boolean;
}

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

function paint(io: CliIO, color: keyof typeof COLORS, text: string): string {
  return io.colors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/**
 * Human status for a topic relative to now: "DUE NOW", "Due within a day",
 * "Due tomorrow", "Due in N days".
 */
export function dueStatus(topic: Topic, now: Date): string {
  const days = Math.floor((topic.nextReviewAt.getTime() - now.getTime()) / MS_PER_DAY);
  if (topic.nextReviewAt.getTime() <= now.getTime()) {
    return "DUE NOW";
  }
  if (days < 1) {
    return "Due within a day";
  }
  if (days === 1) {
    return "Due tomorrow";
  }
  return `Due in ${days} days`;
}

// ============================================================
// Argument parsing
// ============================================================

export type Command =
  | { kind: "help" }
  | { kind: "add"; name: string; description: string }
  | { kind: "review"; name: string; outcome: ReviewOutcome }
  | { kind: "list"; urgent: boolean; withinDays?: number }
  | { kind: "stats"; topic?: string }
  | { kind: "remove"; name: string }
  | { kind: "remind" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function singleName(command: string, rest: string[]): string {
  if (rest.length !== 1 || rest[0] === undefined) {
    throw new UsageError(`"${command}" takes exactly one topic name`);
  }
  return rest[0];
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        description: { type: "string", short: "d" },
        success: { type: "boolean", default: false },
        failure: { type: "boolean", default: false },
        urgent: { type: "boolean", default: false },
        within: { type: "string" },
        topic: { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Turn raw arguments into a command.
 *
 * @throws UsageError on unknown commands, unknown options or bad values
 */
export function parseCommand(argv: string[]): Command {
  const parsed = parseRaw(argv);
  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;

  if (values.help || command === undefined || command === "help") {
    return { kind: "help" };
  }

  switch (command) {
    case "add":
      return {
        kind: "add",
        name: singleName(command, rest),
        description: values.description ?? "",
      };

    case "review": {
      const name = singleName(command, rest);
      if (values.success === values.failure) {
        throw new UsageError(`"review" needs exactly one of --success or --failure`);
      }
      return { kind: "review", name, outcome: values.success ? "success" : "failure" };
    }

    case "list": {
      if (rest.length > 0) {
        throw new UsageError(`"list" takes no positional arguments`);
      }
      if (values.within === undefined) {
        return { kind: "list", urgent: values.urgent === true };
      }
      const withinDays = Number(values.within);
      if (values.within.trim() === "" || !Number.isInteger(withinDays) || withinDays < 0) {
        throw new UsageError(`--within must be a non-negative whole number of days, got: ${values.within}`);
      }
      return { kind: "list", urgent: values.urgent === true, withinDays };
    }

    case "stats":
      if (rest.length > 0) {
        throw new UsageError(`"stats" takes no positional arguments; use --topic <name>`);
      }
      return values.topic === undefined ? { kind: "stats" } : { kind: "stats", topic: values.topic };

    case "remove":
      return { kind: "remove", name: singleName(command, rest) };

    case "remind":
      return { kind: "remind" };

    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

// ============================================================
// Commands
// ============================================================

export interface CliContext {
  service: ReviewService;
  notifier: Notifier;
  io: CliIO;
}

function printTopicLine(ctx: CliContext, topic: Topic, now: Date): void {
  const label = ctx.service.classify(topic);
  ctx.io.out(`${topic.name.padEnd(30)} | ${label.padEnd(12)} | ${dueStatus(topic, now)}`);
}

async function execute(command: Command, ctx: CliContext): Promise<void> {
  const { io, service } = ctx;

  switch (command.kind) {
    case "help":
      io.out(HELP.trim());
      return;

    case "add": {
      const topic = await service.addTopic(command.name, command.description);
      io.out(`${paint(io, "green", "✓")} Added "${topic.name}" to the review schedule`);
      io.out(`First review: ${topic.nextReviewAt.toISOString()}`);
      return;
    }

    case "review": {
      const topic = await service.markReview(command.name, command.outcome);
      const stats = service.statsOf(topic);
      const word = command.outcome === "success" ? "successful" : "failed";
      io.out(`Marked "${topic.name}" as ${word} review`);
      io.out(`Next review in ${plural(stats.currentIntervalDays, "day")}`);
      io.out(`Mastery level: ${stats.mastery}`);
      return;
    }

    case "list": {
      const now = service.now();
      if (command.withinDays !== undefined) {
        const topics = service.listDueWithin(command.withinDays, now);
        if (topics.length === 0) {
          io.out(`No topics due within ${plural(command.withinDays, "day")}`);
          return;
        }
        io.out(`${plural(topics.length, "topic")} due within ${plural(command.withinDays, "day")}:`);
        for (const topic of topics) printTopicLine(ctx, topic, now);
        return;
      }

      if (command.urgent) {
        const due = service.listDue(now);
        if (due.length === 0) {
          io.out("No topics are due for review right now");
          return;
        }
        io.out(paint(io, "yellow", `URGENT: ${plural(due.length, "topic")} due for review:`));
        for (const topic of due) {
          const overdueDays = Math.floor((now.getTime() - topic.nextReviewAt.getTime()) / MS_PER_DAY);
          const suffix = overdueDays > 0 ? ` (overdue by ${plural(overdueDays, "day")})` : "";
          io.out(`  • ${topic.name}${suffix}`);
        }
        return;
      }

      const topics = service
        .listAll()
        .sort((a, b) => a.nextReviewAt.getTime() - b.nextReviewAt.getTime());
      if (topics.length === 0) {
        io.out("No topics in your review schedule");
        io.out(`Add topics with: review-scheduler add "Topic Name" -d "Description"`);
        return;
      }
      io.out(`Review Schedule (${plural(topics.length, "topic")}):`);
      io.out("-".repeat(60));
      for (const topic of topics) printTopicLine(ctx, topic, now);
      return;
    }

    case "stats": {
      if (command.topic !== undefined) {
        const stats = service.topicStats(command.topic);
        io.out(paint(io, "bold", stats.name));
        if (stats.description) io.out(stats.description);
        io.out(`Mastery:        ${stats.mastery}`);
        io.out(`Success rate:   ${stats.successRate}%`);
        io.out(`Streak:         ${stats.successStreak}`);
        io.out(`Reviews:        ${stats.totalReviews}`);
        io.out(`Interval:       ${plural(stats.currentIntervalDays, "day")}`);
        io.out(`Next review:    ${stats.nextReviewDate} (in ${plural(stats.daysUntilReview, "day")})`);
        return;
      }

      const summary = service.summary();
      io.out("Study Statistics");
      io.out("-".repeat(30));
      io.out(`Total Topics: ${summary.totalTopics}`);
      io.out(`Due Now: ${summary.dueNow}`);
      io.out(`Due Today: ${summary.dueToday}`);
      io.out(`Mastered: ${summary.masteredTopics}`);
      io.out(`Success Rate: ${summary.averageSuccessRate}%`);
      if (summary.dueNow > 0) {
        io.out("");
        io.out(`Run 'review-scheduler list --urgent' to see due topics`);
      }
      return;
    }

    case "remove":
      await service.removeTopic(command.name);
      io.out(`Removed "${command.name}" from the review schedule`);
      return;

    case "remind": {
      const result = await service.remind(ctx.notifier);
      switch (result.status) {
        case "skipped":
          io.out("No topics due for review");
          return;
        case "sent":
          io.out(`Sent reminder for ${plural(result.count, "due topic")}`);
          return;
        case "failed":
          io.err(paint(io, "yellow", `Reminder could not be delivered: ${result.error}`));
          return;
      }
    }
  }
}

/**
 * Run one CLI invocation and return its exit code. Never throws for
 * scheduler or usage errors.
 */
export async function run(argv: string[], ctx: CliContext): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      ctx.io.err(paint(ctx.io, "red", `Error: ${err.message}`));
      ctx.io.err(`Run 'review-scheduler --help' for usage.`);
      return EXIT.usage;
    }
    throw err;
  }

  try {
    await execute(command, ctx);
    return EXIT.ok;
  } catch (err) {
    if (err instanceof SchedulerError) {
      ctx.io.err(paint(ctx.io, "red", `Error: ${err.message}`));
      return err.exitCode;
    }
    throw err;
  }
}

// ============================================================
// Entry point
// ============================================================

function createContext(config: AppConfig, logger: Logger): CliContext {
  const io: CliIO = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    colors: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
  };

  return {
    service: ReviewService.fromConfig(config, logger),
    notifier: createPlatformNotifier(process.platform, config.appName, logger.child("notify")),
    io,
  };
}

async function main(): Promise<void> {
  initRunId();

  let config: AppConfig;
  let ctx: CliContext;
  let logger: Logger;
  try {
    config = loadConfig();
    logger = createLogger({
      level: config.logLevel,
      file: config.logToFile,
      logDir: config.logDir,
      // Keep stdout for command output; diagnostics only when asked for
      console: config.logLevel === "debug",
    });
    ctx = createContext(config, logger);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(EXIT.usage);
    }
    if (err instanceof SchedulerConfigError) {
      console.error(err.format());
      process.exit(EXIT.usage);
    }
    throw err;
  }

  logger.debug("Command started", { argv: process.argv.slice(2), store: config.storePath });
  process.exitCode = await run(process.argv.slice(2), ctx);
}

// Only run when executed directly (not imported by tests)
const entry = process.argv[1] ?? "";
const isDirectExecution =
  entry.endsWith("review.ts") || entry.endsWith("review.js") || entry.endsWith("review-scheduler");

if (isDirectExecution) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  });
}
