#!/usr/bin/env node

import { homedir } from "os";
import { dirname, join, resolve } from "path";

import { loadConfig, StrideConfig, writeConfig } from "../../src/config/config.js";
import { CONFIG, SESSIONS } from "../../src/config/constants.js";
import { isStrideError, ValidationError } from "../../src/core/errors.js";
import { Logger } from "../../src/core/logger.js";
import { ArchiveStore } from "../../src/archive/store.js";
import type { Goal, Session } from "../../src/archive/types.js";
import type { GoalFilter } from "../../src/goals/types.js";
import { openTracker, Tracker } from "../../src/tracker.js";
import { parseCommandList } from "../../src/utils/commands.js";
import {
  formatDayLabel,
  formatTimeRange,
  localTimestamp,
  shiftCalendarDate,
  toCalendarDate,
} from "../../src/utils/dates.js";
import { formatDuration, parseDuration } from "../../src/utils/duration.js";

interface ParsedArgs {
  positional: string[];
  flags: Map<string, string>;
}

const GOAL_FILTERS: readonly GoalFilter[] = ["active", "archived", "tombstoned", "all"];
const KINDS = ["goal", "reward"] as const;

/** 最近のセッション一覧のデフォルト日数 */
const RECENT_DAYS = 7;

function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      if (eq !== -1) {
        flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      } else {
        flags.set(arg.slice(2), argv[i + 1] ?? "");
        i++;
      }
    } else if (arg === "-a") {
      flags.set("archive", argv[i + 1] ?? "");
      i++;
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags };
}

/**
 * 設定ファイルの場所（コアは環境変数を読まないのでCLI側で解決）
 */
function resolveConfigPath(): string {
  if (process.env.STRIDE_CONFIG) return process.env.STRIDE_CONFIG;
  const base = process.env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(base, CONFIG.DIR_NAME, CONFIG.FILE_NAME);
}

function requireArg(args: string[], index: number, name: string): string {
  const value = args[index];
  if (value === undefined || value === "") {
    throw new ValidationError(name, `Missing <${name}>`);
  }
  return value;
}

function parseId(raw: string, name: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(name, `Expected a positive integer for <${name}>, got "${raw}"`);
  }
  return id;
}

function parseNumber(raw: string, name: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ValidationError(name, `Expected a number for ${name}, got "${raw}"`);
  }
  return value;
}

function progressBar(fraction: number, width: number = 20): string {
  const filled = Math.round(fraction * width);
  return `[${"#".repeat(filled)}${"-".repeat(width - filled)}]`;
}

function parseFilter(raw: string): GoalFilter {
  const filter = GOAL_FILTERS.find((f) => f === raw);
  if (!filter) {
    throw new ValidationError("filter", `Unknown filter "${raw}" (use ${GOAL_FILTERS.join(", ")})`);
  }
  return filter;
}

/**
 * --kind goal|reward を isReward に変換（未指定はundefined）
 */
function parseKind(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const kind = KINDS.find((k) => k === raw);
  if (!kind) {
    throw new ValidationError("kind", `Unknown kind "${raw}" (use ${KINDS.join(", ")})`);
  }
  return kind === "reward";
}

function formatGoal(goal: Goal): string {
  const tag = goal.isReward ? "[R]" : "[S]";
  const target = goal.target !== undefined ? `  target ${goal.target}${goal.unit ? ` ${goal.unit}` : ""}` : "";
  const reward = goal.reward ? `  reward: ${goal.reward}` : "";
  const state = goal.state.kind === "active" ? "" : `  (${goal.state.kind})`;
  return `${tag} #${goal.id}  ${goal.title}${target}${reward}${state}`;
}

function formatSession(s: Session): string {
  const tag = s.kind === "reward" ? "[R]" : "[S]";
  const times = s.startedAt !== undefined && s.durationSeconds !== undefined
    ? `  ${formatTimeRange(s.startedAt, s.durationSeconds)}`
    : "";
  const duration = s.durationSeconds !== undefined ? `  ${formatDuration(s.durationSeconds)}` : "";
  const note = s.note ? `  ${s.note}` : "";
  return `${tag} ${s.date}  #${s.id}  ${s.value}${times}${duration}${note}`;
}

// ========================================
// Commands
// ========================================

function init(configPath: string, args: ParsedArgs): void {
  const archivePath = resolve(requireArg(args.positional, 1, "path"));
  ArchiveStore.open(archivePath);

  const existing = loadConfig(configPath);
  const config: StrideConfig = {
    archivePath,
    futureToleranceDays: existing?.futureToleranceDays ?? SESSIONS.DEFAULT_FUTURE_TOLERANCE_DAYS,
    logLevel: existing?.logLevel ?? CONFIG.DEFAULT_LOG_LEVEL,
  };
  writeConfig(configPath, config);
  console.log(`Archive: ${archivePath}`);
  console.log(`Config:  ${configPath}`);
}

function goals(tracker: Tracker, args: ParsedArgs): void {
  const list = tracker.goals.list(parseFilter(args.positional[1] ?? "active"));
  if (list.length === 0) {
    console.log("No goals.");
    return;
  }
  for (const goal of list) {
    console.log(formatGoal(goal));
  }
}

function addGoal(tracker: Tracker, args: ParsedArgs): void {
  const target = args.flags.get("target");
  const id = tracker.goals.create({
    title: requireArg(args.positional, 1, "title"),
    isReward: parseKind(args.flags.get("kind")),
    target: target !== undefined ? parseNumber(target, "--target") : undefined,
    reward: args.flags.get("reward"),
    unit: args.flags.get("unit"),
    commands: parseCommandList(args.flags.get("commands") ?? ""),
  });
  console.log(`Created goal #${id}`);
}

function search(tracker: Tracker, args: ParsedArgs): void {
  const found = tracker.goals.search(args.positional[1] ?? "", {
    isReward: parseKind(args.flags.get("kind")),
    filter: parseFilter(args.flags.get("filter") ?? "active"),
  });
  if (found.length === 0) {
    console.log("No matching goals.");
    return;
  }
  for (const goal of found) {
    console.log(formatGoal(goal));
  }
}

function commands(tracker: Tracker, args: ParsedArgs): void {
  const id = parseId(requireArg(args.positional, 1, "id"), "id");
  const text = args.positional[2];
  if (text === undefined) {
    for (const command of tracker.goals.require(id).commands) {
      console.log(command);
    }
    return;
  }
  tracker.goals.setCommands(id, parseCommandList(text));
}

function deleteGoal(tracker: Tracker, args: ParsedArgs): void {
  const id = parseId(requireArg(args.positional, 1, "id"), "id");
  const outcome = tracker.goals.delete(id);
  console.log(outcome === "removed" ? `Removed goal #${id}` : `Goal #${id} deleted; its sessions are kept`);
}

function notes(tracker: Tracker, args: ParsedArgs): void {
  const id = parseId(requireArg(args.positional, 1, "id"), "id");
  const text = args.positional[2];
  if (text === undefined) {
    process.stdout.write(tracker.goals.notesText(id));
    return;
  }
  tracker.goals.setNotes(id, text);
}

function logSession(tracker: Tracker, args: ParsedArgs, today: string): void {
  const goalId = parseId(requireArg(args.positional, 1, "id"), "id");
  const value = parseNumber(requireArg(args.positional, 2, "value"), "value");

  let durationSeconds: number | undefined;
  const rawDuration = args.flags.get("duration");
  if (rawDuration !== undefined) {
    const parsed = parseDuration(rawDuration);
    if (parsed === null) {
      throw new ValidationError("duration", `Could not read duration "${rawDuration}" (try 1h30m, 45m, 90s)`);
    }
    durationSeconds = parsed;
  }

  const date = args.flags.get("date") ?? today;
  let startedAt: string | undefined;
  const rawStart = args.flags.get("start");
  if (rawStart !== undefined) {
    const parsed = localTimestamp(date, rawStart);
    if (parsed === null) {
      throw new ValidationError("start", `Could not read start time "${rawStart}" (use HH:MM)`);
    }
    startedAt = parsed;
  }

  const id = tracker.sessions.add({
    goalId,
    date,
    value,
    note: args.flags.get("note"),
    startedAt,
    durationSeconds,
  });
  console.log(`Logged session #${id}`);
}

function sessions(tracker: Tracker, args: ParsedArgs): void {
  const goalId = parseId(requireArg(args.positional, 1, "id"), "id");
  let count = 0;
  for (const s of tracker.sessions.sessionsFor(goalId, { from: args.flags.get("from"), to: args.flags.get("to") })) {
    console.log(formatSession(s));
    count++;
  }
  if (count === 0) console.log("No sessions.");
}

function recent(tracker: Tracker, args: ParsedArgs, today: string): void {
  const from = args.flags.get("from") ?? shiftCalendarDate(today, -(RECENT_DAYS - 1));
  const to = args.flags.get("to") ?? today;
  const found = tracker.sessions.sessionsBetween({ from, to });
  if (found.length === 0) {
    console.log("No sessions.");
    return;
  }
  for (const s of found) {
    const title = tracker.goals.get(s.goalId)?.title ?? `goal ${s.goalId}`;
    console.log(`${formatSession(s)}  (${title})`);
  }
}

function progress(tracker: Tracker, args: ParsedArgs, today: string): void {
  const goalId = parseId(requireArg(args.positional, 1, "id"), "id");
  const asOf = args.positional[2] ?? today;
  const goal = tracker.goals.require(goalId);
  const view = tracker.progress.progress(goalId, asOf);
  const unit = goal.unit ? ` ${goal.unit}` : "";

  console.log(`\n=== ${goal.title} (${formatDayLabel(asOf, today)}) ===`);
  if (view.target === null) {
    console.log(`Total:   ${view.cumulativeValue}${unit} (no target)`);
  } else {
    const percent = Math.round(view.percentComplete * 100);
    console.log(`Total:   ${view.cumulativeValue}/${view.target}${unit}  ${progressBar(view.percentComplete)} ${percent}%`);
  }
  console.log(`Today:   ${view.valueOn}${unit} in ${view.sessionsOn.length} session(s)`);
  console.log(`Streak:  ${view.currentStreakDays} day(s)`);
  if (view.totalDurationSeconds > 0) {
    console.log(`Time:    ${formatDuration(view.totalDurationSeconds)}`);
  }
  if (goal.reward) {
    console.log(`Reward:  ${goal.reward}`);
  }
  console.log("");
}

function day(tracker: Tracker, args: ParsedArgs, today: string): void {
  const raw = args.positional[1];
  // "-1" / "+2" は今日からの相対日
  const date = raw === undefined ? today : /^[+-]\d+$/.test(raw) ? shiftCalendarDate(today, Number(raw)) : raw;
  const view = tracker.progress.dayView(date);

  console.log(`\n=== ${formatDayLabel(date, today)} ===`);
  if (view.entries.length === 0) {
    console.log("No sessions.");
  }
  for (const entry of view.entries) {
    const unit = entry.goal.unit ? ` ${entry.goal.unit}` : "";
    console.log(`#${entry.goal.id}  ${entry.goal.title}: ${entry.valueOn}${unit} (${entry.sessions.length})`);
  }
  console.log("");
}

function printHelp(): void {
  console.log(`
Stride - goal and session tracker

Usage:
  stride [--archive <path>] <command> [options]

Commands:
  init <path>                      Create an archive and remember it in the config
  goals [active|archived|tombstoned|all]
                                   List goals (default: active)
  add <title> [--kind goal|reward] [--target n] [--reward text] [--unit name] [--commands "a; b"]
                                   Create a goal
  search [query] [--kind goal|reward] [--filter active|archived|tombstoned|all]
                                   Find goals by title
  rename <id> <title>              Rename a goal
  target <id> [n]                  Set or clear a goal's target
  reward <id> [text]               Set or clear a goal's reward
  archive <id> / restore <id>      Archive or restore a goal
  delete <id>                      Delete a goal (kept as a tombstone if it has sessions)
  notes <id> [text]                Print or replace a goal's notes
  commands <id> [a; b]             Print or replace a goal's session commands
  log <id> <value> [--date d] [--start HH:MM] [--note text] [--duration 1h30m]
                                   Log a session (date defaults to today)
  sessions <id> [--from d] [--to d]
                                   List a goal's sessions
  recent [--from d] [--to d]       List sessions of every goal (default: last 7 days)
  note <session-id> <text>         Edit a session's note
  progress <id> [date]             Show progress as of a date
  day [date|-n|+n]                 Show all sessions of a day
  help                             Show this help

Environment:
  STRIDE_CONFIG   Config file path (default: $XDG_CONFIG_HOME/stride/config.json)
`);
}

function run(args: ParsedArgs, configPath: string, logger: Logger): void {
  const command = args.positional[0] ?? "help";

  if (command === "help" || args.flags.has("help")) {
    printHelp();
    return;
  }
  if (command === "init") {
    init(configPath, args);
    return;
  }

  const config = loadConfig(configPath);
  const archivePath = args.flags.get("archive") || config?.archivePath;
  if (!archivePath) {
    throw new ValidationError("archive", "No archive configured. Run `stride init <path>` or pass --archive <path>");
  }

  const tracker = openTracker(archivePath, {
    futureToleranceDays: config?.futureToleranceDays,
    logger,
  });
  const today = toCalendarDate(new Date());
  const id = (): number => parseId(requireArg(args.positional, 1, "id"), "id");

  switch (command) {
    case "goals":
      goals(tracker, args);
      break;
    case "add":
      addGoal(tracker, args);
      break;
    case "search":
      search(tracker, args);
      break;
    case "commands":
      commands(tracker, args);
      break;
    case "recent":
      recent(tracker, args, today);
      break;
    case "rename":
      tracker.goals.rename(id(), requireArg(args.positional, 2, "title"));
      break;
    case "target": {
      const raw = args.positional[2];
      tracker.goals.setTarget(id(), raw === undefined ? undefined : parseNumber(raw, "target"));
      break;
    }
    case "reward":
      tracker.goals.setReward(id(), args.positional[2]);
      break;
    case "archive":
      tracker.goals.archive(id());
      break;
    case "restore":
      tracker.goals.restore(id());
      break;
    case "delete":
      deleteGoal(tracker, args);
      break;
    case "notes":
      notes(tracker, args);
      break;
    case "log":
      logSession(tracker, args, today);
      break;
    case "sessions":
      sessions(tracker, args);
      break;
    case "note":
      tracker.sessions.editNote(parseId(requireArg(args.positional, 1, "session-id"), "session-id"), requireArg(args.positional, 2, "text"));
      break;
    case "progress":
      progress(tracker, args, today);
      break;
    case "day":
      day(tracker, args, today);
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exitCode = 1;
  }
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  const configPath = resolveConfigPath();

  let logger = Logger.silent();
  try {
    logger = new Logger({
      logDir: join(dirname(configPath), CONFIG.LOG_DIR_NAME),
      minLevel: loadConfig(configPath)?.logLevel ?? CONFIG.DEFAULT_LOG_LEVEL,
    });
    run(args, configPath, logger);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error("Command failed", { command: args.positional[0], error: message });
    console.error(`Error: ${message}`);
    process.exitCode = isStrideError(err) && err.code === "validation" ? 2 : 1;
  } finally {
    logger.shutdown();
  }
}

main();
