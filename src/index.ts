export { openTracker } from "./tracker.js";
export type { Tracker, TrackerOptions } from "./tracker.js";

export { ArchiveStore } from "./archive/store.js";
export type { ArchiveStoreOptions } from "./archive/store.js";
export { compareGoals, compareSessions, copyGoal } from "./archive/types.js";
export type {
  Archive,
  ArchiveCounters,
  Goal,
  GoalId,
  GoalState,
  GoalStateKind,
  Session,
  SessionId,
  SessionKind,
} from "./archive/types.js";

export { GoalRepository } from "./goals/repository.js";
export type { CreateGoalInput, DeleteOutcome, GoalFilter, GoalSearchOptions } from "./goals/types.js";

export { SessionLedger } from "./sessions/ledger.js";
export type { AddSessionInput, DateRange } from "./sessions/types.js";

export { ProgressAggregator } from "./progress/aggregator.js";
export type { DayEntry, DayView, ProgressView } from "./progress/types.js";

export { loadConfig, writeConfig } from "./config/config.js";
export type { StrideConfig } from "./config/config.js";

export { Logger } from "./core/logger.js";
export type { LogLevel, LoggerOptions } from "./core/logger.js";
export * from "./core/errors.js";

export {
  formatDayLabel,
  formatTimeRange,
  isCalendarDate,
  isTimestamp,
  localTimestamp,
  shiftCalendarDate,
  toCalendarDate,
} from "./utils/dates.js";
export { parseCommandList } from "./utils/commands.js";
export { formatDuration, parseDuration } from "./utils/duration.js";
