/**
 * Zod Schemas for Persisted Data
 *
 * アーカイブの全永続化データのzodスキーマ定義（バージョン別）
 */

import { z } from "zod";
import { isCalendarDate } from "./dates.js";

// ========================================
// Common
// ========================================

export const IdSchema = z.number().int().positive();

export const CalendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: "expected a calendar date (YYYY-MM-DD)" });

export const TimestampSchema = z.string().datetime({ offset: true });

/**
 * バージョンタグだけを読む（v2以降は "schemaVersion"、v1は "version"）
 */
export const VersionTagSchema = z.object({ schemaVersion: z.number().int().positive() });
export const LegacyVersionTagSchema = z.object({ version: z.number().int().positive() });

// ========================================
// v3 (current)
// ========================================

export const GoalStateSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("active") }),
  z.object({ kind: z.literal("archived"), archivedAt: TimestampSchema.nullable() }),
  z.object({ kind: z.literal("tombstoned"), deletedAt: TimestampSchema.nullable() }),
]);

export const SessionKindSchema = z.enum(["goal", "reward"]);

export const GoalSchema = z.object({
  id: IdSchema,
  title: z.string().refine((s) => s.trim().length > 0, { message: "title must not be empty" }),
  createdAt: TimestampSchema,
  isReward: z.boolean(),
  target: z.number().finite().positive().optional(),
  reward: z.string().optional(),
  unit: z.string().optional(),
  commands: z.array(z.string().min(1)),
  notes: z.string(),
  state: GoalStateSchema,
});

export const SessionSchema = z.object({
  id: IdSchema,
  goalId: IdSchema,
  kind: SessionKindSchema,
  date: CalendarDateSchema,
  value: z.number().finite().nonnegative(),
  startedAt: TimestampSchema.optional(),
  durationSeconds: z.number().int().nonnegative().optional(),
  note: z.string().optional(),
  createdAt: TimestampSchema,
});

export const ManifestV3Schema = z.object({
  schemaVersion: z.literal(3),
  nextGoalId: IdSchema,
  nextSessionId: IdSchema,
});

export const GoalRecordV3Schema = z.object({
  schemaVersion: z.literal(3),
  goal: GoalSchema,
});

export const LedgerRecordV3Schema = z.object({
  schemaVersion: z.literal(3),
  goalId: IdSchema,
  sessions: z.array(SessionSchema),
});

// ========================================
// v2 (legacy): 状態は文字列、種別・コマンド・開始時刻なし
// ========================================

export const ManifestV2Schema = z.object({
  schemaVersion: z.literal(2),
  nextGoalId: IdSchema,
  nextSessionId: IdSchema,
});

export const GoalRecordV2Schema = z.object({
  schemaVersion: z.literal(2),
  goal: z.object({
    id: IdSchema,
    title: z.string(),
    createdAt: TimestampSchema,
    target: z.number().finite().positive().optional(),
    reward: z.string().optional(),
    unit: z.string().optional(),
    notes: z.string(),
    state: z.enum(["active", "archived", "tombstoned"]),
  }),
});

export const LedgerRecordV2Schema = z.object({
  schemaVersion: z.literal(2),
  goalId: IdSchema,
  sessions: z.array(
    z.object({
      id: IdSchema,
      goalId: IdSchema,
      date: CalendarDateSchema,
      value: z.number().finite().nonnegative(),
      durationSeconds: z.number().int().nonnegative().optional(),
      note: z.string().optional(),
      createdAt: TimestampSchema,
    }),
  ),
});

// ========================================
// v1 (legacy)
// ========================================

export const ManifestV1Schema = z.object({
  version: z.literal(1),
  next_goal_id: IdSchema,
  next_session_id: IdSchema,
});

export const GoalRecordV1Schema = z.object({
  version: z.literal(1),
  goal: z.object({
    id: IdSchema,
    name: z.string(),
    /** epoch seconds */
    created_at: z.number().int().nonnegative(),
    target: z.number().finite().positive().nullable().optional(),
    reward: z.string().nullable().optional(),
    quantity_name: z.string().nullable().optional(),
    notes: z.string().default(""),
    archived: z.boolean().default(false),
    deleted: z.boolean().default(false),
  }),
});

export const LedgerRecordV1Schema = z.object({
  version: z.literal(1),
  goal_id: IdSchema,
  sessions: z.array(
    z.object({
      id: IdSchema,
      date: CalendarDateSchema,
      value: z.number().finite().nonnegative(),
      duration_secs: z.number().int().nonnegative().nullable().optional(),
      note: z.string().nullable().optional(),
      created_at: z.number().int().nonnegative(),
    }),
  ),
});

export type ManifestV1 = z.infer<typeof ManifestV1Schema>;
export type ManifestV2 = z.infer<typeof ManifestV2Schema>;
export type GoalRecordV1 = z.infer<typeof GoalRecordV1Schema>;
export type GoalRecordV2 = z.infer<typeof GoalRecordV2Schema>;
export type LedgerRecordV1 = z.infer<typeof LedgerRecordV1Schema>;
export type LedgerRecordV2 = z.infer<typeof LedgerRecordV2Schema>;
export type ManifestV3 = z.infer<typeof ManifestV3Schema>;
export type GoalRecordV3 = z.infer<typeof GoalRecordV3Schema>;
export type LedgerRecordV3 = z.infer<typeof LedgerRecordV3Schema>;

// ========================================
// Config
// ========================================

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ConfigSchema = z.object({
  archivePath: z.string().min(1),
  futureToleranceDays: z.number().int().nonnegative().default(0),
  logLevel: LogLevelSchema.default("info"),
});
