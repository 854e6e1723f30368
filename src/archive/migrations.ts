/**
 * Schema Migrations
 *
 * 旧バージョンのレコードを現行バージョンへ変換する純粋関数群
 * 検証はmigrate後に現行スキーマで行う
 */

import type { GoalState } from "./types.js";
import type {
  GoalRecordV1,
  GoalRecordV2,
  GoalRecordV3,
  LedgerRecordV1,
  LedgerRecordV2,
  LedgerRecordV3,
  ManifestV1,
  ManifestV2,
  ManifestV3,
} from "../utils/schemas.js";

function epochSecondsToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export function migrateManifestV1(record: ManifestV1): ManifestV2 {
  return {
    schemaVersion: 2,
    nextGoalId: record.next_goal_id,
    nextSessionId: record.next_session_id,
  };
}

export function migrateGoalRecordV1(record: GoalRecordV1): GoalRecordV2 {
  const legacy = record.goal;
  // deletedはarchivedより優先
  const state: GoalRecordV2["goal"]["state"] = legacy.deleted ? "tombstoned" : legacy.archived ? "archived" : "active";

  return {
    schemaVersion: 2,
    goal: {
      id: legacy.id,
      title: legacy.name,
      createdAt: epochSecondsToIso(legacy.created_at),
      ...(legacy.target != null ? { target: legacy.target } : {}),
      ...(legacy.reward != null ? { reward: legacy.reward } : {}),
      ...(legacy.quantity_name != null ? { unit: legacy.quantity_name } : {}),
      notes: legacy.notes,
      state,
    },
  };
}

export function migrateLedgerRecordV1(record: LedgerRecordV1): LedgerRecordV2 {
  return {
    schemaVersion: 2,
    goalId: record.goal_id,
    sessions: record.sessions.map((s) => ({
      id: s.id,
      goalId: record.goal_id,
      date: s.date,
      value: s.value,
      ...(s.duration_secs != null ? { durationSeconds: s.duration_secs } : {}),
      ...(s.note != null ? { note: s.note } : {}),
      createdAt: epochSecondsToIso(s.created_at),
    })),
  };
}

// ========================================
// v2 → v3
// ========================================

/**
 * v2はアーカイブ・削除の日時を記録していないのでnull
 */
function stateFromV2(state: GoalRecordV2["goal"]["state"]): GoalState {
  switch (state) {
    case "active":
      return { kind: "active" };
    case "archived":
      return { kind: "archived", archivedAt: null };
    case "tombstoned":
      return { kind: "tombstoned", deletedAt: null };
  }
}

export function migrateManifestV2(record: ManifestV2): ManifestV3 {
  return { ...record, schemaVersion: 3 };
}

export function migrateGoalRecordV2(record: GoalRecordV2): GoalRecordV3 {
  return {
    schemaVersion: 3,
    goal: {
      ...record.goal,
      isReward: false,
      commands: [],
      state: stateFromV2(record.goal.state),
    },
  };
}

export function migrateLedgerRecordV2(record: LedgerRecordV2): LedgerRecordV3 {
  return {
    schemaVersion: 3,
    goalId: record.goalId,
    sessions: record.sessions.map((s) => ({ ...s, kind: "goal" as const })),
  };
}
