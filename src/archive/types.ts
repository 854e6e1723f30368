/**
 * Archive Module - Type Definitions
 *
 * 目標・セッション・アーカイブ全体のインメモリ表現
 */

export type GoalId = number;
export type SessionId = number;

/**
 * 目標のライフサイクル
 * tombstonedはセッション履歴の参照整合性を保つためだけに残る論理削除状態
 * 日時がnullなのは、記録していなかった旧スキーマから移行した場合
 */
export type GoalState =
  | { kind: "active" }
  | { kind: "archived"; archivedAt: string | null }
  | { kind: "tombstoned"; deletedAt: string | null };

export type GoalStateKind = GoalState["kind"];

/** 通常の作業セッションか、ご褒美（休憩・娯楽）のセッションか */
export type SessionKind = "goal" | "reward";

export interface Goal {
  id: GoalId;
  title: string;
  createdAt: string; // ISO timestamp
  /** ご褒美として記録する目標 */
  isReward: boolean;
  target?: number;
  reward?: string;
  unit?: string; // "pages", "books" など
  /** セッション開始時に実行するコマンド（実行はUI層の責務） */
  commands: string[];
  notes: string;
  state: GoalState;
}

export interface Session {
  id: SessionId;
  goalId: GoalId;
  kind: SessionKind;
  date: string; // YYYY-MM-DD
  value: number;
  /** 開始時刻（ISO timestamp） */
  startedAt?: string;
  durationSeconds?: number;
  note?: string;
  createdAt: string; // ISO timestamp（同日内の並び順）
}

export interface Archive {
  schemaVersion: number;
  nextGoalId: GoalId;
  nextSessionId: SessionId;
  goals: Map<GoalId, Goal>;
  ledgers: Map<GoalId, Session[]>;
}

export interface ArchiveCounters {
  nextGoalId: GoalId;
  nextSessionId: SessionId;
}

/**
 * タイムスタンプを時刻として比較する（オフセット表記の違いは無視）
 */
function compareInstants(a: string, b: string): number {
  return Date.parse(a) - Date.parse(b);
}

/**
 * (date, createdAt, id) の全順序
 */
export function compareSessions(a: Session, b: Session): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return compareInstants(a.createdAt, b.createdAt) || a.id - b.id;
}

export function compareGoals(a: Goal, b: Goal): number {
  return compareInstants(a.createdAt, b.createdAt) || a.id - b.id;
}

export function copyGoal(goal: Goal): Goal {
  return { ...goal, commands: [...goal.commands], state: { ...goal.state } };
}
