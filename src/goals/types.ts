import type { GoalStateKind } from "../archive/types.js";

export type { Goal, GoalId, GoalState, GoalStateKind } from "../archive/types.js";

export interface CreateGoalInput {
  title: string;
  isReward?: boolean;
  target?: number;
  reward?: string;
  unit?: string;
  commands?: readonly string[];
}

export type GoalFilter = GoalStateKind | "all";

export interface GoalSearchOptions {
  /** 指定時は通常の目標かご褒美かで絞り込む */
  isReward?: boolean;
  /** デフォルトは "active" */
  filter?: GoalFilter;
}

/**
 * delete()の結果: セッションがなければ物理削除、あれば論理削除
 */
export type DeleteOutcome = "removed" | "tombstoned";
