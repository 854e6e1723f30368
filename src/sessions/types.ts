import type { GoalId } from "../archive/types.js";

export type { Session, SessionId, SessionKind } from "../archive/types.js";

export interface AddSessionInput {
  goalId: GoalId;
  date: string;
  value: number;
  note?: string;
  /** 開始時刻（ISO timestamp）。ローカル暦日がdateと一致すること */
  startedAt?: string;
  durationSeconds?: number;
}

/**
 * 両端を含む日付範囲（片側だけの指定も可）
 */
export interface DateRange {
  from?: string;
  to?: string;
}
