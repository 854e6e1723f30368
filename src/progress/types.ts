import type { Goal, GoalId, Session } from "../archive/types.js";

export interface ProgressView {
  goalId: GoalId;
  asOf: string;
  /** asOf以前（当日含む）の合計 */
  cumulativeValue: number;
  /** null = 目標値なし */
  target: number | null;
  /** 0〜1。目標値なしの場合は0 */
  percentComplete: number;
  sessionsOn: Session[];
  valueOn: number;
  totalDurationSeconds: number;
  currentStreakDays: number;
}

export interface DayEntry {
  goal: Goal;
  sessions: Session[];
  valueOn: number;
}

export interface DayView {
  date: string;
  entries: DayEntry[];
  totalValue: number;
}
