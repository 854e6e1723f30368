/**
 * Progress Aggregator
 *
 * 目標とセッション台帳から進捗を導出する（状態を持たない）
 * 日付の切り替えは asOf を変えるだけで、閲覧による変更は発生しない
 */

import type { GoalId, Session } from "../archive/types.js";
import { ValidationError } from "../core/errors.js";
import { GoalRepository } from "../goals/repository.js";
import { SessionLedger } from "../sessions/ledger.js";
import { isCalendarDate, shiftCalendarDate } from "../utils/dates.js";
import { DayEntry, DayView, ProgressView } from "./types.js";

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function requireDate(date: string): void {
  if (!isCalendarDate(date)) {
    throw new ValidationError("date", `Expected a date as YYYY-MM-DD, got "${date}"`);
  }
}

export class ProgressAggregator {
  private goals: GoalRepository;
  private sessions: SessionLedger;

  constructor(goals: GoalRepository, sessions: SessionLedger) {
    this.goals = goals;
    this.sessions = sessions;
  }

  progress(goalId: GoalId, asOf: string): ProgressView {
    requireDate(asOf);
    const goal = this.goals.require(goalId);

    let cumulativeValue = 0;
    let totalDurationSeconds = 0;
    const activeDays = new Set<string>();
    const sessionsOn: Session[] = [];

    for (const session of this.sessions.sessionsFor(goalId, { to: asOf })) {
      cumulativeValue += session.value;
      totalDurationSeconds += session.durationSeconds ?? 0;
      activeDays.add(session.date);
      if (session.date === asOf) sessionsOn.push(session);
    }

    // asOfから遡って途切れるまで数える
    let currentStreakDays = 0;
    let day = asOf;
    while (activeDays.has(day)) {
      currentStreakDays++;
      day = shiftCalendarDate(day, -1);
    }

    const target = goal.target ?? null;
    const percentComplete = target !== null && target > 0 ? clamp(cumulativeValue / target, 0, 1) : 0;

    return {
      goalId,
      asOf,
      cumulativeValue,
      target,
      percentComplete,
      sessionsOn,
      valueOn: sessionsOn.reduce((sum, s) => sum + s.value, 0),
      totalDurationSeconds,
      currentStreakDays,
    };
  }

  /**
   * 指定日にセッションのある目標の一覧（tombstonedは除く）
   */
  dayView(date: string): DayView {
    requireDate(date);
    const entries: DayEntry[] = [];

    for (const goal of this.goals.list("all")) {
      if (goal.state.kind === "tombstoned") continue;
      const sessions = [...this.sessions.sessionsFor(goal.id, { from: date, to: date })];
      if (sessions.length === 0) continue;
      entries.push({
        goal,
        sessions,
        valueOn: sessions.reduce((sum, s) => sum + s.value, 0),
      });
    }

    return {
      date,
      entries,
      totalValue: entries.reduce((sum, e) => sum + e.valueOn, 0),
    };
  }
}
