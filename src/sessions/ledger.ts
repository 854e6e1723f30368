/**
 * Session Ledger
 *
 * 目標ごとの作業セッションを (date, createdAt, id) 順で保持
 * セッションの移動・日付変更はできない（誤りは補正セッションで打ち消す）
 */

import { ArchiveStore } from "../archive/store.js";
import { Archive, compareSessions, GoalId } from "../archive/types.js";
import { SESSIONS } from "../config/constants.js";
import { NotFoundError, ValidationError } from "../core/errors.js";
import { Logger } from "../core/logger.js";
import { GoalRepository } from "../goals/repository.js";
import { calendarDaysBetween, isCalendarDate, isTimestamp, toCalendarDate } from "../utils/dates.js";
import { AddSessionInput, DateRange, Session, SessionId } from "./types.js";

export interface SessionLedgerOptions {
  now?: () => Date;
  /** 今日から何日先までの日付を受け付けるか */
  futureToleranceDays?: number;
  logger?: Logger;
}

function validateDate(field: string, date: string): void {
  if (!isCalendarDate(date)) {
    throw new ValidationError(field, `Expected a date as YYYY-MM-DD, got "${date}"`);
  }
}

export class SessionLedger {
  private store: ArchiveStore;
  private data: Archive;
  private goals: GoalRepository;
  private now: () => Date;
  private futureToleranceDays: number;
  private logger: Logger;
  /** セッションID → 目標ID */
  private index: Map<SessionId, GoalId> = new Map();

  constructor(
    store: ArchiveStore,
    archive: Archive,
    goals: GoalRepository,
    options: SessionLedgerOptions = {},
  ) {
    this.store = store;
    this.data = archive;
    this.goals = goals;
    this.now = options.now ?? (() => new Date());
    this.futureToleranceDays = options.futureToleranceDays ?? SESSIONS.DEFAULT_FUTURE_TOLERANCE_DAYS;
    this.logger = options.logger ?? Logger.silent();

    for (const [goalId, sessions] of archive.ledgers) {
      for (const session of sessions) {
        this.index.set(session.id, goalId);
      }
    }
  }

  add(input: AddSessionInput): SessionId {
    const goal = this.goals.get(input.goalId);
    if (!goal || goal.state.kind !== "active") {
      throw new NotFoundError("goal", input.goalId);
    }

    if (!Number.isFinite(input.value) || input.value < 0) {
      throw new ValidationError("value", `Session value must be a non-negative number, got ${input.value}`);
    }
    validateDate("date", input.date);

    const now = this.now();
    const aheadDays = calendarDaysBetween(toCalendarDate(now), input.date);
    if (aheadDays > this.futureToleranceDays) {
      throw new ValidationError("date", `Session date ${input.date} is in the future`);
    }

    const duration = input.durationSeconds;
    if (duration !== undefined && (!Number.isInteger(duration) || duration < 0)) {
      throw new ValidationError("durationSeconds", `Duration must be whole seconds, got ${duration}`);
    }
    const startedAt = this.validateStart(input.startedAt, input.date);
    const note = input.note?.trim();

    const id = this.data.nextSessionId;
    const session: Session = {
      id,
      goalId: input.goalId,
      kind: goal.isReward ? "reward" : "goal",
      date: input.date,
      // -0はJSONで0になるため正規化
      value: input.value + 0,
      ...(startedAt !== undefined ? { startedAt } : {}),
      ...(duration !== undefined ? { durationSeconds: duration } : {}),
      ...(note ? { note } : {}),
      createdAt: now.toISOString(),
    };
    const next = [...(this.data.ledgers.get(input.goalId) ?? []), session].sort(compareSessions);

    // カウンタを先に永続化（台帳のIDより後退しないように）
    // メモリ側は台帳の書き込みが成功してから進める
    this.store.writeManifest({ nextGoalId: this.data.nextGoalId, nextSessionId: id + 1 });
    this.store.writeLedger(input.goalId, next);
    this.data.nextSessionId = id + 1;
    this.data.ledgers.set(input.goalId, next);
    this.index.set(id, input.goalId);

    this.logger.info("Session added", { sessionId: id, goalId: input.goalId, date: input.date, value: input.value });
    return id;
  }

  /**
   * 順序付きで何度でも走査できる遅延シーケンス
   * 台帳配列は変更時に置き換えるため、取得時点のスナップショットを走査する
   */
  sessionsFor(goalId: GoalId, range: DateRange = {}): Iterable<Session> {
    if (!this.data.goals.has(goalId)) {
      throw new NotFoundError("goal", goalId);
    }
    const { from, to } = range;
    if (from !== undefined) validateDate("from", from);
    if (to !== undefined) validateDate("to", to);

    const snapshot = this.data.ledgers.get(goalId) ?? [];
    return {
      *[Symbol.iterator]() {
        for (const session of snapshot) {
          if (from !== undefined && session.date < from) continue;
          if (to !== undefined && session.date > to) break;
          yield { ...session };
        }
      },
    };
  }

  /**
   * 期間内の全目標のセッション（最近の記録一覧用）
   */
  sessionsBetween(range: DateRange = {}): Session[] {
    const { from, to } = range;
    if (from !== undefined) validateDate("from", from);
    if (to !== undefined) validateDate("to", to);

    const result: Session[] = [];
    for (const sessions of this.data.ledgers.values()) {
      for (const session of sessions) {
        if (from !== undefined && session.date < from) continue;
        if (to !== undefined && session.date > to) break;
        result.push({ ...session });
      }
    }
    return result.sort(compareSessions);
  }

  /**
   * ある日の全目標のセッション（日表示用）
   */
  sessionsOn(date: string): Session[] {
    validateDate("date", date);
    return this.sessionsBetween({ from: date, to: date });
  }

  get(sessionId: SessionId): Session | undefined {
    const goalId = this.index.get(sessionId);
    if (goalId === undefined) return undefined;
    const session = this.data.ledgers.get(goalId)?.find((s) => s.id === sessionId);
    return session ? { ...session } : undefined;
  }

  count(goalId: GoalId): number {
    return this.data.ledgers.get(goalId)?.length ?? 0;
  }

  /**
   * 開始時刻はセッションの日付（ローカル暦日）に含まれていなければならない
   */
  private validateStart(startedAt: string | undefined, date: string): string | undefined {
    if (startedAt === undefined) return undefined;
    if (!isTimestamp(startedAt)) {
      throw new ValidationError("startedAt", `Expected an ISO timestamp, got "${startedAt}"`);
    }
    const start = new Date(startedAt);
    const startDay = toCalendarDate(start);
    if (startDay !== date) {
      throw new ValidationError("startedAt", `Session starts on ${startDay}, not on ${date}`);
    }
    return start.toISOString();
  }

  /**
   * ノートのみ編集可能（並び順のキーは変わらない）
   */
  editNote(sessionId: SessionId, text: string): void {
    const goalId = this.index.get(sessionId);
    const sessions = goalId === undefined ? undefined : this.data.ledgers.get(goalId);
    if (goalId === undefined || !sessions) {
      throw new NotFoundError("session", sessionId);
    }

    const note = text.trim();
    const next = sessions.map((s) => {
      if (s.id !== sessionId) return s;
      const edited: Session = { ...s };
      if (note) {
        edited.note = note;
      } else {
        delete edited.note;
      }
      return edited;
    });

    this.store.writeLedger(goalId, next);
    this.data.ledgers.set(goalId, next);
    this.logger.debug("Session note edited", { sessionId, goalId });
  }
}
