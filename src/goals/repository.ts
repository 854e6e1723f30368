/**
 * Goal Repository
 *
 * 実行中の目標の正本（インメモリ）を保持し、ライフサイクル操作を提供
 * 変更はArchive Storeへの書き込みが成功してからメモリに反映する
 */

import { ArchiveStore } from "../archive/store.js";
import { Archive, compareGoals, copyGoal } from "../archive/types.js";
import { NotFoundError, ValidationError } from "../core/errors.js";
import { Logger } from "../core/logger.js";
import { CreateGoalInput, DeleteOutcome, Goal, GoalFilter, GoalId, GoalSearchOptions } from "./types.js";

export interface GoalRepositoryOptions {
  now?: () => Date;
  logger?: Logger;
}

function validateTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new ValidationError("title", "Goal title must not be empty");
  }
  return trimmed;
}

function validateTarget(target: number | undefined): number | undefined {
  if (target === undefined) return undefined;
  if (!Number.isFinite(target) || target <= 0) {
    throw new ValidationError("target", `Target must be a positive number, got ${target}`);
  }
  return target;
}

function normalizeCommands(commands: readonly string[] | undefined): string[] {
  return (commands ?? []).map((c) => c.trim()).filter((c) => c.length > 0);
}

function matchesFilter(goal: Goal, filter: GoalFilter): boolean {
  return filter === "all" || goal.state.kind === filter;
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export class GoalRepository {
  private store: ArchiveStore;
  private data: Archive;
  private now: () => Date;
  private logger: Logger;

  constructor(store: ArchiveStore, archive: Archive, options: GoalRepositoryOptions = {}) {
    this.store = store;
    this.data = archive;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? Logger.silent();
  }

  create(input: CreateGoalInput): GoalId {
    const title = validateTitle(input.title);
    const target = validateTarget(input.target);
    const reward = optionalText(input.reward);
    const unit = optionalText(input.unit);

    const id = this.data.nextGoalId;
    const goal: Goal = {
      id,
      title,
      createdAt: this.now().toISOString(),
      isReward: input.isReward ?? false,
      ...(target !== undefined ? { target } : {}),
      ...(reward !== undefined ? { reward } : {}),
      ...(unit !== undefined ? { unit } : {}),
      commands: normalizeCommands(input.commands),
      notes: "",
      state: { kind: "active" },
    };

    // カウンタを先に永続化（目標ファイルより後退しないように）
    // メモリ側は目標の書き込みが成功してから進める
    this.store.writeManifest({ nextGoalId: id + 1, nextSessionId: this.data.nextSessionId });
    this.store.writeGoal(goal);
    this.data.nextGoalId = id + 1;
    this.data.goals.set(id, goal);

    this.logger.info("Goal created", { goalId: id, title, isReward: goal.isReward });
    return id;
  }

  get(id: GoalId): Goal | undefined {
    const goal = this.data.goals.get(id);
    return goal ? copyGoal(goal) : undefined;
  }

  /**
   * 存在しなければNotFound（tombstonedも返す）
   */
  require(id: GoalId): Goal {
    const goal = this.get(id);
    if (!goal) throw new NotFoundError("goal", id);
    return goal;
  }

  list(filter: GoalFilter = "active"): Goal[] {
    return [...this.data.goals.values()]
      .filter((g) => matchesFilter(g, filter))
      .sort(compareGoals)
      .map(copyGoal);
  }

  /**
   * タイトルの部分一致検索（大文字小文字を区別しない、空の検索語は全件）
   */
  search(query: string, options: GoalSearchOptions = {}): Goal[] {
    const needle = query.trim().toLowerCase();
    const filter = options.filter ?? "active";
    return [...this.data.goals.values()]
      .filter((g) => matchesFilter(g, filter))
      .filter((g) => options.isReward === undefined || g.isReward === options.isReward)
      .filter((g) => g.title.toLowerCase().includes(needle))
      .sort(compareGoals)
      .map(copyGoal);
  }

  rename(id: GoalId, title: string): void {
    const validated = validateTitle(title);
    this.update(id, (goal) => ({ ...goal, title: validated }));
    this.logger.info("Goal renamed", { goalId: id, title: validated });
  }

  setTarget(id: GoalId, target: number | undefined): void {
    const validated = validateTarget(target);
    this.update(id, (goal) => {
      const next: Goal = { ...goal };
      if (validated === undefined) {
        delete next.target;
      } else {
        next.target = validated;
      }
      return next;
    });
  }

  setReward(id: GoalId, reward: string | undefined): void {
    const validated = optionalText(reward);
    this.update(id, (goal) => {
      const next: Goal = { ...goal };
      if (validated === undefined) {
        delete next.reward;
      } else {
        next.reward = validated;
      }
      return next;
    });
  }

  /**
   * セッション開始時に実行するコマンドを置き換える（空要素は除く）
   */
  setCommands(id: GoalId, commands: readonly string[]): void {
    const normalized = normalizeCommands(commands);
    this.update(id, (goal) => ({ ...goal, commands: normalized }));
  }

  /**
   * 外部エディタ連携用: ノート本文を取得
   */
  notesText(id: GoalId): string {
    return this.requireMutable(id).notes;
  }

  /**
   * 外部エディタ連携用: ノート本文を置き換え（内容はそのまま保存）
   */
  setNotes(id: GoalId, text: string): void {
    this.update(id, (goal) => ({ ...goal, notes: text }));
  }

  archive(id: GoalId): void {
    const goal = this.requireMutable(id);
    if (goal.state.kind === "archived") return;
    const archivedAt = this.now().toISOString();
    this.update(id, (g) => ({ ...g, state: { kind: "archived", archivedAt } }));
    this.logger.info("Goal archived", { goalId: id });
  }

  restore(id: GoalId): void {
    const goal = this.requireMutable(id);
    if (goal.state.kind === "active") return;
    this.update(id, (g) => ({ ...g, state: { kind: "active" } }));
    this.logger.info("Goal restored", { goalId: id });
  }

  /**
   * セッションがなければ物理削除、あればtombstone化（タイトル・種別・単位は残す）
   */
  delete(id: GoalId): DeleteOutcome {
    const goal = this.requireMutable(id);
    const sessionCount = this.data.ledgers.get(id)?.length ?? 0;

    if (sessionCount === 0) {
      this.store.removeGoal(id);
      this.data.goals.delete(id);
      this.data.ledgers.delete(id);
      this.logger.info("Goal removed", { goalId: id });
      return "removed";
    }

    const tombstone: Goal = {
      id: goal.id,
      title: goal.title,
      createdAt: goal.createdAt,
      isReward: goal.isReward,
      ...(goal.unit !== undefined ? { unit: goal.unit } : {}),
      commands: [],
      notes: "",
      state: { kind: "tombstoned", deletedAt: this.now().toISOString() },
    };
    this.store.writeGoal(tombstone);
    this.data.goals.set(id, tombstone);
    this.logger.info("Goal tombstoned", { goalId: id, sessions: sessionCount });
    return "tombstoned";
  }

  /**
   * 変更対象の目標（tombstonedは存在しない扱い）
   */
  private requireMutable(id: GoalId): Goal {
    const goal = this.data.goals.get(id);
    if (!goal || goal.state.kind === "tombstoned") {
      throw new NotFoundError("goal", id);
    }
    return goal;
  }

  private update(id: GoalId, mutate: (goal: Goal) => Goal): void {
    const next = mutate(this.requireMutable(id));
    this.store.writeGoal(next);
    this.data.goals.set(id, next);
    this.logger.debug("Goal updated", { goalId: id });
  }
}
