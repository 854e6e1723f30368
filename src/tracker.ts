/**
 * Tracker
 *
 * 1つのアーカイブに対するStore / Repository / Ledger / Aggregatorの組み立て
 * ロードに失敗した場合は部分的な状態のまま先へ進まない
 */

import { ArchiveStore } from "./archive/store.js";
import { Archive } from "./archive/types.js";
import { Logger } from "./core/logger.js";
import { GoalRepository } from "./goals/repository.js";
import { ProgressAggregator } from "./progress/aggregator.js";
import { SessionLedger } from "./sessions/ledger.js";

export interface TrackerOptions {
  futureToleranceDays?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface Tracker {
  store: ArchiveStore;
  archive: Archive;
  goals: GoalRepository;
  sessions: SessionLedger;
  progress: ProgressAggregator;
}

export function openTracker(rootPath: string, options: TrackerOptions = {}): Tracker {
  const logger = options.logger ?? Logger.silent();
  const store = ArchiveStore.open(rootPath, { logger });
  const archive = store.load();

  const goals = new GoalRepository(store, archive, { now: options.now, logger });
  const sessions = new SessionLedger(store, archive, goals, {
    now: options.now,
    futureToleranceDays: options.futureToleranceDays,
    logger,
  });
  const progress = new ProgressAggregator(goals, sessions);

  logger.info("Tracker ready", { root: store.rootPath, goals: archive.goals.size });
  return { store, archive, goals, sessions, progress };
}
