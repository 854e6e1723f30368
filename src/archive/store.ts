/**
 * Archive Store
 *
 * アーカイブのディスク表現を読み書きする唯一のモジュール
 * - レコード単位（マニフェスト / 目標1件 / 目標ごとのセッション台帳）でアトミック書き込み
 * - ロードは全件成功か全件失敗（部分的なアーカイブは返さない）
 * - 旧スキーマは純粋関数でmigrateしてから検証
 */

import { accessSync, constants, existsSync, mkdirSync, readdirSync, readFileSync, rmSync, statSync } from "fs";
import { join, resolve } from "path";
import { ZodType, ZodTypeDef } from "zod";

import { LAYOUT, SCHEMA } from "../config/constants.js";
import { Logger } from "../core/logger.js";
import {
  ArchiveUnavailableError,
  CorruptArchiveError,
  describeCause,
  UnsupportedSchemaError,
  ValidationError,
  WriteFailureError,
} from "../core/errors.js";
import { atomicWriteFileSync, isTmpPath } from "../utils/atomic-write.js";
import { safeJsonParse, SafeParseOutcome, validateWithSchema } from "../utils/safe-json.js";
import {
  GoalRecordV1Schema,
  GoalRecordV2Schema,
  GoalRecordV3,
  GoalRecordV3Schema,
  LedgerRecordV1Schema,
  LedgerRecordV2Schema,
  LedgerRecordV3,
  LedgerRecordV3Schema,
  ManifestV1Schema,
  ManifestV2Schema,
  ManifestV3,
  ManifestV3Schema,
  LegacyVersionTagSchema,
  VersionTagSchema,
} from "../utils/schemas.js";
import {
  migrateGoalRecordV1,
  migrateGoalRecordV2,
  migrateLedgerRecordV1,
  migrateLedgerRecordV2,
  migrateManifestV1,
  migrateManifestV2,
} from "./migrations.js";
import { Archive, ArchiveCounters, compareSessions, Goal, GoalId, Session, SessionId } from "./types.js";

/** バージョン n → n+1 への変換 */
type MigrationStep = (value: unknown, context: string) => SafeParseOutcome<unknown>;

interface RecordFormat<T> {
  current: ZodType<T, ZodTypeDef, unknown>;
  steps: Record<number, MigrationStep>;
}

function step<L>(
  legacy: ZodType<L, ZodTypeDef, unknown>,
  migrate: (record: L) => unknown,
): MigrationStep {
  return (value, context) => {
    const result = validateWithSchema(value, legacy, context);
    return result.ok ? { ok: true, data: migrate(result.data) } : result;
  };
}

const MANIFEST_FORMAT: RecordFormat<ManifestV3> = {
  current: ManifestV3Schema,
  steps: {
    1: step(ManifestV1Schema, migrateManifestV1),
    2: step(ManifestV2Schema, migrateManifestV2),
  },
};

const GOAL_FORMAT: RecordFormat<GoalRecordV3> = {
  current: GoalRecordV3Schema,
  steps: {
    1: step(GoalRecordV1Schema, migrateGoalRecordV1),
    2: step(GoalRecordV2Schema, migrateGoalRecordV2),
  },
};

const LEDGER_FORMAT: RecordFormat<LedgerRecordV3> = {
  current: LedgerRecordV3Schema,
  steps: {
    1: step(LedgerRecordV1Schema, migrateLedgerRecordV1),
    2: step(LedgerRecordV2Schema, migrateLedgerRecordV2),
  },
};

const RECORD_FILE_PATTERN = /^(\d+)\.json$/;

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function readSchemaVersion(value: unknown): number | null {
  const tagged = VersionTagSchema.safeParse(value);
  if (tagged.success) return tagged.data.schemaVersion;
  const legacy = LegacyVersionTagSchema.safeParse(value);
  return legacy.success ? legacy.data.version : null;
}

export interface ArchiveStoreOptions {
  logger?: Logger;
}

/**
 * ロード中に集めた問題
 */
class LoadReport {
  readonly issues: string[] = [];
  readonly unsupported: UnsupportedSchemaError[] = [];

  throwIfFailed(): void {
    const [firstUnsupported] = this.unsupported;
    if (firstUnsupported) throw firstUnsupported;
    if (this.issues.length > 0) throw new CorruptArchiveError(this.issues);
  }
}

export class ArchiveStore {
  readonly rootPath: string;
  private logger: Logger;

  private constructor(rootPath: string, logger: Logger) {
    this.rootPath = rootPath;
    this.logger = logger;
  }

  /**
   * ルートを開く（なければ作成）
   * 作成できない・ディレクトリでない・書き込めない場合はArchiveUnavailable
   */
  static open(rootPath: string, options: ArchiveStoreOptions = {}): ArchiveStore {
    const root = resolve(rootPath);
    const logger = options.logger ?? Logger.silent();

    if (existsSync(root) && !statSync(root).isDirectory()) {
      throw new ArchiveUnavailableError(root, "not a directory");
    }

    try {
      mkdirSync(join(root, LAYOUT.GOALS_DIR), { recursive: true });
      mkdirSync(join(root, LAYOUT.SESSIONS_DIR), { recursive: true });
      accessSync(root, constants.R_OK | constants.W_OK);
    } catch (error) {
      throw new ArchiveUnavailableError(root, describeCause(error), { cause: error });
    }

    logger.debug("Archive opened", { root });
    return new ArchiveStore(root, logger);
  }

  get manifestPath(): string {
    return join(this.rootPath, LAYOUT.MANIFEST_FILE);
  }

  goalPath(id: GoalId): string {
    return join(this.rootPath, LAYOUT.GOALS_DIR, `${id}${LAYOUT.RECORD_EXT}`);
  }

  ledgerPath(goalId: GoalId): string {
    return join(this.rootPath, LAYOUT.SESSIONS_DIR, `${goalId}${LAYOUT.RECORD_EXT}`);
  }

  // ========================================
  // Load
  // ========================================

  load(): Archive {
    const report = new LoadReport();

    const goals = new Map<GoalId, Goal>();
    for (const [fileId, path] of this.listRecords(LAYOUT.GOALS_DIR, report)) {
      const record = this.readRecord(path, GOAL_FORMAT, report);
      if (!record) continue;
      if (record.goal.id !== fileId) {
        report.issues.push(`${path}: goal id ${record.goal.id} does not match file name`);
        continue;
      }
      goals.set(record.goal.id, record.goal);
    }

    const ledgers = new Map<GoalId, Session[]>();
    const seenSessions = new Set<SessionId>();
    for (const [fileId, path] of this.listRecords(LAYOUT.SESSIONS_DIR, report)) {
      const record = this.readRecord(path, LEDGER_FORMAT, report);
      if (!record) continue;
      if (record.goalId !== fileId) {
        report.issues.push(`${path}: goal id ${record.goalId} does not match file name`);
        continue;
      }
      if (!goals.has(record.goalId)) {
        report.issues.push(`${path}: sessions reference unknown goal ${record.goalId}`);
      }
      for (const session of record.sessions) {
        if (session.goalId !== record.goalId) {
          report.issues.push(`${path}: session ${session.id} belongs to goal ${session.goalId}`);
        }
        if (seenSessions.has(session.id)) {
          report.issues.push(`${path}: duplicate session id ${session.id}`);
        }
        seenSessions.add(session.id);
      }
      if (record.sessions.length > 0) {
        ledgers.set(record.goalId, [...record.sessions].sort(compareSessions));
      }
    }

    const counters = this.readCounters(goals.size + ledgers.size > 0, report);
    if (counters) {
      const maxGoalId = Math.max(0, ...goals.keys());
      const maxSessionId = Math.max(0, ...seenSessions);
      if (counters.nextGoalId <= maxGoalId) {
        report.issues.push(`${this.manifestPath}: nextGoalId ${counters.nextGoalId} is not above goal ${maxGoalId}`);
      }
      if (counters.nextSessionId <= maxSessionId) {
        report.issues.push(
          `${this.manifestPath}: nextSessionId ${counters.nextSessionId} is not above session ${maxSessionId}`,
        );
      }
    }

    report.throwIfFailed();

    const archive: Archive = {
      schemaVersion: SCHEMA.CURRENT_VERSION,
      nextGoalId: counters?.nextGoalId ?? SCHEMA.FIRST_ID,
      nextSessionId: counters?.nextSessionId ?? SCHEMA.FIRST_ID,
      goals,
      ledgers,
    };

    this.logger.debug("Archive loaded", {
      root: this.rootPath,
      goals: goals.size,
      sessions: seenSessions.size,
    });
    return archive;
  }

  private readCounters(hasRecords: boolean, report: LoadReport): ArchiveCounters | null {
    if (!existsSync(this.manifestPath)) {
      if (hasRecords) {
        report.issues.push(`${this.manifestPath}: manifest missing while records exist`);
      }
      return null;
    }
    const manifest = this.readRecord(this.manifestPath, MANIFEST_FORMAT, report);
    if (!manifest) return null;
    return { nextGoalId: manifest.nextGoalId, nextSessionId: manifest.nextSessionId };
  }

  /**
   * ディレクトリ内のレコードファイルを [id, path] で列挙
   * 中断された書き込みの .tmp は無視する
   */
  private listRecords(dirName: string, report: LoadReport): Array<[number, string]> {
    const dir = join(this.rootPath, dirName);
    if (!existsSync(dir)) return [];

    let names: string[];
    try {
      names = readdirSync(dir);
    } catch (error) {
      throw new ArchiveUnavailableError(this.rootPath, describeCause(error), { cause: error });
    }

    const records: Array<[number, string]> = [];
    for (const name of names.sort()) {
      if (isTmpPath(name) || !name.endsWith(LAYOUT.RECORD_EXT)) continue;
      const match = RECORD_FILE_PATTERN.exec(name);
      if (!match) {
        report.issues.push(`${join(dir, name)}: unexpected record file name`);
        continue;
      }
      records.push([Number(match[1]), join(dir, name)]);
    }
    return records;
  }

  private readRecord<T>(path: string, format: RecordFormat<T>, report: LoadReport): T | null {
    let content: string;
    try {
      content = readFileSync(path, "utf-8");
    } catch (error) {
      // レコード名のディレクトリは読み込み不能ではなく破損として扱う
      if (hasErrorCode(error, "EISDIR")) {
        report.issues.push(`${path}: expected a record file, found a directory`);
        return null;
      }
      throw new ArchiveUnavailableError(this.rootPath, describeCause(error), { cause: error });
    }

    const parsed = safeJsonParse(content, path);
    if (!parsed.ok) {
      report.issues.push(...parsed.issues);
      return null;
    }

    let version = readSchemaVersion(parsed.data);
    if (version === null) {
      report.issues.push(`${path}: missing schema version`);
      return null;
    }

    if (version > SCHEMA.CURRENT_VERSION) {
      report.unsupported.push(new UnsupportedSchemaError(path, version, SCHEMA.CURRENT_VERSION));
      return null;
    }

    let value: unknown = parsed.data;
    while (version < SCHEMA.CURRENT_VERSION) {
      const migrate = format.steps[version];
      if (!migrate) {
        report.issues.push(`${path}: no migration from schema version ${version}`);
        return null;
      }
      const migrated = migrate(value, path);
      if (!migrated.ok) {
        report.issues.push(...migrated.issues);
        return null;
      }
      value = migrated.data;
      version += 1;
    }

    const validated = validateWithSchema(value, format.current, path);
    if (!validated.ok) {
      report.issues.push(...validated.issues);
      return null;
    }
    return validated.data;
  }

  // ========================================
  // Save
  // ========================================

  /**
   * アーカイブ全体を保存し、存在しなくなった目標のファイルを削除する
   */
  save(archive: Archive): void {
    for (const goalId of archive.ledgers.keys()) {
      if (!archive.goals.has(goalId)) {
        throw new ValidationError("ledgers", `sessions reference unknown goal ${goalId}`);
      }
    }

    this.writeManifest(archive);
    for (const goal of archive.goals.values()) {
      this.writeGoal(goal);
    }
    for (const [goalId, sessions] of archive.ledgers) {
      if (sessions.length > 0) this.writeLedger(goalId, sessions);
    }

    for (const [id] of this.listRecords(LAYOUT.SESSIONS_DIR, new LoadReport())) {
      const sessions = archive.ledgers.get(id);
      if (!sessions || sessions.length === 0) this.removeFile(this.ledgerPath(id));
    }
    for (const [id] of this.listRecords(LAYOUT.GOALS_DIR, new LoadReport())) {
      if (!archive.goals.has(id)) this.removeFile(this.goalPath(id));
    }

    this.logger.info("Archive saved", { root: this.rootPath, goals: archive.goals.size });
  }

  writeManifest(counters: ArchiveCounters): void {
    const manifest: ManifestV3 = {
      schemaVersion: SCHEMA.CURRENT_VERSION,
      nextGoalId: counters.nextGoalId,
      nextSessionId: counters.nextSessionId,
    };
    this.writeRecord(this.manifestPath, manifest);
  }

  writeGoal(goal: Goal): void {
    const record: GoalRecordV3 = { schemaVersion: SCHEMA.CURRENT_VERSION, goal };
    this.writeRecord(this.goalPath(goal.id), record);
  }

  writeLedger(goalId: GoalId, sessions: readonly Session[]): void {
    const record: LedgerRecordV3 = { schemaVersion: SCHEMA.CURRENT_VERSION, goalId, sessions: [...sessions] };
    this.writeRecord(this.ledgerPath(goalId), record);
  }

  /**
   * 目標を物理削除する（台帳→目標の順で、孤立セッションを残さない）
   */
  removeGoal(goalId: GoalId): void {
    this.removeFile(this.ledgerPath(goalId));
    this.removeFile(this.goalPath(goalId));
    this.logger.debug("Goal files removed", { goalId });
  }

  private writeRecord(path: string, record: unknown): void {
    try {
      atomicWriteFileSync(path, JSON.stringify(record, null, 2) + "\n");
    } catch (error) {
      this.logger.error("Record write failed", { path, error: describeCause(error) });
      throw new WriteFailureError(path, { cause: error });
    }
  }

  private removeFile(path: string): void {
    try {
      rmSync(path, { force: true });
    } catch (error) {
      throw new WriteFailureError(path, { cause: error });
    }
  }
}
