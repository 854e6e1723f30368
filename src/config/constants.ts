/**
 * Centralized Configuration Constants
 *
 * マジックナンバーを排除し、全設定値を一箇所に集約
 */

// ========================================
// Archive Schema
// ========================================

export const SCHEMA = {
  /** 現行のアーカイブスキーマバージョン */
  CURRENT_VERSION: 3,
  /** 最初に採番される識別子 */
  FIRST_ID: 1,
} as const;

// ========================================
// Archive Layout
// ========================================

export const LAYOUT = {
  MANIFEST_FILE: "archive.json",
  GOALS_DIR: "goals",
  SESSIONS_DIR: "sessions",
  RECORD_EXT: ".json",
  /** アトミック書き込みの一時ファイル拡張子 */
  TMP_EXT: ".tmp",
} as const;

// ========================================
// Session Policy
// ========================================

export const SESSIONS = {
  /** 未来日付を許容する日数（0 = 今日まで） */
  DEFAULT_FUTURE_TOLERANCE_DAYS: 0,
} as const;

// ========================================
// Config / CLI
// ========================================

export const CONFIG = {
  DIR_NAME: "stride",
  FILE_NAME: "config.json",
  LOG_DIR_NAME: "logs",
  DEFAULT_LOG_LEVEL: "info",
} as const;
