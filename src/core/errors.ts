/**
 * Error Taxonomy
 *
 * コア全体で共有するエラー分類
 * UI層（CLI）だけがメッセージへの変換を担当する
 */

export type StrideErrorCode =
  | "validation"           // ユーザー入力の不備（修正して再試行）
  | "not-found"            // 古い識別子（ビューを更新）
  | "archive-unavailable"  // ルートが作成・書き込みできない
  | "write-failure"        // 永続化の失敗
  | "corrupt-archive"      // ロード時の整合性エラー
  | "unsupported-schema"   // 未知の将来バージョン
  | "config";              // 設定ファイルの不備

export abstract class StrideError extends Error {
  abstract readonly code: StrideErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends StrideError {
  readonly code = "validation" as const;

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
  }
}

export class NotFoundError extends StrideError {
  readonly code = "not-found" as const;

  constructor(
    readonly entity: "goal" | "session",
    readonly id: number,
  ) {
    super(`${entity} ${id} not found`);
  }
}

export class ArchiveUnavailableError extends StrideError {
  readonly code = "archive-unavailable" as const;

  constructor(
    readonly rootPath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Archive unavailable at ${rootPath}: ${reason}`, options);
  }
}

export class WriteFailureError extends StrideError {
  readonly code = "write-failure" as const;

  constructor(
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to write ${filePath}: ${describeCause(options?.cause)}`, options);
  }
}

export class CorruptArchiveError extends StrideError {
  readonly code = "corrupt-archive" as const;

  constructor(readonly issues: string[]) {
    super(
      issues.length === 1
        ? `Corrupt archive: ${issues[0]}`
        : `Corrupt archive (${issues.length} issues): ${issues.join("; ")}`,
    );
  }
}

export class UnsupportedSchemaError extends StrideError {
  readonly code = "unsupported-schema" as const;

  constructor(
    readonly filePath: string,
    readonly foundVersion: number,
    readonly supportedVersion: number,
  ) {
    super(
      `${filePath} uses schema version ${foundVersion}; this build supports up to ${supportedVersion}`,
    );
  }
}

export class ConfigError extends StrideError {
  readonly code = "config" as const;

  constructor(
    readonly configPath: string,
    detail: string,
  ) {
    super(`Invalid config ${configPath}: ${detail}`);
  }
}

export function isStrideError(value: unknown): value is StrideError {
  return value instanceof StrideError;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
