/**
 * Safe JSON Parse Utility
 *
 * try-catch内包のJSONパース。zodスキーマによるバリデーション付き。
 * 失敗時はnullではなく理由付きの結果を返す（呼び出し側が中断か隔離かを決める）
 */

import { ZodType, ZodTypeDef } from "zod";

export type SafeParseOutcome<T> =
  | { ok: true; data: T }
  | { ok: false; issues: string[] };

/**
 * 文字列をJSONとしてパースする
 */
export function safeJsonParse(content: string, context: string): SafeParseOutcome<unknown> {
  try {
    const parsed: unknown = JSON.parse(content);
    return { ok: true, data: parsed };
  } catch (error) {
    return {
      ok: false,
      issues: [`${context}: unparseable JSON (${error instanceof Error ? error.message : String(error)})`],
    };
  }
}

/**
 * パース済みの値をzodスキーマで検証する
 */
export function validateWithSchema<T>(
  value: unknown,
  schema: ZodType<T, ZodTypeDef, unknown>,
  context: string,
): SafeParseOutcome<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map(
        (i) => `${context}: ${i.path.length > 0 ? i.path.join(".") : "<root>"}: ${i.message}`,
      ),
    };
  }
  return { ok: true, data: result.data };
}

/**
 * パースと検証をまとめて行う
 */
export function safeJsonParseWithSchema<T>(
  content: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  context: string,
): SafeParseOutcome<T> {
  const parsed = safeJsonParse(content, context);
  if (!parsed.ok) return parsed;
  return validateWithSchema(parsed.data, schema, context);
}
