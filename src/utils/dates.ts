/**
 * Calendar Day Helpers
 *
 * セッションの日付は "YYYY-MM-DD" のローカル暦日として扱う
 */

import { addDays, addSeconds, differenceInCalendarDays, format, isValid, parse, parseISO } from "date-fns";

export const CALENDAR_DATE_FORMAT = "yyyy-MM-dd";

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;

export function isCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE_PATTERN.test(value)) return false;
  const parsed = parse(value, CALENDAR_DATE_FORMAT, new Date(0));
  // 2024-02-30 のような値はdate-fns側で弾かれる
  return isValid(parsed) && format(parsed, CALENDAR_DATE_FORMAT) === value;
}

/**
 * 日時を含むISO 8601文字列か
 */
export function isTimestamp(value: string): boolean {
  return TIMESTAMP_PATTERN.test(value) && isValid(parseISO(value));
}

export function toCalendarDate(date: Date): string {
  return format(date, CALENDAR_DATE_FORMAT);
}

export function parseCalendarDate(value: string): Date {
  return parse(value, CALENDAR_DATE_FORMAT, new Date(0));
}

export function shiftCalendarDate(value: string, days: number): string {
  return toCalendarDate(addDays(parseCalendarDate(value), days));
}

/**
 * b - a の暦日差
 */
export function calendarDaysBetween(a: string, b: string): number {
  return differenceInCalendarDays(parseCalendarDate(b), parseCalendarDate(a));
}

/**
 * 日付ナビゲーション用のラベル（"2024-01-04, today" / "2024-01-02, -2d"）
 */
export function formatDayLabel(day: string, today: string): string {
  const diff = calendarDaysBetween(day, today);
  if (diff === 0) return `${day}, today`;
  return diff > 0 ? `${day}, -${diff}d` : `${day}, +${-diff}d`;
}

/**
 * 暦日とローカル時刻 "HH:mm" からISO timestampを作る（不正な入力はnull）
 */
export function localTimestamp(date: string, time: string): string | null {
  const parsed = parse(`${date} ${time}`, `${CALENDAR_DATE_FORMAT} HH:mm`, new Date(0));
  return isValid(parsed) ? parsed.toISOString() : null;
}

/**
 * セッションの時間帯（ローカル時刻 "09:00-09:25"）
 */
export function formatTimeRange(startedAt: string, durationSeconds: number): string {
  const start = parseISO(startedAt);
  return `${format(start, "HH:mm")}-${format(addSeconds(start, durationSeconds), "HH:mm")}`;
}
