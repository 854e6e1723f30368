/**
 * 作業時間の入力パース・表示
 *
 * "1h30m" / "45m" / "90s" / "25"（単位なしは分）
 */

const UNIT_SECONDS: Record<string, number> = {
  h: 3600,
  m: 60,
  s: 1,
};

/**
 * 秒数に変換する。解釈できない入力や合計0はnull
 */
export function parseDuration(input: string): number | null {
  const trimmed = input.trim();
  if (trimmed === "") return null;

  let total = 0;
  let digits = "";

  for (const ch of trimmed) {
    if (ch >= "0" && ch <= "9") {
      digits += ch;
    } else if (/\p{L}/u.test(ch)) {
      if (digits === "") continue;
      const unit = UNIT_SECONDS[ch.toLowerCase()];
      if (unit === undefined) return null;
      total += Number.parseInt(digits, 10) * unit;
      digits = "";
    } else if (/\s/.test(ch)) {
      continue;
    } else {
      return null;
    }
  }

  if (digits !== "") {
    total += Number.parseInt(digits, 10) * UNIT_SECONDS.m;
  }

  return total === 0 ? null : total;
}

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;

  if (h > 0) return m > 0 ? `${h}h ${m}m` : `${h}h`;
  if (m > 0) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  return `${s}s`;
}
