import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";

/**
 * テストごとの一時ディレクトリ
 */
export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "stride-test-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/**
 * 呼ぶたびに1秒進む時計（createdAtの並びを決定的にする）
 */
export function steppingClock(startIso: string): () => Date {
  let current = Date.parse(startIso);
  return () => {
    const date = new Date(current);
    current += 1000;
    return date;
  };
}

export function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}

export function writeJson(path: string, value: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(value, null, 2));
}
