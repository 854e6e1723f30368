/**
 * Atomic File Write Utility
 *
 * .tmpファイルに書き込み→renameでアトミックに置換
 * 書き込み中のクラッシュで中途半端なレコードが見えることを防止
 */

import { writeFileSync, renameSync, mkdirSync, existsSync } from "fs";
import { dirname } from "path";
import { LAYOUT } from "../config/constants.js";

export function tmpPathFor(filePath: string): string {
  return `${filePath}${LAYOUT.TMP_EXT}`;
}

export function isTmpPath(filePath: string): boolean {
  return filePath.endsWith(LAYOUT.TMP_EXT);
}

/**
 * アトミックにファイルを書き込む
 * .tmpに書き込み→renameで置換（POSIXアトミック）
 */
export function atomicWriteFileSync(filePath: string, data: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const tmpPath = tmpPathFor(filePath);
  writeFileSync(tmpPath, data, "utf-8");
  renameSync(tmpPath, filePath);
}
