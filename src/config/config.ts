import { existsSync, readFileSync } from "fs";
import { z } from "zod";

import { ConfigError, describeCause } from "../core/errors.js";
import { atomicWriteFileSync } from "../utils/atomic-write.js";
import { safeJsonParseWithSchema } from "../utils/safe-json.js";
import { ConfigSchema } from "../utils/schemas.js";

export type StrideConfig = z.infer<typeof ConfigSchema>;

/**
 * 設定ファイルを読み込む
 * ファイルがなければnull（初回起動）。不正な内容はConfigError
 */
export function loadConfig(configPath: string): StrideConfig | null {
  if (!existsSync(configPath)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(configPath, describeCause(err));
  }

  const result = safeJsonParseWithSchema(content, ConfigSchema, configPath);
  if (!result.ok) {
    throw new ConfigError(configPath, result.issues.join("; "));
  }
  return result.data;
}

export function writeConfig(configPath: string, config: StrideConfig): void {
  atomicWriteFileSync(configPath, JSON.stringify(config, null, 2) + "\n");
}
