import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync } from "fs";
import { join } from "path";

import {
  CorruptArchiveError,
  isStrideError,
  NotFoundError,
  UnsupportedSchemaError,
  ValidationError,
  WriteFailureError,
} from "../src/core/errors.js";
import { Logger } from "../src/core/logger.js";
import { makeTempDir } from "./fixtures.js";

describe("Logger", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });
  afterEach(() => cleanup());

  it("should write buffered entries to the daily file on shutdown", () => {
    const logDir = join(dir, "logs");
    const logger = new Logger({ logDir });

    logger.info("Goal created", { goalId: 1 });
    logger.debug("Below the minimum level");
    logger.shutdown();

    const logFile = logger.getLogFile();
    expect(logFile).not.toBeNull();
    if (logFile === null) return;
    const lines = readFileSync(logFile, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] Goal created \{"goalId":1\}$/);
  });

  it("should honour the configured minimum level", () => {
    const logger = new Logger({ logDir: join(dir, "logs"), minLevel: "debug" });

    logger.debug("Session note edited");
    logger.shutdown();

    const logFile = logger.getLogFile();
    if (logFile === null) throw new Error("expected a log file");
    expect(readFileSync(logFile, "utf-8")).toContain("[DEBUG] Session note edited\n");
  });

  it("should write nothing when silent", () => {
    const logger = Logger.silent();

    logger.error("Dropped");
    logger.shutdown();

    expect(logger.getLogFile()).toBeNull();
    expect(existsSync(join(dir, "logs"))).toBe(false);
  });
});

describe("Errors", () => {
  it("should carry a stable code and name", () => {
    const error = new NotFoundError("goal", 7);

    expect(error.code).toBe("not-found");
    expect(error.name).toBe("NotFoundError");
    expect(error.message).toBe("goal 7 not found");
    expect(isStrideError(error)).toBe(true);
    expect(isStrideError(new Error("plain"))).toBe(false);
  });

  it("should keep the failing field on validation errors", () => {
    const error = new ValidationError("title", "Title must not be empty");

    expect(error.code).toBe("validation");
    expect(error.field).toBe("title");
  });

  it("should describe the underlying cause of a write failure", () => {
    const cause = new Error("EACCES: permission denied");
    const error = new WriteFailureError("/archive/goals/1.json", { cause });

    expect(error.message).toBe("Failed to write /archive/goals/1.json: EACCES: permission denied");
    expect(error.cause).toBe(cause);
  });

  it("should summarise corruption issues", () => {
    expect(new CorruptArchiveError(["a.json: bad"]).message).toBe("Corrupt archive: a.json: bad");
    expect(new CorruptArchiveError(["a.json: bad", "b.json: worse"]).message).toBe(
      "Corrupt archive (2 issues): a.json: bad; b.json: worse",
    );
  });

  it("should name both schema versions", () => {
    const error = new UnsupportedSchemaError("/archive/archive.json", 3, 2);

    expect(error.message).toBe("/archive/archive.json uses schema version 3; this build supports up to 2");
  });
});
