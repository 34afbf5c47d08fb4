import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonLogger } from "../../../src/infrastructure/services/json-logger.service.js";

describe("JsonLogger", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "crm-extract-log-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function readEntries(file: string): unknown[] {
    return fs
      .readFileSync(file, "utf-8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
  }

  it("appends one JSON object per line at or above the level", async () => {
    const dir = path.join(tmpDir, "logs");
    const logger = JsonLogger.open(dir, "run.jsonl", { level: "info", console: false, scope: "app" });

    logger.debug("hidden");
    logger.info("Starting full load", { update: false });
    logger.child("loader").child("tags").warn("Skipping tag missing locally");
    await logger.close();

    const entries = readEntries(path.join(dir, "run.jsonl"));
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      level: "info",
      scope: "app",
      message: "Starting full load",
      data: { update: false },
    });
    expect(entries[1]).toMatchObject({ level: "warn", scope: "app.loader.tags", message: "Skipping tag missing locally" });
    expect(entries[1]).not.toHaveProperty("data");
  });

  it("ignores writes after close", async () => {
    const logger = JsonLogger.open(tmpDir, "run.jsonl", { console: false });
    logger.error("first");
    await logger.close();
    logger.error("second");

    expect(readEntries(path.join(tmpDir, "run.jsonl"))).toHaveLength(1);
  });
});
