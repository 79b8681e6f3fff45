import { describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createNullLogger, createRunLogger, normalizeLevel } from "./logger.js";
import { getDocumentLogPath, getRunLogDir } from "./run-paths.js";

const createRunDir = async (runId: string): Promise<string> => {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "block-labeler-log-"));
  const runDir = path.join(tempDir, "runs", runId);
  await fs.mkdir(runDir, { recursive: true });
  return runDir;
};

const readLines = async (filePath: string): Promise<Array<Record<string, unknown>>> => {
  const raw = await fs.readFile(filePath, "utf-8");
  return raw
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
};

describe("run logger", () => {
  it("writes run and document logs as JSON lines", async () => {
    const runDir = await createRunDir("run-1");
    const logger = createRunLogger(runDir, {
      level: "info",
      per_document_logs: true,
      keep_logs: true,
    });

    logger.info("run-start", { runId: "run-1" });
    logger.document("casebook/001", "warn", "partial page", { pageNo: 2 });
    await logger.flush();

    const runLines = await readLines(path.join(getRunLogDir(runDir), "run.log"));
    const documentLines = await readLines(getDocumentLogPath(runDir, "casebook/001"));

    expect(runLines).toHaveLength(1);
    expect(runLines[0]).toMatchObject({ level: "info", message: "run-start", runId: "run-1" });
    expect(documentLines[0]).toMatchObject({
      level: "warn",
      documentId: "casebook/001",
      message: "partial page",
      pageNo: 2,
    });
    expect(path.basename(getDocumentLogPath(runDir, "casebook/001"))).toBe("casebook_001.log");
  });

  it("keeps lines in call order", async () => {
    const runDir = await createRunDir("run-2");
    const logger = createRunLogger(runDir);

    ["first", "second", "third"].forEach((message) => logger.info(message));
    await logger.flush();

    const lines = await readLines(path.join(getRunLogDir(runDir), "run.log"));
    expect(lines.map((line) => line.message)).toEqual(["first", "second", "third"]);
  });

  it("removes logs when keep_logs is false", async () => {
    const runDir = await createRunDir("run-3");
    const logger = createRunLogger(runDir, { keep_logs: false });

    logger.info("run-start");
    await logger.finalize();

    await expect(fs.stat(getRunLogDir(runDir))).rejects.toBeDefined();
  });

  it("respects log levels and disables document logs", async () => {
    const runDir = await createRunDir("run-4");
    const logger = createRunLogger(runDir, { level: "error", per_document_logs: false });

    logger.info("ignored");
    logger.document("doc-1", "error", "ignored-document");
    await logger.flush();

    await expect(fs.stat(path.join(getRunLogDir(runDir), "run.log"))).rejects.toBeDefined();
    await expect(fs.stat(path.join(getRunLogDir(runDir), "documents"))).rejects.toBeDefined();
  });

  it("normalizes level names", () => {
    expect(normalizeLevel("WARNING")).toBe("warn");
    expect(normalizeLevel("debug")).toBe("debug");
    expect(normalizeLevel("verbose")).toBe("info");
    expect(normalizeLevel(undefined)).toBe("info");
  });

  it("creates a null logger that no-ops", async () => {
    const logger = createNullLogger();
    logger.debug("noop");
    logger.info("noop");
    logger.warn("noop");
    logger.error("noop");
    logger.document("doc-1", "info", "noop");
    await logger.finalize();
  });
});
