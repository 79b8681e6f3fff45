import fs from "node:fs/promises";
import path from "node:path";
import { getDocumentLogPath, getRunLogDir } from "./run-paths.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LoggerConfig = {
  level?: string;
  per_document_logs?: boolean;
  keep_logs?: boolean;
};

export type RunLogger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  document: (
    documentId: string,
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ) => void;
  flush: () => Promise<void>;
  finalize: () => Promise<void>;
};

export const normalizeLevel = (value: string | undefined): LogLevel => {
  const normalized = String(value ?? "info").toLowerCase();
  if (normalized === "debug") return "debug";
  if (normalized === "warn" || normalized === "warning") return "warn";
  if (normalized === "error") return "error";
  return "info";
};

const safeStringify = (payload: unknown): string => {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({ message: "Failed to serialize log payload" });
  }
};

const writeLine = async (filePath: string, payload: Record<string, unknown>): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, `${safeStringify(payload)}\n`);
};

export const createRunLogger = (runDir: string, config?: LoggerConfig): RunLogger => {
  const level = normalizeLevel(config?.level);
  const perDocument = config?.per_document_logs ?? false;
  const keepLogs = config?.keep_logs ?? true;
  const logDir = getRunLogDir(runDir);
  const runLogPath = path.join(logDir, "run.log");
  // Writes to one file are chained so lines land in call order.
  const chains = new Map<string, Promise<void>>();

  const shouldLog = (entryLevel: LogLevel): boolean =>
    LEVEL_WEIGHT[entryLevel] >= LEVEL_WEIGHT[level];

  const enqueue = (filePath: string, payload: Record<string, unknown>): void => {
    const previous = chains.get(filePath) ?? Promise.resolve();
    const next = previous
      .then(() => writeLine(filePath, payload))
      .catch((error: unknown) => {
        process.emitWarning(
          `Failed to write log line to ${filePath}: ${error instanceof Error ? error.message : String(error)}`
        );
      });
    chains.set(filePath, next);
  };

  const log = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!shouldLog(entryLevel)) return;
    enqueue(runLogPath, {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      ...(meta ?? {}),
    });
  };

  const logDocument = (
    documentId: string,
    entryLevel: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): void => {
    if (!perDocument || !shouldLog(entryLevel)) return;
    enqueue(getDocumentLogPath(runDir, documentId), {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      documentId,
      message,
      ...(meta ?? {}),
    });
  };

  const flush = async (): Promise<void> => {
    await Promise.all(chains.values());
  };

  const finalize = async (): Promise<void> => {
    await flush();
    if (keepLogs) return;
    await fs.rm(logDir, { recursive: true, force: true });
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    document: logDocument,
    flush,
    finalize,
  };
};

export const createNullLogger = (): RunLogger => ({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  document: () => undefined,
  flush: async () => undefined,
  finalize: async () => undefined,
});
