import path from "node:path";

export const getRunDir = (outputDir: string, runId: string): string =>
  path.join(outputDir, "runs", runId);

export const getRunLogDir = (runDir: string): string => path.join(runDir, "logs");

export const getDocumentLogPath = (runDir: string, documentId: string): string =>
  path.join(getRunLogDir(runDir), "documents", `${sanitizeFileStem(documentId)}.log`);

export const getCorpusRowsPath = (corpusDir: string): string => path.join(corpusDir, "rows.jsonl");

export const getCorpusManifestPath = (corpusDir: string): string =>
  path.join(corpusDir, "manifest.json");

export const sanitizeFileStem = (value: string): string =>
  value.replace(/[^a-zA-Z0-9._-]+/g, "_").replace(/^\.+/, "_") || "_";
