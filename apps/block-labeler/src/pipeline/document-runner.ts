import fs from "node:fs/promises";
import path from "node:path";
import type {
  ClassifierResult,
  LabelDecision,
  LabeledBlock,
  LabeledDocument,
  MatchCandidate,
  MatchStats,
  PageReconcileStats,
  TextBlock,
} from "../io/contracts.js";
import { adaptClassifiedText } from "../io/classifiedTextAdapter.js";
import {
  CorruptDocumentError,
  describeWarning,
  type ClassifierUnavailableWarning,
  type PipelineWarning,
  type ValidationIssue,
} from "../io/errors.js";
import { adaptRawOcr } from "../io/rawTextAdapter.js";
import { adaptReference } from "../io/referenceAdapter.js";
import { parseDocumentInput } from "../io/validation.js";
import {
  layoutPredictionResult,
  requestClassification,
  type BlockClassifier,
} from "./block-classifier.js";
import { appendDocument, type AppendResult, type CorpusStore } from "./corpus-store.js";
import { matchDocument } from "./ground-truth-matcher.js";
import { resolveBlockLabel, summarizeTiers } from "./label-resolver.js";
import type { LabelingConfig } from "./labeling-config.js";
import { createNullLogger, type RunLogger } from "./logger.js";
import { reconcileDocument } from "./reconciliation.js";

export type ProcessOptions = {
  config: LabelingConfig;
  classifier?: BlockClassifier | null;
  logger?: RunLogger;
  fallbackDocumentId?: string;
};

export type DocumentResult = LabeledDocument & {
  pageStats: PageReconcileStats[];
  matchStats: MatchStats;
  warnings: PipelineWarning[];
  droppedFragments: number;
};

const NO_CANDIDATES: readonly MatchCandidate[] = [];

const toLabeledBlock = (block: TextBlock, decision: LabelDecision): LabeledBlock => ({
  blockId: block.blockId,
  documentId: block.documentId,
  pageNo: block.pageNo,
  readingOrder: block.readingOrder,
  text: block.text,
  bbox: block.bbox,
  source: block.source,
  extractionConfidence: block.extractionConfidence,
  layoutPrediction: block.layoutPrediction,
  ...decision,
});

const classifyBlock = async (
  block: TextBlock,
  options: ProcessOptions
): Promise<ClassifierResult> => {
  if (options.classifier) {
    return requestClassification(options.classifier, block, options.config.classifier.timeout_ms);
  }
  if (options.config.resolution.use_layout_prediction) {
    return layoutPredictionResult(block);
  }
  return { status: "absent" };
};

/**
 * Runs one document through adaptation, reconciliation, reference matching
 * and label resolution. Throws CorruptDocumentError when the input cannot be
 * parsed at all; every other problem is reported as a warning.
 */
export const processDocument = async (
  input: unknown,
  options: ProcessOptions
): Promise<DocumentResult> => {
  const { config } = options;
  const logger = options.logger ?? createNullLogger();
  const form = config.normalization.unicode_form;
  const document = parseDocumentInput(input, options.fallbackDocumentId);
  const { documentId } = document;
  if (!document.raw && !document.classified) {
    throw new CorruptDocumentError(documentId, "document has neither a raw nor a classified stream");
  }

  const raw = document.raw ? adaptRawOcr(document.raw, document.pages, form) : null;
  const classified = document.classified
    ? adaptClassifiedText(document.classified, document.pages, form)
    : null;
  const reference = adaptReference(document.reference, form);

  const reconciled = reconcileDocument(
    { documentId, pages: document.pages, raw, classified },
    config
  );
  const matched = matchDocument(reconciled.blocks, reference, config);
  const warnings: PipelineWarning[] = [...reconciled.warnings, ...matched.warnings];

  const blocks: LabeledBlock[] = [];
  for (const block of reconciled.blocks) {
    const candidates = matched.candidates.get(block.blockId) ?? NO_CANDIDATES;
    // The classifier is only consulted for blocks without an accepted reference match.
    const classifierResult: ClassifierResult =
      candidates.length > 0 ? { status: "absent" } : await classifyBlock(block, options);
    if (classifierResult.status === "unavailable") {
      const warning: ClassifierUnavailableWarning = {
        kind: "classifier_unavailable",
        documentId,
        blockId: block.blockId,
        reason: classifierResult.reason,
        message: classifierResult.message,
      };
      warnings.push(warning);
    }
    blocks.push(toLabeledBlock(block, resolveBlockLabel(block, candidates, classifierResult, config)));
  }

  const tierStats = summarizeTiers(blocks, config);
  if (tierStats.flaggedForReview) {
    warnings.push({
      kind: "tier_alarm",
      documentId,
      unresolvedFraction: tierStats.fractions.unresolved,
      threshold: config.resolution.tier3_alarm_fraction,
    });
    logger.warn("Document flagged for review", {
      documentId,
      unresolvedFraction: tierStats.fractions.unresolved,
      threshold: config.resolution.tier3_alarm_fraction,
    });
  }

  warnings.forEach((warning) => {
    logger.document(documentId, "warn", describeWarning(warning), { warning });
  });
  logger.document(documentId, "info", "Document labeled", {
    blocks: blocks.length,
    tiers: tierStats.counts,
    matchStats: matched.stats,
  });

  return {
    documentId,
    blocks,
    tierStats,
    flaggedForReview: tierStats.flaggedForReview,
    pageStats: reconciled.pageStats,
    matchStats: matched.stats,
    warnings,
    droppedFragments: (raw?.droppedFragments ?? 0) + (classified?.droppedFragments ?? 0),
  };
};

export type BatchDocument = {
  documentId: string;
  load: () => Promise<unknown>;
};

export type BatchFailure = {
  documentId: string;
  kind: "corrupt_document" | "error";
  message: string;
  issues: ValidationIssue[];
};

export type BatchOutcome =
  | { status: "ok"; documentId: string; result: DocumentResult; corpus: AppendResult | null }
  | { status: "failed"; documentId: string; failure: BatchFailure };

export type BatchSummary = {
  outcomes: BatchOutcome[];
  succeeded: number;
  failed: number;
  flagged: string[];
};

export type BatchOptions = ProcessOptions & {
  store?: CorpusStore;
  concurrency?: number;
};

const toFailure = (documentId: string, error: unknown): BatchFailure => {
  if (error instanceof CorruptDocumentError) {
    return {
      documentId,
      kind: "corrupt_document",
      message: error.message,
      issues: error.issues,
    };
  }
  return {
    documentId,
    kind: "error",
    message: error instanceof Error ? error.message : String(error),
    issues: [],
  };
};

const runOne = async (item: BatchDocument, options: BatchOptions): Promise<BatchOutcome> => {
  let loaded: unknown;
  try {
    loaded = await item.load();
  } catch (error) {
    if (error instanceof CorruptDocumentError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new CorruptDocumentError(item.documentId, `failed to load: ${message}`);
  }
  const result = await processDocument(loaded, { ...options, fallbackDocumentId: item.documentId });
  const corpus = options.store ? await appendDocument(options.store, result) : null;
  return { status: "ok", documentId: result.documentId, result, corpus };
};

/**
 * Processes documents in parallel on a bounded worker pool. A failing document
 * is recorded and the batch continues; outcomes keep the input order.
 */
export const runBatch = async (
  documents: BatchDocument[],
  options: BatchOptions
): Promise<BatchSummary> => {
  const logger = options.logger ?? createNullLogger();
  const concurrency = options.concurrency ?? options.config.batch.concurrency;
  const outcomes = new Array<BatchOutcome | undefined>(documents.length).fill(undefined);
  const queue = documents.map((item, index) => ({ item, index }));
  const workerCount = Math.max(1, Math.min(concurrency, queue.length));

  logger.info("Batch started", { documents: documents.length, workers: workerCount });

  const workers = Array.from({ length: workerCount }, async () => {
    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) continue;
      try {
        outcomes[next.index] = await runOne(next.item, options);
      } catch (error) {
        const failure = toFailure(next.item.documentId, error);
        logger.error("Document failed", {
          documentId: failure.documentId,
          kind: failure.kind,
          reason: failure.message,
          issues: failure.issues,
        });
        outcomes[next.index] = { status: "failed", documentId: next.item.documentId, failure };
      }
    }
  });
  await Promise.all(workers);

  const settled = outcomes.filter((outcome): outcome is BatchOutcome => outcome !== undefined);
  const flagged = settled.flatMap((outcome) =>
    outcome.status === "ok" && outcome.result.flaggedForReview ? [outcome.documentId] : []
  );
  const succeeded = settled.filter((outcome) => outcome.status === "ok").length;
  const summary: BatchSummary = {
    outcomes: settled,
    succeeded,
    failed: settled.length - succeeded,
    flagged,
  };
  logger.info("Batch finished", {
    succeeded: summary.succeeded,
    failed: summary.failed,
    flagged: summary.flagged,
  });
  return summary;
};

/** Reads a JSON document from disk; unreadable or malformed files are corrupt documents. */
export const loadDocumentFromFile = async (filePath: string): Promise<unknown> => {
  const fallbackId = path.basename(filePath, path.extname(filePath));
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CorruptDocumentError(fallbackId, `cannot read ${filePath}: ${message}`);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CorruptDocumentError(fallbackId, `invalid JSON in ${filePath}: ${message}`);
  }
};

export const documentsFromFiles = (filePaths: string[]): BatchDocument[] =>
  filePaths.map((filePath) => ({
    documentId: path.basename(filePath, path.extname(filePath)),
    load: () => loadDocumentFromFile(filePath),
  }));
