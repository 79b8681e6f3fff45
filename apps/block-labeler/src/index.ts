export * from "./io/contracts.js";
export * from "./io/errors.js";
export { adaptRawOcr, clampConfidence, type AdaptedStream } from "./io/rawTextAdapter.js";
export { adaptClassifiedText, mapClassifierLabel } from "./io/classifiedTextAdapter.js";
export { adaptReference } from "./io/referenceAdapter.js";
export {
  documentInputSchema,
  parseDocumentInput,
  type DocumentInput,
  type StreamInput,
} from "./io/validation.js";
export { normalizeText, toMatchKey, type UnicodeForm } from "./pipeline/text-normalization.js";
export { overlapFraction, toNormalizedBBox } from "./pipeline/geometry.js";
export { similarityRatio, levenshteinDistance } from "./pipeline/similarity.js";
export {
  reconcileDocument,
  reconcilePage,
  type ReconciledDocument,
  type ReconciledPage,
} from "./pipeline/reconciliation.js";
export { matchDocument, type MatchResult } from "./pipeline/ground-truth-matcher.js";
export { resolveBlockLabel, summarizeTiers } from "./pipeline/label-resolver.js";
export {
  createClassifierFromConfig,
  createRemoteBlockClassifier,
  layoutPredictionResult,
  requestClassification,
  ClassifierTimeoutError,
  InvalidClassifierResponseError,
  type BlockClassifier,
  type ClassifierPrediction,
} from "./pipeline/block-classifier.js";
export {
  documentsFromFiles,
  loadDocumentFromFile,
  processDocument,
  runBatch,
  type BatchDocument,
  type BatchFailure,
  type BatchOptions,
  type BatchOutcome,
  type BatchSummary,
  type DocumentResult,
} from "./pipeline/document-runner.js";
export {
  appendDocument,
  effectiveRows,
  exportTrainingRows,
  measureAutoLabelAccuracy,
  openCorpusStore,
  readCorpusManifest,
  readCorpusRows,
  recordCorrection,
  summarizeLabelDistribution,
  UnknownBlockError,
  type CorpusStore,
} from "./pipeline/corpus-store.js";
export {
  createLabelingConfig,
  defaultLabelingConfig,
  loadLabelingConfig,
  resolveLabelingConfig,
  type LabelingConfig,
} from "./pipeline/labeling-config.js";
export { createNullLogger, createRunLogger, type RunLogger } from "./pipeline/logger.js";
export { getRunDir } from "./pipeline/run-paths.js";
