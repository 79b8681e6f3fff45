/**
 * Shared contracts for the labeling engine.
 * Defines the records exchanged between adapters, the reconciliation engine,
 * the ground-truth matcher, the label resolver and the corpus store.
 */

export type BBox = [number, number, number, number];

export type BlockLabel =
  | "body_text"
  | "footnote"
  | "heading"
  | "front_matter"
  | "caption"
  | "page_header"
  | "page_footer"
  | "unresolved";

export type LabelTier = "ground_truth_match" | "classifier_prediction" | "unresolved";

export type BlockSource = "classified" | "recovered";

export type SectionType = "body_text" | "footnote";

export type BboxFormat = "xyxy_px" | "xywh_px" | "xyxy_norm";

export interface PageDimensions {
  pageNo: number;
  width: number;
  height: number;
}

export interface RawTextRecord {
  text: string;
  bbox: BBox | null;
  pageNo: number;
  confidence: number;
}

export interface ClassifiedTextRecord {
  text: string;
  bbox: BBox | null;
  pageNo: number;
  label: BlockLabel | null;
  rawLabel: string;
  confidence: number;
}

export interface ReferenceSpan {
  readonly text: string;
  readonly sectionType: SectionType;
  readonly documentOrderIndex: number;
}

export interface LayoutPrediction {
  label: BlockLabel | null;
  rawLabel: string;
  confidence: number;
}

export interface TextBlock {
  blockId: string;
  documentId: string;
  pageNo: number;
  readingOrder: number;
  text: string;
  bbox: BBox | null;
  source: BlockSource;
  extractionConfidence: number;
  layoutPrediction: LayoutPrediction | null;
  label: null;
}

export interface LabelDecision {
  label: BlockLabel;
  labelTier: LabelTier;
  confidence: number;
  matchedSpanIndex: number | null;
  matchedSpanCount: number | null;
}

export type LabeledBlock = Omit<TextBlock, "label"> & LabelDecision;

export interface LabeledDocument {
  documentId: string;
  blocks: LabeledBlock[];
  tierStats: TierStats;
  flaggedForReview: boolean;
}

export interface MatchCandidate {
  blockId: string;
  spanIndex: number;
  spanCount: number;
  sectionType: SectionType;
  similarity: number;
  windowSize: number;
}

export type ClassifierResult =
  | { status: "ok"; label: BlockLabel | null; confidence: number }
  | { status: "unavailable"; reason: ClassifierFailureReason; message: string }
  | { status: "absent" };

export type ClassifierFailureReason = "timeout" | "error" | "invalid_response";

export interface PageReconcileStats {
  pageNo: number;
  rawCount: number;
  classifiedCount: number;
  recoveredCount: number;
  duplicatesSkipped: number;
}

export interface TierStats {
  total: number;
  counts: Record<LabelTier, number>;
  fractions: Record<LabelTier, number>;
  flaggedForReview: boolean;
}

export interface MatchStats {
  matchedBlocks: number;
  windowExpansions: number;
  globalSearches: number;
}

export type CorpusVersion = "v1" | "v2" | "v3";

export interface CorrectionProvenance {
  previousLabel: BlockLabel | null;
  reviewer: string;
  note: string | null;
  correctedAt: string;
}

export interface CorpusRow {
  rowId: string;
  blockId: string;
  documentId: string;
  pageNo: number;
  bbox: BBox | null;
  text: string;
  label: BlockLabel | null;
  labelTier: LabelTier | null;
  confidence: number;
  source: BlockSource;
  version: CorpusVersion;
  supersedes: string | null;
  correction: CorrectionProvenance | null;
  createdAt: string;
}

export interface CorpusManifestEntry {
  documentId: string;
  updatedAt: string;
  blockCount: number;
  rowCount: number;
  tierStats?: TierStats;
  flaggedForReview?: boolean;
}

export const BLOCK_LABELS: readonly BlockLabel[] = [
  "body_text",
  "footnote",
  "heading",
  "front_matter",
  "caption",
  "page_header",
  "page_footer",
  "unresolved",
];

export const LABEL_TIERS: readonly LabelTier[] = [
  "ground_truth_match",
  "classifier_prediction",
  "unresolved",
];
