import type {
  BBox,
  BlockSource,
  ClassifiedTextRecord,
  LayoutPrediction,
  PageDimensions,
  PageReconcileStats,
  RawTextRecord,
  TextBlock,
} from "../io/contracts.js";
import type { PartialPageWarning } from "../io/errors.js";
import type { AdaptedStream } from "../io/rawTextAdapter.js";
import { hashContent } from "./file-utils.js";
import { compareReadingPosition, overlapFraction } from "./geometry.js";
import type { LabelingConfig } from "./labeling-config.js";
import { isContainedIn, isNearDuplicate, tokenCoverage } from "./similarity.js";
import { toMatchKey } from "./text-normalization.js";

type ReconcileConfig = Pick<LabelingConfig, "reconciliation" | "normalization">;

export type DraftBlock = {
  pageNo: number;
  text: string;
  key: string;
  bbox: BBox | null;
  source: BlockSource;
  streamIndex: number;
  extractionConfidence: number;
  layoutPrediction: LayoutPrediction | null;
};

export type PageStreams = {
  pageNo: number;
  raw: RawTextRecord[];
  classified: ClassifiedTextRecord[];
};

export type ReconciledPage = {
  pageNo: number;
  blocks: DraftBlock[];
  stats: PageReconcileStats;
};

export type ReconciledDocument = {
  documentId: string;
  blocks: TextBlock[];
  pageStats: PageReconcileStats[];
  warnings: PartialPageWarning[];
};

const SOURCE_RANK: Record<BlockSource, number> = { classified: 0, recovered: 1 };

const compareDrafts = (a: DraftBlock, b: DraftBlock): number => {
  if (a.bbox && b.bbox) {
    const position = compareReadingPosition(a.bbox, b.bbox);
    if (position !== 0) return position;
  } else if (a.bbox || b.bbox) {
    return a.bbox ? -1 : 1;
  }
  const rank = SOURCE_RANK[a.source] - SOURCE_RANK[b.source];
  if (rank !== 0) return rank;
  return a.streamIndex - b.streamIndex;
};

const sameBox = (a: BBox, b: BBox): boolean => a.every((value, index) => value === b[index]);

const boxesOverlap = (a: BBox, b: BBox, minOverlap: number): boolean =>
  sameBox(a, b) || overlapFraction(a, b) >= minOverlap;

const isDuplicateOfAccepted = (
  draft: DraftBlock,
  accepted: DraftBlock[],
  config: ReconcileConfig
): boolean => {
  const { overlap_fraction: minOverlap, near_duplicate_similarity: minSimilarity } =
    config.reconciliation;
  return accepted.some((existing) => {
    if (draft.bbox && existing.bbox) {
      return (
        boxesOverlap(draft.bbox, existing.bbox, minOverlap) &&
        isNearDuplicate(draft.key, existing.key, minSimilarity)
      );
    }
    if (!draft.bbox && !existing.bbox) {
      return draft.text === existing.text;
    }
    return false;
  });
};

/** A repeated raw line is only recovered where it overlaps no accepted block. */
const occupiesAcceptedSpace = (
  bbox: BBox | null,
  accepted: DraftBlock[],
  config: ReconcileConfig
): boolean =>
  bbox !== null &&
  accepted.some(
    (existing) =>
      existing.bbox !== null &&
      boxesOverlap(bbox, existing.bbox, config.reconciliation.overlap_fraction)
  );

// Needs both text containment and bbox overlap; a fragment without a bbox is never represented.
const isRepresented = (
  key: string,
  bbox: BBox | null,
  classified: DraftBlock[],
  config: ReconcileConfig
): boolean => {
  if (!bbox) return false;
  const { overlap_fraction: minOverlap, near_duplicate_similarity: minSimilarity } =
    config.reconciliation;

  const overlapping = classified.filter(
    (block) => block.bbox !== null && overlapFraction(bbox, block.bbox) >= minOverlap
  );
  if (overlapping.some((block) => isContainedIn(key, block.key, minSimilarity))) return true;
  // OCR may merge what the classifier split into several neighbouring blocks.
  return (
    overlapping.length > 1 &&
    tokenCoverage(key, overlapping.map((block) => block.key).join(" ")) >= minSimilarity
  );
};

/**
 * Merges one page's raw and classified streams into an ordered, duplicate-free
 * block list. Raw text already covered by an overlapping classified block is
 * dropped; everything else is recovered.
 */
export const reconcilePage = (page: PageStreams, config: ReconcileConfig): ReconciledPage => {
  const form = config.normalization.unicode_form;
  const accepted: DraftBlock[] = [];
  let duplicatesSkipped = 0;

  page.classified.forEach((record, index) => {
    const draft: DraftBlock = {
      pageNo: page.pageNo,
      text: record.text,
      key: toMatchKey(record.text, form),
      bbox: record.bbox,
      source: "classified",
      streamIndex: index,
      extractionConfidence: record.confidence,
      layoutPrediction: {
        label: record.label,
        rawLabel: record.rawLabel,
        confidence: record.confidence,
      },
    };
    if (isDuplicateOfAccepted(draft, accepted, config)) {
      duplicatesSkipped += 1;
      return;
    }
    accepted.push(draft);
  });

  const classifiedBlocks = accepted.slice();
  let recoveredCount = 0;

  const rawKeys = page.raw.map((record) => toMatchKey(record.text, form));
  const keyCounts = new Map<string, number>();
  rawKeys.forEach((key) => keyCounts.set(key, (keyCounts.get(key) ?? 0) + 1));

  page.raw.forEach((record, index) => {
    const key = rawKeys[index];
    if (isRepresented(key, record.bbox, classifiedBlocks, config)) return;
    const repeated = (keyCounts.get(key) ?? 0) > 1;
    if (repeated && occupiesAcceptedSpace(record.bbox, accepted, config)) {
      duplicatesSkipped += 1;
      return;
    }
    const draft: DraftBlock = {
      pageNo: page.pageNo,
      text: record.text,
      key,
      bbox: record.bbox,
      source: "recovered",
      streamIndex: index,
      extractionConfidence: record.confidence,
      layoutPrediction: null,
    };
    if (isDuplicateOfAccepted(draft, accepted, config)) {
      duplicatesSkipped += 1;
      return;
    }
    accepted.push(draft);
    recoveredCount += 1;
  });

  return {
    pageNo: page.pageNo,
    blocks: accepted.slice().sort(compareDrafts),
    stats: {
      pageNo: page.pageNo,
      rawCount: page.raw.length,
      classifiedCount: page.classified.length,
      recoveredCount,
      duplicatesSkipped,
    },
  };
};

const groupByPage = <T extends { pageNo: number }>(records: T[]): Map<number, T[]> => {
  const grouped = new Map<number, T[]>();
  records.forEach((record) => {
    const bucket = grouped.get(record.pageNo);
    if (bucket) {
      bucket.push(record);
    } else {
      grouped.set(record.pageNo, [record]);
    }
  });
  return grouped;
};

export const createBlockId = (documentId: string, draft: DraftBlock, used: Set<string>): string => {
  const base = hashContent([
    documentId,
    draft.pageNo,
    draft.source,
    draft.text,
    draft.bbox ? draft.bbox.join(",") : null,
  ]);
  let candidate = base;
  let ordinal = 2;
  while (used.has(candidate)) {
    candidate = `${base}-${ordinal}`;
    ordinal += 1;
  }
  used.add(candidate);
  return candidate;
};

export type ReconcileDocumentInput = {
  documentId: string;
  pages?: PageDimensions[];
  raw: AdaptedStream<RawTextRecord> | null;
  classified: AdaptedStream<ClassifiedTextRecord> | null;
};

/**
 * Reconciles every page of a document. Pages with an empty or unreadable
 * stream, or with fragments that could not be read, are still reconciled and
 * reported with a partial-page warning.
 */
export const reconcileDocument = (
  input: ReconcileDocumentInput,
  config: ReconcileConfig
): ReconciledDocument => {
  const rawByPage = groupByPage(input.raw?.records ?? []);
  const classifiedByPage = groupByPage(input.classified?.records ?? []);
  const pageNumbers = new Set<number>([
    ...(input.pages ?? []).map((page) => page.pageNo),
    ...rawByPage.keys(),
    ...classifiedByPage.keys(),
    ...(input.raw?.corruptPages ?? []),
    ...(input.classified?.corruptPages ?? []),
    ...(input.raw?.partialPages ?? []),
    ...(input.classified?.partialPages ?? []),
  ]);

  const blocks: TextBlock[] = [];
  const pageStats: PageReconcileStats[] = [];
  const warnings: PartialPageWarning[] = [];
  const usedIds = new Set<string>();

  Array.from(pageNumbers)
    .sort((a, b) => a - b)
    .forEach((pageNo) => {
      const raw = rawByPage.get(pageNo) ?? [];
      const classified = classifiedByPage.get(pageNo) ?? [];
      const missingStreams: Array<"raw" | "classified"> = [];
      if (raw.length === 0) missingStreams.push("raw");
      if (classified.length === 0) missingStreams.push("classified");
      const incompleteStreams: Array<"raw" | "classified"> = [];
      if (input.raw?.partialPages.includes(pageNo)) incompleteStreams.push("raw");
      if (input.classified?.partialPages.includes(pageNo)) incompleteStreams.push("classified");
      if (missingStreams.length > 0 || incompleteStreams.length > 0) {
        warnings.push({
          kind: "partial_page",
          documentId: input.documentId,
          pageNo,
          missingStreams,
          incompleteStreams,
        });
      }

      const page = reconcilePage({ pageNo, raw, classified }, config);
      pageStats.push(page.stats);
      page.blocks.forEach((draft) => {
        blocks.push({
          blockId: createBlockId(input.documentId, draft, usedIds),
          documentId: input.documentId,
          pageNo,
          readingOrder: blocks.length,
          text: draft.text,
          bbox: draft.bbox,
          source: draft.source,
          extractionConfidence: draft.extractionConfidence,
          layoutPrediction: draft.layoutPrediction,
          label: null,
        });
      });
    });

  return { documentId: input.documentId, blocks, pageStats, warnings };
};
