import type {
  MatchCandidate,
  MatchStats,
  ReferenceSpan,
  SectionType,
  TextBlock,
} from "../io/contracts.js";
import type { AmbiguousMatchWarning } from "../io/errors.js";
import type { LabelingConfig } from "./labeling-config.js";
import { maxPossibleSimilarity, similarityRatio } from "./similarity.js";
import { toMatchKey } from "./text-normalization.js";

type MatcherConfig = Pick<LabelingConfig, "matching" | "normalization">;

export type MatchResult = {
  candidates: Map<string, MatchCandidate[]>;
  warnings: AmbiguousMatchWarning[];
  stats: MatchStats;
};

type ScoredStart = {
  spanIndex: number;
  spanCount: number;
  sectionType: SectionType;
  similarity: number;
};

type IndexedSpan = {
  key: string;
  sectionType: SectionType;
};

export const computeWindowRange = (
  anchor: number,
  windowSize: number,
  spanCount: number
): { start: number; end: number } => {
  const size = Math.min(windowSize, spanCount);
  let start = Math.max(0, anchor - Math.floor((size - 1) / 2));
  const end = Math.min(spanCount, start + size);
  start = Math.max(0, end - size);
  return { start, end };
};

/**
 * Scores one start position as a single span, then as concatenations of
 * following spans of the same section type, keeping the best.
 */
const scoreStart = (
  query: string,
  spans: IndexedSpan[],
  start: number,
  maxSpans: number,
  floor: number
): ScoredStart => {
  const sectionType = spans[start].sectionType;
  let best: ScoredStart = { spanIndex: start, spanCount: 1, sectionType, similarity: 0 };
  let joined = "";
  for (let count = 1; count <= maxSpans; count++) {
    const index = start + count - 1;
    if (index >= spans.length || spans[index].sectionType !== sectionType) break;
    joined = count === 1 ? spans[index].key : `${joined} ${spans[index].key}`;
    if (maxPossibleSimilarity(query, joined) < floor) {
      if (joined.length > query.length) break;
      continue;
    }
    const similarity = similarityRatio(query, joined);
    if (similarity > best.similarity) {
      best = { spanIndex: start, spanCount: count, sectionType, similarity };
    }
  }
  return best;
};

const scoreRange = (
  query: string,
  spans: IndexedSpan[],
  start: number,
  end: number,
  config: MatcherConfig
): ScoredStart[] => {
  const scored: ScoredStart[] = [];
  for (let index = start; index < end; index++) {
    scored.push(
      scoreStart(
        query,
        spans,
        index,
        config.matching.max_concatenated_spans,
        config.matching.floor_similarity
      )
    );
  }
  return scored;
};

const bestSimilarity = (scored: ScoredStart[]): number =>
  scored.reduce((best, entry) => Math.max(best, entry.similarity), 0);

const compareScored = (a: ScoredStart, b: ScoredStart): number => {
  if (a.similarity !== b.similarity) return b.similarity - a.similarity;
  return a.spanIndex - b.spanIndex;
};

/**
 * Aligns canonical blocks, in document order, against the reference spans.
 * The search window follows the last accepted span and only grows when nothing
 * in it reaches the floor similarity; a bounded number of full-reference
 * searches per document covers reordered layouts.
 */
export const matchDocument = (
  blocks: TextBlock[],
  spans: readonly ReferenceSpan[] | null,
  config: MatcherConfig
): MatchResult => {
  const candidates = new Map<string, MatchCandidate[]>();
  const warnings: AmbiguousMatchWarning[] = [];
  const stats: MatchStats = { matchedBlocks: 0, windowExpansions: 0, globalSearches: 0 };
  if (!spans || spans.length === 0) {
    return { candidates, warnings, stats };
  }

  const form = config.normalization.unicode_form;
  const {
    acceptance_threshold: acceptance,
    floor_similarity: floor,
    initial_window: initialWindow,
    window_step: windowStep,
    max_window: maxWindow,
    min_query_chars: minQueryChars,
    global_search_per_document: globalSearchLimit,
  } = config.matching;

  const indexed: IndexedSpan[] = spans.map((span) => ({
    key: toMatchKey(span.text, form),
    sectionType: span.sectionType,
  }));
  let anchor = 0;

  blocks.forEach((block) => {
    const query = toMatchKey(block.text, form);
    if (query.length < minQueryChars) {
      candidates.set(block.blockId, []);
      return;
    }

    let windowSize = initialWindow;
    let range = computeWindowRange(anchor, windowSize, indexed.length);
    let scored = scoreRange(query, indexed, range.start, range.end, config);
    while (
      bestSimilarity(scored) < floor &&
      windowSize < maxWindow &&
      range.end - range.start < indexed.length
    ) {
      windowSize = Math.min(maxWindow, windowSize + windowStep);
      stats.windowExpansions += 1;
      range = computeWindowRange(anchor, windowSize, indexed.length);
      scored = scoreRange(query, indexed, range.start, range.end, config);
    }

    if (
      bestSimilarity(scored) < floor &&
      stats.globalSearches < globalSearchLimit &&
      range.end - range.start < indexed.length
    ) {
      stats.globalSearches += 1;
      windowSize = indexed.length;
      scored = scoreRange(query, indexed, 0, indexed.length, config);
    }

    const accepted = scored.filter((entry) => entry.similarity >= acceptance).sort(compareScored);
    candidates.set(
      block.blockId,
      accepted.map((entry) => ({
        blockId: block.blockId,
        spanIndex: entry.spanIndex,
        spanCount: entry.spanCount,
        sectionType: entry.sectionType,
        similarity: entry.similarity,
        windowSize,
      }))
    );
    if (accepted.length === 0) return;

    const top = accepted[0];
    const tied = accepted.filter((entry) => entry.similarity === top.similarity);
    if (tied.length > 1) {
      warnings.push({
        kind: "ambiguous_match",
        documentId: block.documentId,
        blockId: block.blockId,
        spanIndices: tied.map((entry) => entry.spanIndex),
        chosenSpanIndex: top.spanIndex,
        similarity: top.similarity,
      });
    }
    anchor = top.spanIndex + top.spanCount - 1;
    stats.matchedBlocks += 1;
  });

  return { candidates, warnings, stats };
};
