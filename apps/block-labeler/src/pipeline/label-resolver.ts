import {
  LABEL_TIERS,
  type ClassifierResult,
  type LabelDecision,
  type LabelTier,
  type MatchCandidate,
  type TextBlock,
  type TierStats,
} from "../io/contracts.js";
import type { LabelingConfig } from "./labeling-config.js";

type ResolverConfig = Pick<LabelingConfig, "matching" | "resolution">;

const classifierProbability = (result: ClassifierResult): number =>
  result.status === "ok" ? Math.max(result.confidence, 0) : 0;

/**
 * Fixed precedence: an accepted reference match, then a confident classifier
 * prediction, then unresolved. Ground truth wins even when the classifier is
 * more confident.
 */
export const resolveBlockLabel = (
  block: Pick<TextBlock, "blockId">,
  candidates: readonly MatchCandidate[],
  classifierResult: ClassifierResult,
  config: ResolverConfig
): LabelDecision => {
  const best = candidates
    .filter(
      (candidate) =>
        candidate.blockId === block.blockId &&
        candidate.similarity >= config.matching.acceptance_threshold
    )
    .reduce<MatchCandidate | null>((top, candidate) => {
      if (!top) return candidate;
      if (candidate.similarity > top.similarity) return candidate;
      if (candidate.similarity === top.similarity && candidate.spanIndex < top.spanIndex) {
        return candidate;
      }
      return top;
    }, null);

  if (best) {
    return {
      label: best.sectionType,
      labelTier: "ground_truth_match",
      confidence: best.similarity,
      matchedSpanIndex: best.spanIndex,
      matchedSpanCount: best.spanCount,
    };
  }

  if (
    classifierResult.status === "ok" &&
    classifierResult.label !== null &&
    classifierResult.label !== "unresolved" &&
    classifierResult.confidence > config.resolution.classifier_threshold
  ) {
    return {
      label: classifierResult.label,
      labelTier: "classifier_prediction",
      confidence: classifierResult.confidence,
      matchedSpanIndex: null,
      matchedSpanCount: null,
    };
  }

  return {
    label: "unresolved",
    labelTier: "unresolved",
    confidence: classifierProbability(classifierResult),
    matchedSpanIndex: null,
    matchedSpanCount: null,
  };
};

const emptyTierRecord = (): Record<LabelTier, number> => ({
  ground_truth_match: 0,
  classifier_prediction: 0,
  unresolved: 0,
});

export const summarizeTiers = (
  decisions: ReadonlyArray<Pick<LabelDecision, "labelTier">>,
  config: Pick<LabelingConfig, "resolution">
): TierStats => {
  const counts = emptyTierRecord();
  decisions.forEach((decision) => {
    counts[decision.labelTier] += 1;
  });
  const total = decisions.length;
  const fractions = emptyTierRecord();
  if (total > 0) {
    LABEL_TIERS.forEach((tier) => {
      fractions[tier] = counts[tier] / total;
    });
  }
  return {
    total,
    counts,
    fractions,
    flaggedForReview: total > 0 && fractions.unresolved > config.resolution.tier3_alarm_fraction,
  };
};
