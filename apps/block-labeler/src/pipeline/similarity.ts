import { tokenize } from "./text-normalization.js";

/** Levenshtein edit distance, two-row variant. */
export const levenshteinDistance = (a: string, b: string): number => {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  const shorter = a.length <= b.length ? a : b;
  const longer = a.length <= b.length ? b : a;

  let previous = Array.from({ length: shorter.length + 1 }, (_, i) => i);
  let current = new Array<number>(shorter.length + 1).fill(0);
  for (let i = 1; i <= longer.length; i++) {
    current[0] = i;
    const ch = longer.charCodeAt(i - 1);
    for (let j = 1; j <= shorter.length; j++) {
      const cost = shorter.charCodeAt(j - 1) === ch ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    [previous, current] = [current, previous];
  }
  return previous[shorter.length];
};

/** Upper bound of similarityRatio from lengths alone. */
export const maxPossibleSimilarity = (a: string, b: string): number => {
  const longer = Math.max(a.length, b.length);
  if (longer === 0) return 1;
  return Math.min(a.length, b.length) / longer;
};

/** 1 - distance / longer length, in [0,1]. Two empty strings are identical. */
export const similarityRatio = (a: string, b: string): number => {
  const longer = Math.max(a.length, b.length);
  if (longer === 0) return 1;
  return (longer - levenshteinDistance(a, b)) / longer;
};

/** Fraction of needle tokens found in the haystack's token multiset. */
export const tokenCoverage = (needle: string, haystack: string): number => {
  const needleTokens = tokenize(needle);
  if (needleTokens.length === 0) return 0;
  const available = new Map<string, number>();
  for (const token of tokenize(haystack)) {
    available.set(token, (available.get(token) ?? 0) + 1);
  }
  let found = 0;
  for (const token of needleTokens) {
    const remaining = available.get(token) ?? 0;
    if (remaining > 0) {
      found += 1;
      available.set(token, remaining - 1);
    }
  }
  return found / needleTokens.length;
};

/** Exact or near-exact containment of one match key in another. */
export const isContainedIn = (needle: string, haystack: string, threshold: number): boolean => {
  if (needle.length === 0) return true;
  if (haystack.includes(needle)) return true;
  if (tokenCoverage(needle, haystack) >= threshold) return true;
  if (maxPossibleSimilarity(needle, haystack) < threshold) return false;
  return similarityRatio(needle, haystack) >= threshold;
};

export const isNearDuplicate = (a: string, b: string, threshold: number): boolean => {
  if (a === b) return true;
  if (maxPossibleSimilarity(a, b) < threshold) return false;
  return similarityRatio(a, b) >= threshold;
};
