import type { BBox, BboxFormat, PageDimensions } from "../io/contracts.js";

const clamp01 = (value: number): number => Math.max(0, Math.min(1, value));

const round = (value: number): number => Math.round(value * 1e6) / 1e6;

export const computeBoxArea = (box: BBox): number =>
  Math.max(0, box[2] - box[0]) * Math.max(0, box[3] - box[1]);

export const intersectArea = (a: BBox, b: BBox): number => {
  const x0 = Math.max(a[0], b[0]);
  const y0 = Math.max(a[1], b[1]);
  const x1 = Math.min(a[2], b[2]);
  const y1 = Math.min(a[3], b[3]);
  if (x1 <= x0 || y1 <= y0) return 0;
  return (x1 - x0) * (y1 - y0);
};

/** Intersection area over the smaller box's area; 0 when either box is missing or empty. */
export const overlapFraction = (a: BBox | null, b: BBox | null): number => {
  if (!a || !b) return 0;
  const smaller = Math.min(computeBoxArea(a), computeBoxArea(b));
  if (smaller <= 0) return 0;
  return intersectArea(a, b) / smaller;
};

/**
 * Converts a source bbox to normalized (x1, y1, x2, y2) in [0,1].
 * Returns null when the page size is unknown or the box is degenerate.
 */
export const toNormalizedBBox = (
  box: readonly number[] | null | undefined,
  format: BboxFormat,
  page: PageDimensions | undefined
): BBox | null => {
  if (!box || box.length !== 4 || !box.every((value) => Number.isFinite(value))) return null;
  const [a, b, c, d] = box;
  let x1: number;
  let y1: number;
  let x2: number;
  let y2: number;
  if (format === "xyxy_norm") {
    [x1, y1, x2, y2] = [a, b, c, d];
  } else {
    if (!page || page.width <= 0 || page.height <= 0) return null;
    const right = format === "xywh_px" ? a + c : c;
    const bottom = format === "xywh_px" ? b + d : d;
    [x1, y1, x2, y2] = [a / page.width, b / page.height, right / page.width, bottom / page.height];
  }
  const normalized: BBox = [
    round(clamp01(Math.min(x1, x2))),
    round(clamp01(Math.min(y1, y2))),
    round(clamp01(Math.max(x1, x2))),
    round(clamp01(Math.max(y1, y2))),
  ];
  if (computeBoxArea(normalized) <= 0) return null;
  return normalized;
};

/** Reading-order comparison: ascending y1, then ascending x1. */
export const compareReadingPosition = (a: BBox, b: BBox): number => {
  if (a[1] !== b[1]) return a[1] - b[1];
  return a[0] - b[0];
};
