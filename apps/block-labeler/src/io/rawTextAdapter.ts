import type { PageDimensions, RawTextRecord } from "./contracts.js";
import { toNormalizedBBox } from "../pipeline/geometry.js";
import { normalizeText, type UnicodeForm } from "../pipeline/text-normalization.js";
import { indexPages, parseStreamFragments, rawFragmentSchema, type StreamInput } from "./validation.js";

export type AdaptedStream<T> = {
  records: T[];
  corruptPages: number[];
  partialPages: number[];
  droppedFragments: number;
};

export const clampConfidence = (value: number | null | undefined): number => {
  if (value === null || value === undefined || !Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
};

/**
 * Normalizes OCR engine output. Pixel boxes default to [x, y, w, h] and are
 * rescaled by the page's pixel dimensions.
 */
export const adaptRawOcr = (
  stream: StreamInput,
  pages: PageDimensions[] | undefined,
  form: UnicodeForm = "NFKC"
): AdaptedStream<RawTextRecord> => {
  const pageIndex = indexPages(pages);
  const format = stream.bboxFormat ?? "xywh_px";
  const parsed = parseStreamFragments(stream, rawFragmentSchema);

  const records: RawTextRecord[] = [];
  parsed.fragments.forEach((fragment) => {
    const text = normalizeText(fragment.text, form);
    if (!text) return;
    records.push({
      text,
      bbox: toNormalizedBBox(fragment.bbox, format, pageIndex.get(fragment.page)),
      pageNo: fragment.page,
      confidence: clampConfidence(fragment.confidence),
    });
  });

  return {
    records,
    corruptPages: parsed.corruptPages,
    partialPages: parsed.partialPages,
    droppedFragments: parsed.droppedFragments,
  };
};
