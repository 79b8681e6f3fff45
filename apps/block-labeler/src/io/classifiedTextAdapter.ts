import type { BlockLabel, ClassifiedTextRecord, PageDimensions } from "./contracts.js";
import { toNormalizedBBox } from "../pipeline/geometry.js";
import { normalizeText, type UnicodeForm } from "../pipeline/text-normalization.js";
import { clampConfidence, type AdaptedStream } from "./rawTextAdapter.js";
import {
  classifiedFragmentSchema,
  indexPages,
  parseStreamFragments,
  type StreamInput,
} from "./validation.js";

const LABEL_MAPPING: Record<string, BlockLabel> = {
  text: "body_text",
  paragraph: "body_text",
  list_item: "body_text",
  list: "body_text",
  equation: "body_text",
  abstract: "body_text",
  body_text: "body_text",
  title: "heading",
  section_header: "heading",
  author: "heading",
  heading: "heading",
  footnote: "footnote",
  caption: "caption",
  figure: "caption",
  table: "caption",
  page_header: "page_header",
  page_footer: "page_footer",
  cover: "front_matter",
  front_matter: "front_matter",
};

/** Maps a classifier's label vocabulary onto block labels; unknown labels map to null. */
export const mapClassifierLabel = (label: string | null | undefined): BlockLabel | null => {
  if (!label) return null;
  const key = label
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_");
  return LABEL_MAPPING[key] ?? null;
};

export const adaptClassifiedText = (
  stream: StreamInput,
  pages: PageDimensions[] | undefined,
  form: UnicodeForm = "NFKC"
): AdaptedStream<ClassifiedTextRecord> => {
  const pageIndex = indexPages(pages);
  const format = stream.bboxFormat ?? "xyxy_px";
  const parsed = parseStreamFragments(stream, classifiedFragmentSchema);

  const records: ClassifiedTextRecord[] = [];
  parsed.fragments.forEach((fragment) => {
    const text = normalizeText(fragment.text, form);
    if (!text) return;
    const rawLabel = fragment.label ?? "";
    records.push({
      text,
      bbox: toNormalizedBBox(fragment.bbox, format, pageIndex.get(fragment.page)),
      pageNo: fragment.page,
      label: mapClassifierLabel(rawLabel),
      rawLabel,
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
