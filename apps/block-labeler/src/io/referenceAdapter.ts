import type { ReferenceSpan, SectionType } from "./contracts.js";
import { normalizeText, type UnicodeForm } from "../pipeline/text-normalization.js";
import type { ReferenceSpanInput } from "./validation.js";

const toSectionType = (value: ReferenceSpanInput["section_type"]): SectionType =>
  value === "footnote" || value === "footnote-text" ? "footnote" : "body_text";

/**
 * Normalizes a ground-truth reference into ordered, immutable spans.
 * Returns null when the document has no reference.
 */
export const adaptReference = (
  spans: ReferenceSpanInput[] | null | undefined,
  form: UnicodeForm = "NFKC"
): readonly ReferenceSpan[] | null => {
  if (!spans) return null;
  const output: ReferenceSpan[] = [];
  spans.forEach((span) => {
    const text = normalizeText(span.text, form);
    if (!text) return;
    output.push(
      Object.freeze({
        text,
        sectionType: toSectionType(span.section_type),
        documentOrderIndex: output.length,
      })
    );
  });
  return Object.freeze(output);
};
