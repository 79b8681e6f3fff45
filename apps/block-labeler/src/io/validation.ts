import { z } from "zod";
import type { PageDimensions } from "./contracts.js";
import { CorruptDocumentError, type ValidationIssue } from "./errors.js";

const bboxFormatSchema = z.enum(["xyxy_px", "xywh_px", "xyxy_norm"]);

const pageSchema = z.object({
  pageNo: z.number().int().positive(),
  width: z.number().positive(),
  height: z.number().positive(),
});

const bboxSchema = z.array(z.number()).length(4);

export const rawFragmentSchema = z.object({
  text: z.string(),
  confidence: z.number().nullish(),
  bbox: bboxSchema.nullish(),
  page: z.number().int().positive(),
});

export const classifiedFragmentSchema = z.object({
  text: z.string(),
  label: z.string().nullish(),
  confidence: z.number().nullish(),
  bbox: bboxSchema.nullish(),
  page: z.number().int().positive(),
});

export const referenceSpanInputSchema = z.object({
  text: z.string(),
  section_type: z.enum(["body_text", "footnote", "body-text", "footnote-text"]),
});

const streamSchema = z.object({
  bboxFormat: bboxFormatSchema.optional(),
  fragments: z.array(z.unknown()),
  failedPages: z.array(z.number().int().positive()).optional(),
});

export const documentInputSchema = z.object({
  documentId: z.string().min(1),
  pages: z.array(pageSchema).optional(),
  raw: streamSchema.nullish(),
  classified: streamSchema.nullish(),
  reference: z.array(referenceSpanInputSchema).nullish(),
});

export type RawFragmentInput = z.infer<typeof rawFragmentSchema>;
export type ClassifiedFragmentInput = z.infer<typeof classifiedFragmentSchema>;
export type ReferenceSpanInput = z.infer<typeof referenceSpanInputSchema>;
export type StreamInput = z.infer<typeof streamSchema>;
export type DocumentInput = z.infer<typeof documentInputSchema>;

const toIssues = (error: z.ZodError): ValidationIssue[] =>
  error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const guessDocumentId = (value: unknown, fallback: string): string => {
  if (!isPlainObject(value)) return fallback;
  const id = value.documentId;
  return typeof id === "string" && id.trim().length > 0 ? id : fallback;
};

/** Validates a document envelope; throws CorruptDocumentError when it cannot be parsed at all. */
export const parseDocumentInput = (value: unknown, fallbackId = "unknown"): DocumentInput => {
  const result = documentInputSchema.safeParse(value);
  if (!result.success) {
    throw new CorruptDocumentError(
      guessDocumentId(value, fallbackId),
      "document envelope failed validation",
      toIssues(result.error)
    );
  }
  return result.data;
};

export const indexPages = (pages: PageDimensions[] | undefined): Map<number, PageDimensions> =>
  new Map((pages ?? []).map((page) => [page.pageNo, page]));

const readPageNo = (fragment: unknown): number | null => {
  if (!isPlainObject(fragment)) return null;
  const page = fragment.page;
  return typeof page === "number" && Number.isInteger(page) && page > 0 ? page : null;
};

export type ParsedStream<T> = {
  fragments: T[];
  corruptPages: number[];
  partialPages: number[];
  droppedFragments: number;
};

/**
 * Validates stream fragments one by one. A malformed fragment is dropped on its
 * own and its page reported as partial; when only the bbox is malformed the
 * text is kept without one. Fragments of pages the engine reported as failed
 * are discarded.
 */
export const parseStreamFragments = <T extends { page: number }>(
  stream: StreamInput,
  schema: z.ZodType<T>
): ParsedStream<T> => {
  const corrupt = new Set<number>(stream.failedPages ?? []);
  const partial = new Set<number>();
  const parsed: T[] = [];
  let droppedFragments = 0;

  stream.fragments.forEach((fragment) => {
    const result = schema.safeParse(fragment);
    if (result.success) {
      parsed.push(result.data);
      return;
    }
    const pageNo = readPageNo(fragment);
    if (pageNo !== null) partial.add(pageNo);
    const withoutBBox = isPlainObject(fragment)
      ? schema.safeParse({ ...fragment, bbox: null })
      : null;
    if (withoutBBox?.success) {
      parsed.push(withoutBBox.data);
      return;
    }
    droppedFragments += 1;
  });

  const fragments = parsed.filter((fragment) => !corrupt.has(fragment.page));
  droppedFragments += parsed.length - fragments.length;
  const byPage = (a: number, b: number): number => a - b;
  return {
    fragments,
    corruptPages: Array.from(corrupt).sort(byPage),
    partialPages: Array.from(partial)
      .filter((pageNo) => !corrupt.has(pageNo))
      .sort(byPage),
    droppedFragments,
  };
};
