import fs from "node:fs/promises";
import { z } from "zod";
import {
  BLOCK_LABELS,
  type BlockLabel,
  type CorpusManifestEntry,
  type CorpusRow,
  type CorpusVersion,
  type LabeledBlock,
  type LabeledDocument,
  type LabelTier,
} from "../io/contracts.js";
import { appendJsonLines, hashContent, serializeByKey, writeJsonAtomic } from "./file-utils.js";
import { getCorpusManifestPath, getCorpusRowsPath } from "./run-paths.js";

const blockLabelSchema = z.enum([
  "body_text",
  "footnote",
  "heading",
  "front_matter",
  "caption",
  "page_header",
  "page_footer",
  "unresolved",
]);
const labelTierSchema = z.enum(["ground_truth_match", "classifier_prediction", "unresolved"]);
const tierRecordSchema = z.object({
  ground_truth_match: z.number(),
  classifier_prediction: z.number(),
  unresolved: z.number(),
});

export const corpusRowSchema = z.object({
  rowId: z.string().min(1),
  blockId: z.string().min(1),
  documentId: z.string().min(1),
  pageNo: z.number().int().positive(),
  bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]).nullable(),
  text: z.string(),
  label: blockLabelSchema.nullable(),
  labelTier: labelTierSchema.nullable(),
  confidence: z.number().min(0).max(1),
  source: z.enum(["classified", "recovered"]),
  version: z.enum(["v1", "v2", "v3"]),
  supersedes: z.string().nullable(),
  correction: z
    .object({
      previousLabel: blockLabelSchema.nullable(),
      reviewer: z.string().min(1),
      note: z.string().nullable(),
      correctedAt: z.string(),
    })
    .nullable(),
  createdAt: z.string(),
});

const manifestEntrySchema = z.object({
  documentId: z.string(),
  updatedAt: z.string(),
  blockCount: z.number().int().min(0),
  rowCount: z.number().int().min(0),
  tierStats: z
    .object({
      total: z.number().int().min(0),
      counts: tierRecordSchema,
      fractions: tierRecordSchema,
      flaggedForReview: z.boolean(),
    })
    .optional(),
  flaggedForReview: z.boolean().optional(),
});

const manifestSchema = z.object({
  schemaVersion: z.literal(1),
  updatedAt: z.string().nullable(),
  documents: z.record(z.string(), manifestEntrySchema),
});

export type CorpusManifest = {
  schemaVersion: 1;
  updatedAt: string | null;
  documents: Record<string, CorpusManifestEntry>;
};

export type CorpusStore = {
  dir: string;
  rowsPath: string;
  manifestPath: string;
};

export type CorpusWriteOptions = {
  now?: () => Date;
};

export type AppendResult = {
  documentId: string;
  appended: number;
  skipped: number;
};

export type CorrectionInput = {
  blockId: string;
  label: BlockLabel;
  reviewer: string;
  note?: string;
};

export class UnknownBlockError extends Error {
  readonly blockId: string;

  constructor(blockId: string) {
    super(`No corpus rows exist for block ${blockId}`);
    this.name = "UnknownBlockError";
    this.blockId = blockId;
  }
}

export const openCorpusStore = (dir: string): CorpusStore => ({
  dir,
  rowsPath: getCorpusRowsPath(dir),
  manifestPath: getCorpusManifestPath(dir),
});

const VERSION_RANK: Record<CorpusVersion, number> = { v1: 1, v2: 2, v3: 3 };

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

type RowContent = Omit<CorpusRow, "rowId" | "createdAt">;

// createdAt is excluded so identical content always hashes to the same row id.
const computeRowId = (content: RowContent): string =>
  hashContent([content.version, content.blockId, JSON.stringify(content)], 24);

const toRow = (content: RowContent, createdAt: string): CorpusRow => ({
  rowId: computeRowId(content),
  ...content,
  createdAt,
});

const buildAutoRows = (block: LabeledBlock, createdAt: string): [CorpusRow, CorpusRow] => {
  const extracted = toRow(
    {
      blockId: block.blockId,
      documentId: block.documentId,
      pageNo: block.pageNo,
      bbox: block.bbox,
      text: block.text,
      label: null,
      labelTier: null,
      confidence: block.extractionConfidence,
      source: block.source,
      version: "v1",
      supersedes: null,
      correction: null,
    },
    createdAt
  );
  const labeled = toRow(
    {
      blockId: block.blockId,
      documentId: block.documentId,
      pageNo: block.pageNo,
      bbox: block.bbox,
      text: block.text,
      label: block.label,
      labelTier: block.labelTier,
      confidence: block.confidence,
      source: block.source,
      version: "v2",
      supersedes: extracted.rowId,
      correction: null,
    },
    createdAt
  );
  return [extracted, labeled];
};

export const readCorpusRows = async (store: CorpusStore): Promise<CorpusRow[]> => {
  let raw: string;
  try {
    raw = await fs.readFile(store.rowsPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }
  const rows: CorpusRow[] = [];
  raw.split("\n").forEach((line, index) => {
    if (!line.trim()) return;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid corpus row at ${store.rowsPath}:${index + 1}: ${detail}`);
    }
    const result = corpusRowSchema.safeParse(value);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new Error(`Invalid corpus row at ${store.rowsPath}:${index + 1}: ${detail}`);
    }
    rows.push(result.data);
  });
  return rows;
};

export const readCorpusManifest = async (store: CorpusStore): Promise<CorpusManifest> => {
  let raw: string;
  try {
    raw = await fs.readFile(store.manifestPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return { schemaVersion: 1, updatedAt: null, documents: {} };
    throw error;
  }
  return manifestSchema.parse(JSON.parse(raw));
};

const updateManifest = async (
  store: CorpusStore,
  documentId: string,
  rows: CorpusRow[],
  updatedAt: string,
  patch: Partial<CorpusManifestEntry>
): Promise<void> => {
  const manifest = await readCorpusManifest(store);
  const documentRows = rows.filter((row) => row.documentId === documentId);
  const previous = manifest.documents[documentId];
  manifest.documents[documentId] = {
    ...previous,
    ...patch,
    documentId,
    updatedAt,
    blockCount: new Set(documentRows.map((row) => row.blockId)).size,
    rowCount: documentRows.length,
  };
  manifest.updatedAt = updatedAt;
  await writeJsonAtomic(store.manifestPath, manifest);
};

/**
 * Appends the extraction (v1) and auto-label (v2) rows of a labeled document.
 * Rows already present are skipped, so re-running a document is a no-op.
 */
export const appendDocument = async (
  store: CorpusStore,
  document: LabeledDocument,
  options?: CorpusWriteOptions
): Promise<AppendResult> => {
  const createdAt = (options?.now ?? (() => new Date()))().toISOString();
  return serializeByKey(store.rowsPath, async () => {
    const existing = await readCorpusRows(store);
    const knownIds = new Set(existing.map((row) => row.rowId));
    const fresh: CorpusRow[] = [];
    let skipped = 0;
    document.blocks.forEach((block) => {
      buildAutoRows(block, createdAt).forEach((row) => {
        if (knownIds.has(row.rowId)) {
          skipped += 1;
          return;
        }
        knownIds.add(row.rowId);
        fresh.push(row);
      });
    });
    await appendJsonLines(store.rowsPath, fresh);
    await updateManifest(store, document.documentId, existing.concat(fresh), createdAt, {
      tierStats: document.tierStats,
      flaggedForReview: document.flaggedForReview,
    });
    return { documentId: document.documentId, appended: fresh.length, skipped };
  });
};

const latestRowFor = (rows: CorpusRow[], blockId: string): CorpusRow | null =>
  rows
    .filter((row) => row.blockId === blockId)
    .reduce<CorpusRow | null>(
      (latest, row) =>
        !latest || VERSION_RANK[row.version] >= VERSION_RANK[latest.version] ? row : latest,
      null
    );

/**
 * Records a reviewer's label for a block as a new v3 row that supersedes the
 * block's latest row. Earlier rows are left untouched.
 */
export const recordCorrection = async (
  store: CorpusStore,
  correction: CorrectionInput,
  options?: CorpusWriteOptions
): Promise<CorpusRow> => {
  const label = blockLabelSchema.parse(correction.label);
  const correctedAt = (options?.now ?? (() => new Date()))().toISOString();
  return serializeByKey(store.rowsPath, async () => {
    const rows = await readCorpusRows(store);
    const latest = latestRowFor(rows, correction.blockId);
    if (!latest) throw new UnknownBlockError(correction.blockId);
    const row = toRow(
      {
        blockId: latest.blockId,
        documentId: latest.documentId,
        pageNo: latest.pageNo,
        bbox: latest.bbox,
        text: latest.text,
        label,
        labelTier: latest.labelTier,
        confidence: latest.confidence,
        source: latest.source,
        version: "v3",
        supersedes: latest.rowId,
        correction: {
          previousLabel: latest.label,
          reviewer: correction.reviewer,
          note: correction.note ?? null,
          correctedAt,
        },
      },
      correctedAt
    );
    await appendJsonLines(store.rowsPath, [row]);
    await updateManifest(store, latest.documentId, rows.concat(row), correctedAt, {});
    return row;
  });
};

/** Latest row per block, by version and then file order, in first-seen block order. */
export const effectiveRows = (rows: readonly CorpusRow[]): CorpusRow[] => {
  const latest = new Map<string, CorpusRow>();
  rows.forEach((row) => {
    const current = latest.get(row.blockId);
    if (!current || VERSION_RANK[row.version] >= VERSION_RANK[current.version]) {
      latest.set(row.blockId, row);
    }
  });
  return Array.from(latest.values());
};

export type AccuracyBucket = {
  reviewed: number;
  agreed: number;
  accuracy: number | null;
};

export type AccuracyReport = AccuracyBucket & {
  byTier: Record<LabelTier, AccuracyBucket>;
};

const emptyBucket = (): AccuracyBucket => ({ reviewed: 0, agreed: 0, accuracy: null });

const closeBucket = (bucket: AccuracyBucket): AccuracyBucket => ({
  ...bucket,
  accuracy: bucket.reviewed > 0 ? bucket.agreed / bucket.reviewed : null,
});

/** Agreement of auto labels (v2) with the latest human correction (v3) per reviewed block. */
export const measureAutoLabelAccuracy = (rows: readonly CorpusRow[]): AccuracyReport => {
  const autoByBlock = new Map<string, CorpusRow>();
  const correctedByBlock = new Map<string, CorpusRow>();
  rows.forEach((row) => {
    if (row.version === "v2") autoByBlock.set(row.blockId, row);
    if (row.version === "v3") correctedByBlock.set(row.blockId, row);
  });

  const overall = emptyBucket();
  const byTier: Record<LabelTier, AccuracyBucket> = {
    ground_truth_match: emptyBucket(),
    classifier_prediction: emptyBucket(),
    unresolved: emptyBucket(),
  };
  correctedByBlock.forEach((corrected, blockId) => {
    const auto = autoByBlock.get(blockId);
    if (!auto || !auto.labelTier) return;
    const agreed = auto.label === corrected.label ? 1 : 0;
    overall.reviewed += 1;
    overall.agreed += agreed;
    byTier[auto.labelTier].reviewed += 1;
    byTier[auto.labelTier].agreed += agreed;
  });

  return {
    ...closeBucket(overall),
    byTier: {
      ground_truth_match: closeBucket(byTier.ground_truth_match),
      classifier_prediction: closeBucket(byTier.classifier_prediction),
      unresolved: closeBucket(byTier.unresolved),
    },
  };
};

export type TrainingRow = {
  documentId: string;
  pageNo: number;
  bbox: CorpusRow["bbox"];
  text: string;
  label: BlockLabel;
  labelTier: LabelTier | null;
  confidence: number;
  source: CorpusRow["source"];
  version: CorpusVersion;
};

export const exportTrainingRows = (
  rows: readonly CorpusRow[],
  options?: { includeUnresolved?: boolean }
): TrainingRow[] => {
  const includeUnresolved = options?.includeUnresolved ?? false;
  const output: TrainingRow[] = [];
  effectiveRows(rows).forEach((row) => {
    if (row.label === null) return;
    if (row.label === "unresolved" && !includeUnresolved) return;
    output.push({
      documentId: row.documentId,
      pageNo: row.pageNo,
      bbox: row.bbox,
      text: row.text,
      label: row.label,
      labelTier: row.labelTier,
      confidence: row.confidence,
      source: row.source,
      version: row.version,
    });
  });
  return output;
};

export type LabelDistribution = {
  total: number;
  counts: Record<BlockLabel, number>;
  percentages: Record<BlockLabel, number>;
  imbalanceRatio: number | null;
};

const emptyLabelRecord = (): Record<BlockLabel, number> => ({
  body_text: 0,
  footnote: 0,
  heading: 0,
  front_matter: 0,
  caption: 0,
  page_header: 0,
  page_footer: 0,
  unresolved: 0,
});

/** Per-label counts over effective labeled rows; imbalance is largest over smallest non-empty class. */
export const summarizeLabelDistribution = (rows: readonly CorpusRow[]): LabelDistribution => {
  const counts = emptyLabelRecord();
  let total = 0;
  effectiveRows(rows).forEach((row) => {
    if (row.label === null) return;
    counts[row.label] += 1;
    total += 1;
  });
  const percentages = emptyLabelRecord();
  const present: number[] = [];
  BLOCK_LABELS.forEach((label) => {
    percentages[label] = total > 0 ? (counts[label] / total) * 100 : 0;
    if (counts[label] > 0) present.push(counts[label]);
  });
  return {
    total,
    counts,
    percentages,
    imbalanceRatio: present.length > 0 ? Math.max(...present) / Math.min(...present) : null,
  };
};
