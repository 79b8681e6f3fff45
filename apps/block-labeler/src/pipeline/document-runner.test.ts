import { describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { CorruptDocumentError } from "../io/errors.js";
import type { BlockClassifier } from "./block-classifier.js";
import { openCorpusStore, readCorpusRows } from "./corpus-store.js";
import {
  documentsFromFiles,
  loadDocumentFromFile,
  processDocument,
  runBatch,
} from "./document-runner.js";
import { createLabelingConfig } from "./labeling-config.js";
import { createRunLogger } from "./logger.js";
import { getDocumentLogPath, getRunLogDir } from "./run-paths.js";

const fixturePath = fileURLToPath(
  new URL("../../tests/fixtures/casebook-001.json", import.meta.url)
);
const config = createLabelingConfig();

const loadFixture = (): Promise<unknown> => loadDocumentFromFile(fixturePath);

const singleBlockDocument = (label: string, confidence: number) => ({
  documentId: "single-block",
  pages: [{ pageNo: 1, width: 1000, height: 1000 }],
  classified: {
    fragments: [
      {
        text: "A short note printed beneath the figure.",
        label,
        confidence,
        bbox: [100, 100, 900, 150],
        page: 1,
      },
    ],
  },
});

describe("processDocument", () => {
  it("reconciles, matches and labels a document", async () => {
    const result = await processDocument(await loadFixture(), { config });

    expect(
      result.blocks.map((block) => [block.text, block.source, block.label, block.labelTier])
    ).toEqual([
      ["CONTRACT LAW CASEBOOK", "recovered", "unresolved", "unresolved"],
      [
        "The court held that the agreement was void for want of consideration.",
        "classified",
        "body_text",
        "ground_truth_match",
      ],
      ["1 See Smith v. Jones.", "classified", "footnote", "ground_truth_match"],
      ["CONTRACT LAW CASEBOOK", "recovered", "unresolved", "unresolved"],
      [
        "Damages follow from the breach of a valid promise.",
        "classified",
        "body_text",
        "ground_truth_match",
      ],
    ]);
    expect(result.blocks.map((block) => block.readingOrder)).toEqual([0, 1, 2, 3, 4]);
    expect(result.blocks[1].bbox).toEqual([0.1, 0.142857, 0.9, 0.2]);
    expect(result.matchStats).toEqual({ matchedBlocks: 3, windowExpansions: 0, globalSearches: 0 });
    expect(result.pageStats).toEqual([
      { pageNo: 1, rawCount: 4, classifiedCount: 2, recoveredCount: 1, duplicatesSkipped: 0 },
      { pageNo: 2, rawCount: 2, classifiedCount: 1, recoveredCount: 1, duplicatesSkipped: 0 },
    ]);
  });

  it("flags documents whose unresolved fraction exceeds the alarm", async () => {
    const result = await processDocument(await loadFixture(), { config });

    expect(result.tierStats.counts).toEqual({
      ground_truth_match: 3,
      classifier_prediction: 0,
      unresolved: 2,
    });
    expect(result.flaggedForReview).toBe(true);
    expect(result.warnings).toEqual([
      {
        kind: "tier_alarm",
        documentId: "casebook-001",
        unresolvedFraction: 0.4,
        threshold: 0.3,
      },
    ]);
  });

  it("falls back to the layout prediction without a reference", async () => {
    const result = await processDocument(singleBlockDocument("Footnote", 0.9), { config });

    expect(result.blocks[0]).toMatchObject({
      label: "footnote",
      labelTier: "classifier_prediction",
      confidence: 0.9,
    });
  });

  it("ignores the layout prediction when disabled", async () => {
    const result = await processDocument(singleBlockDocument("Footnote", 0.9), {
      config: createLabelingConfig({ resolution: { use_layout_prediction: false } }),
    });

    expect(result.blocks[0]).toMatchObject({ label: "unresolved", confidence: 0 });
  });

  it("resolves to unresolved when the fallback classifier times out", async () => {
    const classifier: BlockClassifier = {
      classify: vi.fn(() => new Promise<null>(() => undefined)),
    };

    const result = await processDocument(singleBlockDocument("Footnote", 0.9), {
      config: createLabelingConfig({ classifier: { timeout_ms: 20 } }),
      classifier,
    });

    expect(result.blocks[0]).toMatchObject({ label: "unresolved", labelTier: "unresolved" });
    expect(result.warnings).toContainEqual({
      kind: "classifier_unavailable",
      documentId: "single-block",
      blockId: result.blocks[0].blockId,
      reason: "timeout",
      message: "Classifier did not answer within 20ms",
    });
  });

  it("keeps readable text on a page with a malformed fragment", async () => {
    const result = await processDocument(
      {
        documentId: "damaged-page",
        pages: [{ pageNo: 1, width: 1000, height: 1000 }],
        raw: {
          fragments: [
            { text: "A valid line of text.", confidence: 0.9, bbox: [100, 100, 800, 40], page: 1 },
            { text: "A line with a broken box.", confidence: 0.8, bbox: [1, 2, 3], page: 1 },
          ],
        },
      },
      { config }
    );

    expect(result.blocks.map((block) => [block.text, block.bbox])).toEqual([
      ["A valid line of text.", [0.1, 0.1, 0.9, 0.14]],
      ["A line with a broken box.", null],
    ]);
    expect(result.droppedFragments).toBe(0);
    expect(result.warnings).toContainEqual({
      kind: "partial_page",
      documentId: "damaged-page",
      pageNo: 1,
      missingStreams: ["classified"],
      incompleteStreams: ["raw"],
    });
  });

  it("rejects documents without any text stream", async () => {
    await expect(processDocument({ documentId: "empty" }, { config })).rejects.toThrow(
      "Corrupt document empty: document has neither a raw nor a classified stream"
    );
  });

  it("rejects envelopes that fail validation", async () => {
    const error = await processDocument({ pages: "none" }, { config }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(CorruptDocumentError);
    expect(error).toMatchObject({ documentId: "unknown" });
  });
});

describe("runBatch", () => {
  it("isolates failing documents and keeps input order", async () => {
    const store = openCorpusStore(
      await fs.mkdtemp(path.join(os.tmpdir(), "block-labeler-batch-"))
    );

    const summary = await runBatch(
      [
        { documentId: "casebook-001", load: loadFixture },
        { documentId: "broken", load: async () => ({ documentId: "broken" }) },
        {
          documentId: "offline-doc",
          load: async () => {
            throw new Error("disk unavailable");
          },
        },
      ],
      { config, store, concurrency: 2 }
    );

    expect(summary.outcomes.map((outcome) => [outcome.documentId, outcome.status])).toEqual([
      ["casebook-001", "ok"],
      ["broken", "failed"],
      ["offline-doc", "failed"],
    ]);
    expect(summary.outcomes[2]).toEqual({
      status: "failed",
      documentId: "offline-doc",
      failure: {
        documentId: "offline-doc",
        kind: "corrupt_document",
        message: "Corrupt document offline-doc: failed to load: disk unavailable",
        issues: [],
      },
    });
    expect(summary).toMatchObject({ succeeded: 1, failed: 2, flagged: ["casebook-001"] });
    expect(await readCorpusRows(store)).toHaveLength(10);
  });

  it("logs failures and document warnings", async () => {
    const runDir = await fs.mkdtemp(path.join(os.tmpdir(), "block-labeler-run-"));
    const logger = createRunLogger(runDir, { level: "info", per_document_logs: true });

    await runBatch(
      [
        { documentId: "casebook-001", load: loadFixture },
        { documentId: "broken", load: async () => ({ documentId: "broken" }) },
      ],
      { config, logger }
    );
    await logger.flush();

    const runLog = await fs.readFile(path.join(getRunLogDir(runDir), "run.log"), "utf-8");
    const documentLog = await fs.readFile(getDocumentLogPath(runDir, "casebook-001"), "utf-8");
    const runEntries = runLog
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    const documentEntries = documentLog
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));

    expect(runEntries.map((entry) => entry.message)).toContain("Document failed");
    expect(runEntries.find((entry) => entry.message === "Document failed")).toMatchObject({
      level: "error",
      documentId: "broken",
      kind: "corrupt_document",
      reason: "Corrupt document broken: document has neither a raw nor a classified stream",
      issues: [],
    });
    expect(runEntries.map((entry) => entry.message)).toContain("Document flagged for review");
    expect(documentEntries[0]).toMatchObject({
      level: "warn",
      message: "unresolved fraction 0.400 exceeds 0.3",
    });
  });
});

describe("loadDocumentFromFile", () => {
  it("treats malformed JSON as a corrupt document", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "block-labeler-load-"));
    const filePath = path.join(dir, "truncated.json");
    await fs.writeFile(filePath, '{ "documentId": "truncated", ');

    const error = await loadDocumentFromFile(filePath).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CorruptDocumentError);
    expect(error).toMatchObject({ documentId: "truncated" });
  });

  it("derives document ids from file names", () => {
    const documents = documentsFromFiles(["/data/in/casebook-001.json", "/data/in/notes.json"]);

    expect(documents.map((document) => document.documentId)).toEqual(["casebook-001", "notes"]);
  });
});
