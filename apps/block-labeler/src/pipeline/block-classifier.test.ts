import { afterEach, describe, expect, it, vi } from "vitest";
import type { TextBlock } from "../io/contracts.js";
import {
  createClassifierFromConfig,
  createRemoteBlockClassifier,
  layoutPredictionResult,
  requestClassification,
  type BlockClassifier,
} from "./block-classifier.js";
import { createLabelingConfig } from "./labeling-config.js";

const block: TextBlock = {
  blockId: "block-1",
  documentId: "doc-1",
  pageNo: 3,
  readingOrder: 0,
  text: "1 See the earlier discussion.",
  bbox: [0.1, 0.85, 0.9, 0.88],
  source: "recovered",
  extractionConfidence: 0.8,
  layoutPrediction: null,
  label: null,
};

const stubClassifier = (classify: BlockClassifier["classify"]): BlockClassifier => ({ classify });

describe("requestClassification", () => {
  it("maps the prediction onto block labels", async () => {
    const classifier = stubClassifier(async () => ({ label: "Paragraph", confidence: 0.91 }));

    await expect(requestClassification(classifier, block, 100)).resolves.toEqual({
      status: "ok",
      label: "body_text",
      confidence: 0.91,
    });
  });

  it("keeps unknown labels as null", async () => {
    const classifier = stubClassifier(async () => ({ label: "Marginalia", confidence: 0.9 }));

    await expect(requestClassification(classifier, block, 100)).resolves.toEqual({
      status: "ok",
      label: null,
      confidence: 0.9,
    });
  });

  it("reports an absent prediction", async () => {
    const classifier = stubClassifier(async () => null);

    await expect(requestClassification(classifier, block, 100)).resolves.toEqual({
      status: "absent",
    });
  });

  it("turns thrown errors into an unavailable result", async () => {
    const classifier = stubClassifier(async () => {
      throw new Error("model crashed");
    });

    await expect(requestClassification(classifier, block, 100)).resolves.toEqual({
      status: "unavailable",
      reason: "error",
      message: "model crashed",
    });
  });

  it("gives up after the timeout without retrying", async () => {
    const classify = vi.fn(
      () => new Promise<null>(() => undefined)
    );

    const result = await requestClassification(stubClassifier(classify), block, 20);

    expect(result).toEqual({
      status: "unavailable",
      reason: "timeout",
      message: "Classifier did not answer within 20ms",
    });
    expect(classify).toHaveBeenCalledTimes(1);
  });

  it("rejects out-of-range confidences", async () => {
    const classifier = stubClassifier(async () => ({ label: "Footnote", confidence: 1.5 }));

    const result = await requestClassification(classifier, block, 100);

    expect(result).toMatchObject({ status: "unavailable", reason: "invalid_response" });
  });
});

describe("layoutPredictionResult", () => {
  it("uses a classified block's layout prediction", () => {
    expect(
      layoutPredictionResult({
        ...block,
        source: "classified",
        layoutPrediction: { label: "footnote", rawLabel: "Footnote", confidence: 0.88 },
      })
    ).toEqual({ status: "ok", label: "footnote", confidence: 0.88 });
  });

  it("is absent for recovered blocks", () => {
    expect(layoutPredictionResult(block)).toEqual({ status: "absent" });
  });
});

describe("createRemoteBlockClassifier", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the block and validates the response", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => ({
      ok: true,
      status: 200,
      json: async () => ({ label: "footnote", confidence: 0.88 }),
    }));
    vi.stubGlobal("fetch", fetchMock);

    const classifier = createRemoteBlockClassifier({
      endpoint: "https://classifier.test/classify",
      token: "test-secret",
      timeoutMs: 250,
    });
    const prediction = await classifier.classify(block);

    expect(prediction).toEqual({ label: "footnote", confidence: 0.88 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://classifier.test/classify");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      blockId: "block-1",
      text: "1 See the earlier discussion.",
      pageNo: 3,
      bbox: [0.1, 0.85, 0.9, 0.88],
    });
  });

  it("returns null when the endpoint has no label", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => ({ ok: true, status: 200, json: async () => ({ label: null, confidence: 0 }) }))
    );

    const classifier = createRemoteBlockClassifier({ endpoint: "https://classifier.test/classify" });

    await expect(classifier.classify(block)).resolves.toBeNull();
  });

  it("reports HTTP failures as unavailable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => ({ ok: false, status: 503, json: async () => ({}) }))
    );
    const classifier = createRemoteBlockClassifier({ endpoint: "https://classifier.test/classify" });

    await expect(requestClassification(classifier, block, 250)).resolves.toEqual({
      status: "unavailable",
      reason: "error",
      message: "Classifier endpoint responded with HTTP 503",
    });
  });

  it("reports malformed bodies as invalid responses", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => ({ ok: true, status: 200, json: async () => ({ kind: "footnote" }) }))
    );
    const classifier = createRemoteBlockClassifier({ endpoint: "https://classifier.test/classify" });

    await expect(requestClassification(classifier, block, 250)).resolves.toEqual({
      status: "unavailable",
      reason: "invalid_response",
      message: "Classifier endpoint returned an unexpected body",
    });
  });
});

describe("createClassifierFromConfig", () => {
  it("returns null without an endpoint", () => {
    expect(createClassifierFromConfig(createLabelingConfig(), {})).toBeNull();
  });

  it("builds a remote classifier with the token from the configured variable", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => ({
      ok: true,
      status: 200,
      json: async () => ({ label: "heading", confidence: 0.9 }),
    }));
    vi.stubGlobal("fetch", fetchMock);
    const config = createLabelingConfig({
      classifier: { endpoint: "https://classifier.test/classify" },
    });

    const classifier = createClassifierFromConfig(config, {
      BLOCK_LABELER_CLASSIFIER_TOKEN: "test-secret",
    });
    await classifier?.classify(block);

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    vi.unstubAllGlobals();
  });
});
