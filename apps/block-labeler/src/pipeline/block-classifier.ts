import { z } from "zod";
import type { ClassifierResult, TextBlock } from "../io/contracts.js";
import { mapClassifierLabel } from "../io/classifiedTextAdapter.js";
import type { LabelingConfig } from "./labeling-config.js";

export type ClassifierPrediction = {
  label: string;
  confidence: number;
};

export interface BlockClassifier {
  classify: (
    block: TextBlock,
    options?: { signal?: AbortSignal }
  ) => Promise<ClassifierPrediction | null>;
}

export class ClassifierTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Classifier did not answer within ${timeoutMs}ms`);
    this.name = "ClassifierTimeoutError";
  }
}

export class InvalidClassifierResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidClassifierResponseError";
  }
}

const predictionSchema = z.object({
  label: z.string().nullable(),
  confidence: z.number().min(0).max(1),
});

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Calls the fallback classifier for one block, bounded by a timeout. Failures
 * never propagate: they come back as an unavailable result and are not retried.
 */
export const requestClassification = async (
  classifier: BlockClassifier,
  block: TextBlock,
  timeoutMs: number
): Promise<ClassifierResult> => {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ClassifierTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    const prediction = await Promise.race([
      classifier.classify(block, { signal: controller.signal }),
      timeout,
    ]);
    if (prediction === null) return { status: "absent" };
    const parsed = predictionSchema.safeParse(prediction);
    if (!parsed.success || parsed.data.label === null) {
      return {
        status: "unavailable",
        reason: "invalid_response",
        message: "Classifier returned a malformed prediction",
      };
    }
    return {
      status: "ok",
      label: mapClassifierLabel(parsed.data.label),
      confidence: parsed.data.confidence,
    };
  } catch (error) {
    if (error instanceof ClassifierTimeoutError) {
      return { status: "unavailable", reason: "timeout", message: error.message };
    }
    if (error instanceof InvalidClassifierResponseError) {
      return { status: "unavailable", reason: "invalid_response", message: error.message };
    }
    return { status: "unavailable", reason: "error", message: describeError(error) };
  } finally {
    clearTimeout(timer);
  }
};

/** A classified block's own layout prediction, used when no fallback classifier is configured. */
export const layoutPredictionResult = (block: TextBlock): ClassifierResult => {
  if (!block.layoutPrediction) return { status: "absent" };
  return {
    status: "ok",
    label: block.layoutPrediction.label,
    confidence: block.layoutPrediction.confidence,
  };
};

export type RemoteClassifierConfig = {
  endpoint: string;
  token?: string;
  timeoutMs?: number;
};

const remoteResponseSchema = z.object({
  label: z.string().nullable(),
  confidence: z.number(),
});

export const createRemoteBlockClassifier = (config: RemoteClassifierConfig): BlockClassifier => ({
  classify: async (block, options) => {
    const timeoutMs = config.timeoutMs ?? 5000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = (): void => controller.abort();
    options?.signal?.addEventListener("abort", forwardAbort, { once: true });
    try {
      const response = await fetch(config.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(config.token ? { Authorization: `Bearer ${config.token}` } : {}),
        },
        body: JSON.stringify({
          blockId: block.blockId,
          text: block.text,
          pageNo: block.pageNo,
          bbox: block.bbox,
        }),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Classifier endpoint responded with HTTP ${response.status}`);
      }
      const body: unknown = await response.json();
      const parsed = remoteResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new InvalidClassifierResponseError("Classifier endpoint returned an unexpected body");
      }
      if (parsed.data.label === null) return null;
      return { label: parsed.data.label, confidence: parsed.data.confidence };
    } finally {
      clearTimeout(timeout);
      options?.signal?.removeEventListener("abort", forwardAbort);
    }
  },
});

/** Builds the remote classifier named by the config, or null when no endpoint is set. */
export const createClassifierFromConfig = (
  config: Pick<LabelingConfig, "classifier">,
  env: Record<string, string | undefined> = process.env
): BlockClassifier | null => {
  const { endpoint, token_env: tokenEnv, timeout_ms: timeoutMs } = config.classifier;
  if (!endpoint) return null;
  return createRemoteBlockClassifier({ endpoint, token: env[tokenEnv], timeoutMs });
};
