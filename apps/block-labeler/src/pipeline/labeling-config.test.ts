import { beforeEach, describe, expect, it, vi } from "vitest";

const readFile = vi.hoisted(() => vi.fn());

vi.mock("node:fs/promises", () => ({
  default: { readFile },
  readFile,
}));

import {
  createLabelingConfig,
  defaultLabelingConfig,
  loadLabelingConfig,
  resolveLabelingConfig,
} from "./labeling-config.js";

describe("labeling-config", () => {
  beforeEach(() => {
    readFile.mockReset();
  });

  it("loadLabelingConfig returns defaults when the file is missing", async () => {
    readFile.mockRejectedValueOnce(new Error("missing"));

    const result = await loadLabelingConfig("/tmp/missing.yaml");

    expect(result.loadedFromFile).toBe(false);
    expect(result.configPath).toBe("/tmp/missing.yaml");
    expect(result.config).toEqual(defaultLabelingConfig);
  });

  it("loadLabelingConfig returns defaults when the YAML is not a mapping", async () => {
    readFile.mockResolvedValueOnce("- just\n- a list\n");

    const result = await loadLabelingConfig("/tmp/list.yaml");

    expect(result.loadedFromFile).toBe(false);
    expect(result.config.matching.acceptance_threshold).toBe(0.8);
  });

  it("loadLabelingConfig merges the file over the defaults", async () => {
    readFile.mockResolvedValueOnce(
      ["matching:", "  acceptance_threshold: 0.85", "batch:", "  concurrency: 2"].join("\n")
    );

    const result = await loadLabelingConfig("/tmp/labeling.yaml");

    expect(result.loadedFromFile).toBe(true);
    expect(result.config.matching.acceptance_threshold).toBe(0.85);
    expect(result.config.matching.floor_similarity).toBe(0.5);
    expect(result.config.batch.concurrency).toBe(2);
  });

  it("loadLabelingConfig rejects out-of-range values", async () => {
    readFile.mockResolvedValueOnce("matching:\n  acceptance_threshold: 1.5\n");

    await expect(loadLabelingConfig("/tmp/bad.yaml")).rejects.toThrow(
      /Invalid labeling config: matching\.acceptance_threshold/
    );
  });

  it("resolveLabelingConfig applies overrides and env", () => {
    const { resolvedConfig, sources } = resolveLabelingConfig(defaultLabelingConfig, {
      overrides: { resolution: { tier3_alarm_fraction: 0.2 } },
      env: {
        BLOCK_LABELER_ACCEPTANCE_THRESHOLD: "0.9",
        BLOCK_LABELER_CONCURRENCY: "8",
      },
      configPath: "/tmp/labeling_config.yaml",
      loadedFromFile: true,
    });

    expect(resolvedConfig.resolution.tier3_alarm_fraction).toBe(0.2);
    expect(resolvedConfig.matching.acceptance_threshold).toBe(0.9);
    expect(resolvedConfig.batch.concurrency).toBe(8);
    expect(sources).toEqual({
      configPath: "/tmp/labeling_config.yaml",
      loadedFromFile: true,
      overrides: { resolution: { tier3_alarm_fraction: 0.2 } },
      envOverrides: { matching: { acceptance_threshold: 0.9 }, batch: { concurrency: 8 } },
    });
  });

  it("resolveLabelingConfig ignores malformed env values", () => {
    const { sources } = resolveLabelingConfig(defaultLabelingConfig, {
      env: { BLOCK_LABELER_ACCEPTANCE_THRESHOLD: "high", BLOCK_LABELER_CONCURRENCY: "0" },
    });

    expect(sources.envOverrides).toEqual({});
  });

  it("returns a frozen config", () => {
    const config = createLabelingConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.matching)).toBe(true);
  });

  it("rejects an initial window larger than the cap", () => {
    expect(() => createLabelingConfig({ matching: { initial_window: 12 } })).toThrow(
      /matching\.initial_window/
    );
  });
});
