/**
 * Configuration and generation-context tests
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { SubstrateError } from "@evoforge/contracts";
import {
  coinFlipMutation,
  DEFAULT_SUBSTRATE_CONFIG,
  emit,
  resolveConfig,
  trace,
  validateSubstrateConfig,
} from "../src";
import { recordingContext, sequence } from "./helpers";

describe("validateSubstrateConfig", () => {
  it("fills every default", () => {
    const result = validateSubstrateConfig();
    expect(result.isOk()).toBe(true);
    expect(result.value).toEqual(DEFAULT_SUBSTRATE_CONFIG);
  });

  it("keeps valid overrides", () => {
    const result = validateSubstrateConfig({ poissonAttempts: 5, trace: true });
    expect(result.value).toEqual({ poissonAttempts: 5, minSubtractDistance: 0.1, trace: true });
  });

  it("rejects too few Poisson attempts", () => {
    const result = validateSubstrateConfig({ poissonAttempts: 0 });
    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("CONFIG_INVALID");
    expect(result.error.message).toBe("poissonAttempts must be at least 1");
    expect(result.error.details).toEqual({
      issues: [{ path: "poissonAttempts", message: "poissonAttempts must be at least 1" }],
    });
  });

  it("rejects fractional Poisson attempts", () => {
    expect(validateSubstrateConfig({ poissonAttempts: 1.5 }).error.message).toBe(
      "poissonAttempts must be an integer",
    );
  });

  it("rejects a non-positive subtraction floor", () => {
    expect(validateSubstrateConfig({ minSubtractDistance: 0 }).error.message).toBe(
      "minSubtractDistance must be positive",
    );
  });

  it("joins several problems", () => {
    const result = validateSubstrateConfig({ poissonAttempts: 2000, minSubtractDistance: 3 });
    expect(result.error.message).toBe(
      "poissonAttempts must not exceed 1000; minSubtractDistance must not exceed the unit-square diagonal span",
    );
  });

  it("fails loudly through getOrThrow", () => {
    expect(() => validateSubstrateConfig({ poissonAttempts: -3 }).getOrThrow()).toThrow(SubstrateError);
  });
});

describe("generation context", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("falls back to the default configuration", () => {
    expect(resolveConfig(undefined)).toBe(DEFAULT_SUBSTRATE_CONFIG);
    expect(resolveConfig({})).toBe(DEFAULT_SUBSTRATE_CONFIG);
  });

  it("reports events to the hook", () => {
    const { events, ctx } = recordingContext();
    emit(ctx, "mutate", "Byte");
    emit(undefined, "generate", "Byte");
    expect(events).toEqual([{ kind: "mutate", key: "Byte" }]);
  });

  it("traces only when enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    trace(undefined, "Test", "hidden");
    trace({ config: { ...DEFAULT_SUBSTRATE_CONFIG, trace: true } }, "Test", "shown");
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[Test] shown");
  });

  it("resamples on heads and tweaks on tails", () => {
    expect(coinFlipMutation(sequence([0.1]), () => "resample", () => "tweak")).toBe("resample");
    expect(coinFlipMutation(sequence([0.9]), () => "resample", () => "tweak")).toBe("tweak");
  });
});
