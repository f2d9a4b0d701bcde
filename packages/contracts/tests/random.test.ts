/**
 * Random source and helper tests
 */

import { describe, expect, it } from "vitest";
import {
  choice,
  coinFlip,
  createSystemRandom,
  intBelow,
  randomSeed,
  range,
  SeededRandom,
  shuffle,
  uniform,
  type RandomSource,
} from "../src";

/**
 * Source that replays a fixed sequence, wrapping around.
 */
function sequence(values: readonly number[]): RandomSource {
  let i = 0;
  return {
    next() {
      const value = values[i % values.length] ?? 0;
      i++;
      return value;
    },
  };
}

describe("SeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    for (let i = 0; i < 100; i++) {
      expect(a.next()).toBe(b.next());
    }
  });

  it("diverges for different seeds", () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);
    const same = Array.from({ length: 20 }, () => a.next() === b.next());
    expect(same.every(Boolean)).toBe(false);
  });

  it("stays inside [0, 1)", () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 10_000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("restores saved state", () => {
    const rng = new SeededRandom(99);
    rng.next();
    const state = rng.getState();
    const expected = [rng.next(), rng.next(), rng.next()];

    const restored = SeededRandom.fromState(state);
    expect([restored.next(), restored.next(), restored.next()]).toEqual(expected);
  });

  it("forks an independent generator deterministically", () => {
    const a = new SeededRandom(5).fork();
    const b = new SeededRandom(5).fork();
    expect(a.next()).toBe(b.next());
  });
});

describe("random helpers", () => {
  it("maps range onto inclusive integer bounds", () => {
    expect(range(sequence([0]), 3, 7)).toBe(3);
    expect(range(sequence([0.999]), 3, 7)).toBe(7);
    expect(range(sequence([0.5]), 0, 1)).toBe(1);
  });

  it("maps intBelow onto [0, bound)", () => {
    expect(intBelow(sequence([0]), 16)).toBe(0);
    expect(intBelow(sequence([0.999]), 16)).toBe(15);
  });

  it("scales uniform into the requested interval", () => {
    expect(uniform(sequence([0.25]), -1, 1)).toBe(-0.5);
  });

  it("flips coins on the half-way mark", () => {
    expect(coinFlip(sequence([0.49]))).toBe(true);
    expect(coinFlip(sequence([0.5]))).toBe(false);
  });

  it("returns undefined when choosing from an empty array", () => {
    expect(choice(sequence([0.3]), [])).toBeUndefined();
    expect(choice(sequence([0.3]), ["a", "b", "c"])).toBe("a");
  });

  it("shuffles into a permutation", () => {
    const rng = new SeededRandom(11);
    const input = [1, 2, 3, 4, 5, 6, 7, 8];
    const output = shuffle(rng, input);
    expect([...output].sort((a, b) => a - b)).toEqual(input);
    expect(input).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });
});

describe("system random", () => {
  it("produces unsigned 32-bit integers", () => {
    for (let i = 0; i < 100; i++) {
      const value = randomSeed();
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(0xffffffff);
    }
  });

  it("creates a usable unseeded generator", () => {
    const value = createSystemRandom().next();
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(1);
  });
});
