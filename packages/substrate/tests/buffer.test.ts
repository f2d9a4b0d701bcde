/**
 * Buffer tests
 */

import { describe, expect, it } from "vitest";
import { InvariantViolationError } from "@evoforge/contracts";
import { BitColor, Buffer, ModulusReseeder, SNPoint } from "../src";
import { recordingContext, sequence } from "./helpers";

describe("Buffer", () => {
  describe("construction", () => {
    it("initializes cells from their coordinates", () => {
      const buffer = new Buffer(3, 2, (x, y) => x + y * 10);
      expect(buffer.get(2, 1)).toBe(12);
      expect(buffer.get(0, 0)).toBe(0);
    });

    it("rejects empty dimensions", () => {
      expect(() => Buffer.filled(0, 4, false)).toThrow(InvariantViolationError);
      expect(() => Buffer.filled(2.5, 4, false)).toThrow(InvariantViolationError);
    });

    it("rebuilds from its serialized shape", () => {
      const info = Buffer.filled<number>(5, 7, 1).toJSON();
      expect(info).toEqual({ width: 5, height: 7 });
      const rebuilt = Buffer.fromInfo(info, () => "empty");
      expect(rebuilt.width).toBe(5);
      expect(rebuilt.get(4, 6)).toBe("empty");
    });

    it("generates a random shape", () => {
      const { events, ctx } = recordingContext();
      const buffer = Buffer.generate(sequence([0.5, 0]), (rng) => rng.next(), ctx);
      expect(buffer.info()).toEqual({ width: 129, height: 1 });
      expect(events[0]).toEqual({ kind: "generate", key: "Buffer" });
    });
  });

  describe("addressing", () => {
    it("maps points onto cells", () => {
      const buffer = Buffer.filled<number>(100, 100, 0);
      expect(buffer.pointToUint(SNPoint.ZERO)).toEqual({ x: 50, y: 50 });
      expect(buffer.pointToUint(SNPoint.of(-0.5, 0.5))).toEqual({ x: 25, y: 75 });
      expect(buffer.pointToUint(SNPoint.of(-1, -1))).toEqual({ x: 0, y: 0 });
    });

    it("caps the far edge at the last cell", () => {
      const buffer = Buffer.filled<number>(100, 100, 0);
      expect(buffer.pointToUint(SNPoint.of(1, 1))).toEqual({ x: 99, y: 99 });
    });

    it("rejects out-of-bounds access", () => {
      const buffer = Buffer.filled<number>(2, 2, 0);
      expect(() => buffer.get(2, 0)).toThrow(InvariantViolationError);
      expect(() => buffer.set(0, -1, 1)).toThrow(InvariantViolationError);
    });

    it("reads and writes through points", () => {
      const buffer = Buffer.filled<number>(4, 4, 0);
      buffer.setAt(SNPoint.ZERO, 9);
      expect(buffer.get(2, 2)).toBe(9);
      expect(buffer.getAt(SNPoint.of(0.1, 0.1))).toBe(9);
    });
  });

  describe("drawing", () => {
    it("draws a line across the diagonal", () => {
      const buffer = Buffer.filled<boolean>(4, 4, false);
      buffer.drawLine(SNPoint.of(-1, -1), SNPoint.of(1, 1), true);

      const marked: string[] = [];
      buffer.forEach((value, x, y) => {
        if (value) marked.push(`${x},${y}`);
      });
      expect(marked).toEqual(["0,0", "1,1", "2,2", "3,3"]);
    });

    it("draws a dot", () => {
      const buffer = Buffer.filled<BitColor>(10, 10, BitColor.Black);
      buffer.drawDot(SNPoint.of(-1, 1), BitColor.Red);
      expect(buffer.get(0, 9)).toBe(BitColor.Red);
    });
  });

  describe("whole-buffer operations", () => {
    it("maps into a new buffer", () => {
      const buffer = new Buffer(2, 2, (x, y) => x * 2 + y);
      const doubled = buffer.map((value) => value * 2);
      expect(doubled.get(1, 1)).toBe(6);
      expect(buffer.get(1, 1)).toBe(3);
    });

    it("clones independently", () => {
      const buffer = Buffer.filled<number>(2, 2, 1);
      const copy = buffer.clone();
      copy.set(0, 0, 5);
      expect(buffer.get(0, 0)).toBe(1);
    });

    it("is unchanged by mutate and update", () => {
      const buffer = Buffer.filled<number>(2, 2, 1);
      expect(buffer.mutate(sequence([0.3]))).toBe(buffer);
      expect(buffer.update()).toBe(buffer);
    });

    it("is overwritten by a reseeder", () => {
      const buffer = Buffer.filled<BitColor>(4, 4, BitColor.Black);
      const reseeder = new ModulusReseeder({
        xMod: 2,
        yMod: 4,
        xOffset: 0,
        yOffset: 1,
        colorTable: [BitColor.Black, BitColor.Red, BitColor.Green, BitColor.White],
      });
      reseeder.reseed(buffer);

      // x even hits, y === 3 hits
      expect(buffer.get(0, 0)).toBe(BitColor.Green);
      expect(buffer.get(1, 0)).toBe(BitColor.Black);
      expect(buffer.get(1, 3)).toBe(BitColor.Red);
      expect(buffer.get(2, 3)).toBe(BitColor.White);
    });
  });
});
