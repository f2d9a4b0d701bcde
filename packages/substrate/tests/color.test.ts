/**
 * Color tests
 */

import { describe, expect, it } from "vitest";
import { InvariantViolationError, SeededRandom } from "@evoforge/contracts";
import {
  Angle,
  BIT_COLORS,
  BitColor,
  bitColorFromComponents,
  bitColorFromIndex,
  bitColorToComponents,
  blendColors,
  ByteColor,
  CMYKColor,
  eqColor,
  FloatColor,
  giveColor,
  hasColor,
  HSVColor,
  LABColor,
  mutateBitColor,
  Nibble,
  NibbleColor,
  randomBitColor,
  takeColor,
  xorColor,
} from "../src";
import { sequence } from "./helpers";

describe("BitColor", () => {
  it("maps each color to its channels", () => {
    expect(BIT_COLORS.map(bitColorToComponents)).toEqual([
      [false, false, false],
      [true, false, false],
      [false, true, false],
      [false, false, true],
      [false, true, true],
      [true, false, true],
      [true, true, false],
      [true, true, true],
    ]);
  });

  it("round-trips through components", () => {
    for (const color of BIT_COLORS) {
      expect(bitColorFromComponents(bitColorToComponents(color))).toBe(color);
    }
  });

  it("rejects indices outside 0..7", () => {
    expect(bitColorFromIndex(6)).toBe(BitColor.Yellow);
    expect(() => bitColorFromIndex(8)).toThrow(InvariantViolationError);
  });

  it("combines channels", () => {
    expect(giveColor(BitColor.Red, BitColor.Green)).toBe(BitColor.Yellow);
    expect(takeColor(BitColor.White, BitColor.Red)).toBe(BitColor.Cyan);
    expect(xorColor(BitColor.Yellow, BitColor.Red)).toBe(BitColor.Green);
    expect(eqColor(BitColor.Red, BitColor.Green)).toBe(BitColor.Blue);
    expect(hasColor(BitColor.Cyan, BitColor.Blue)).toBe(true);
    expect(hasColor(BitColor.Red, BitColor.Cyan)).toBe(false);
  });

  it("agrees with per-channel logic for every pair", () => {
    for (const a of BIT_COLORS) {
      for (const b of BIT_COLORS) {
        const [ar, ag, ab] = bitColorToComponents(a);
        const [br, bg, bb] = bitColorToComponents(b);
        expect(giveColor(a, b)).toBe(bitColorFromComponents([ar || br, ag || bg, ab || bb]));
        expect(takeColor(a, b)).toBe(bitColorFromComponents([ar && !br, ag && !bg, ab && !bb]));
        expect(xorColor(a, b)).toBe(bitColorFromComponents([ar !== br, ag !== bg, ab !== bb]));
        expect(eqColor(a, b)).toBe(bitColorFromComponents([ar === br, ag === bg, ab === bb]));
        expect(hasColor(a, b)).toBe((ar && br) || (ag && bg) || (ab && bb));
      }
    }
  });

  it("draws and mutates channels from the source", () => {
    expect(randomBitColor(sequence([0.5]))).toBe(BitColor.Blue);
    expect(mutateBitColor(BitColor.Black, sequence([0.9]))).toBe(BitColor.Black);
    expect(mutateBitColor(BitColor.Black, sequence([0.1]))).toBe(BitColor.White);
  });
});

describe("RGBA colors", () => {
  it("truncates floats into bytes", () => {
    expect(FloatColor.of(0.5, 0.25, 1, 1).toByte().toJSON()).toEqual({ r: 127, g: 63, b: 255, a: 255 });
  });

  it("quantizes floats into nibbles", () => {
    expect(FloatColor.of(1, 0.5, 0.99, 0).toNibble().toJSON()).toEqual({ r: 15, g: 8, b: 15, a: 0 });
  });

  it("keeps float -> byte -> float within 1/255", () => {
    const rng = new SeededRandom(8);
    for (let i = 0; i < 200; i++) {
      const color = FloatColor.random(rng);
      const back = FloatColor.fromByte(color.toByte());
      for (const channel of ["r", "g", "b", "a"] as const) {
        expect(Math.abs(back[channel].value - color[channel].value)).toBeLessThan(1 / 255);
      }
    }
  });

  it("converts bit colors to bytes and floats", () => {
    expect(ByteColor.fromBitColor(BitColor.Cyan).toJSON()).toEqual({ r: 0, g: 255, b: 255, a: 255 });
    expect(FloatColor.fromBitColor(BitColor.Yellow).toJSON()).toEqual({ r: 1, g: 1, b: 0, a: 1 });
  });

  it("steps byte channels toward a bit color", () => {
    const stepped = ByteColor.of(255, 0, 10, 50).addBitColor(BitColor.Red);
    expect(stepped.toJSON()).toEqual({ r: 0, g: 255, b: 9, a: 50 });
  });

  it("thresholds back to bit colors", () => {
    expect(ByteColor.of(200, 100, 128).toBitColor()).toBe(BitColor.Magenta);
    expect(FloatColor.of(0.5, 0.49, 1).toBitColor()).toBe(BitColor.Magenta);
  });

  it("reports hue, saturation and value", () => {
    const red = FloatColor.of(1, 0, 0);
    expect(red.hue().value).toBe(0);
    expect(red.saturation().value).toBe(1);
    expect(red.value().value).toBe(1);
    expect(FloatColor.of(0, 1, 0).hue().value).toBeCloseTo(1 / 3, 12);
    expect(FloatColor.of(0.3, 0.6, 0.9).average()).toBeCloseTo(0.6, 12);
  });

  it("replaces one channel", () => {
    const color = NibbleColor.fromFloat(FloatColor.ALL_ZERO).with("g", Nibble.of(9));
    expect(color.toJSON()).toEqual({ r: 0, g: 9, b: 0, a: 0 });
  });
});

describe("HSVColor", () => {
  it("puts pure red at hue 0", () => {
    const hsv = HSVColor.fromFloat(FloatColor.of(1, 0, 0, 0.5));
    expect(hsv.h.value).toBe(0);
    expect(hsv.s.value).toBe(1);
    expect(hsv.v.value).toBe(1);
    expect(hsv.a.value).toBe(0.5);
  });

  it("round-trips through float", () => {
    const green = FloatColor.of(0, 1, 0);
    const hsv = HSVColor.fromFloat(green);
    expect(hsv.h.value).toBeCloseTo((2 * Math.PI) / 3, 12);
    const back = hsv.toFloat();
    expect(back.r.value).toBeCloseTo(0, 10);
    expect(back.g.value).toBeCloseTo(1, 10);
    expect(back.b.value).toBeCloseTo(0, 10);
  });

  it("offsets the hue", () => {
    expect(HSVColor.WHITE.offsetHue(Angle.of(1)).h.value).toBeCloseTo(1, 12);
  });
});

describe("CMYKColor", () => {
  it("maps pure black to BLACK, keeping alpha", () => {
    const black = CMYKColor.fromFloat(FloatColor.of(0, 0, 0, 0.4));
    expect(black.toJSON()).toEqual({ c: 0, m: 0, y: 0, k: 1, a: 0.4 });
  });

  it("converts red", () => {
    const red = CMYKColor.fromFloat(FloatColor.of(1, 0, 0));
    expect(red.toJSON()).toEqual({ c: 0, m: 1, y: 1, k: 0, a: 1 });
    expect(red.toFloat().toJSON()).toEqual({ r: 1, g: 0, b: 0, a: 1 });
  });
});

describe("LABColor", () => {
  it("puts white at full lightness with a neutral chroma", () => {
    const white = LABColor.fromFloat(FloatColor.WHITE);
    expect(white.l.value).toBeCloseTo(1, 3);
    expect(white.ab.re.value).toBeCloseTo(0, 3);
    expect(white.ab.im.value).toBeCloseTo(0, 3);
  });

  it("puts black at zero lightness", () => {
    expect(LABColor.fromFloat(FloatColor.BLACK).l.value).toBeCloseTo(0, 10);
  });

  it("round-trips an in-gamut color", () => {
    const color = FloatColor.of(0.2, 0.6, 0.4, 0.75);
    const back = LABColor.fromFloat(color).toFloat();
    expect(back.r.value).toBeCloseTo(0.2, 3);
    expect(back.g.value).toBeCloseTo(0.6, 3);
    expect(back.b.value).toBeCloseTo(0.4, 3);
    expect(back.a.value).toBe(0.75);
  });
});

describe("blendColors", () => {
  const a = FloatColor.of(0.25, 0.75, 0.5, 1);
  const b = FloatColor.of(0.5, 0.5, 0.5, 0.5);

  it("overlays per channel and averages alpha", () => {
    expect(blendColors("overlay", a, b, sequence([0])).toJSON()).toEqual({ r: 0.25, g: 0.75, b: 0.5, a: 0.75 });
  });

  it("screens per channel", () => {
    expect(blendColors("screenDodge", a, b, sequence([0])).toJSON()).toEqual({
      r: 0.625,
      g: 0.875,
      b: 0.75,
      a: 0.75,
    });
  });

  it("dissolves to one whole input", () => {
    expect(blendColors("dissolve", a, b, sequence([0.1]))).toBe(a);
    expect(blendColors("dissolve", a, b, sequence([0.9]))).toBe(b);
  });
});
