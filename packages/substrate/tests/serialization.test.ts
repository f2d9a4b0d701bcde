/**
 * Decoder and schema tests
 */

import { describe, expect, it } from "vitest";
import { SeededRandom } from "@evoforge/contracts";
import {
  BitColor,
  BitColorSchema,
  CMYKColor,
  CMYKColorSchema,
  decodeByteColor,
  decodeFloatColor,
  decodePointSet,
  decodePointSetGenerator,
  decodePointSetJson,
  decodeSNComplex,
  decodeSNPoint,
  decodeWith,
  ElementaryAutomataRule,
  ElementaryAutomataRuleSchema,
  FloatColor,
  HSVColor,
  HSVColorSchema,
  LABColor,
  LABColorSchema,
  parseJson,
  POINT_SET_GENERATOR_TYPES,
  PointSet,
  randomGeneratorOfType,
  SNPoint,
  type PointSetGeneratorType,
} from "../src";

const STOCHASTIC: readonly PointSetGeneratorType[] = ["UniformDistribution", "Poisson", "RandomRings"];

describe("point decoding", () => {
  it("reads the formatted text form", () => {
    const result = decodeSNPoint("(0.5, -0.25)");
    expect(result.isOk()).toBe(true);
    expect(result.value.toString()).toBe("(0.5000, -0.2500)");
  });

  it("round-trips the serialized form", () => {
    const point = SNPoint.of(-0.125, 0.75);
    const decoded = decodeSNPoint(JSON.parse(JSON.stringify(point)));
    expect(decoded.value.equals(point)).toBe(true);
  });

  it("reports malformed text", () => {
    const result = decodeSNPoint("0.5, 0.5");
    expect(result.error.code).toBe("DECODE_FAILED");
    expect(result.error.message).toBe('Invalid SNPoint: Expected "(x, y)"');
  });

  it("reports components outside [-1, 1]", () => {
    const result = decodeSNPoint("(1.5, 0)");
    expect(result.error.message).toBe("Invalid SNPoint: Expected a value in [-1, 1]");
    expect(result.error.details).toEqual({
      issues: [{ path: "0", message: "Expected a value in [-1, 1]" }],
    });
  });

  it("rejects non-string input", () => {
    expect(decodeSNPoint(42).isErr()).toBe(true);
  });

  it("reads complex numbers in the same form", () => {
    const z = decodeSNComplex("(0.25,-1)").value;
    expect(z.re.value).toBe(0.25);
    expect(z.im.value).toBe(-1);
  });
});

describe("JSON parsing", () => {
  it("wraps syntax errors", () => {
    const result = parseJson("{not json");
    expect(result.error.code).toBe("DECODE_FAILED");
    expect(result.error.message).toBe("Malformed JSON");
  });

  it("passes valid JSON through", () => {
    expect(parseJson('{"a":1}').value).toEqual({ a: 1 });
  });
});

describe("point-set decoding", () => {
  it("reads a generator descriptor", () => {
    const generator = decodePointSetGenerator({ type: "UniformGrid", xCount: 1, yCount: 3 }).value;
    expect(generator.type).toBe("UniformGrid");
    expect(JSON.stringify(generator)).toBe('{"type":"UniformGrid","xCount":1,"yCount":3}');
  });

  it("rejects unknown variants", () => {
    expect(decodePointSetGenerator({ type: "Nope" }).error.code).toBe("DECODE_FAILED");
  });

  it("rejects out-of-range fields", () => {
    const result = decodePointSetGenerator({ type: "HexGrid", xCount: 16, yCount: 2 });
    expect(result.error.message).toBe("Invalid PointSetGenerator: Nibble must be in 0..15");
  });

  it("rebuilds deterministic sets from their JSON", () => {
    const rng = new SeededRandom(12);
    for (const type of POINT_SET_GENERATOR_TYPES) {
      if (STOCHASTIC.includes(type)) continue;
      for (let i = 0; i < 5; i++) {
        const original = PointSet.fromGenerator(randomGeneratorOfType(type, rng), rng);
        const decoded = decodePointSetJson(JSON.stringify(original), rng).getOrThrow();

        expect(decoded.length).toBe(original.length);
        decoded.points.forEach((p, index) => {
          const q = original.at(index);
          expect(p.x.value).toBeCloseTo(q.x.value, 9);
          expect(p.y.value).toBeCloseTo(q.y.value, 9);
        });
      }
    }
  });

  it("repeats stochastic sets under the same seed", () => {
    const descriptor = { type: "Poisson", count: 40, radius: 0.3 };
    const first = decodePointSet(descriptor, new SeededRandom(5)).getOrThrow();
    const second = decodePointSet(descriptor, new SeededRandom(5)).getOrThrow();
    expect(second.points.map(String)).toEqual(first.points.map(String));
  });

  it("reports malformed JSON before decoding", () => {
    expect(decodePointSetJson("[", new SeededRandom(1)).error.message).toBe("Malformed JSON");
  });
});

describe("color decoding", () => {
  it("reads float colors", () => {
    const color = decodeFloatColor({ r: 0.5, g: 0, b: 1, a: 1 }).value;
    expect(color.toJSON()).toEqual({ r: 0.5, g: 0, b: 1, a: 1 });
  });

  it("names the offending channel", () => {
    const result = decodeFloatColor({ r: 2, g: 0, b: 0, a: 1 });
    expect(result.error.message).toBe("Invalid FloatColor: Expected a value in [0, 1]");
    expect(result.error.details).toEqual({ issues: [{ path: "r", message: "Expected a value in [0, 1]" }] });
  });

  it("requires whole bytes", () => {
    expect(decodeByteColor({ r: 1.5, g: 0, b: 0, a: 0 }).error.message).toBe(
      "Invalid ByteColor: Byte must be an integer",
    );
    expect(decodeByteColor({ r: 12, g: 0, b: 255, a: 7 }).value.toJSON()).toEqual({ r: 12, g: 0, b: 255, a: 7 });
  });

  it("reads bit colors by index", () => {
    expect(decodeWith(BitColorSchema, 5, "BitColor").value).toBe(BitColor.Magenta);
    expect(decodeWith(BitColorSchema, 8, "BitColor").error.message).toBe("Invalid BitColor: BitColor must be in 0..7");
  });

  it("round-trips the other color spaces", () => {
    const source = FloatColor.of(0.2, 0.6, 0.4, 0.5);

    const hsv = HSVColor.fromFloat(source);
    const decodedHsv = decodeWith(HSVColorSchema, hsv.toJSON(), "HSVColor").value;
    expect(decodedHsv.h.value).toBeCloseTo(hsv.h.value, 12);
    expect(decodedHsv.s.value).toBe(hsv.s.value);
    expect(decodedHsv.a.value).toBe(0.5);

    const cmyk = CMYKColor.fromFloat(source);
    expect(decodeWith(CMYKColorSchema, cmyk.toJSON(), "CMYKColor").value.toJSON()).toEqual(cmyk.toJSON());

    const lab = LABColor.fromFloat(source);
    expect(decodeWith(LABColorSchema, lab.toJSON(), "LABColor").value.toJSON()).toEqual(lab.toJSON());
  });
});

describe("automaton decoding", () => {
  it("rebuilds an elementary rule from its pattern", () => {
    const rule = ElementaryAutomataRule.fromWolframCode(30);
    const decoded = decodeWith(ElementaryAutomataRuleSchema, rule.toJSON(), "ElementaryAutomataRule");
    expect(decoded.value.toWolframCode()).toBe(30);
  });

  it("requires exactly eight entries", () => {
    const result = decodeWith(ElementaryAutomataRuleSchema, { pattern: [true] }, "ElementaryAutomataRule");
    expect(result.error.message).toBe("Invalid ElementaryAutomataRule: Pattern needs 8 entries");
  });
});
