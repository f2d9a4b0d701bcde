import { intBelow, type RandomSource } from "@evoforge/contracts";
import { coinFlipMutation, emit, type GenContext } from "../core/context/generation";
import { UnsignedNormFloat } from "../core/numeric/continuous";
import { cmykToRgb, rgbToCmyk } from "./color-space";
import { FloatColor } from "./rgba";

type CmykChannel = "c" | "m" | "y" | "k" | "a";
const CMYK_CHANNELS: readonly CmykChannel[] = ["c", "m", "y", "k", "a"];

/**
 * Subtractive color with alpha, every channel in [0, 1].
 */
export class CMYKColor {
  static readonly KEY = "CMYKColor";
  static readonly WHITE = new CMYKColor(
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ONE,
  );
  static readonly BLACK = new CMYKColor(
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ONE,
    UnsignedNormFloat.ONE,
  );

  constructor(
    readonly c: UnsignedNormFloat,
    readonly m: UnsignedNormFloat,
    readonly y: UnsignedNormFloat,
    readonly k: UnsignedNormFloat,
    readonly a: UnsignedNormFloat,
  ) {}

  /**
   * Pure black has no ink ratios; it becomes `BLACK` with the source alpha.
   */
  static fromFloat(color: FloatColor): CMYKColor {
    const cmyk = rgbToCmyk([color.r.value, color.g.value, color.b.value]);
    if (cmyk === undefined) {
      return CMYKColor.BLACK.withChannel("a", color.a);
    }
    const [c, m, y, k] = cmyk;
    return new CMYKColor(
      UnsignedNormFloat.clamped(c),
      UnsignedNormFloat.clamped(m),
      UnsignedNormFloat.clamped(y),
      UnsignedNormFloat.clamped(k),
      color.a,
    );
  }

  static random(rng: RandomSource): CMYKColor {
    return new CMYKColor(
      UnsignedNormFloat.random(rng),
      UnsignedNormFloat.random(rng),
      UnsignedNormFloat.random(rng),
      UnsignedNormFloat.random(rng),
      UnsignedNormFloat.random(rng),
    );
  }

  static generate(rng: RandomSource, ctx?: GenContext): CMYKColor {
    emit(ctx, "generate", CMYKColor.KEY);
    return CMYKColor.random(rng);
  }

  toFloat(): FloatColor {
    const [r, g, b] = cmykToRgb(this.c.value, this.m.value, this.y.value, this.k.value);
    return FloatColor.clamped(r, g, b, this.a.value);
  }

  withChannel(channel: CmykChannel, value: UnsignedNormFloat): CMYKColor {
    const { c, m, y, k, a }: Record<CmykChannel, UnsignedNormFloat> = { c: this.c, m: this.m, y: this.y, k: this.k, a: this.a, [channel]: value };
    return new CMYKColor(c, m, y, k, a);
  }

  lerp(other: CMYKColor, t: UnsignedNormFloat): CMYKColor {
    return new CMYKColor(
      this.c.lerp(other.c, t),
      this.m.lerp(other.m, t),
      this.y.lerp(other.y, t),
      this.k.lerp(other.k, t),
      this.a.lerp(other.a, t),
    );
  }

  mutate(rng: RandomSource, ctx?: GenContext): CMYKColor {
    emit(ctx, "mutate", CMYKColor.KEY);
    return coinFlipMutation(
      rng,
      () => CMYKColor.random(rng),
      () => {
        const channel = CMYK_CHANNELS[intBelow(rng, CMYK_CHANNELS.length)] ?? "c";
        return this.withChannel(channel, this[channel].mutate(rng, ctx));
      },
    );
  }

  update(ctx?: GenContext): CMYKColor {
    emit(ctx, "update", CMYKColor.KEY);
    return this;
  }

  toJSON(): { c: number; m: number; y: number; k: number; a: number } {
    return { c: this.c.value, m: this.m.value, y: this.y.value, k: this.k.value, a: this.a.value };
  }
}
