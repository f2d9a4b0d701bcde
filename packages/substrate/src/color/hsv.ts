import { intBelow, type RandomSource } from "@evoforge/contracts";
import { coinFlipMutation, emit, type GenContext } from "../core/context/generation";
import { Angle, UnsignedNormFloat } from "../core/numeric/continuous";
import { TAU } from "../core/numeric/math";
import { hsvToRgb, rgbToHsv } from "./color-space";
import { FloatColor } from "./rgba";

/**
 * Hue as an angle, saturation, value and alpha in [0, 1].
 */
export class HSVColor {
  static readonly KEY = "HSVColor";
  static readonly WHITE = new HSVColor(Angle.ZERO, UnsignedNormFloat.ZERO, UnsignedNormFloat.ONE, UnsignedNormFloat.ONE);
  static readonly BLACK = new HSVColor(Angle.ZERO, UnsignedNormFloat.ZERO, UnsignedNormFloat.ZERO, UnsignedNormFloat.ONE);

  constructor(
    readonly h: Angle,
    readonly s: UnsignedNormFloat,
    readonly v: UnsignedNormFloat,
    readonly a: UnsignedNormFloat,
  ) {}

  static fromFloat(color: FloatColor): HSVColor {
    const [h, s, v] = rgbToHsv([color.r.value, color.g.value, color.b.value]);
    return new HSVColor(
      Angle.of(h * TAU),
      UnsignedNormFloat.clamped(s),
      UnsignedNormFloat.clamped(v),
      color.a,
    );
  }

  static random(rng: RandomSource): HSVColor {
    return new HSVColor(
      Angle.random(rng),
      UnsignedNormFloat.random(rng),
      UnsignedNormFloat.random(rng),
      UnsignedNormFloat.random(rng),
    );
  }

  static generate(rng: RandomSource, ctx?: GenContext): HSVColor {
    emit(ctx, "generate", HSVColor.KEY);
    return HSVColor.random(rng);
  }

  toFloat(): FloatColor {
    const [r, g, b] = hsvToRgb([this.h.value / TAU, this.s.value, this.v.value]);
    return FloatColor.clamped(r, g, b, this.a.value);
  }

  /**
   * Hue follows the shorter arc; the other channels interpolate linearly.
   */
  lerp(other: HSVColor, t: UnsignedNormFloat): HSVColor {
    return new HSVColor(
      this.h.lerp(other.h, t),
      this.s.lerp(other.s, t),
      this.v.lerp(other.v, t),
      this.a.lerp(other.a, t),
    );
  }

  offsetHue(offset: Angle): HSVColor {
    return new HSVColor(this.h.add(offset), this.s, this.v, this.a);
  }

  mutate(rng: RandomSource, ctx?: GenContext): HSVColor {
    emit(ctx, "mutate", HSVColor.KEY);
    return coinFlipMutation(
      rng,
      () => HSVColor.random(rng),
      () => {
        switch (intBelow(rng, 4)) {
          case 0:
            return new HSVColor(this.h.mutate(rng, ctx), this.s, this.v, this.a);
          case 1:
            return new HSVColor(this.h, this.s.mutate(rng, ctx), this.v, this.a);
          case 2:
            return new HSVColor(this.h, this.s, this.v.mutate(rng, ctx), this.a);
          default:
            return new HSVColor(this.h, this.s, this.v, this.a.mutate(rng, ctx));
        }
      },
    );
  }

  update(ctx?: GenContext): HSVColor {
    emit(ctx, "update", HSVColor.KEY);
    return this;
  }

  toJSON(): { h: number; s: number; v: number; a: number } {
    return { h: this.h.value, s: this.s.value, v: this.v.value, a: this.a.value };
  }
}
