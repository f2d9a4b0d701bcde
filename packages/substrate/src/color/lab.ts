import { intBelow, type RandomSource } from "@evoforge/contracts";
import { coinFlipMutation, emit, type GenContext } from "../core/context/generation";
import { SNComplex } from "../core/geometry/sn-complex";
import { SignedNormFloat, UnsignedNormFloat } from "../core/numeric/continuous";
import { rgbToLab, labToRgb } from "./color-space";
import { FloatColor } from "./rgba";

/** Scale between CIE a*, b* and the stored [-1, 1] pair. */
const AB_SCALE = 127;

/**
 * CIE L*a*b* color. `l` is L/100 and the a*b* plane is packed into one
 * complex value scaled by 1/127 and clamped to the unit square.
 */
export class LABColor {
  static readonly KEY = "LABColor";
  static readonly WHITE = new LABColor(SignedNormFloat.ONE, SNComplex.ZERO, UnsignedNormFloat.ONE);
  static readonly BLACK = new LABColor(SignedNormFloat.ZERO, SNComplex.ZERO, UnsignedNormFloat.ONE);

  constructor(
    readonly l: SignedNormFloat,
    readonly ab: SNComplex,
    readonly alpha: UnsignedNormFloat,
  ) {}

  static fromFloat(color: FloatColor): LABColor {
    const [l, a, b] = rgbToLab([color.r.value, color.g.value, color.b.value]);
    return new LABColor(
      SignedNormFloat.clamped(l / 100),
      SNComplex.fromSignedFloats(
        SignedNormFloat.clamped(a / AB_SCALE),
        SignedNormFloat.clamped(b / AB_SCALE),
      ),
      color.a,
    );
  }

  static random(rng: RandomSource): LABColor {
    return new LABColor(SignedNormFloat.random(rng), SNComplex.random(rng), UnsignedNormFloat.random(rng));
  }

  static generate(rng: RandomSource, ctx?: GenContext): LABColor {
    emit(ctx, "generate", LABColor.KEY);
    return LABColor.random(rng);
  }

  toFloat(): FloatColor {
    const [r, g, b] = labToRgb([
      this.l.value * 100,
      this.ab.re.value * AB_SCALE,
      this.ab.im.value * AB_SCALE,
    ]);
    return FloatColor.clamped(r, g, b, this.alpha.value);
  }

  lerp(other: LABColor, t: UnsignedNormFloat): LABColor {
    return new LABColor(this.l.lerp(other.l, t), this.ab.lerp(other.ab, t), this.alpha.lerp(other.alpha, t));
  }

  mutate(rng: RandomSource, ctx?: GenContext): LABColor {
    emit(ctx, "mutate", LABColor.KEY);
    return coinFlipMutation(
      rng,
      () => LABColor.random(rng),
      () => {
        switch (intBelow(rng, 3)) {
          case 0:
            return new LABColor(this.l.mutate(rng, ctx), this.ab, this.alpha);
          case 1:
            return new LABColor(this.l, this.ab.mutate(rng, ctx), this.alpha);
          default:
            return new LABColor(this.l, this.ab, this.alpha.mutate(rng, ctx));
        }
      },
    );
  }

  update(ctx?: GenContext): LABColor {
    emit(ctx, "update", LABColor.KEY);
    return this;
  }

  toJSON(): { l: number; a: number; b: number; alpha: number } {
    return { l: this.l.value, a: this.ab.re.value, b: this.ab.im.value, alpha: this.alpha.value };
  }
}
