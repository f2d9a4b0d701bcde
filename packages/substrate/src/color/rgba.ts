/**
 * RGBA colors at three precisions: nibble, byte and float.
 *
 * Conversions truncate toward zero, so `Float -> Byte -> Float` is within
 * 1/255 per channel and `Float -> Nibble` lands in 0..15.
 */

import { intBelow, type RandomSource } from "@evoforge/contracts";
import { coinFlipMutation, emit, type GenContext } from "../core/context/generation";
import { UnsignedNormFloat } from "../core/numeric/continuous";
import { Byte, Nibble } from "../core/numeric/discrete";
import { rgbToHsv } from "./color-space";
import {
  bitColorFromComponents,
  bitColorToComponents,
  type BitColor,
} from "./bit-color";

type Channel = "r" | "g" | "b" | "a";
const CHANNELS: readonly [Channel, ...Channel[]] = ["r", "g", "b", "a"];

function randomChannel(rng: RandomSource): Channel {
  return CHANNELS[intBelow(rng, CHANNELS.length)] ?? "r";
}

// =============================================================================
// NIBBLE COLOR
// =============================================================================

export class NibbleColor {
  static readonly KEY = "NibbleColor";

  constructor(
    readonly r: Nibble,
    readonly g: Nibble,
    readonly b: Nibble,
    readonly a: Nibble,
  ) {}

  static fromFloat(color: FloatColor): NibbleColor {
    const quantize = (v: UnsignedNormFloat): Nibble => Nibble.of(Math.min(15, Math.trunc(v.value * 16)));
    return new NibbleColor(quantize(color.r), quantize(color.g), quantize(color.b), quantize(color.a));
  }

  static random(rng: RandomSource): NibbleColor {
    return new NibbleColor(Nibble.random(rng), Nibble.random(rng), Nibble.random(rng), Nibble.random(rng));
  }

  static generate(rng: RandomSource, ctx?: GenContext): NibbleColor {
    emit(ctx, "generate", NibbleColor.KEY);
    return new NibbleColor(
      Nibble.generate(rng, ctx),
      Nibble.generate(rng, ctx),
      Nibble.generate(rng, ctx),
      Nibble.generate(rng, ctx),
    );
  }

  with(channel: Channel, value: Nibble): NibbleColor {
    const { r, g, b, a }: Record<Channel, Nibble> = { r: this.r, g: this.g, b: this.b, a: this.a, [channel]: value };
    return new NibbleColor(r, g, b, a);
  }

  mutate(rng: RandomSource, ctx?: GenContext): NibbleColor {
    emit(ctx, "mutate", NibbleColor.KEY);
    return coinFlipMutation(
      rng,
      () => NibbleColor.generate(rng, ctx),
      () => {
        const channel = randomChannel(rng);
        return this.with(channel, this[channel].mutate(rng, ctx));
      },
    );
  }

  update(ctx?: GenContext): NibbleColor {
    emit(ctx, "update", NibbleColor.KEY);
    return this;
  }

  equals(other: NibbleColor): boolean {
    return this.r.equals(other.r) && this.g.equals(other.g) && this.b.equals(other.b) && this.a.equals(other.a);
  }

  toJSON(): { r: number; g: number; b: number; a: number } {
    return { r: this.r.value, g: this.g.value, b: this.b.value, a: this.a.value };
  }
}

// =============================================================================
// BYTE COLOR
// =============================================================================

export class ByteColor {
  static readonly KEY = "ByteColor";

  constructor(
    readonly r: Byte,
    readonly g: Byte,
    readonly b: Byte,
    readonly a: Byte,
  ) {}

  static of(r: number, g: number, b: number, a: number = 255): ByteColor {
    return new ByteColor(Byte.of(r), Byte.of(g), Byte.of(b), Byte.of(a));
  }

  static fromFloat(color: FloatColor): ByteColor {
    const quantize = (v: UnsignedNormFloat): Byte => Byte.of(Math.trunc(v.value * 255));
    return new ByteColor(quantize(color.r), quantize(color.g), quantize(color.b), quantize(color.a));
  }

  /**
   * Fully saturated, opaque rendition of a bit color.
   */
  static fromBitColor(color: BitColor): ByteColor {
    const [r, g, b] = bitColorToComponents(color);
    return ByteColor.of(r ? 255 : 0, g ? 255 : 0, b ? 255 : 0, 255);
  }

  static random(rng: RandomSource): ByteColor {
    return new ByteColor(Byte.random(rng), Byte.random(rng), Byte.random(rng), Byte.random(rng));
  }

  static generate(rng: RandomSource, ctx?: GenContext): ByteColor {
    emit(ctx, "generate", ByteColor.KEY);
    return new ByteColor(
      Byte.generate(rng, ctx),
      Byte.generate(rng, ctx),
      Byte.generate(rng, ctx),
      Byte.generate(rng, ctx),
    );
  }

  /**
   * Step each color channel up where the bit color has it and down where it
   * does not, wrapping. Alpha is unchanged.
   */
  addBitColor(color: BitColor): ByteColor {
    const [r, g, b] = bitColorToComponents(color);
    return new ByteColor(
      this.r.circularAddInt(r ? 1 : -1),
      this.g.circularAddInt(g ? 1 : -1),
      this.b.circularAddInt(b ? 1 : -1),
      this.a,
    );
  }

  /**
   * Threshold each channel above 127.
   */
  toBitColor(): BitColor {
    return bitColorFromComponents([this.r.value > 127, this.g.value > 127, this.b.value > 127]);
  }

  with(channel: Channel, value: Byte): ByteColor {
    const { r, g, b, a }: Record<Channel, Byte> = { r: this.r, g: this.g, b: this.b, a: this.a, [channel]: value };
    return new ByteColor(r, g, b, a);
  }

  mutate(rng: RandomSource, ctx?: GenContext): ByteColor {
    emit(ctx, "mutate", ByteColor.KEY);
    return coinFlipMutation(
      rng,
      () => ByteColor.generate(rng, ctx),
      () => {
        const channel = randomChannel(rng);
        return this.with(channel, this[channel].mutate(rng, ctx));
      },
    );
  }

  update(ctx?: GenContext): ByteColor {
    emit(ctx, "update", ByteColor.KEY);
    return this;
  }

  equals(other: ByteColor): boolean {
    return this.r.equals(other.r) && this.g.equals(other.g) && this.b.equals(other.b) && this.a.equals(other.a);
  }

  toJSON(): { r: number; g: number; b: number; a: number } {
    return { r: this.r.value, g: this.g.value, b: this.b.value, a: this.a.value };
  }
}

// =============================================================================
// FLOAT COLOR
// =============================================================================

export class FloatColor {
  static readonly KEY = "FloatColor";
  static readonly ALL_ZERO = new FloatColor(
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
  );
  static readonly WHITE = new FloatColor(
    UnsignedNormFloat.ONE,
    UnsignedNormFloat.ONE,
    UnsignedNormFloat.ONE,
    UnsignedNormFloat.ONE,
  );
  static readonly BLACK = new FloatColor(
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ZERO,
    UnsignedNormFloat.ONE,
  );

  constructor(
    readonly r: UnsignedNormFloat,
    readonly g: UnsignedNormFloat,
    readonly b: UnsignedNormFloat,
    readonly a: UnsignedNormFloat,
  ) {}

  static of(r: number, g: number, b: number, a: number = 1): FloatColor {
    return new FloatColor(
      UnsignedNormFloat.of(r),
      UnsignedNormFloat.of(g),
      UnsignedNormFloat.of(b),
      UnsignedNormFloat.of(a),
    );
  }

  /**
   * Clamp raw channels into [0, 1].
   */
  static clamped(r: number, g: number, b: number, a: number): FloatColor {
    return new FloatColor(
      UnsignedNormFloat.clamped(r),
      UnsignedNormFloat.clamped(g),
      UnsignedNormFloat.clamped(b),
      UnsignedNormFloat.clamped(a),
    );
  }

  static fromByte(color: ByteColor): FloatColor {
    return FloatColor.of(color.r.value / 255, color.g.value / 255, color.b.value / 255, color.a.value / 255);
  }

  static fromBitColor(color: BitColor): FloatColor {
    const [r, g, b] = bitColorToComponents(color);
    return FloatColor.of(r ? 1 : 0, g ? 1 : 0, b ? 1 : 0, 1);
  }

  static random(rng: RandomSource): FloatColor {
    return new FloatColor(
      UnsignedNormFloat.random(rng),
      UnsignedNormFloat.random(rng),
      UnsignedNormFloat.random(rng),
      UnsignedNormFloat.random(rng),
    );
  }

  static generate(rng: RandomSource, ctx?: GenContext): FloatColor {
    emit(ctx, "generate", FloatColor.KEY);
    return FloatColor.random(rng);
  }

  /**
   * Mean of the color channels, ignoring alpha.
   */
  average(): number {
    return (this.r.value + this.g.value + this.b.value) / 3;
  }

  hue(): UnsignedNormFloat {
    return UnsignedNormFloat.clamped(rgbToHsv([this.r.value, this.g.value, this.b.value])[0]);
  }

  saturation(): UnsignedNormFloat {
    return UnsignedNormFloat.clamped(rgbToHsv([this.r.value, this.g.value, this.b.value])[1]);
  }

  value(): UnsignedNormFloat {
    return UnsignedNormFloat.clamped(rgbToHsv([this.r.value, this.g.value, this.b.value])[2]);
  }

  lerp(other: FloatColor, t: UnsignedNormFloat): FloatColor {
    return new FloatColor(
      this.r.lerp(other.r, t),
      this.g.lerp(other.g, t),
      this.b.lerp(other.b, t),
      this.a.lerp(other.a, t),
    );
  }

  /**
   * Threshold each channel at 0.5.
   */
  toBitColor(): BitColor {
    return bitColorFromComponents([this.r.value >= 0.5, this.g.value >= 0.5, this.b.value >= 0.5]);
  }

  toByte(): ByteColor {
    return ByteColor.fromFloat(this);
  }

  toNibble(): NibbleColor {
    return NibbleColor.fromFloat(this);
  }

  mutate(rng: RandomSource, ctx?: GenContext): FloatColor {
    emit(ctx, "mutate", FloatColor.KEY);
    return FloatColor.random(rng);
  }

  update(ctx?: GenContext): FloatColor {
    emit(ctx, "update", FloatColor.KEY);
    return this;
  }

  equals(other: FloatColor): boolean {
    return this.r.equals(other.r) && this.g.equals(other.g) && this.b.equals(other.b) && this.a.equals(other.a);
  }

  toJSON(): { r: number; g: number; b: number; a: number } {
    return { r: this.r.value, g: this.g.value, b: this.b.value, a: this.a.value };
  }
}
