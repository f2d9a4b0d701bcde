import { intBelow, invariant, type RandomSource } from "@evoforge/contracts";
import { coinFlipMutation, emit, type GenContext } from "../core/context/generation";
import type { Buffer } from "../core/grid/buffer";
import { randomBitColor, type BitColor } from "../color/bit-color";

/** Largest period or offset produced by generation and mutation. */
export const MAX_RESEED_PERIOD = 16;

/**
 * Colors indexed by `[xHit][yHit]`, where a hit means the shifted
 * coordinate is a multiple of the period.
 */
export type ReseedColorTable = readonly [
  xMissYMiss: BitColor,
  xMissYHit: BitColor,
  xHitYMiss: BitColor,
  xHitYHit: BitColor,
];

export interface ModulusReseederParams {
  readonly xMod: number;
  readonly yMod: number;
  readonly xOffset: number;
  readonly yOffset: number;
  readonly colorTable: ReseedColorTable;
}

type ReseederField = "xMod" | "yMod" | "xOffset" | "yOffset";
const RESEEDER_FIELDS: readonly ReseederField[] = ["xMod", "yMod", "xOffset", "yOffset"];

const randomPeriod = (rng: RandomSource): number => intBelow(rng, MAX_RESEED_PERIOD) + 1;

function randomColorTable(rng: RandomSource): ReseedColorTable {
  return [randomBitColor(rng), randomBitColor(rng), randomBitColor(rng), randomBitColor(rng)];
}

function mapColorTable(
  table: ReseedColorTable,
  fn: (color: BitColor, index: number) => BitColor,
): ReseedColorTable {
  return [fn(table[0], 0), fn(table[1], 1), fn(table[2], 2), fn(table[3], 3)];
}

/**
 * Periodic reseeding pattern for an automaton's cell raster.
 */
export class ModulusReseeder implements ModulusReseederParams {
  static readonly KEY = "ModulusReseeder";

  readonly xMod: number;
  readonly yMod: number;
  readonly xOffset: number;
  readonly yOffset: number;
  readonly colorTable: ReseedColorTable;

  constructor(params: ModulusReseederParams) {
    const { xMod, yMod, xOffset, yOffset } = params;
    invariant(
      [xMod, yMod].every((m) => Number.isInteger(m) && m >= 1),
      `Reseeder periods must be positive integers, got (${xMod}, ${yMod})`,
    );
    invariant(
      [xOffset, yOffset].every((o) => Number.isInteger(o) && o >= 0),
      `Reseeder offsets must be non-negative integers, got (${xOffset}, ${yOffset})`,
    );

    this.xMod = xMod;
    this.yMod = yMod;
    this.xOffset = xOffset;
    this.yOffset = yOffset;
    this.colorTable = params.colorTable;
  }

  static generate(rng: RandomSource, ctx?: GenContext): ModulusReseeder {
    emit(ctx, "generate", ModulusReseeder.KEY);
    return new ModulusReseeder({
      xMod: randomPeriod(rng),
      yMod: randomPeriod(rng),
      xOffset: randomPeriod(rng),
      yOffset: randomPeriod(rng),
      colorTable: randomColorTable(rng),
    });
  }

  reseedCell(x: number, y: number): BitColor {
    const xHit = (x + this.xOffset) % this.xMod === 0 ? 1 : 0;
    const yHit = (y + this.yOffset) % this.yMod === 0 ? 1 : 0;
    return this.colorTable[xHit * 2 + yHit] ?? this.colorTable[0];
  }

  /**
   * Overwrite every cell of the buffer with the pattern.
   */
  reseed(buffer: Buffer<BitColor>): void {
    buffer.forEach((_, x, y) => buffer.set(x, y, this.reseedCell(x, y)));
  }

  /**
   * Coin flip between a fresh pattern and changing one period, offset or
   * table entry.
   */
  mutate(rng: RandomSource, ctx?: GenContext): ModulusReseeder {
    emit(ctx, "mutate", ModulusReseeder.KEY);
    return coinFlipMutation(
      rng,
      () => ModulusReseeder.generate(rng, ctx),
      () => {
        const slot = intBelow(rng, RESEEDER_FIELDS.length + 1);
        const field = RESEEDER_FIELDS[slot];
        if (field !== undefined) {
          return new ModulusReseeder({ ...this.toJSON(), [field]: randomPeriod(rng) });
        }
        const entry = intBelow(rng, 4);
        return new ModulusReseeder({
          ...this.toJSON(),
          colorTable: mapColorTable(this.colorTable, (color, i) => (i === entry ? randomBitColor(rng) : color)),
        });
      },
    );
  }

  update(ctx?: GenContext): ModulusReseeder {
    emit(ctx, "update", ModulusReseeder.KEY);
    return this;
  }

  toJSON(): ModulusReseederParams {
    return {
      xMod: this.xMod,
      yMod: this.yMod,
      xOffset: this.xOffset,
      yOffset: this.yOffset,
      colorTable: this.colorTable,
    };
  }
}
