import { intBelow, invariant, type RandomSource } from "@evoforge/contracts";
import { coinFlipMutation, emit, type GenContext } from "../core/context/generation";
import { BitColor, bitColorToComponents, randomBitColor } from "../color/bit-color";
import {
  neighbourhoodOffsets,
  neighbourhoodSize,
  PixelNeighbourhoods,
  type NeighbourSampler,
  type PixelNeighbourhood,
} from "./neighbourhood";

/**
 * Outcome color chosen by how many neighbours carry red, green and blue.
 *
 * The table is a cube of side `n + 1` for a neighbourhood of `n` offsets,
 * stored flat with red as the slowest axis.
 */
export class NeighbourCountAutomataRule {
  static readonly KEY = "NeighbourCountAutomataRule";

  private constructor(
    readonly neighbourhood: PixelNeighbourhood,
    private readonly table: readonly BitColor[],
  ) {}

  static of(neighbourhood: PixelNeighbourhood, table: readonly BitColor[]): NeighbourCountAutomataRule {
    const side = neighbourhoodSize(neighbourhood) + 1;
    invariant(
      table.length === side ** 3,
      `Truth table for ${neighbourhood} needs ${side ** 3} entries, got ${table.length}`,
    );
    return new NeighbourCountAutomataRule(neighbourhood, [...table]);
  }

  static generate(rng: RandomSource, ctx?: GenContext): NeighbourCountAutomataRule {
    emit(ctx, "generate", NeighbourCountAutomataRule.KEY);
    const neighbourhood = PixelNeighbourhoods.generate(rng, ctx);
    const side = neighbourhoodSize(neighbourhood) + 1;
    return new NeighbourCountAutomataRule(
      neighbourhood,
      Array.from({ length: side ** 3 }, () => randomBitColor(rng)),
    );
  }

  /** Side length of the truth-table cube. */
  get side(): number {
    return neighbourhoodSize(this.neighbourhood) + 1;
  }

  get entries(): readonly BitColor[] {
    return this.table;
  }

  lookup(r: number, g: number, b: number): BitColor {
    const side = this.side;
    invariant(
      [r, g, b].every((count) => Number.isInteger(count) && count >= 0 && count < side),
      `Channel counts (${r}, ${g}, ${b}) outside table of side ${side}`,
    );
    return this.table[(r * side + g) * side + b] ?? BitColor.Black;
  }

  /**
   * Count the neighbours carrying each channel and look the counts up.
   */
  evaluate(sample: NeighbourSampler): BitColor {
    let r = 0;
    let g = 0;
    let b = 0;
    for (const offset of neighbourhoodOffsets(this.neighbourhood)) {
      const [hasR, hasG, hasB] = bitColorToComponents(sample(offset));
      if (hasR) r++;
      if (hasG) g++;
      if (hasB) b++;
    }
    return this.lookup(r, g, b);
  }

  /**
   * Coin flip between a fresh rule and resampling one table entry.
   */
  mutate(rng: RandomSource, ctx?: GenContext): NeighbourCountAutomataRule {
    emit(ctx, "mutate", NeighbourCountAutomataRule.KEY);
    return coinFlipMutation(
      rng,
      () => NeighbourCountAutomataRule.generate(rng, ctx),
      () => {
        const table = [...this.table];
        table[intBelow(rng, table.length)] = randomBitColor(rng);
        return new NeighbourCountAutomataRule(this.neighbourhood, table);
      },
    );
  }

  update(ctx?: GenContext): NeighbourCountAutomataRule {
    emit(ctx, "update", NeighbourCountAutomataRule.KEY);
    return this;
  }

  toJSON(): { neighbourhood: PixelNeighbourhood; table: BitColor[] } {
    return { neighbourhood: this.neighbourhood, table: [...this.table] };
  }
}
