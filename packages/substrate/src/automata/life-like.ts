/**
 * Life-like Automata
 *
 * Each of the eight bit colors has its own birth/survival rule over its own
 * neighbourhood. Colors are tried in a shuffled order and the first whose
 * rule fires claims the cell.
 */

import { intBelow, invariant, shuffle, type RandomSource } from "@evoforge/contracts";
import { coinFlipMutation, emit, type GenContext } from "../core/context/generation";
import { BooleanValue } from "../core/numeric/discrete";
import { BIT_COLORS, BitColor } from "../color/bit-color";
import {
  neighbourhoodOffsets,
  neighbourhoodSize,
  PixelNeighbourhoods,
  type NeighbourSampler,
  type PixelNeighbourhood,
} from "./neighbourhood";

// =============================================================================
// LIFE-LIKE TABLE
// =============================================================================

export class LifeLikeTable {
  static readonly KEY = "LifeLikeTable";

  constructor(
    readonly birth: BooleanValue,
    readonly survival: BooleanValue,
  ) {}

  static of(birth: boolean, survival: boolean): LifeLikeTable {
    return new LifeLikeTable(BooleanValue.of(birth), BooleanValue.of(survival));
  }

  static generate(rng: RandomSource, ctx?: GenContext): LifeLikeTable {
    emit(ctx, "generate", LifeLikeTable.KEY);
    return new LifeLikeTable(BooleanValue.generate(rng, ctx), BooleanValue.generate(rng, ctx));
  }

  mutate(rng: RandomSource, ctx?: GenContext): LifeLikeTable {
    emit(ctx, "mutate", LifeLikeTable.KEY);
    return coinFlipMutation(
      rng,
      () => LifeLikeTable.generate(rng, ctx),
      () =>
        intBelow(rng, 2) === 0
          ? new LifeLikeTable(this.birth.mutate(rng, ctx), this.survival)
          : new LifeLikeTable(this.birth, this.survival.mutate(rng, ctx)),
    );
  }

  update(ctx?: GenContext): LifeLikeTable {
    emit(ctx, "update", LifeLikeTable.KEY);
    return this;
  }

  toJSON(): { birth: boolean; survival: boolean } {
    return { birth: this.birth.value, survival: this.survival.value };
  }
}

// =============================================================================
// PER-COLOR RULE
// =============================================================================

/**
 * A neighbourhood plus one table per possible neighbour count (0..n).
 */
export class IndivAutomataRule {
  static readonly KEY = "IndivAutomataRule";

  private constructor(
    readonly neighbourhood: PixelNeighbourhood,
    readonly rules: readonly LifeLikeTable[],
  ) {}

  static of(neighbourhood: PixelNeighbourhood, rules: readonly LifeLikeTable[]): IndivAutomataRule {
    const expected = neighbourhoodSize(neighbourhood) + 1;
    invariant(
      rules.length === expected,
      `Rule over ${neighbourhood} needs ${expected} tables, got ${rules.length}`,
    );
    return new IndivAutomataRule(neighbourhood, [...rules]);
  }

  static generate(rng: RandomSource, ctx?: GenContext): IndivAutomataRule {
    emit(ctx, "generate", IndivAutomataRule.KEY);
    const neighbourhood = PixelNeighbourhoods.generate(rng, ctx);
    return new IndivAutomataRule(
      neighbourhood,
      Array.from({ length: neighbourhoodSize(neighbourhood) + 1 }, () => LifeLikeTable.generate(rng, ctx)),
    );
  }

  tableFor(count: number): LifeLikeTable {
    const table = this.rules[count];
    invariant(table !== undefined, `No table for neighbour count ${count}`);
    return table;
  }

  /**
   * How many cells in this rule's neighbourhood hold `color`.
   */
  countMatching(color: BitColor, sample: NeighbourSampler): number {
    return neighbourhoodOffsets(this.neighbourhood).filter((offset) => sample(offset) === color).length;
  }

  mutate(rng: RandomSource, ctx?: GenContext): IndivAutomataRule {
    emit(ctx, "mutate", IndivAutomataRule.KEY);
    return coinFlipMutation(
      rng,
      () => IndivAutomataRule.generate(rng, ctx),
      () => {
        const index = intBelow(rng, this.rules.length);
        return new IndivAutomataRule(
          this.neighbourhood,
          this.rules.map((table, i) => (i === index ? table.mutate(rng, ctx) : table)),
        );
      },
    );
  }

  update(ctx?: GenContext): IndivAutomataRule {
    emit(ctx, "update", IndivAutomataRule.KEY);
    return this;
  }

  toJSON(): { neighbourhood: PixelNeighbourhood; rules: { birth: boolean; survival: boolean }[] } {
    return { neighbourhood: this.neighbourhood, rules: this.rules.map((rule) => rule.toJSON()) };
  }
}

// =============================================================================
// LIFE-LIKE RULE
// =============================================================================

export class LifeLikeAutomataRule {
  static readonly KEY = "LifeLikeAutomataRule";

  private constructor(
    readonly colorOrder: readonly BitColor[],
    /** Indexed by bit color. */
    readonly colorRules: readonly IndivAutomataRule[],
  ) {}

  static of(colorOrder: readonly BitColor[], colorRules: readonly IndivAutomataRule[]): LifeLikeAutomataRule {
    invariant(
      colorOrder.length === BIT_COLORS.length && BIT_COLORS.every((color) => colorOrder.includes(color)),
      "Color order must be a permutation of the eight bit colors",
      { colorOrder: [...colorOrder] },
    );
    invariant(
      colorRules.length === BIT_COLORS.length,
      `Need one rule per bit color, got ${colorRules.length}`,
    );
    return new LifeLikeAutomataRule([...colorOrder], [...colorRules]);
  }

  static generate(rng: RandomSource, ctx?: GenContext): LifeLikeAutomataRule {
    emit(ctx, "generate", LifeLikeAutomataRule.KEY);
    return new LifeLikeAutomataRule(
      shuffle(rng, BIT_COLORS),
      BIT_COLORS.map(() => IndivAutomataRule.generate(rng, ctx)),
    );
  }

  ruleFor(color: BitColor): IndivAutomataRule {
    const rule = this.colorRules[color];
    invariant(rule !== undefined, `No rule for color ${color}`);
    return rule;
  }

  /**
   * Next color of a cell. For each color `c` in order, count neighbours equal
   * to `c`; a cell already `c` stays on the survival flag, any other cell
   * becomes `c` on the birth flag. Black when no color fires.
   */
  evaluate(current: BitColor, sample: NeighbourSampler): BitColor {
    for (const color of this.colorOrder) {
      const rule = this.ruleFor(color);
      const table = rule.tableFor(rule.countMatching(color, sample));
      const fires = current === color ? table.survival.value : table.birth.value;
      if (fires) {
        return color;
      }
    }
    return BitColor.Black;
  }

  mutate(rng: RandomSource, ctx?: GenContext): LifeLikeAutomataRule {
    emit(ctx, "mutate", LifeLikeAutomataRule.KEY);
    return coinFlipMutation(
      rng,
      () => LifeLikeAutomataRule.generate(rng, ctx),
      () => {
        const index = intBelow(rng, this.colorRules.length);
        return new LifeLikeAutomataRule(
          this.colorOrder,
          this.colorRules.map((rule, i) => (i === index ? rule.mutate(rng, ctx) : rule)),
        );
      },
    );
  }

  update(ctx?: GenContext): LifeLikeAutomataRule {
    emit(ctx, "update", LifeLikeAutomataRule.KEY);
    return this;
  }

  toJSON(): {
    colorOrder: BitColor[];
    colorRules: ReturnType<IndivAutomataRule["toJSON"]>[];
  } {
    return {
      colorOrder: [...this.colorOrder],
      colorRules: this.colorRules.map((rule) => rule.toJSON()),
    };
  }
}
