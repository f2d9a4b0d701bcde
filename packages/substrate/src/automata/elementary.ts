import { intBelow, invariant, type RandomSource } from "@evoforge/contracts";
import { coinFlipMutation, emit, type GenContext } from "../core/context/generation";
import { BooleanValue } from "../core/numeric/discrete";

export type ElementaryPattern = readonly [
  BooleanValue,
  BooleanValue,
  BooleanValue,
  BooleanValue,
  BooleanValue,
  BooleanValue,
  BooleanValue,
  BooleanValue,
];

function buildPattern(bit: (index: number) => BooleanValue): ElementaryPattern {
  return [bit(0), bit(1), bit(2), bit(3), bit(4), bit(5), bit(6), bit(7)];
}

/**
 * One-dimensional, two-state, radius-one automaton rule: an 8-entry truth
 * table over (left, centre, right).
 *
 * @example
 * ```typescript
 * const rule110 = ElementaryAutomataRule.fromWolframCode(110);
 * rule110.valueFromBooleans(true, true, false); // true
 * ```
 */
export class ElementaryAutomataRule {
  static readonly KEY = "ElementaryAutomataRule";

  constructor(readonly pattern: ElementaryPattern) {}

  static fromWolframCode(code: number): ElementaryAutomataRule {
    invariant(
      Number.isInteger(code) && code >= 0 && code <= 255,
      `Invalid Wolfram code: ${code}`,
      { code },
    );
    return new ElementaryAutomataRule(buildPattern((i) => BooleanValue.of((code & (1 << i)) !== 0)));
  }

  /**
   * Table index of a neighbourhood: right is bit 0, centre bit 1, left bit 2.
   */
  static indexFromBooleans(l: boolean, c: boolean, r: boolean): number {
    return (r ? 1 : 0) | (c ? 2 : 0) | (l ? 4 : 0);
  }

  static generate(rng: RandomSource, ctx?: GenContext): ElementaryAutomataRule {
    emit(ctx, "generate", ElementaryAutomataRule.KEY);
    return new ElementaryAutomataRule(buildPattern(() => BooleanValue.generate(rng, ctx)));
  }

  valueFromBooleans(l: boolean, c: boolean, r: boolean): boolean {
    return this.pattern[ElementaryAutomataRule.indexFromBooleans(l, c, r)]?.value ?? false;
  }

  toWolframCode(): number {
    return this.pattern.reduce((code, bit, i) => (bit.value ? code | (1 << i) : code), 0);
  }

  /**
   * Coin flip between a fresh table and flipping a single entry.
   */
  mutate(rng: RandomSource, ctx?: GenContext): ElementaryAutomataRule {
    emit(ctx, "mutate", ElementaryAutomataRule.KEY);
    return coinFlipMutation(
      rng,
      () => ElementaryAutomataRule.generate(rng, ctx),
      () => {
        const flipped = intBelow(rng, 8);
        return new ElementaryAutomataRule(
          buildPattern((i) => {
            const bit = this.pattern[i] ?? BooleanValue.FALSE;
            return i === flipped ? bit.not() : bit;
          }),
        );
      },
    );
  }

  update(ctx?: GenContext): ElementaryAutomataRule {
    emit(ctx, "update", ElementaryAutomataRule.KEY);
    return this;
  }

  toJSON(): { pattern: boolean[] } {
    return { pattern: this.pattern.map((bit) => bit.value) };
  }
}
