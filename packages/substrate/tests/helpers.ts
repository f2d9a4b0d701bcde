/**
 * Shared test fixtures
 */

import type { RandomSource } from "@evoforge/contracts";
import type { SubstrateEvent } from "../src";

/**
 * Source that replays a fixed sequence, wrapping around.
 */
export function sequence(values: readonly number[]): RandomSource {
  let i = 0;
  return {
    next() {
      const value = values[i % values.length] ?? 0;
      i++;
      return value;
    },
  };
}

/**
 * Context that records every event it sees.
 */
export function recordingContext(): { events: SubstrateEvent[]; ctx: { onEvent: (e: SubstrateEvent) => void } } {
  const events: SubstrateEvent[] = [];
  return { events, ctx: { onEvent: (e) => events.push(e) } };
}
