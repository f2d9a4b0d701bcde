/**
 * Generation Context
 *
 * The value threaded through every generate/mutate/update call. The
 * substrate does not know what listens on the event hook; it only reports
 * a well-known key per type.
 *
 * @example
 * ```typescript
 * const counts = new Map<string, number>();
 * const ctx: GenContext = {
 *   onEvent: (e) => counts.set(e.key, (counts.get(e.key) ?? 0) + 1),
 * };
 * PointSet.generate(rng, ctx);
 * ```
 */

import { coinFlip, type RandomSource } from "@evoforge/contracts";
import { DEFAULT_SUBSTRATE_CONFIG, type ValidatedSubstrateConfig } from "../config";

// =============================================================================
// EVENTS
// =============================================================================

export type SubstrateEventKind = "generate" | "mutate" | "update";

export interface SubstrateEvent {
  readonly kind: SubstrateEventKind;
  readonly key: string;
}

export type SubstrateEventHandler = (event: SubstrateEvent) => void;

// =============================================================================
// CONTEXT
// =============================================================================

export interface GenContext {
  readonly onEvent?: SubstrateEventHandler;
  readonly config?: ValidatedSubstrateConfig;
}

/**
 * Report an event to the context's hook, if any.
 */
export function emit(
  ctx: GenContext | undefined,
  kind: SubstrateEventKind,
  key: string,
): void {
  ctx?.onEvent?.({ kind, key });
}

/**
 * Configuration carried by the context, or the defaults.
 */
export function resolveConfig(ctx: GenContext | undefined): ValidatedSubstrateConfig {
  return ctx?.config ?? DEFAULT_SUBSTRATE_CONFIG;
}

/**
 * Debug log gated on the context's `trace` flag.
 */
export function trace(
  ctx: GenContext | undefined,
  tag: string,
  message: string,
): void {
  if (resolveConfig(ctx).trace) {
    console.debug(`[${tag}] ${message}`);
  }
}

// =============================================================================
// CAPABILITIES
// =============================================================================

/**
 * Static side of a type that can be built from randomness.
 */
export interface Generatable<T> {
  generate(rng: RandomSource, ctx?: GenContext): T;
}

/**
 * A value that yields a perturbed copy of itself.
 */
export interface Mutatable<T> {
  mutate(rng: RandomSource, ctx?: GenContext): T;
}

/**
 * A value that advances with the collaborator's update tick.
 */
export interface Updatable<T> {
  update(ctx?: GenContext): T;
}

/**
 * Generation and mutation for a closed set of string tags, which carry no
 * methods of their own.
 */
export interface VariantFamily<T> {
  readonly KEY: string;
  generate(rng: RandomSource, ctx?: GenContext): T;
  mutate(current: T, rng: RandomSource, ctx?: GenContext): T;
}

/**
 * The mutation policy shared by composite types: half the time rebuild the
 * whole structure, otherwise tweak a single leaf.
 */
export function coinFlipMutation<T>(
  rng: RandomSource,
  resample: () => T,
  tweak: () => T,
): T {
  return coinFlip(rng) ? resample() : tweak();
}
