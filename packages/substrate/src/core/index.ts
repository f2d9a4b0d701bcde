/**
 * Core module - configuration, generation context and the bounded
 * numeric and geometric primitives.
 */

export * from "./config";
export * from "./context";
export * from "./geometry";
export * from "./grid";
export * from "./numeric";
