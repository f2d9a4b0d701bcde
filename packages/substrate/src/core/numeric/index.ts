/**
 * Numeric module - bounded scalars and normalisers.
 */

export * from "./continuous";
export * from "./discrete";
export * from "./math";
export * from "./normalisers";
