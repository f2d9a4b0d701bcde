/**
 * Result and error type tests
 */

import { describe, expect, it } from "vitest";
import {
  invariant,
  InvariantViolationError,
  Result,
  SubstrateError,
} from "../src";

describe("Result", () => {
  it("maps over successful values", () => {
    const result = Result.ok<number, string>(2).map((n) => n * 3);
    expect(result.isOk()).toBe(true);
    expect(result.value).toBe(6);
  });

  it("short-circuits on errors", () => {
    let called = false;
    const result = Result.err<number, string>("bad").map((n) => {
      called = true;
      return n + 1;
    });
    expect(called).toBe(false);
    expect(result.error).toBe("bad");
    expect(result.getOrElse(10)).toBe(10);
  });

  it("chains fallible steps with flatMap", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? Result.ok(n / 2) : Result.err(`odd: ${n}`);

    expect(half(8).flatMap(half).value).toBe(2);
    expect(half(6).flatMap(half).error).toBe("odd: 3");
  });

  it("captures thrown errors", () => {
    const result = Result.fromThrowable(
      () => {
        throw new Error("boom");
      },
      (e) => (e instanceof Error ? e.message : "unknown"),
    );
    expect(result.error).toBe("boom");
  });

  it("serializes both variants", () => {
    expect(Result.ok(1).toJSON()).toEqual({ success: true, value: 1 });
    expect(Result.err("x").toJSON()).toEqual({ success: false, error: "x" });
  });

  it("rethrows the stored error from getOrThrow", () => {
    const error = SubstrateError.decodeFailed("bad input");
    const result = Result.err<number, SubstrateError>(error);
    expect(result.isErr()).toBe(true);
    expect(() => result.getOrThrow()).toThrow(error);
    expect(Result.ok(4).getOrThrow()).toBe(4);
  });

  it("throws when reading the wrong side", () => {
    expect(() => Result.ok(1).error).toThrow("Cannot access error of Ok Result");
    expect(() => Result.err("x").value).toThrow("Cannot access value of Err Result");
  });
});

describe("SubstrateError", () => {
  it("carries code and details", () => {
    const error = SubstrateError.decodeFailed("bad point", { input: "(2, 0)" });
    expect(error.code).toBe("DECODE_FAILED");
    expect(error.name).toBe("SubstrateError");
    expect(error.toJSON()).toEqual({
      name: "SubstrateError",
      code: "DECODE_FAILED",
      message: "bad point",
      details: { input: "(2, 0)" },
    });
  });

  it("omits missing details from JSON", () => {
    expect(SubstrateError.configInvalid("nope").toJSON()).toEqual({
      name: "SubstrateError",
      code: "CONFIG_INVALID",
      message: "nope",
    });
  });

  it("recognizes its instances", () => {
    expect(SubstrateError.isSubstrateError(new Error("x"))).toBe(false);
    expect(SubstrateError.isSubstrateError(new InvariantViolationError("x"))).toBe(true);
  });
});

describe("invariant", () => {
  it("passes when the condition holds", () => {
    expect(() => invariant(true, "never")).not.toThrow();
  });

  it("throws InvariantViolationError otherwise", () => {
    try {
      invariant(false, "value out of range", { value: 2 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvariantViolationError);
      if (e instanceof InvariantViolationError) {
        expect(e.code).toBe("INVARIANT_VIOLATION");
        expect(e.name).toBe("InvariantViolationError");
        expect(e.details).toEqual({ value: 2 });
      }
    }
  });
});
