/**
 * Unit tests for the operator table and operator semantics
 */

import { describe, expect, test } from "vitest";
import {
  BINARY_OPERATIONS,
  OperatorDomainError,
  floorDiv,
  floorMod,
  getOperatorPrecedence,
  isArithmeticOperator,
  isBinaryOperator,
  isComparisonOperator,
  isRightAssociative,
  power,
} from "../src/lib/math/index.ts";

describe("operator table", () => {
  test("precedence tiers", () => {
    expect(getOperatorPrecedence("==")).toBe(0);
    expect(getOperatorPrecedence(">=")).toBe(0);
    expect(getOperatorPrecedence("+")).toBe(1);
    expect(getOperatorPrecedence("-")).toBe(1);
    expect(getOperatorPrecedence("*")).toBe(2);
    expect(getOperatorPrecedence("//")).toBe(2);
    expect(getOperatorPrecedence("%")).toBe(2);
    expect(getOperatorPrecedence("^")).toBe(3);
    expect(getOperatorPrecedence("-u")).toBe(4);
  });

  test("only exponentiation is right-associative", () => {
    expect(isRightAssociative("^")).toBe(true);
    expect(isRightAssociative("-")).toBe(false);
    expect(isRightAssociative("/")).toBe(false);
  });

  test("classifies symbols", () => {
    expect(isArithmeticOperator("//")).toBe(true);
    expect(isArithmeticOperator("==")).toBe(false);
    expect(isComparisonOperator("!=")).toBe(true);
    expect(isComparisonOperator("=")).toBe(false);
    expect(isBinaryOperator("**")).toBe(false);
    expect(isBinaryOperator("<=")).toBe(true);
  });
});

describe("floorMod", () => {
  test("takes the sign of the divisor", () => {
    expect(floorMod(5, 4)).toBe(1);
    expect(floorMod(-7, 2)).toBe(1);
    expect(floorMod(7, -2)).toBe(-1);
    expect(floorMod(5.5, 2)).toBe(1.5);
  });

  test("throws on a zero divisor", () => {
    expect(() => floorMod(1, 0)).toThrow(OperatorDomainError);
  });
});

describe("floorDiv", () => {
  test("rounds toward negative infinity", () => {
    expect(floorDiv(5, 4)).toBe(1);
    expect(floorDiv(-7, 2)).toBe(-4);
    expect(floorDiv(7, -2)).toBe(-4);
    expect(floorDiv(7.5, 2)).toBe(3);
    expect(floorDiv(1, 3)).toBe(0);
  });

  test("a zero quotient takes the sign of the true quotient", () => {
    expect(floorDiv(-0, 1)).toBe(-0);
    expect(floorDiv(0, -1)).toBe(-0);
    expect(floorDiv(-1, -3)).toBe(0);
  });

  test("agrees with floorMod", () => {
    for (const [a, b] of [[17, 5], [-17, 5], [17, -5], [-17, -5]] as const) {
      expect(floorDiv(a, b) * b + floorMod(a, b)).toBe(a);
    }
  });

  test("throws on a zero divisor", () => {
    expect(() => floorDiv(1, 0)).toThrow("division by zero");
  });
});

describe("power", () => {
  test("negative exponents give fractions", () => {
    expect(power(2, -3)).toBe(0.125);
  });

  test("zero to a negative power fails", () => {
    expect(() => power(0, -1)).toThrow("0.0 cannot be raised to a negative power");
  });

  test("negative base with fractional exponent is a domain error", () => {
    expect(() => power(-8, 1 / 3)).toThrow("math domain error");
  });

  test("overflow is a range error", () => {
    expect(() => power(10, 400)).toThrow("math range error");
  });

  test("infinite operands pass through", () => {
    expect(power(Number.POSITIVE_INFINITY, 2)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("BINARY_OPERATIONS", () => {
  test("comparisons", () => {
    expect(BINARY_OPERATIONS["=="](1, 1)).toBe(true);
    expect(BINARY_OPERATIONS["!="](1, 1)).toBe(false);
    expect(BINARY_OPERATIONS["<="](2, 2)).toBe(true);
    expect(BINARY_OPERATIONS[">"](2, 3)).toBe(false);
  });

  test("true division", () => {
    expect(BINARY_OPERATIONS["/"](4, 5)).toBe(0.8);
  });
});
