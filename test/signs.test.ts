/**
 * Unit tests for sign-run normalization
 */

import { describe, expect, test } from "vitest";
import { normalizeSigns, tokenize, tokenText } from "../src/lib/math/index.ts";

function normalized(expression: string): string {
  const tokens = tokenize(expression);
  if (!tokens.ok) throw tokens.error;
  const result = normalizeSigns(tokens.value);
  if (!result.ok) throw result.error;
  return result.value.map(tokenText).join(" ");
}

describe("normalizeSigns", () => {
  test("collapses a leading run by minus parity", () => {
    expect(normalized("--+- 1 -- 1")).toBe("-u 1 + 1");
    expect(normalized("-+--1")).toBe("-u 1");
  });

  test("drops a unary plus", () => {
    expect(normalized("+1")).toBe("1");
    expect(normalized("++1")).toBe("1");
    expect(normalized("+--1")).toBe("1");
  });

  test("sign after an operator is unary", () => {
    expect(normalized("1*-2")).toBe("1 * -u 2");
    expect(normalized("2^-3")).toBe("2 ^ -u 3");
    expect(normalized("1 == -1")).toBe("1 == -u 1");
  });

  test("sign after '(' or ',' is unary", () => {
    expect(normalized("(-1)")).toBe("( -u 1 )");
    expect(normalized("hypot(-1, +2)")).toBe("hypot ( -u 1 , 2 )");
  });

  test("sign between operands stays binary", () => {
    expect(normalized("1-2")).toBe("1 - 2");
    expect(normalized("1+-+2")).toBe("1 - 2");
    expect(normalized("(1)--2")).toBe("( 1 ) + 2");
  });

  test("unary marker takes the position of the run's first sign", () => {
    const tokens = tokenize("2 * --3");
    if (!tokens.ok) throw tokens.error;
    const result = normalizeSigns(tokens.value);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual([
        { type: "number", value: 2, text: "2", position: 0 },
        { type: "operator", symbol: "*", position: 2 },
        { type: "number", value: 3, text: "3", position: 6 },
      ]);
    }
  });

  test("a trailing sign fails", () => {
    const tokens = tokenize("123-");
    if (!tokens.ok) throw tokens.error;
    const result = normalizeSigns(tokens.value);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("UnknownTokenError");
      expect(result.error.message).toBe("Dangling sign ('-') at end of expression");
      expect(result.error.position).toBe(3);
    }
  });

  test("an expression made only of signs fails", () => {
    const tokens = tokenize("-++--");
    if (!tokens.ok) throw tokens.error;
    const result = normalizeSigns(tokens.value);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Dangling run of 5 signs ('-') at end of expression");
      expect(result.error.position).toBe(0);
    }
  });

  test("does not modify its input", () => {
    const tokens = tokenize("--1");
    if (!tokens.ok) throw tokens.error;
    const before = tokens.value.map(tokenText);
    normalizeSigns(tokens.value);
    expect(tokens.value.map(tokenText)).toEqual(before);
  });
});
