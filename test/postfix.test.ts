/**
 * Unit tests for the shunting-yard converter
 */

import { describe, expect, test } from "vitest";
import {
  type CalculationErrorKind,
  compile,
  createRegistry,
  formatRpn,
  normalizeSigns,
  toPostfix,
  tokenize,
} from "../src/lib/math/index.ts";

function rpnOf(expression: string): string {
  const result = compile(expression);
  if (!result.ok) throw result.error;
  return formatRpn(result.value);
}

function expectFailure(expression: string, kind: CalculationErrorKind, message: string): void {
  const result = compile(expression);
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.kind).toBe(kind);
    expect(result.error.message).toBe(message);
  }
}

describe("toPostfix", () => {
  describe("precedence and associativity", () => {
    test("multiplication binds tighter than addition", () => {
      expect(rpnOf("1 + 2 * 3")).toBe("1 2 3 * +");
    });

    test("equal precedence is left-associative", () => {
      expect(rpnOf("2 - 3 + 4")).toBe("2 3 - 4 +");
      expect(rpnOf("8 / 4 // 2 % 3")).toBe("8 4 / 2 // 3 %");
    });

    test("exponentiation is right-associative", () => {
      expect(rpnOf("2^3^4")).toBe("2 3 4 ^ ^");
    });

    test("unary minus binds tighter than exponentiation", () => {
      expect(rpnOf("-2^2")).toBe("2 -u 2 ^");
      expect(rpnOf("2^-3")).toBe("2 3 -u ^");
    });

    test("parentheses override precedence", () => {
      expect(rpnOf("(1 + 2) * 3")).toBe("1 2 + 3 *");
    });
  });

  describe("comparisons", () => {
    test("arithmetic is reduced before comparing", () => {
      expect(rpnOf("1 + 2 == 3 * 1")).toBe("1 2 + 3 1 * ==");
    });

    test("chained comparisons apply left to right", () => {
      expect(rpnOf("1 < 2 < 3")).toBe("1 2 < 3 <");
    });

    test("a comparison inside parentheses stops at the paren", () => {
      expect(rpnOf("2 * (1 < 2)")).toBe("2 1 2 < *");
    });
  });

  describe("constants and functions", () => {
    test("constants resolve to their values", () => {
      expect(rpnOf("pi")).toBe("3.141592653589793");
    });

    test("function calls carry their argument count", () => {
      expect(rpnOf("hypot(3, 4)")).toBe("3 4 hypot/2");
      expect(rpnOf("cos(hypot(1, 2))")).toBe("1 2 hypot/2 cos/1");
      expect(rpnOf("-abs(2 - 3)")).toBe("2 3 - abs/1 -u");
    });

    test("an empty call has no arguments", () => {
      expect(rpnOf("abs()")).toBe("abs/0");
      expect(rpnOf("gcd() + 1")).toBe("gcd/0 1 +");
    });

    test("commas in nested plain parentheses count toward the enclosing call", () => {
      expect(rpnOf("gcd(1, (2, 3))")).toBe("1 2 3 gcd/3");
    });

    test("nested calls keep separate counts", () => {
      expect(rpnOf("atan2(hypot(1, 2), 3)")).toBe("1 2 hypot/2 3 atan2/2");
    });

    test("uses the supplied registry", () => {
      const registry = createRegistry({
        constants: { answer: 42 },
        functions: { double: { arity: { kind: "fixed", count: 1 }, apply: ([x = 0]) => x * 2 } },
      });
      const tokens = tokenize("answer + double(1)");
      if (!tokens.ok) throw tokens.error;
      const normalized = normalizeSigns(tokens.value);
      if (!normalized.ok) throw normalized.error;
      const result = toPostfix(normalized.value, registry);
      expect(result.ok && formatRpn(result.value)).toBe("42 1 double/1 +");
    });
  });

  describe("errors", () => {
    test("unclosed parenthesis", () => {
      expectFailure("(123", "UnmatchedParenthesisError", "Unclosed '(' at position 0");
      expectFailure("1+(3*4", "UnmatchedParenthesisError", "Unclosed '(' at position 2");
    });

    test("unmatched closing parenthesis", () => {
      expectFailure("1 + 2)", "UnmatchedParenthesisError", "Unmatched ')' at position 5");
    });

    test("function without an opening parenthesis", () => {
      expectFailure("abs 3", "MissingFunctionParenError", "Function 'abs' must be followed by '(', found '3'");
      expectFailure("1 + abs", "MissingFunctionParenError", "Function 'abs' must be followed by '(', found end of expression");
    });

    test("unknown identifier", () => {
      expectFailure("qwerty", "UnknownTokenError", "Unknown token 'qwerty' at position 0");
      expectFailure("pi.123", "UnknownTokenError", "Unknown token 'pi.123' at position 0");
    });

    test("comma outside a function call", () => {
      expectFailure("1, 2", "UnknownTokenError", "Unexpected ',' outside a function call at position 1");
      expectFailure("(1, 2)", "UnknownTokenError", "Unexpected ',' outside a function call at position 2");
    });

    test("reports the offending position", () => {
      const result = compile("1 + foo");
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.position).toBe(4);
    });
  });
});
