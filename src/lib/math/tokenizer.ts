/**
 * Expression Tokenizer
 * Splits an expression string into number, identifier, operator and punctuation tokens
 */

import { type Result, fail, ok } from "./errors.ts";
import { type BinaryOperator, DELIMITERS, UNARY_MINUS, isBinaryOperator } from "./operators.ts";

// =============================================================================
// TOKEN TYPES
// =============================================================================

export type Punctuation = "(" | ")" | ",";

/** Decimal literal */
export interface NumberToken {
  type: "number";
  value: number;
  text: string;
  position: number;
}

/** Name to resolve against the registry (constant or function) */
export interface IdentifierToken {
  type: "identifier";
  name: string;
  position: number;
}

export interface OperatorToken {
  type: "operator";
  symbol: BinaryOperator;
  position: number;
}

export interface PunctuationToken {
  type: "punctuation";
  symbol: Punctuation;
  position: number;
}

/** Unary minus marker, produced only by the sign normalizer */
export interface UnaryMinusToken {
  type: "unary";
  position: number;
}

export type Token = NumberToken | IdentifierToken | OperatorToken | PunctuationToken | UnaryMinusToken;

/** Unsigned decimal literal: 12, 1.5, .5, 5. with an optional unsigned exponent */
const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE]\d+)?$/;

// =============================================================================
// TOKENIZER
// =============================================================================

/**
 * Tokenize an expression
 *
 * Runs of characters between delimiters become numbers when they form a
 * decimal literal and identifiers otherwise; unknown identifiers are
 * rejected later, when they are resolved against the registry.
 *
 * @example
 * tokenize("123.123 + .1")
 * // [
 * //   { type: "number", value: 123.123, text: "123.123", position: 0 },
 * //   { type: "operator", symbol: "+", position: 8 },
 * //   { type: "number", value: 0.1, text: ".1", position: 10 },
 * // ]
 */
export function tokenize(expression: string): Result<Token[]> {
  if (expression.trim() === "") {
    return fail("EmptyExpressionError", "Empty expression");
  }

  const tokens: Token[] = [];
  let runStart = -1;
  let i = 0;

  const flushRun = (end: number): void => {
    if (runStart < 0) return;
    tokens.push(classifyRun(expression.slice(runStart, end), runStart));
    runStart = -1;
  };

  while (i < expression.length) {
    const char = expression.charAt(i);

    if (/\s/.test(char)) {
      flushRun(i);
      i++;
      continue;
    }

    const delimiter = matchDelimiter(expression, i);
    if (delimiter === null) {
      if (runStart < 0) runStart = i;
      i++;
      continue;
    }

    flushRun(i);
    tokens.push(delimiterToken(delimiter, i));
    i += delimiter.length;
  }
  flushRun(expression.length);

  return ok(tokens);
}

/** Longest delimiter starting at index, or null */
function matchDelimiter(expression: string, index: number): string | null {
  for (const delimiter of DELIMITERS) {
    if (expression.startsWith(delimiter, index)) return delimiter;
  }
  return null;
}

function delimiterToken(symbol: string, position: number): Token {
  if (symbol === "(" || symbol === ")" || symbol === ",") {
    return { type: "punctuation", symbol, position };
  }
  if (isBinaryOperator(symbol)) {
    return { type: "operator", symbol, position };
  }
  // DELIMITERS only holds operators and punctuation
  throw new Error(`Unhandled delimiter: ${symbol}`);
}

function classifyRun(text: string, position: number): Token {
  if (NUMBER_PATTERN.test(text)) {
    return { type: "number", value: Number(text), text, position };
  }
  return { type: "identifier", name: text, position };
}

// =============================================================================
// TOKEN FORMATTING
// =============================================================================

/** Source text of a token */
export function tokenText(token: Token): string {
  switch (token.type) {
    case "number":
      return token.text;
    case "identifier":
      return token.name;
    case "operator":
    case "punctuation":
      return token.symbol;
    case "unary":
      return UNARY_MINUS;
  }
}
