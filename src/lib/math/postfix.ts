/**
 * Infix to Postfix Conversion (Shunting-Yard Algorithm)
 * Resolves precedence, associativity, parentheses and variadic function arity
 */

import { type Result, fail, ok } from "./errors.ts";
import {
  type BinaryOperator,
  UNARY_MINUS,
  getOperatorPrecedence,
  isComparisonOperator,
  isRightAssociative,
} from "./operators.ts";
import { type OperationRegistry, defaultRegistry } from "./registry.ts";
import { type Token, tokenText } from "./tokenizer.ts";

// =============================================================================
// RPN TYPES
// =============================================================================

/** Literal or already-resolved constant */
export interface RpnValue {
  type: "value";
  value: number;
  position: number;
}

export interface RpnOperator {
  type: "operator";
  symbol: BinaryOperator;
  position: number;
}

export interface RpnUnaryMinus {
  type: "unary";
  position: number;
}

/** Function application consuming `arity` operands */
export interface RpnCall {
  type: "call";
  name: string;
  arity: number;
  position: number;
}

export type RpnElement = RpnValue | RpnOperator | RpnUnaryMinus | RpnCall;

// =============================================================================
// OPERATOR STACK
// =============================================================================

interface OpenParenEntry {
  type: "paren";
  position: number;
  /** Whether a "," or an operand has been seen since this paren opened */
  hasContent: boolean;
}

/** In-flight function call; arity grows with each top-level comma */
interface FunctionEntry {
  type: "function";
  name: string;
  arity: number;
  position: number;
}

type StackEntry = RpnOperator | RpnUnaryMinus | OpenParenEntry | FunctionEntry;

/** Converter state shared by the token handlers */
interface ConversionState {
  output: RpnElement[];
  stack: StackEntry[];
  registry: OperationRegistry;
}

function top(stack: readonly StackEntry[]): StackEntry | undefined {
  return stack[stack.length - 1];
}

function precedenceOf(entry: RpnOperator | RpnUnaryMinus): number {
  return getOperatorPrecedence(entry.type === "unary" ? UNARY_MINUS : entry.symbol);
}

// =============================================================================
// CONVERTER
// =============================================================================

/**
 * Convert normalized infix tokens to postfix order
 *
 * @example
 * toPostfix(normalizeSigns(tokenize("hypot(3, 4) * 2").value).value)
 * // 3 4 hypot/2 2 *
 */
export function toPostfix(
  tokens: readonly Token[],
  registry: OperationRegistry = defaultRegistry,
): Result<RpnElement[]> {
  const state: ConversionState = { output: [], stack: [], registry };

  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index];
    if (token === undefined) break;
    const error = processToken(token, tokens[index + 1], state);
    if (error) return error;
  }

  // Drain the remaining operators
  for (let entry = state.stack.pop(); entry !== undefined; entry = state.stack.pop()) {
    if (entry.type === "paren") {
      return fail("UnmatchedParenthesisError", `Unclosed '(' at position ${entry.position}`, {
        position: entry.position,
      });
    }
    emit(entry, state.output);
  }

  return ok(state.output);
}

/** Handle one token; returns a failure or null to continue */
function processToken(
  token: Token,
  next: Token | undefined,
  state: ConversionState,
): Result<RpnElement[]> | null {
  if (token.type !== "punctuation" || token.symbol !== ")") markContent(state.stack);

  switch (token.type) {
    case "number":
      state.output.push({ type: "value", value: token.value, position: token.position });
      return null;

    case "identifier":
      return processIdentifier(token.name, token.position, next, state);

    case "unary":
      pushOperator({ type: "unary", position: token.position }, state);
      return null;

    case "operator":
      if (isComparisonOperator(token.symbol)) {
        popUntilParen(state);
        state.stack.push({ type: "operator", symbol: token.symbol, position: token.position });
      } else {
        pushOperator({ type: "operator", symbol: token.symbol, position: token.position }, state);
      }
      return null;

    case "punctuation":
      switch (token.symbol) {
        case "(":
          state.stack.push({ type: "paren", position: token.position, hasContent: false });
          return null;
        case ")":
          return closeParen(token.position, state);
        case ",":
          return separateArgument(token, state);
      }
  }
}

function processIdentifier(
  name: string,
  position: number,
  next: Token | undefined,
  state: ConversionState,
): Result<RpnElement[]> | null {
  const constant = state.registry.constants.get(name);
  if (constant !== undefined) {
    state.output.push({ type: "value", value: constant, position });
    return null;
  }

  if (state.registry.functions.has(name)) {
    if (next?.type !== "punctuation" || next.symbol !== "(") {
      const found = next ? `'${tokenText(next)}'` : "end of expression";
      return fail(
        "MissingFunctionParenError",
        `Function '${name}' must be followed by '(', found ${found}`,
        { position, operation: name },
      );
    }
    state.stack.push({ type: "function", name, arity: 1, position });
    return null;
  }

  return fail("UnknownTokenError", `Unknown token '${name}' at position ${position}`, { position });
}

/**
 * Push an arithmetic operator or the unary marker, first popping every
 * operator that binds at least as tightly (strictly tighter for
 * right-associative operators)
 */
function pushOperator(entry: RpnOperator | RpnUnaryMinus, state: ConversionState): void {
  const precedence = precedenceOf(entry);
  const rightAssociative = entry.type === "operator" && isRightAssociative(entry.symbol);

  for (let current = top(state.stack); current !== undefined; current = top(state.stack)) {
    if (current.type !== "operator" && current.type !== "unary") break;
    const currentPrecedence = precedenceOf(current);
    const shouldPop = rightAssociative ? currentPrecedence > precedence : currentPrecedence >= precedence;
    if (!shouldPop) break;
    state.stack.pop();
    state.output.push(current);
  }

  state.stack.push(entry);
}

/** Pop operators to output down to, not including, the nearest "(" */
function popUntilParen(state: ConversionState): void {
  for (let current = top(state.stack); current !== undefined; current = top(state.stack)) {
    if (current.type === "paren") return;
    state.stack.pop();
    emit(current, state.output);
  }
}

function closeParen(position: number, state: ConversionState): Result<RpnElement[]> | null {
  popUntilParen(state);

  const paren = state.stack.pop();
  if (paren?.type !== "paren") {
    return fail("UnmatchedParenthesisError", `Unmatched ')' at position ${position}`, { position });
  }

  const owner = top(state.stack);
  if (owner?.type === "function") {
    state.stack.pop();
    // "f()" is a call with no arguments
    if (!paren.hasContent) owner.arity = 0;
    emit(owner, state.output);
  }
  return null;
}

function separateArgument(token: Token, state: ConversionState): Result<RpnElement[]> | null {
  popUntilParen(state);

  for (let i = state.stack.length - 1; i >= 0; i--) {
    const entry = state.stack[i];
    if (entry?.type === "function") {
      entry.arity++;
      return null;
    }
  }

  return fail("UnknownTokenError", `Unexpected ',' outside a function call at position ${token.position}`, {
    position: token.position,
  });
}

/** Record that the innermost open paren has content, so "f()" can be told from "f(x)" */
function markContent(stack: StackEntry[]): void {
  for (let i = stack.length - 1; i >= 0; i--) {
    const entry = stack[i];
    if (entry?.type === "paren") {
      entry.hasContent = true;
      return;
    }
  }
}

function emit(entry: Exclude<StackEntry, OpenParenEntry>, output: RpnElement[]): void {
  if (entry.type === "function") {
    output.push({ type: "call", name: entry.name, arity: entry.arity, position: entry.position });
  } else {
    output.push(entry);
  }
}
