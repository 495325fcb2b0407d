/**
 * Operator Table
 * Symbols, precedence, associativity and semantics of the calculator's operators
 */

/** Binary arithmetic operators */
export const ARITHMETIC_OPERATORS = ["+", "-", "*", "/", "//", "%", "^"] as const;

/** Comparison operators; all share the lowest precedence tier */
export const COMPARISON_OPERATORS = ["==", "!=", "<", ">", "<=", ">="] as const;

export type ArithmeticOperator = (typeof ARITHMETIC_OPERATORS)[number];
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];
export type BinaryOperator = ArithmeticOperator | ComparisonOperator;

/** Display symbol of the synthetic unary minus */
export const UNARY_MINUS = "-u";

/**
 * Every delimiter the tokenizer recognizes, longest first so that
 * "//" wins over "/" and "<=" over "<".
 */
export const DELIMITERS = [
  "==",
  "!=",
  "<=",
  ">=",
  "//",
  "<",
  ">",
  "+",
  "-",
  "*",
  "/",
  "%",
  "^",
  "(",
  ")",
  ",",
] as const;

/**
 * Operator precedence levels (higher = binds tighter)
 * - 0: comparisons (and parentheses)
 * - 1: addition/subtraction
 * - 2: multiplication/division/modulo
 * - 3: exponentiation
 * - 4: unary minus
 */
export const OPERATOR_PRECEDENCE: Record<BinaryOperator | typeof UNARY_MINUS, number> = {
  "==": 0,
  "!=": 0,
  "<": 0,
  ">": 0,
  "<=": 0,
  ">=": 0,
  "+": 1,
  "-": 1,
  "*": 2,
  "/": 2,
  "//": 2,
  "%": 2,
  "^": 3,
  "-u": 4,
};

/**
 * Right-associative operators
 * 2^3^4 = 2^(3^4) = 2^81, not (2^3)^4
 */
export const RIGHT_ASSOCIATIVE: ReadonlySet<string> = new Set(["^"]);

const ARITHMETIC_SET: ReadonlySet<string> = new Set(ARITHMETIC_OPERATORS);
const COMPARISON_SET: ReadonlySet<string> = new Set(COMPARISON_OPERATORS);

export function isArithmeticOperator(symbol: string): symbol is ArithmeticOperator {
  return ARITHMETIC_SET.has(symbol);
}

export function isComparisonOperator(symbol: string): symbol is ComparisonOperator {
  return COMPARISON_SET.has(symbol);
}

export function isBinaryOperator(symbol: string): symbol is BinaryOperator {
  return isArithmeticOperator(symbol) || isComparisonOperator(symbol);
}

export function getOperatorPrecedence(symbol: BinaryOperator | typeof UNARY_MINUS): number {
  return OPERATOR_PRECEDENCE[symbol];
}

export function isRightAssociative(symbol: string): boolean {
  return RIGHT_ASSOCIATIVE.has(symbol);
}

// =============================================================================
// SEMANTICS
// =============================================================================

/** Thrown by an operator whose operands are outside its domain */
export class OperatorDomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OperatorDomainError";
  }
}

/**
 * Floored modulo: the result takes the sign of the divisor
 * @example floorMod(-7, 2) // 1
 */
export function floorMod(a: number, b: number): number {
  if (b === 0) throw new OperatorDomainError("division by zero");
  let mod = a % b;
  if (mod !== 0) {
    if (b < 0 !== mod < 0) mod += b;
  } else {
    // Keep the divisor's sign on a zero result
    mod = b < 0 ? -0 : 0;
  }
  return mod;
}

/**
 * Floor division consistent with floorMod, so that
 * a === floorDiv(a, b) * b + floorMod(a, b) up to rounding
 */
export function floorDiv(a: number, b: number): number {
  if (b === 0) throw new OperatorDomainError("division by zero");
  const mod = a % b;
  let div = (a - mod) / b;
  if (mod !== 0 && b < 0 !== mod < 0) div -= 1;
  if (div === 0) {
    // A zero quotient keeps the sign of the true quotient
    const quotient = a / b;
    return quotient < 0 || Object.is(quotient, -0) ? -0 : 0;
  }
  let floored = Math.floor(div);
  if (div - floored > 0.5) floored += 1;
  return floored;
}

/** Exponentiation that rejects results outside the real, finite range */
export function power(base: number, exponent: number): number {
  if (base === 0 && exponent < 0) {
    throw new OperatorDomainError("0.0 cannot be raised to a negative power");
  }
  const result = base ** exponent;
  if (Number.isNaN(result) && !Number.isNaN(base) && !Number.isNaN(exponent)) {
    throw new OperatorDomainError("math domain error");
  }
  if (!Number.isFinite(result) && Number.isFinite(base) && Number.isFinite(exponent)) {
    throw new OperatorDomainError("math range error");
  }
  return result;
}

function divide(a: number, b: number): number {
  if (b === 0) throw new OperatorDomainError("division by zero");
  return a / b;
}

/** Implementation of each binary operator over numeric operands */
export const BINARY_OPERATIONS: Record<BinaryOperator, (a: number, b: number) => number | boolean> = {
  "+": (a, b) => a + b,
  "-": (a, b) => a - b,
  "*": (a, b) => a * b,
  "/": divide,
  "//": floorDiv,
  "%": floorMod,
  "^": power,
  "==": (a, b) => a === b,
  "!=": (a, b) => a !== b,
  "<": (a, b) => a < b,
  ">": (a, b) => a > b,
  "<=": (a, b) => a <= b,
  ">=": (a, b) => a >= b,
};
