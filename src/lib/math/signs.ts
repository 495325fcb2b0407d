/**
 * Sign Normalizer
 * Collapses runs of "+" and "-" into a single sign and decides whether it is unary or binary
 */

import { type Result, fail, ok } from "./errors.ts";
import type { OperatorToken, Token } from "./tokenizer.ts";

/** A pending run of consecutive sign tokens */
interface SignRun {
  minusCount: number;
  signCount: number;
  /** Position of the first sign in the run */
  position: number;
}

/**
 * Normalize sign runs in a token sequence
 *
 * A run collapses to "-" when it holds an odd number of minuses and to "+"
 * otherwise. The run is unary when it opens the expression or follows an
 * operator, "(" or ","; a unary "-" becomes the unary marker and a unary "+"
 * is dropped. Anywhere else the collapsed sign stays a binary operator.
 *
 * @example
 * normalizeSigns(tokenize("--+- 1 -- 1").value)
 * // -u 1 + 1
 */
export function normalizeSigns(tokens: readonly Token[]): Result<Token[]> {
  const output: Token[] = [];
  let run: SignRun | null = null;

  for (const token of tokens) {
    if (isSign(token)) {
      run ??= { minusCount: 0, signCount: 0, position: token.position };
      run.signCount++;
      if (token.symbol === "-") run.minusCount++;
      continue;
    }

    if (run) {
      const resolved = resolveRun(run, output[output.length - 1]);
      if (resolved) output.push(resolved);
      run = null;
    }
    output.push(token);
  }

  if (run) {
    const sign = run.minusCount % 2 === 0 ? "+" : "-";
    const noun = run.signCount === 1 ? "sign" : `run of ${run.signCount} signs`;
    return fail("UnknownTokenError", `Dangling ${noun} ('${sign}') at end of expression`, {
      position: run.position,
    });
  }

  return ok(output);
}

function isSign(token: Token): token is OperatorToken & { symbol: "+" | "-" } {
  return token.type === "operator" && (token.symbol === "+" || token.symbol === "-");
}

/** The token a run collapses into, or null for a dropped unary "+" */
function resolveRun(run: SignRun, previous: Token | undefined): Token | null {
  const negative = run.minusCount % 2 === 1;

  if (isUnaryContext(previous)) {
    return negative ? { type: "unary", position: run.position } : null;
  }
  return { type: "operator", symbol: negative ? "-" : "+", position: run.position };
}

function isUnaryContext(previous: Token | undefined): boolean {
  if (previous === undefined) return true;
  switch (previous.type) {
    case "operator":
    case "unary":
      return true;
    case "punctuation":
      return previous.symbol === "(" || previous.symbol === ",";
    default:
      return false;
  }
}
