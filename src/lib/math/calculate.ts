/**
 * Expression Calculation
 * Runs an expression through tokenize → normalizeSigns → toPostfix → evaluateRpn
 */

import type { Result } from "./errors.ts";
import { type Value, evaluateRpn } from "./evaluate.ts";
import { type RpnElement, toPostfix } from "./postfix.ts";
import { type OperationRegistry, defaultRegistry } from "./registry.ts";
import { normalizeSigns } from "./signs.ts";
import { tokenize } from "./tokenizer.ts";

/**
 * Compile an expression to its postfix form without evaluating it
 *
 * @example
 * compile("2 * (3 + 4)") // ok: 2 3 4 + *
 */
export function compile(
  expression: string,
  registry: OperationRegistry = defaultRegistry,
): Result<RpnElement[]> {
  const tokens = tokenize(expression);
  if (!tokens.ok) return tokens;

  const normalized = normalizeSigns(tokens.value);
  if (!normalized.ok) return normalized;

  return toPostfix(normalized.value, registry);
}

/**
 * Evaluate an expression to a number or boolean
 * Pure: the same expression always yields the same result
 *
 * @example
 * calculate("hypot(3, 4)"); // { ok: true, value: 5 }
 * calculate("1 < 2");       // { ok: true, value: true }
 * calculate("1 / 0");       // { ok: false, error: CalculationError (OperationFailedError) }
 */
export function calculate(
  expression: string,
  registry: OperationRegistry = defaultRegistry,
): Result<Value> {
  const rpn = compile(expression, registry);
  if (!rpn.ok) return rpn;
  return evaluateRpn(rpn.value, registry);
}
