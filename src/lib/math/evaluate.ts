/**
 * Postfix Evaluator
 * Reduces an RPN stream to a single number or boolean with one evaluation stack
 */

import { type Result, fail, ok } from "./errors.ts";
import { BINARY_OPERATIONS, OperatorDomainError } from "./operators.ts";
import type { RpnCall, RpnElement, RpnOperator } from "./postfix.ts";
import { type OperationRegistry, acceptsArity, defaultRegistry, describeArity } from "./registry.ts";

/** Result of a calculation */
export type Value = number | boolean;

/** Booleans take part in arithmetic as 1 and 0 */
function toNumber(value: Value): number {
  return typeof value === "boolean" ? Number(value) : value;
}

/**
 * Evaluate a postfix stream
 *
 * @example
 * evaluateRpn(toPostfix(normalizeSigns(tokenize("2 ^ -1").value).value).value)
 * // { ok: true, value: 0.5 }
 */
export function evaluateRpn(
  rpn: readonly RpnElement[],
  registry: OperationRegistry = defaultRegistry,
): Result<Value> {
  const stack: Value[] = [];

  for (const element of rpn) {
    switch (element.type) {
      case "value":
        stack.push(element.value);
        break;

      case "unary": {
        const operand = stack.pop();
        if (operand === undefined) {
          return missingOperand("unary '-'", element.position);
        }
        stack.push(-toNumber(operand));
        break;
      }

      case "operator": {
        const result = applyOperator(element, stack);
        if (!result.ok) return result;
        stack.push(result.value);
        break;
      }

      case "call": {
        const result = applyFunction(element, stack, registry);
        if (!result.ok) return result;
        stack.push(result.value);
        break;
      }
    }
  }

  const [result, ...rest] = stack;
  if (result === undefined || rest.length > 0) {
    return fail(
      "InvalidFinalResultError",
      `Expression did not reduce to a single value (${stack.length} values left)`,
    );
  }
  return ok(result);
}

function missingOperand(operation: string, position: number): Result<Value> {
  return fail("InvalidFinalResultError", `Missing operand for ${operation} at position ${position}`, {
    position,
    operation,
  });
}

function applyOperator(element: RpnOperator, stack: Value[]): Result<Value> {
  const right = stack.pop();
  const left = stack.pop();
  if (left === undefined || right === undefined) {
    return missingOperand(`'${element.symbol}'`, element.position);
  }

  return guard(element.symbol, element.position, () =>
    BINARY_OPERATIONS[element.symbol](toNumber(left), toNumber(right)),
  );
}

function applyFunction(element: RpnCall, stack: Value[], registry: OperationRegistry): Result<Value> {
  const definition = registry.functions.get(element.name);
  if (!definition) {
    return fail("UnknownTokenError", `Unknown function '${element.name}'`, {
      position: element.position,
    });
  }

  if (!acceptsArity(definition.arity, element.arity)) {
    return fail(
      "InvalidArityError",
      `${element.name}() takes ${describeArity(definition.arity)} argument(s), got ${element.arity}`,
      { position: element.position, operation: element.name },
    );
  }

  if (stack.length < element.arity) {
    return missingOperand(`${element.name}()`, element.position);
  }
  const args = stack.splice(stack.length - element.arity, element.arity).map(toNumber);

  return guard(element.name, element.position, () => {
    const result = definition.apply(args);
    if (typeof result === "number") checkRange(result, args);
    return result;
  });
}

/** Reject NaN or infinite results computed from well-behaved arguments */
function checkRange(result: number, args: readonly number[]): void {
  if (Number.isNaN(result) && !args.some(Number.isNaN)) {
    throw new OperatorDomainError("math domain error");
  }
  if (!Number.isFinite(result) && !Number.isNaN(result) && args.every(Number.isFinite)) {
    throw new OperatorDomainError("math range error");
  }
}

/** Run an operation, turning anything it throws into an OperationFailedError */
function guard(operation: string, position: number, run: () => Value): Result<Value> {
  try {
    return ok(run());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail("OperationFailedError", `${operation}: ${reason}`, {
      position,
      operation,
      cause: error,
    });
  }
}
