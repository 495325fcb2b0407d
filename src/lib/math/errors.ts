/**
 * Calculation Errors
 * Closed set of failure kinds produced by the expression pipeline
 */

/** Every way a calculation can fail */
export type CalculationErrorKind =
  | "EmptyExpressionError"
  | "UnknownTokenError"
  | "MissingFunctionParenError"
  | "UnmatchedParenthesisError"
  | "InvalidArityError"
  | "OperationFailedError"
  | "InvalidFinalResultError";

export interface CalculationErrorDetails {
  /** Character offset of the offending token */
  position?: number;
  /** Operator symbol or function name that failed */
  operation?: string;
  cause?: unknown;
}

export class CalculationError extends Error {
  readonly kind: CalculationErrorKind;
  readonly position?: number;
  readonly operation?: string;

  constructor(kind: CalculationErrorKind, message: string, details: CalculationErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "CalculationError";
    this.kind = kind;
    this.position = details.position;
    this.operation = details.operation;
  }
}

/** Outcome of a pipeline stage: a value or the first error encountered */
export type Result<T> = { ok: true; value: T } | { ok: false; error: CalculationError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(
  kind: CalculationErrorKind,
  message: string,
  details?: CalculationErrorDetails,
): Result<T> {
  return { ok: false, error: new CalculationError(kind, message, details) };
}
