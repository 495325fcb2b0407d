/**
 * Operation Registry
 * Immutable catalogue of the named constants and functions an expression may use
 */

import { all, create } from "mathjs";
import { OperatorDomainError, power } from "./operators.ts";

const math = create(all);

// =============================================================================
// TYPES
// =============================================================================

/** How many arguments a function accepts */
export type ArityPolicy =
  | { kind: "fixed"; count: number }
  | { kind: "variadic"; min: number; max?: number };

export type FunctionResult = number | boolean;

export interface FunctionDefinition {
  arity: ArityPolicy;
  /** Receives exactly as many arguments as the arity policy allows */
  apply: (args: readonly number[]) => FunctionResult;
}

export interface RegistryDefinitions {
  constants: Record<string, number>;
  functions: Record<string, FunctionDefinition>;
}

export interface OperationRegistry {
  readonly constants: ReadonlyMap<string, number>;
  readonly functions: ReadonlyMap<string, FunctionDefinition>;
}

/** Thrown when registry definitions are inconsistent */
export class RegistryDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryDefinitionError";
  }
}

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// REGISTRY
// =============================================================================

/**
 * Build a registry from plain definitions
 * Throws RegistryDefinitionError on invalid names, duplicate names or bad arity bounds
 */
export function createRegistry(definitions: RegistryDefinitions): OperationRegistry {
  const constants = new Map<string, number>();
  const functions = new Map<string, FunctionDefinition>();

  for (const [name, value] of Object.entries(definitions.constants)) {
    assertName(name);
    constants.set(name, value);
  }

  for (const [name, definition] of Object.entries(definitions.functions)) {
    assertName(name);
    if (constants.has(name)) {
      throw new RegistryDefinitionError(`'${name}' is defined as both a constant and a function`);
    }
    assertArity(name, definition.arity);
    functions.set(name, Object.freeze({ ...definition, arity: Object.freeze({ ...definition.arity }) }));
  }

  return Object.freeze({ constants: new FrozenMap(constants), functions: new FrozenMap(functions) });
}

/** Read-only view over a map that has no set, delete or clear */
class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  readonly #entries: Map<K, V>;

  constructor(entries: Map<K, V>) {
    this.#entries = entries;
    Object.freeze(this);
  }

  get size(): number {
    return this.#entries.size;
  }

  get(key: K): V | undefined {
    return this.#entries.get(key);
  }

  has(key: K): boolean {
    return this.#entries.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.#entries.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.#entries.entries();
  }

  keys() {
    return this.#entries.keys();
  }

  values() {
    return this.#entries.values();
  }

  [Symbol.iterator]() {
    return this.#entries[Symbol.iterator]();
  }
}

function assertName(name: string): void {
  if (!NAME_PATTERN.test(name)) {
    throw new RegistryDefinitionError(`Invalid operation name: '${name}'`);
  }
}

function assertArity(name: string, arity: ArityPolicy): void {
  const bounds = arity.kind === "fixed" ? [arity.count] : [arity.min, arity.max ?? arity.min];
  if (bounds.some((n) => !Number.isInteger(n) || n < 0)) {
    throw new RegistryDefinitionError(`Invalid arity for '${name}'`);
  }
  if (arity.kind === "variadic" && arity.max !== undefined && arity.max < arity.min) {
    throw new RegistryDefinitionError(`'${name}' has max arity ${arity.max} below min ${arity.min}`);
  }
}

/** Whether a call with `count` arguments satisfies the policy */
export function acceptsArity(policy: ArityPolicy, count: number): boolean {
  if (policy.kind === "fixed") return count === policy.count;
  return count >= policy.min && (policy.max === undefined || count <= policy.max);
}

/**
 * Human-readable arity
 * @example describeArity({ kind: "variadic", min: 1, max: 2 }) // "1-2"
 */
export function describeArity(policy: ArityPolicy): string {
  if (policy.kind === "fixed") return String(policy.count);
  if (policy.max === undefined) return `${policy.min}+`;
  return `${policy.min}-${policy.max}`;
}

export interface OperationCatalogue {
  constants: Array<{ name: string; value: number }>;
  functions: Array<{ name: string; arity: string }>;
}

/** Sorted listing of everything a registry offers */
export function listOperations(registry: OperationRegistry): OperationCatalogue {
  const byName = (a: { name: string }, b: { name: string }) => a.name.localeCompare(b.name);
  return {
    constants: Array.from(registry.constants, ([name, value]) => ({ name, value })).sort(byName),
    functions: Array.from(registry.functions, ([name, definition]) => ({
      name,
      arity: describeArity(definition.arity),
    })).sort(byName),
  };
}

// =============================================================================
// DEFAULT DEFINITIONS
// =============================================================================

function argAt(args: readonly number[], index: number): number {
  const value = args[index];
  if (value === undefined) {
    throw new RangeError(`Missing argument ${index + 1}`);
  }
  return value;
}

function unary(fn: (x: number) => FunctionResult): FunctionDefinition {
  return { arity: { kind: "fixed", count: 1 }, apply: (args) => fn(argAt(args, 0)) };
}

function binary(fn: (x: number, y: number) => FunctionResult): FunctionDefinition {
  return {
    arity: { kind: "fixed", count: 2 },
    apply: (args) => fn(argAt(args, 0), argAt(args, 1)),
  };
}

function requireIntegral(name: string, x: number): number {
  if (!Number.isInteger(x)) {
    throw new OperatorDomainError(`${name}() only accepts integral values`);
  }
  return x;
}

/** Integer-valued results have no infinity or NaN */
function requireFinite(x: number): number {
  if (Number.isNaN(x)) throw new OperatorDomainError("cannot convert float NaN to integer");
  if (!Number.isFinite(x)) throw new OperatorDomainError("cannot convert float infinity to integer");
  return x;
}

function requirePositive(x: number): number {
  if (x <= 0) throw new OperatorDomainError("math domain error");
  return x;
}

/** Round half to even, optionally to a number of decimal digits */
export function roundHalfEven(x: number, digits = 0): number {
  requireIntegral("round", digits);
  if (!Number.isFinite(x)) return x;
  // Negative digits round to tens, hundreds, ...; dividing keeps those exact
  const factor = 10 ** Math.abs(digits);
  if (!Number.isFinite(factor)) return digits > 0 ? x : 0 * Math.sign(x);
  const scaled = digits >= 0 ? x * factor : x / factor;
  // Past 2^52 every double is already a whole number
  if (!Number.isFinite(scaled) || Math.abs(scaled) >= 2 ** 52) return x;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;
  return digits >= 0 ? rounded / factor : rounded * factor;
}

function factorial(x: number): number {
  requireIntegral("factorial", x);
  if (x < 0) throw new OperatorDomainError("factorial() not defined for negative values");
  let result = 1;
  for (let i = 2; i <= x && Number.isFinite(result); i++) result *= i;
  return result;
}

function gcd(args: readonly number[]): number {
  let result = 0;
  for (const arg of args) {
    let a = Math.abs(result);
    let b = Math.abs(requireIntegral("gcd", arg));
    while (b !== 0) [a, b] = [b, a % b];
    result = a;
  }
  return result;
}

function copysign(x: number, y: number): number {
  const negative = y < 0 || Object.is(y, -0);
  return negative ? -Math.abs(x) : Math.abs(x);
}

function isclose(a: number, b: number): boolean {
  if (a === b) return true;
  if (!Number.isFinite(a) || !Number.isFinite(b)) return false;
  const diff = Math.abs(b - a);
  return diff <= Math.abs(1e-9 * b) || diff <= Math.abs(1e-9 * a);
}

function log(args: readonly number[]): number {
  const x = requirePositive(argAt(args, 0));
  if (args.length === 1) return Math.log(x);
  const base = requirePositive(argAt(args, 1));
  const denominator = Math.log(base);
  if (denominator === 0) throw new OperatorDomainError("division by zero");
  return Math.log(x) / denominator;
}

function round(args: readonly number[]): number {
  if (args.length === 1) return roundHalfEven(requireFinite(argAt(args, 0)));
  return roundHalfEven(argAt(args, 0), argAt(args, 1));
}

/** Gamma and its log have poles at zero and the negative integers */
function requireNotPole(x: number): number {
  if (Number.isInteger(x) && x <= 0) throw new OperatorDomainError("math domain error");
  return x;
}

function lgamma(x: number): number {
  if (!Number.isFinite(x)) return Number.isNaN(x) ? x : Number.POSITIVE_INFINITY;
  return math.lgamma(requireNotPole(x));
}

/**
 * IEEE 754 remainder: x minus the nearest multiple of y, ties to even
 * @example remainder(5, 3) // -1
 */
function remainder(x: number, y: number): number {
  if (Number.isNaN(x) || Number.isNaN(y)) return Number.NaN;
  if (y === 0 || !Number.isFinite(x)) throw new OperatorDomainError("math domain error");
  if (!Number.isFinite(y)) return x;
  return x - roundHalfEven(x / y) * y;
}

/** Constants and functions mirroring a typical host math library */
export const DEFAULT_DEFINITIONS: RegistryDefinitions = {
  constants: {
    pi: Math.PI,
    e: Math.E,
    tau: 2 * Math.PI,
    inf: Number.POSITIVE_INFINITY,
    nan: Number.NaN,
  },
  functions: {
    abs: unary(Math.abs),
    round: { arity: { kind: "variadic", min: 1, max: 2 }, apply: round },
    acos: unary(Math.acos),
    acosh: unary(Math.acosh),
    asin: unary(Math.asin),
    asinh: unary(Math.asinh),
    atan: unary(Math.atan),
    atan2: binary(Math.atan2),
    atanh: unary(Math.atanh),
    ceil: unary((x) => Math.ceil(requireFinite(x))),
    copysign: binary(copysign),
    cos: unary(Math.cos),
    cosh: unary(Math.cosh),
    degrees: unary((x) => (x * 180) / Math.PI),
    erf: unary((x) => math.erf(x)),
    erfc: unary((x) => 1 - math.erf(x)),
    exp: unary(Math.exp),
    expm1: unary(Math.expm1),
    fabs: unary(Math.abs),
    factorial: unary(factorial),
    floor: unary((x) => Math.floor(requireFinite(x))),
    fmod: binary((x, y) => x % y),
    gamma: unary((x) => math.gamma(requireNotPole(x))),
    gcd: { arity: { kind: "variadic", min: 0 }, apply: gcd },
    hypot: binary(Math.hypot),
    isclose: binary(isclose),
    isfinite: unary(Number.isFinite),
    isinf: unary((x) => x === Number.POSITIVE_INFINITY || x === Number.NEGATIVE_INFINITY),
    isnan: unary(Number.isNaN),
    ldexp: binary((x, i) => x * 2 ** requireIntegral("ldexp", i)),
    lgamma: unary(lgamma),
    log: { arity: { kind: "variadic", min: 1, max: 2 }, apply: log },
    log10: unary((x) => Math.log10(requirePositive(x))),
    log1p: unary((x) => {
      if (x <= -1) throw new OperatorDomainError("math domain error");
      return Math.log1p(x);
    }),
    log2: unary((x) => Math.log2(requirePositive(x))),
    pow: binary(power),
    radians: unary((x) => (x * Math.PI) / 180),
    remainder: binary(remainder),
    sin: unary(Math.sin),
    sinh: unary(Math.sinh),
    sqrt: unary(Math.sqrt),
    tan: unary(Math.tan),
    tanh: unary(Math.tanh),
    trunc: unary((x) => Math.trunc(requireFinite(x))),
  },
};

/** Process-wide registry, built once at module load */
export const defaultRegistry: OperationRegistry = createRegistry(DEFAULT_DEFINITIONS);
