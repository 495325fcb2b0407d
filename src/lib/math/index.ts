/**
 * Math module barrel export
 * Re-exports the calculator pipeline, registry and formatting helpers
 */

export * from "./calculate.ts";
export * from "./errors.ts";
export * from "./evaluate.ts";
export * from "./format.ts";
export * from "./operators.ts";
export * from "./postfix.ts";
export * from "./registry.ts";
export * from "./signs.ts";
export * from "./tokenizer.ts";
