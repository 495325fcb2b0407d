/**
 * Value and RPN Formatting
 */

import type { Value } from "./evaluate.ts";
import { UNARY_MINUS } from "./operators.ts";
import type { RpnElement } from "./postfix.ts";

/**
 * Render a result for display
 *
 * @example
 * formatValue(5)        // "5"
 * formatValue(0.1 + 0.2) // "0.30000000000000004"
 * formatValue(-Infinity) // "-inf"
 * formatValue(-0)        // "-0"
 */
export function formatValue(value: Value): string {
  if (typeof value === "boolean") return String(value);
  if (Number.isNaN(value)) return "nan";
  if (value === Number.POSITIVE_INFINITY) return "inf";
  if (value === Number.NEGATIVE_INFINITY) return "-inf";
  if (Object.is(value, -0)) return "-0";
  return String(value);
}

/**
 * Render a postfix stream as space-separated elements
 *
 * @example
 * formatRpn(compile("-abs(2 - 3)").value) // "2 3 - abs/1 -u"
 */
export function formatRpn(rpn: readonly RpnElement[]): string {
  return rpn
    .map((element) => {
      switch (element.type) {
        case "value":
          return formatValue(element.value);
        case "operator":
          return element.symbol;
        case "unary":
          return UNARY_MINUS;
        case "call":
          return `${element.name}/${element.arity}`;
      }
    })
    .join(" ");
}
