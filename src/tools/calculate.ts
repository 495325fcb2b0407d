import { z } from "zod";
import type { CalculatorConfig } from "../lib/config.ts";
import { type ToolLog, filterLog } from "../lib/logger.ts";
import { calculate, compile, formatRpn, formatValue } from "../lib/math/index.ts";

/**
 * Calculator tool - evaluates one arithmetic/comparison expression
 * The maximum expression length comes from configuration
 */
export function createCalculateTool(config: Pick<CalculatorConfig, "maxExpressionLength" | "logLevel">) {
  return {
    name: "calculate",
    description: `Evaluate a single arithmetic or comparison expression.

Supports decimal literals, the constants pi, e, tau, inf and nan, functions such as
sin, log, hypot and round, the operators + - * / // % ^ and == != < > <= >=,
parentheses, and chains of unary signs (e.g. "--+-1").

Returns the numeric or boolean result, or an error naming what went wrong.`,

    parameters: z.object({
      expression: z
        .string()
        .max(config.maxExpressionLength)
        .describe("Expression to evaluate, e.g. \"2 * (3 + 4) ^ 2\""),
      show_rpn: z
        .boolean()
        .default(false)
        .describe("Include the postfix (RPN) form of the expression"),
    }),

    execute: async (
      args: { expression: string; show_rpn?: boolean },
      context: { log: ToolLog },
    ): Promise<string> => {
      const log = filterLog(context.log, config.logLevel);
      log.debug(`calculate: ${args.expression}`);

      const result = calculate(args.expression);
      if (!result.ok) {
        log.warn(`calculate failed (${result.error.kind}): ${result.error.message}`);
        return formatFailure(result.error.kind, result.error.message);
      }

      const lines = [`**Result:** ${formatValue(result.value)}`];
      if (args.show_rpn) {
        const rpn = compile(args.expression);
        if (rpn.ok) lines.push(`**RPN:** ${formatRpn(rpn.value)}`);
      }
      log.info(`calculate: ${args.expression} = ${formatValue(result.value)}`);
      return lines.join("\n");
    },
  };
}

function formatFailure(kind: string, message: string): string {
  return [`**Error:** ${kind}`, message].join("\n");
}
