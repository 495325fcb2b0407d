import { z } from "zod";
import { defaultRegistry, formatValue, listOperations } from "../lib/math/index.ts";

/**
 * Lists the constants and functions expressions can use
 */
export const listOperationsTool = {
  name: "list_operations",
  description: "List the named constants and functions available to the calculate tool",
  parameters: z.object({}),
  execute: async (): Promise<string> => {
    const catalogue = listOperations(defaultRegistry);

    const lines = [
      `**Constants** (${catalogue.constants.length})`,
      "",
      "| Name | Value |",
      "|------|-------|",
      ...catalogue.constants.map((c) => `| ${c.name} | ${formatValue(c.value)} |`),
      "",
      `**Functions** (${catalogue.functions.length})`,
      "",
      "| Name | Arguments |",
      "|------|-----------|",
      ...catalogue.functions.map((f) => `| ${f.name} | ${f.arity} |`),
    ];

    return lines.join("\n");
  },
};
