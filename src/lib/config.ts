/**
 * Configuration
 * Environment-driven settings for the MCP server and tools, validated with zod
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const ConfigSchema = z.object({
  CALC_TRANSPORT: z.enum(["stdio", "httpStream"]).default("stdio"),
  CALC_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  CALC_MAX_EXPRESSION_LENGTH: z.coerce.number().int().min(1).default(2000),
  CALC_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface CalculatorConfig {
  transport: "stdio" | "httpStream";
  port: number;
  maxExpressionLength: number;
  logLevel: LogLevel;
}

/** Thrown at start-up when the environment holds invalid settings */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parse settings from an environment object
 * Unset variables fall back to their defaults; empty strings count as unset
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CalculatorConfig {
  const relevant = Object.fromEntries(
    Object.keys(ConfigSchema.shape).map((key) => [key, env[key] === "" ? undefined : env[key]]),
  );
  const parsed = ConfigSchema.safeParse(relevant);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  return {
    transport: parsed.data.CALC_TRANSPORT,
    port: parsed.data.CALC_PORT,
    maxExpressionLength: parsed.data.CALC_MAX_EXPRESSION_LENGTH,
    logLevel: parsed.data.CALC_LOG_LEVEL,
  };
}

/** Load .env from the working directory, then parse process.env */
export function readConfig(): CalculatorConfig {
  loadDotenv();
  return loadConfig(process.env);
}
