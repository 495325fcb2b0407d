/**
 * Tool Logging
 * Level filter in front of the logger FastMCP hands to each tool call
 */

import type { LogLevel } from "./config.ts";

/** The subset of FastMCP's context logger the tools use */
export interface ToolLog {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Wrap a logger so that messages below `level` are dropped */
export function filterLog(log: ToolLog, level: LogLevel): ToolLog {
  const write = (messageLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level]) log[messageLevel](message);
  };
  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
