/**
 * Command-line front end
 * calc "<expression>" prints the result, or "ERROR: <message>" on stderr with exit code 1
 */

import { existsSync, realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { Command, CommanderError } from "commander";
import {
  calculate,
  compile,
  defaultRegistry,
  formatRpn,
  formatValue,
  listOperations,
  type Value,
} from "./lib/math/index.ts";

export interface CliOptions {
  rpn?: boolean;
  json?: boolean;
  list?: boolean;
}

/** Where the CLI writes; replaced in tests */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Run the CLI against arguments (without the node and script entries)
 * @returns the process exit code
 */
export function runCli(argv: readonly string[], io: CliIO = consoleIO): number {
  let exitCode = 0;
  const program = new Command();

  program
    .name("calc")
    .description("Evaluate an arithmetic or comparison expression")
    .argument("[expression]", "expression to evaluate, e.g. \"2 * (3 + 4)\"")
    .option("--rpn", "print the postfix (RPN) form instead of evaluating", false)
    .option("--json", "print the result as JSON", false)
    .option("--list", "list available constants and functions", false)
    // Expressions such as "-1" or "--+-1" look like flags
    .allowUnknownOption()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    })
    .action((expression: string | undefined, options: CliOptions) => {
      exitCode = execute(expression, options, io);
    });

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    // exitOverride turns --help, --version and usage errors into exceptions
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}

function execute(expression: string | undefined, options: CliOptions, io: CliIO): number {
  if (options.list) {
    printCatalogue(options, io);
    return 0;
  }

  if (expression === undefined) {
    io.err("ERROR: missing expression");
    return 1;
  }

  if (options.rpn) {
    const rpn = compile(expression);
    if (!rpn.ok) return printError(rpn.error.kind, rpn.error.message, options, io);
    io.out(options.json ? JSON.stringify({ ok: true, rpn: formatRpn(rpn.value) }) : formatRpn(rpn.value));
    return 0;
  }

  const result = calculate(expression);
  if (!result.ok) return printError(result.error.kind, result.error.message, options, io);

  io.out(options.json ? JSON.stringify({ ok: true, value: jsonValue(result.value) }) : formatValue(result.value));
  return 0;
}

/** JSON has no inf or nan; those are written as their display strings */
function jsonValue(value: Value): Value | string {
  return typeof value === "number" && !Number.isFinite(value) ? formatValue(value) : value;
}

function printError(kind: string, message: string, options: CliOptions, io: CliIO): number {
  io.err(options.json ? JSON.stringify({ ok: false, kind, message }) : `ERROR: ${message}`);
  return 1;
}

function printCatalogue(options: CliOptions, io: CliIO): void {
  const catalogue = listOperations(defaultRegistry);
  if (options.json) {
    const constants = catalogue.constants.map((c) => ({ name: c.name, value: jsonValue(c.value) }));
    io.out(JSON.stringify({ ...catalogue, constants }));
    return;
  }
  io.out("Constants:");
  for (const constant of catalogue.constants) {
    io.out(`  ${constant.name} = ${formatValue(constant.value)}`);
  }
  io.out("Functions:");
  for (const fn of catalogue.functions) {
    io.out(`  ${fn.name} (${fn.arity} args)`);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script || !existsSync(script)) return false;
  return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  process.exitCode = runCli(process.argv.slice(2));
}
