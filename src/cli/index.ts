/**
 * variant-name CLI
 *
 * Usage:
 *   variant-name expand <file> [--diff] [--out <file>] [--verbose]
 *   variant-name check <file> [--verbose]
 */

import { consoleIO, runExpand, type CliIO, type ExpandOptions } from "./expand.js";

export type ParsedArgs =
  | { kind: "help" }
  | { kind: "run"; options: ExpandOptions }
  | { kind: "error"; message: string };

const COMMANDS = ["expand", "check"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const [command] = args;
  if (command === undefined || command === "--help" || command === "-h") {
    return { kind: "help" };
  }
  if (!isCommand(command)) {
    return {
      kind: "error",
      message: `Unknown command: ${command}\nUsage: variant-name <expand|check> <file> [options]`,
    };
  }

  let file: string | undefined;
  let diff = false;
  let out: string | undefined;
  let verbose = false;
  let colors: boolean | undefined;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--diff") {
      diff = true;
    } else if (arg === "--out" || arg === "-o") {
      out = args[++i];
      if (out === undefined) {
        return { kind: "error", message: `${arg} requires a file argument` };
      }
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg === "--no-color") {
      colors = false;
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (arg.startsWith("-")) {
      return { kind: "error", message: `Unknown option: ${arg}` };
    } else if (file === undefined) {
      file = arg;
    } else {
      return { kind: "error", message: `Unexpected argument: ${arg}` };
    }
  }

  if (file === undefined) {
    return {
      kind: "error",
      message: `${command} requires a file argument: variant-name ${command} <file>`,
    };
  }

  return {
    kind: "run",
    options: { file, check: command === "check", diff, out, verbose, colors },
  };
}

export const HELP_TEXT = `variant-name - variantName accessors for unions and enums

USAGE:
  variant-name <command> <file> [options]

COMMANDS:
  expand   Print the file with every directive expanded
  check    Report diagnostics without printing code

OPTIONS:
  --diff                 Show a line diff (expand command)
  -o, --out <file>       Write the expanded file instead of printing it
  -v, --verbose          Enable verbose logging
  --no-color             Disable colored output
  -h, --help             Show this help message

EXAMPLES:
  variant-name expand src/models/shape.ts
  variant-name expand --diff src/models/shape.ts
  variant-name check src/models/shape.ts`;

/**
 * Run the CLI with the given arguments. Returns the process exit code.
 */
export function runCli(args: readonly string[], io: CliIO = consoleIO): number {
  const parsed = parseArgs(args);
  switch (parsed.kind) {
    case "help":
      io.stdout(HELP_TEXT);
      return 0;
    case "error":
      io.stderr(parsed.message);
      return 1;
    case "run":
      return runExpand(parsed.options, io);
  }
}
