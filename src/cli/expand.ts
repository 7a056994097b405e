/**
 * variant-name expand / check
 *
 * Expands the directives of one file and prints the result, or only checks
 * that every directive expands.
 *
 * Usage:
 *   variant-name expand src/models/shape.ts
 *   variant-name expand --diff src/models/shape.ts
 *   variant-name expand src/models/shape.ts --out src/models/shape.expanded.ts
 *   variant-name check src/models/shape.ts
 */

import * as fs from "fs";
import * as path from "path";
import {
  ConfigError,
  loadConfig,
  type VariantNameConfig,
} from "../core/config.js";
import { colorsEnabled, renderDiagnosticsCLI } from "../core/diagnostics.js";
import { transformSource } from "../transforms/macro-transformer.js";

export interface ExpandOptions {
  /** File to expand */
  file: string;

  /** Only report diagnostics, print no code */
  check: boolean;

  /** Show a line diff between original and expanded */
  diff: boolean;

  /** Write the expanded code here instead of stdout */
  out?: string;

  /** Enable verbose logging */
  verbose: boolean;

  /** Colored output (default: auto-detect) */
  colors?: boolean;
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const consoleIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

/**
 * Run the expand (or check) command. Returns the process exit code.
 */
export function runExpand(options: ExpandOptions, io: CliIO = consoleIO): number {
  const absolutePath = path.resolve(options.file);

  if (!fs.existsSync(absolutePath)) {
    io.stderr(`File not found: ${absolutePath}`);
    return 1;
  }

  let config: VariantNameConfig;
  try {
    config = loadConfig(path.dirname(absolutePath));
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }
  if (options.verbose) config.verbose = true;

  const originalSource = fs.readFileSync(absolutePath, "utf-8");
  const result = transformSource(originalSource, {
    fileName: options.file,
    config,
  });

  const useColors = options.colors ?? colorsEnabled();
  if (result.diagnostics.length > 0) {
    io.stderr(renderDiagnosticsCLI(result.diagnostics, { colors: useColors }));
  }
  if (result.diagnostics.some((d) => d.severity === "error")) {
    return 1;
  }

  if (options.check) {
    io.stdout(
      `${options.file}: ${result.expanded} expanded, ${result.folded} folded`,
    );
    return 0;
  }

  if (options.diff) {
    printDiff(io, originalSource, result.code, options.file, useColors);
  } else if (options.out) {
    fs.writeFileSync(path.resolve(options.out), result.code, "utf-8");
    io.stdout(`Wrote ${options.out}`);
  } else {
    io.stdout(result.code);
  }

  return 0;
}

/**
 * Print a simple line diff between original and expanded source.
 */
function printDiff(
  io: CliIO,
  original: string,
  expanded: string,
  filePath: string,
  useColors: boolean,
): void {
  const origLines = original.split("\n");
  const expLines = expanded.split("\n");
  const paint = (code: string, text: string): string =>
    useColors ? `\x1b[${code}m${text}\x1b[0m` : text;

  io.stdout(`--- ${filePath} (original)`);
  io.stdout(`+++ ${filePath} (expanded)`);

  const hunks: Array<{
    origStart: number;
    origLines: string[];
    expLines: string[];
  }> = [];
  let inHunk = false;

  const maxLen = Math.max(origLines.length, expLines.length);
  for (let i = 0; i < maxLen; i++) {
    const origLine = origLines[i] ?? "";
    const expLine = expLines[i] ?? "";

    if (origLine === expLine) {
      inHunk = false;
      continue;
    }
    if (!inHunk) {
      inHunk = true;
      hunks.push({ origStart: i, origLines: [], expLines: [] });
    }
    const hunk = hunks[hunks.length - 1];
    if (i < origLines.length) hunk.origLines.push(origLine);
    if (i < expLines.length) hunk.expLines.push(expLine);
  }

  if (hunks.length === 0) {
    io.stdout("(no changes)");
    return;
  }

  for (const hunk of hunks) {
    io.stdout(
      `@@ -${hunk.origStart + 1},${hunk.origLines.length} +${hunk.origStart + 1},${hunk.expLines.length} @@`,
    );
    for (const line of hunk.origLines) io.stdout(paint("31", `- ${line}`));
    for (const line of hunk.expLines) io.stdout(paint("32", `+ ${line}`));
  }
}
