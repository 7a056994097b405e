/**
 * Test utilities for running and type-checking generated code in process.
 */

import * as vm from "node:vm";
import ts from "typescript";

const TRANSPILE_OPTIONS: ts.TranspileOptions = {
  compilerOptions: {
    module: ts.ModuleKind.CommonJS,
    target: ts.ScriptTarget.ES2022,
  },
  reportDiagnostics: false,
};

/**
 * Transpile a TypeScript module to CommonJS and run it in a fresh VM
 * context. Returns the module's exports.
 */
export function evaluateModule(code: string): Record<string, unknown> {
  const { outputText } = ts.transpileModule(code, TRANSPILE_OPTIONS);
  const exports: Record<string, unknown> = {};
  vm.runInNewContext(
    outputText,
    { exports, module: { exports } },
    { filename: "generated.js", timeout: 1000 },
  );
  return exports;
}

/**
 * Read a dotted path (`Shapes.Shape`) out of a module's exports.
 */
export function getExport(
  exports: Record<string, unknown>,
  dottedPath: string,
): unknown {
  let current: unknown = exports;
  for (const key of dottedPath.split(".")) {
    if (
      (typeof current !== "object" && typeof current !== "function") ||
      current === null
    ) {
      throw new Error(`Cannot read ${key} of ${dottedPath}`);
    }
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Call a function found at a dotted path, with `this` bound to its owner.
 */
export function callExport(
  exports: Record<string, unknown>,
  dottedPath: string,
  ...args: unknown[]
): unknown {
  const dot = dottedPath.lastIndexOf(".");
  const owner = dot === -1 ? exports : getExport(exports, dottedPath.slice(0, dot));
  const fn = getExport(exports, dottedPath);
  if (typeof fn !== "function") {
    throw new Error(`${dottedPath} is not a function`);
  }
  return Reflect.apply(fn, owner, args);
}

const CHECK_OPTIONS: ts.CompilerOptions = {
  strict: true,
  noEmit: true,
  noImplicitReturns: true,
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  lib: ["lib.es2022.d.ts"],
  types: [],
};

/**
 * Type-check a single in-memory file under `strict`. Returns the messages of
 * every diagnostic.
 */
export function typeCheck(code: string, fileName = "generated.ts"): string[] {
  const sourceFile = ts.createSourceFile(
    fileName,
    code,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS,
  );
  const host = ts.createCompilerHost(CHECK_OPTIONS);
  const program = ts.createProgram([fileName], CHECK_OPTIONS, {
    ...host,
    getSourceFile: (name, languageVersion) =>
      name === fileName ? sourceFile : host.getSourceFile(name, languageVersion),
    fileExists: (name) => name === fileName || host.fileExists(name),
  });

  return ts
    .getPreEmitDiagnostics(program)
    .map((d) => ts.flattenDiagnosticMessageText(d.messageText, "\n"));
}
