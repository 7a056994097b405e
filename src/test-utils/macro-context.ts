/**
 * Test utilities for creating MacroContext instances
 */

import ts from "typescript";
import { resolveConfig, type VariantNameUserConfig } from "../core/config.js";
import { MacroContextImpl } from "../core/context.js";
import type { RichDiagnostic } from "../core/diagnostics.js";

export interface TestMacroContext {
  ctx: MacroContextImpl;
  sourceFile: ts.SourceFile;
  /** Diagnostics reported through the context, in order */
  diagnostics: RichDiagnostic[];
}

/**
 * Parse source as a TypeScript file with parent pointers set.
 */
export function parseSource(source: string, fileName = "test.ts"): ts.SourceFile {
  return ts.createSourceFile(
    fileName,
    source,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS,
  );
}

/**
 * Create a MacroContext over a source string.
 */
export function createMacroTestContext(
  source: string,
  config: VariantNameUserConfig = {},
): TestMacroContext {
  const sourceFile = parseSource(source);
  const diagnostics: RichDiagnostic[] = [];
  const ctx = new MacroContextImpl(
    sourceFile,
    ts.factory,
    resolveConfig(config),
    (d) => diagnostics.push(d),
  );
  return { ctx, sourceFile, diagnostics };
}

/**
 * The top-level statement declaring `name`.
 */
export function findStatement(
  sourceFile: ts.SourceFile,
  name: string,
): ts.Statement {
  const statement = sourceFile.statements.find(
    (s) =>
      (ts.isTypeAliasDeclaration(s) ||
        ts.isInterfaceDeclaration(s) ||
        ts.isEnumDeclaration(s) ||
        ts.isClassDeclaration(s)) &&
      s.name?.text === name,
  );
  if (!statement) throw new Error(`No declaration named ${name}`);
  return statement;
}
