/**
 * MacroContext Implementation - Provides utilities for macro expansion
 */

import ts from "typescript";
import type { MacroContext } from "./types.js";
import type { VariantNameConfig } from "./config.js";
import { DiagnosticBuilder, VN9003, type RichDiagnostic } from "./diagnostics.js";
import { parseStatementsWithComments } from "./ast-utils.js";

export class MacroContextImpl implements MacroContext {
  private diagnostics: RichDiagnostic[] = [];

  constructor(
    public readonly sourceFile: ts.SourceFile,
    public readonly factory: ts.NodeFactory,
    public readonly config: VariantNameConfig,
    private readonly onDiagnostic?: (diagnostic: RichDiagnostic) => void,
  ) {}

  // -------------------------------------------------------------------------
  // Node Creation Utilities
  // -------------------------------------------------------------------------

  createStringLiteral(value: string): ts.StringLiteral {
    return this.factory.createStringLiteral(value);
  }

  parseStatements(code: string): ts.Statement[] {
    return parseStatementsWithComments(code);
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  report(diagnostic: RichDiagnostic): void {
    this.diagnostics.push(diagnostic);
    this.onDiagnostic?.(diagnostic);
  }

  reportError(node: ts.Node, message: string): void {
    new DiagnosticBuilder(VN9003, this.sourceFile, (d) => this.report(d))
      .at(node)
      .withArgs({ message })
      .emit();
  }

  getDiagnostics(): readonly RichDiagnostic[] {
    return this.diagnostics;
  }
}

/**
 * Create a macro context for a source file.
 */
export function createMacroContext(
  sourceFile: ts.SourceFile,
  config: VariantNameConfig,
  onDiagnostic?: (diagnostic: RichDiagnostic) => void,
  factory: ts.NodeFactory = ts.factory,
): MacroContextImpl {
  return new MacroContextImpl(sourceFile, factory, config, onDiagnostic);
}
