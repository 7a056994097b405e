/**
 * Core types for the variant-name macro system
 */

import type ts from "typescript";
import type { RichDiagnostic } from "./diagnostics.js";
import type { VariantNameConfig } from "./config.js";

// ============================================================================
// Macro Kinds
// ============================================================================

export type MacroKind = "attribute" | "derive";

// ============================================================================
// Macro Context - Available to all macros during expansion
// ============================================================================

export interface MacroContext {
  /** Current source file being processed */
  sourceFile: ts.SourceFile;

  /** TypeScript factory for creating nodes */
  factory: ts.NodeFactory;

  /** Resolved configuration for this run */
  config: VariantNameConfig;

  // -------------------------------------------------------------------------
  // Node Creation Utilities
  // -------------------------------------------------------------------------

  /** Create a string literal */
  createStringLiteral(value: string): ts.StringLiteral;

  /**
   * Parse a code string into statements. Comments in the code are carried
   * over as synthetic comments so they survive printing.
   */
  parseStatements(code: string): ts.Statement[];

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Record a fully-built diagnostic */
  report(diagnostic: RichDiagnostic): void;

  /** Report a compile-time error */
  reportError(node: ts.Node, message: string): void;
}

// ============================================================================
// Directives
// ============================================================================

/**
 * A macro directive written as a JSDoc tag in a declaration's leading
 * comment: `@variantName`, `@derive VariantName, Eq`.
 */
export interface Directive {
  /** Tag name without the `@` */
  name: string;

  /** Whitespace, comma or paren separated words following the tag */
  args: string[];

  /** Position of the `@` in the source text */
  pos: number;
}

// ============================================================================
// Macro Definitions
// ============================================================================

/** Base interface for all macro definitions */
export interface MacroDefinitionBase {
  /** Unique name of the macro */
  name: string;

  /** Optional description for documentation */
  description?: string;
}

/**
 * Attribute macro - owns the declaration it is attached to. The returned
 * nodes replace the declaration.
 */
export interface AttributeMacro extends MacroDefinitionBase {
  kind: "attribute";

  /**
   * Expand the attribute macro
   * @param directive - The directive that triggered the expansion
   * @param target - The declaration carrying the directive
   */
  expand(
    ctx: MacroContext,
    directive: Directive,
    target: ts.Statement,
  ): ts.Statement | ts.Statement[];
}

/**
 * Derive macro - observes a declaration and returns statements to be placed
 * after it. The declaration itself is never touched.
 */
export interface DeriveMacro extends MacroDefinitionBase {
  kind: "derive";

  expand(ctx: MacroContext, target: ts.Statement): ts.Statement[];
}

/** Union of all macro types */
export type MacroDefinition = AttributeMacro | DeriveMacro;

// ============================================================================
// Macro Registry
// ============================================================================

export interface MacroRegistry {
  /** Register a new macro */
  register(macro: MacroDefinition): void;

  /** Get an attribute macro by name */
  getAttribute(name: string): AttributeMacro | undefined;

  /** Get a derive macro by name */
  getDerive(name: string): DeriveMacro | undefined;

  /** Get all registered macros */
  getAll(): MacroDefinition[];
}
