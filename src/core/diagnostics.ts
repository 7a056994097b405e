/**
 * Diagnostics System for variant-name
 *
 * Provides compiler-style error messages with:
 * - Structured error codes (VN9001-VN9999)
 * - Notes and help lines attached to a primary span
 * - Builder API for macro authors
 *
 * @example
 * ```typescript
 * new DiagnosticBuilder(VN9001, sourceFile, emit)
 *   .at(declaration.name)
 *   .withArgs({ directive: "variantName", name: "Point", description: "an interface" })
 *   .note("interfaces describe a single shape")
 *   .help("declare Point as a discriminated union or an enum")
 *   .emit();
 * ```
 */

import type ts from "typescript";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Target = "target",
  Directive = "directive",
  Expansion = "expansion",
}

export type DiagnosticSeverity = "error" | "warning";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 9001-9999 */
  readonly code: number;

  readonly severity: DiagnosticSeverity;

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for docs and --explain */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/**
 * Structured diagnostic with a primary span, notes and help.
 * This is the form that renders to CLI output.
 */
export interface RichDiagnostic {
  /** The error code from the catalog */
  code: number;

  severity: DiagnosticSeverity;

  category: DiagnosticCategory;

  /** Primary message (with placeholders interpolated) */
  message: string;

  /** The primary span (main error location) */
  primarySpan?: {
    node: ts.Node;
    sourceFile: ts.SourceFile;
  };

  /** Additional notes (not attached to spans) */
  notes: string[];

  /** Help text (actionable suggestion in prose) */
  help?: string;

  /** Long-form explanation from the catalog */
  explanation?: string;
}

/**
 * Plain location record of a diagnostic, detached from the AST.
 * Lines and columns are 1-based.
 */
export interface DiagnosticLocation {
  fileName: string;
  start: number;
  length: number;
  line: number;
  column: number;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly sourceFile: ts.SourceFile,
    private readonly emitter: (diagnostic: RichDiagnostic) => void = () => {},
  ) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(node: ts.Node): this {
    this.diagnostic.primarySpan = { node, sourceFile: this.sourceFile };
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  private interpolateMessage(): string {
    let message = this.descriptor.messageTemplate;
    for (const [key, value] of Object.entries(this.args)) {
      message = message.split(`{${key}}`).join(value);
    }
    return message;
  }

  /**
   * Finish the diagnostic without emitting it.
   */
  build(): RichDiagnostic {
    return {
      ...this.diagnostic,
      notes: [...this.diagnostic.notes],
      message: this.interpolateMessage(),
    };
  }

  /**
   * Emit the diagnostic via the registered emitter.
   */
  emit(): RichDiagnostic {
    const diagnostic = this.build();
    this.emitter(diagnostic);
    return diagnostic;
  }
}

// ============================================================================
// Error Catalog
// ============================================================================

export const VN9001: DiagnosticDescriptor = {
  code: 9001,
  severity: "error",
  category: DiagnosticCategory.Target,
  messageTemplate:
    "@{directive} is only applicable to sum types: `{name}` is {description}",
  explanation: `The variant-name directives generate a dispatch over the variants
of a sum type. A sum type is either:

  - a union type alias whose members are object types sharing a literal
    discriminant property, e.g.
      type Shape = { kind: "circle"; r: number } | { kind: "square"; s: number };
  - an enum with at least one member.

Interfaces, classes and object-type aliases have a single shape and carry no
variant name to report.`,
};

export const VN9002: DiagnosticDescriptor = {
  code: 9002,
  severity: "warning",
  category: DiagnosticCategory.Directive,
  messageTemplate: "Unknown derive `{name}`",
  explanation: `@derive names a derive macro registered with the macro registry.
The name did not match any registered derive and was skipped.`,
};

export const VN9003: DiagnosticDescriptor = {
  code: 9003,
  severity: "error",
  category: DiagnosticCategory.Expansion,
  messageTemplate: "{message}",
  explanation: `A macro threw while expanding. The declaration was left as written.`,
};

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> =
  new Map([
    [VN9001.code, VN9001],
    [VN9002.code, VN9002],
    [VN9003.code, VN9003],
  ]);

/**
 * Get a diagnostic descriptor by code.
 */
export function getDiagnosticDescriptor(
  code: number,
): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

// ============================================================================
// Locations
// ============================================================================

/**
 * Get line and column from a node's position.
 */
function getLineAndColumn(
  sourceFile: ts.SourceFile,
  pos: number,
): { line: number; column: number } {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(pos);
  return { line: line + 1, column: character + 1 };
}

/**
 * Resolve the primary span of a diagnostic to a plain location record.
 */
export function diagnosticLocation(
  diagnostic: RichDiagnostic,
): DiagnosticLocation | undefined {
  if (!diagnostic.primarySpan) return undefined;
  const { node, sourceFile } = diagnostic.primarySpan;
  const start = node.getStart(sourceFile);
  const { line, column } = getLineAndColumn(sourceFile, start);
  return {
    fileName: sourceFile.fileName,
    start,
    length: node.getEnd() - start,
    line,
    column,
  };
}

// ============================================================================
// CLI Renderer: Compiler-Style Error Output
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  green: "\x1b[32m",
} as const;

type Style = keyof typeof COLORS;

/**
 * Colors are on unless NO_COLOR is set or FORCE_COLOR=0.
 */
export function colorsEnabled(): boolean {
  const env = process.env;
  return !env.NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: DiagnosticSeverity): "red" | "yellow" {
  return severity === "error" ? "red" : "yellow";
}

function getLineText(sourceFile: ts.SourceFile, lineNumber: number): string {
  const lines = sourceFile.text.split("\n");
  return (lines[lineNumber - 1] ?? "").replace(/\r$/, "");
}

function lineNumberWidth(maxLine: number): number {
  return Math.max(3, String(maxLine).length);
}

function createUnderline(startColumn: number, length: number): string {
  return " ".repeat(startColumn - 1) + "^".repeat(Math.max(1, length));
}

/**
 * Options for CLI rendering.
 */
export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Number of context lines before/after the error (default: 2) */
  contextLines?: number;
  /** Whether to show the explanation (default: false) */
  showExplanation?: boolean;
}

/**
 * Render a RichDiagnostic to CLI output.
 *
 * @example Output:
 * ```
 * error[VN9001]: @variantName is only applicable to sum types: `Point` is an interface
 *   --> src/point.ts:2:11
 *     |
 *   1 | /** @variantName *\/
 *   2 | interface Point {
 *     |           ^^^^^
 *   3 |   x: number;
 *     |
 *    = note: interfaces describe a single shape
 * ```
 */
export function renderDiagnosticCLI(
  diagnostic: RichDiagnostic,
  options: CLIRenderOptions = {},
): string {
  const { contextLines = 2, showExplanation = false } = options;
  const useColors = options.colors ?? colorsEnabled();
  const color = (text: string, ...styles: Style[]): string =>
    useColors
      ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}`
      : text;

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);

  lines.push(
    `${color(`${diagnostic.severity}[VN${diagnostic.code}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`,
  );

  if (diagnostic.primarySpan) {
    const { node, sourceFile } = diagnostic.primarySpan;
    const startPos = getLineAndColumn(sourceFile, node.getStart(sourceFile));
    const endPos = getLineAndColumn(sourceFile, node.getEnd());
    const lastLine = sourceFile.getLineStarts().length;

    lines.push(
      `  ${color("-->", "blue")} ${sourceFile.fileName}:${startPos.line}:${startPos.column}`,
    );

    const minLine = Math.max(1, startPos.line - contextLines);
    const maxLine = Math.min(lastLine, endPos.line + contextLines);
    const numWidth = lineNumberWidth(maxLine);
    const gutter = " ".repeat(numWidth);
    const bar = color("|", "blue");

    lines.push(` ${gutter} ${bar}`);

    for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
      const lineText = getLineText(sourceFile, lineNum);
      const lineNumStr = String(lineNum).padStart(numWidth, " ");
      lines.push(` ${color(lineNumStr, "blue")} ${bar} ${lineText}`.trimEnd());

      if (lineNum >= startPos.line && lineNum <= endPos.line) {
        const lineStartCol = lineNum === startPos.line ? startPos.column : 1;
        const lineEndCol =
          lineNum === endPos.line ? endPos.column : lineText.length + 1;
        const underline = createUnderline(
          lineStartCol,
          lineEndCol - lineStartCol,
        );
        lines.push(` ${gutter} ${bar} ${color(underline, severityClr)}`);
      }
    }

    lines.push(` ${gutter} ${bar}`);
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`.trimEnd());
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(
  diagnostics: readonly RichDiagnostic[],
  options: CLIRenderOptions = {},
): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const lines: string[] = [];
  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) {
    parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  }
  if (warnCount > 0) {
    parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  }
  if (parts.length > 0) {
    lines.push(`${parts.join(", ")} generated`);
  }

  return lines.join("\n");
}
