/**
 * Shared AST utility functions for macro implementations.
 */

import ts from "typescript";
import type { Directive } from "./types.js";

// =============================================================================
// stripPositions: detach parsed nodes from their temporary source file
// =============================================================================

/**
 * Recursively set all node positions to -1 (synthesized).
 *
 * Nodes parsed from a temporary source file carry positions that point into
 * that file's text. Printed against any other file, the printer would slice
 * the wrong text for identifiers and literals.
 */
export function stripPositions<T extends ts.Node>(node: T): T {
  ts.setTextRange(node, { pos: -1, end: -1 });
  ts.forEachChild(node, (child) => {
    stripPositions(child);
  });
  return node;
}

// =============================================================================
// Parsing with comments
// =============================================================================

function commentText(text: string, range: ts.CommentRange): string {
  if (range.kind === ts.SyntaxKind.SingleLineCommentTrivia) {
    return text.slice(range.pos + 2, range.end);
  }
  // Continuation lines are re-indented by the printer relative to the
  // statement, so keep a single leading space before each `*`.
  return text.slice(range.pos + 2, range.end - 2).replace(/\n[ \t]*/g, "\n ");
}

/**
 * Parse a code string into statements whose comments survive printing.
 *
 * Every leading comment in the text is attached as a synthetic leading
 * comment to the outermost node that starts after it; positions are then
 * stripped.
 */
export function parseStatementsWithComments(code: string): ts.Statement[] {
  const temp = ts.createSourceFile(
    "__macro_temp__.ts",
    code,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS,
  );
  const text = temp.text;
  const claimed = new Set<number>();

  const attach = (node: ts.Node): void => {
    const ranges = ts.getLeadingCommentRanges(text, node.pos) ?? [];
    const fresh = ranges.filter((range) => !claimed.has(range.pos));
    if (fresh.length > 0) {
      ts.setSyntheticLeadingComments(
        node,
        fresh.map((range): ts.SynthesizedComment => {
          claimed.add(range.pos);
          return {
            kind: range.kind,
            text: commentText(text, range),
            hasTrailingNewLine: range.hasTrailingNewLine ?? false,
            pos: -1,
            end: -1,
          };
        }),
      );
    }
    ts.forEachChild(node, attach);
  };

  temp.statements.forEach(attach);
  return temp.statements.map((statement) => stripPositions(statement));
}

// =============================================================================
// Directives
// =============================================================================

const TAG_PATTERN = /(?:^|[\s*])@([A-Za-z_$][\w$]*)([^\n@]*)/g;

/**
 * Find the JSDoc directives (`@variantName`, `@derive VariantName`) written in
 * the doc comments directly in front of a statement, in source order.
 */
export function findDirectives(
  node: ts.Node,
  sourceFile: ts.SourceFile,
): Directive[] {
  const text = sourceFile.text;
  const ranges = ts.getLeadingCommentRanges(text, node.getFullStart()) ?? [];
  const directives: Directive[] = [];

  for (const range of ranges) {
    const comment = text.slice(range.pos, range.end);
    if (!comment.startsWith("/**")) continue;

    for (const match of comment.matchAll(TAG_PATTERN)) {
      const [whole, name, rest] = match;
      const args = rest
        .replace(/\*\/\s*$/, "")
        .split(/[\s,()]+/)
        .filter((word) => word.length > 0 && word !== "*");
      const offset = (match.index ?? 0) + whole.indexOf("@");
      directives.push({ name, args, pos: range.pos + offset });
    }
  }

  return directives;
}

// =============================================================================
// Declarations
// =============================================================================

/**
 * The name node of a declaration statement, if it has one.
 */
export function declarationName(
  statement: ts.Statement,
): ts.Identifier | undefined {
  if (
    ts.isTypeAliasDeclaration(statement) ||
    ts.isInterfaceDeclaration(statement) ||
    ts.isEnumDeclaration(statement)
  ) {
    return statement.name;
  }
  if (ts.isClassDeclaration(statement) || ts.isFunctionDeclaration(statement)) {
    return statement.name;
  }
  if (ts.isModuleDeclaration(statement) && ts.isIdentifier(statement.name)) {
    return statement.name;
  }
  if (ts.isVariableStatement(statement)) {
    const [first] = statement.declarationList.declarations;
    if (first && ts.isIdentifier(first.name)) return first.name;
  }
  return undefined;
}

export function hasModifier(node: ts.Node, kind: ts.ModifierSyntaxKind): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  return ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false;
}

/**
 * Render `object.key` or `object["key"]` for a property key.
 */
export function propertyAccess(object: string, key: string): string {
  return ts.isIdentifierText(key, ts.ScriptTarget.Latest)
    ? `${object}.${key}`
    : `${object}[${JSON.stringify(key)}]`;
}
