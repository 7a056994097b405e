/**
 * Call-site folding
 *
 * `Shape.variantName({ kind: "circle", r: 1 })` is known at build time when
 * `Shape` gets its accessor in the same file. Such calls are replaced by the
 * string they would return.
 *
 * `Shape` at the call site must resolve to that declaration: the scopes
 * between the call and the declaring file or namespace block may not bind
 * the name to anything else.
 */

import ts from "typescript";
import { findDirectives } from "../../core/ast-utils.js";
import type { VariantNameConfig } from "../../core/config.js";
import { extractSumType } from "./extract.js";
import {
  ATTRIBUTE_NAME,
  DERIVE_NAME,
  type Branch,
  type BranchTag,
  type InvocationMode,
  type SumType,
} from "./model.js";

function directiveMode(
  statement: ts.Statement,
  sourceFile: ts.SourceFile,
): InvocationMode | undefined {
  for (const directive of findDirectives(statement, sourceFile)) {
    if (directive.name === ATTRIBUTE_NAME) return "attachment";
    if (directive.name === "derive" && directive.args.includes(DERIVE_NAME)) {
      return "annotation";
    }
  }
  return undefined;
}

type Container = ts.SourceFile | ts.ModuleBlock;

export interface FoldTarget {
  readonly sumType: SumType;
  /** Statement list declaring the type */
  readonly container: Container;
}

/**
 * Targets by the dotted path of their namespace, `""` for the top level.
 * Blocks of a namespace declared more than once share a path.
 */
export type FoldTargets = ReadonlyMap<string, readonly FoldTarget[]>;

/** `A.B` for a block of `namespace B` inside `namespace A` */
function containerPath(container: Container): string | undefined {
  const names: string[] = [];
  let node: ts.Node = container;
  while (ts.isModuleBlock(node)) {
    const declaration = node.parent;
    names.unshift(declaration.name.text);
    const outer: ts.Node = declaration.parent;
    if (!ts.isModuleBlock(outer) && !ts.isSourceFile(outer)) return undefined;
    node = outer;
  }
  return names.join(".");
}

/**
 * Sum types in the file (namespaces included) that will receive an accessor.
 */
export function collectFoldTargets(
  sourceFile: ts.SourceFile,
  config: Pick<VariantNameConfig, "accessorName" | "discriminants">,
): FoldTargets {
  const targets = new Map<string, FoldTarget[]>();

  const visitContainer = (container: Container, path: string): void => {
    for (const statement of container.statements) {
      if (
        ts.isModuleDeclaration(statement) &&
        statement.body &&
        ts.isModuleBlock(statement.body)
      ) {
        const name = statement.name.text;
        visitContainer(statement.body, path ? `${path}.${name}` : name);
        continue;
      }
      const mode = directiveMode(statement, sourceFile);
      if (!mode) continue;
      const result = extractSumType(statement, mode, {
        sourceFile,
        discriminants: config.discriminants,
        accessorName: config.accessorName,
      });
      if (!result.ok) continue;
      const list = targets.get(path) ?? [];
      list.push({ sumType: result.sumType, container });
      targets.set(path, list);
    }
  };

  visitContainer(sourceFile, "");
  return targets;
}

// ============================================================================
// Name resolution
// ============================================================================

function bindingNames(name: ts.BindingName): string[] {
  if (ts.isIdentifier(name)) return [name.text];
  const elements: readonly ts.ArrayBindingElement[] = name.elements;
  return elements.flatMap((element) =>
    ts.isOmittedExpression(element) ? [] : bindingNames(element.name),
  );
}

function listDeclares(
  list: ts.VariableDeclarationList,
  name: string,
): boolean {
  return list.declarations.some((d) => bindingNames(d.name).includes(name));
}

function importBinds(statement: ts.ImportDeclaration, name: string): boolean {
  const clause = statement.importClause;
  if (!clause) return false;
  if (clause.name?.text === name) return true;
  const bindings = clause.namedBindings;
  if (!bindings) return false;
  if (ts.isNamespaceImport(bindings)) return bindings.name.text === name;
  return bindings.elements.some((element) => element.name.text === name);
}

/** The statement puts `name` into the value space of its block */
function statementBinds(statement: ts.Statement, name: string): boolean {
  if (ts.isVariableStatement(statement)) {
    return listDeclares(statement.declarationList, name);
  }
  if (
    ts.isFunctionDeclaration(statement) ||
    ts.isClassDeclaration(statement) ||
    ts.isEnumDeclaration(statement) ||
    ts.isModuleDeclaration(statement) ||
    ts.isImportEqualsDeclaration(statement)
  ) {
    return statement.name?.text === name;
  }
  if (ts.isImportDeclaration(statement)) return importBinds(statement, name);
  return false;
}

/** A `var` declared anywhere in the function or block, outside nested functions */
function hoistsVar(root: ts.Node, name: string): boolean {
  const visit = (node: ts.Node): boolean => {
    if (ts.isFunctionLike(node) || ts.isClassLike(node)) return false;
    if (ts.isModuleDeclaration(node)) return false;
    if (
      ts.isVariableDeclarationList(node) &&
      (node.flags & ts.NodeFlags.BlockScoped) === 0 &&
      listDeclares(node, name)
    ) {
      return true;
    }
    return ts.forEachChild(node, visit) ?? false;
  };
  return ts.forEachChild(root, visit) ?? false;
}

/** `scope` binds `name` for the code nested in it */
function bindsValue(scope: ts.Node, name: string): boolean {
  if (ts.isSourceFile(scope) || ts.isModuleBlock(scope)) {
    return (
      scope.statements.some((s) => statementBinds(s, name)) ||
      hoistsVar(scope, name)
    );
  }
  if (ts.isBlock(scope) || ts.isCaseClause(scope) || ts.isDefaultClause(scope)) {
    return scope.statements.some((s) => statementBinds(s, name));
  }
  if (ts.isFunctionLike(scope)) {
    return (
      scope.parameters.some((p) => bindingNames(p.name).includes(name)) ||
      (ts.isFunctionExpression(scope) && scope.name?.text === name) ||
      hoistsVar(scope, name)
    );
  }
  if (ts.isClassExpression(scope)) return scope.name?.text === name;
  if (
    ts.isForStatement(scope) ||
    ts.isForInStatement(scope) ||
    ts.isForOfStatement(scope)
  ) {
    const { initializer } = scope;
    return (
      initializer !== undefined &&
      ts.isVariableDeclarationList(initializer) &&
      listDeclares(initializer, name)
    );
  }
  if (ts.isCatchClause(scope)) {
    const variable = scope.variableDeclaration;
    return variable !== undefined && bindingNames(variable.name).includes(name);
  }
  return false;
}

/**
 * Walk the scopes around `node`, innermost first. `settle` is asked at every
 * file or namespace block before its own bindings are checked; the walk
 * stops at the first scope that settles or binds `name`.
 */
function lookup<T>(
  node: ts.Node,
  name: string,
  settle: (container: Container) => T | undefined,
): T | undefined {
  for (let scope: ts.Node | undefined = node.parent; scope; scope = scope.parent) {
    if (ts.isSourceFile(scope) || ts.isModuleBlock(scope)) {
      const settled = settle(scope);
      if (settled !== undefined) return settled;
    }
    if (bindsValue(scope, name)) return undefined;
  }
  return undefined;
}

function resolveTarget(
  call: ts.CallExpression,
  name: string,
  targets: FoldTargets,
): SumType | null | undefined {
  return lookup<SumType | null>(call, name, (container) => {
    const path = containerPath(container);
    if (path === undefined) return undefined;
    const candidates = (targets.get(path) ?? []).filter(
      (target) =>
        target.sumType.name === name &&
        (target.container === container || target.sumType.exported),
    );
    if (candidates.length === 0) return undefined;
    // two declarations answer to the name
    return candidates.length === 1 ? candidates[0].sumType : null;
  });
}

/** `name` at `node` refers to an enum declared in an enclosing block */
function resolvesToEnum(node: ts.Node, name: string): boolean {
  return (
    lookup(node, name, (container) =>
      container.statements.some(
        (s) => ts.isEnumDeclaration(s) && s.name.text === name,
      )
        ? true
        : undefined,
    ) ?? false
  );
}

// ============================================================================
// Static evaluation of the argument
// ============================================================================

type Literal = string | number | boolean;

function unwrap(expr: ts.Expression): ts.Expression {
  let current = expr;
  while (
    ts.isParenthesizedExpression(current) ||
    ts.isAsExpression(current) ||
    ts.isSatisfiesExpression(current) ||
    ts.isNonNullExpression(current)
  ) {
    current = current.expression;
  }
  return current;
}

function literalValue(expr: ts.Expression): Literal | undefined {
  const node = unwrap(expr);
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return node.text;
  }
  if (ts.isNumericLiteral(node)) return Number(node.text);
  if (
    ts.isPrefixUnaryExpression(node) &&
    node.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(node.operand)
  ) {
    return -Number(node.operand.text);
  }
  if (node.kind === ts.SyntaxKind.TrueKeyword) return true;
  if (node.kind === ts.SyntaxKind.FalseKeyword) return false;
  return undefined;
}

/** Evaluating the expression runs no user code */
function isPure(expr: ts.Expression): boolean {
  const node = unwrap(expr);
  if (literalValue(node) !== undefined) return true;
  switch (node.kind) {
    case ts.SyntaxKind.NullKeyword:
    case ts.SyntaxKind.BigIntLiteral:
    case ts.SyntaxKind.Identifier:
    case ts.SyntaxKind.ArrowFunction:
    case ts.SyntaxKind.FunctionExpression:
      return true;
  }
  if (ts.isPrefixUnaryExpression(node)) {
    return (
      node.operator !== ts.SyntaxKind.PlusPlusToken &&
      node.operator !== ts.SyntaxKind.MinusMinusToken &&
      isPure(node.operand)
    );
  }
  if (ts.isArrayLiteralExpression(node)) {
    return node.elements.every(
      (element) => !ts.isSpreadElement(element) && isPure(element),
    );
  }
  if (ts.isObjectLiteralExpression(node)) {
    return node.properties.every(isPureProperty);
  }
  return false;
}

function isPureProperty(property: ts.ObjectLiteralElementLike): boolean {
  if (ts.isSpreadAssignment(property)) return false;
  if (ts.isComputedPropertyName(property.name)) return false;
  if (ts.isPropertyAssignment(property)) return isPure(property.initializer);
  // shorthand references, methods and accessors only define things
  return true;
}

function staticKey(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) return name.text;
  if (ts.isNumericLiteral(name)) return String(Number(name.text));
  return undefined;
}

/**
 * The discriminant of a side-effect free object literal: a literal or an
 * `Enum.Member` access.
 */
function discriminantOf(
  expr: ts.Expression,
  discriminant: string,
): ts.Expression | undefined {
  if (!ts.isObjectLiteralExpression(expr)) return undefined;

  let tag: ts.Expression | undefined;
  for (const property of expr.properties) {
    if (ts.isSpreadAssignment(property)) return undefined;
    const key = staticKey(property.name);
    if (key === undefined) return undefined;
    if (key !== discriminant) {
      if (!isPureProperty(property)) return undefined;
      continue;
    }
    if (!ts.isPropertyAssignment(property)) return undefined;
    tag = unwrap(property.initializer);
    if (literalValue(tag) === undefined && !memberAccess(tag)) return undefined;
  }
  return tag;
}

/** `Color.Red` or `Color["Red"]` */
function memberAccess(
  expr: ts.Expression,
): { object: string; member: string } | undefined {
  if (
    ts.isPropertyAccessExpression(expr) &&
    ts.isIdentifier(expr.expression) &&
    ts.isIdentifier(expr.name)
  ) {
    return { object: expr.expression.text, member: expr.name.text };
  }
  if (
    ts.isElementAccessExpression(expr) &&
    ts.isIdentifier(expr.expression) &&
    ts.isStringLiteral(expr.argumentExpression)
  ) {
    return {
      object: expr.expression.text,
      member: expr.argumentExpression.text,
    };
  }
  return undefined;
}

function enumMember(expr: ts.Expression, enumName: string): string | undefined {
  const access = memberAccess(expr);
  return access?.object === enumName ? access.member : undefined;
}

export interface FoldedCall {
  typeName: string;
  /** The string the call returns */
  name: string;
}

function tagMatches(
  tag: BranchTag,
  expr: ts.Expression,
  call: ts.CallExpression,
): boolean {
  if (tag.kind === "literal") return literalValue(expr) === tag.value;
  return (
    enumMember(expr, tag.enumName) === tag.member &&
    resolvesToEnum(call, tag.enumName)
  );
}

/**
 * The result of an accessor call when it is statically known.
 */
export function foldAccessorCall(
  call: ts.CallExpression,
  targets: FoldTargets,
  accessorName: string,
): FoldedCall | undefined {
  const callee = call.expression;
  if (
    !ts.isPropertyAccessExpression(callee) ||
    !ts.isIdentifier(callee.expression) ||
    !ts.isIdentifier(callee.name) ||
    callee.name.text !== accessorName ||
    call.arguments.length !== 1
  ) {
    return undefined;
  }

  const sumType = resolveTarget(call, callee.expression.text, targets);
  if (!sumType) return undefined;

  const [argument] = call.arguments;
  const expr = unwrap(argument);

  let branch: Branch | undefined;
  if (sumType.form === "enum") {
    const member = enumMember(expr, sumType.name);
    branch = sumType.branches.find(
      (b) => b.tag.kind === "member" && b.tag.member === member,
    );
  } else {
    const tag = discriminantOf(expr, sumType.discriminant);
    branch =
      tag === undefined
        ? undefined
        : sumType.branches.find((b) => tagMatches(b.tag, tag, call));
  }

  return branch ? { typeName: sumType.name, name: branch.name } : undefined;
}
