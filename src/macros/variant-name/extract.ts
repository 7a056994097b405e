/**
 * Declaration Extractor
 *
 * Reads a declaration statement and decides whether it is a sum type: a
 * union type alias whose members share a literal discriminant, or an enum.
 * Works on the syntax tree alone; no type checker is involved, so union
 * members written as references must resolve to interfaces or object-type
 * aliases declared in the same file.
 */

import ts from "typescript";
import {
  declarationName,
  hasModifier,
  propertyAccess,
} from "../../core/ast-utils.js";
import type {
  Branch,
  BranchTag,
  BranchShape,
  ExtractResult,
  GenericModifier,
  GenericParam,
  InvocationMode,
} from "./model.js";

export interface ExtractOptions {
  sourceFile: ts.SourceFile;
  /** Discriminant properties tried first, in order */
  discriminants?: readonly string[];
  /** Name of the generated accessor; enum members may not take it */
  accessorName?: string;
}

const DEFAULT_ACCESSOR_NAME = "variantName";

export const DEFAULT_DISCRIMINANTS: readonly string[] = [
  "kind",
  "_tag",
  "type",
  "tag",
];

type LiteralValue = string | number | boolean;

// ============================================================================
// Entry point
// ============================================================================

/**
 * Extract the sum type declared by `statement`.
 *
 * Both invocation modes run the same checks; `mode` only travels with the
 * error so the reporter can name the directive.
 */
export function extractSumType(
  statement: ts.Statement,
  mode: InvocationMode,
  options: ExtractOptions,
): ExtractResult {
  if (ts.isEnumDeclaration(statement)) {
    return extractEnum(statement, mode, options);
  }
  if (ts.isTypeAliasDeclaration(statement)) {
    return extractUnion(statement, mode, options);
  }
  return fail(
    mode,
    statement,
    describeStatement(statement),
    ts.isInterfaceDeclaration(statement) || ts.isClassDeclaration(statement)
      ? "it describes a single shape, so there is no variant to name"
      : "only union type aliases and enums have variants",
  );
}

function fail(
  mode: InvocationMode,
  statement: ts.Statement,
  description: string,
  reason: string,
): ExtractResult {
  const nameNode = declarationName(statement);
  return {
    ok: false,
    error: {
      kind: "InvalidTarget",
      mode,
      name: nameNode?.text ?? "<anonymous>",
      node: nameNode ?? statement,
      description,
      reason,
    },
  };
}

function describeStatement(statement: ts.Statement): string {
  if (ts.isInterfaceDeclaration(statement)) return "an interface";
  if (ts.isClassDeclaration(statement)) return "a class";
  if (ts.isFunctionDeclaration(statement)) return "a function";
  if (ts.isVariableStatement(statement)) return "a variable";
  if (ts.isModuleDeclaration(statement)) return "a namespace";
  return "not a type declaration";
}

function literalKey(value: LiteralValue): string {
  return `${typeof value}:${String(value)}`;
}

function unwrapParens(type: ts.TypeNode): ts.TypeNode {
  let current = type;
  while (ts.isParenthesizedTypeNode(current)) current = current.type;
  return current;
}

function nameText(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name)) return name.text;
  if (ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
  if (ts.isNoSubstitutionTemplateLiteral(name)) return name.text;
  return undefined;
}

// ============================================================================
// Enums
// ============================================================================

function enumMemberValue(
  initializer: ts.Expression | undefined,
  next: number | undefined,
): string | number | undefined {
  if (!initializer) return next;

  let expr = initializer;
  while (ts.isParenthesizedExpression(expr)) expr = expr.expression;

  if (ts.isStringLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) {
    return expr.text;
  }
  if (ts.isNumericLiteral(expr)) return Number(expr.text);
  if (
    ts.isPrefixUnaryExpression(expr) &&
    expr.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(expr.operand)
  ) {
    return -Number(expr.operand.text);
  }
  return undefined;
}

interface EnumMember {
  readonly name: string;
  readonly value: string | number;
}

type EnumMembers =
  | { readonly ok: true; readonly members: readonly EnumMember[] }
  | { readonly ok: false; readonly description: string; readonly reason: string };

/** Members with literal, distinct values, in declaration order */
function readEnumMembers(
  declaration: ts.EnumDeclaration,
  sourceFile: ts.SourceFile,
): EnumMembers {
  if (declaration.members.length === 0) {
    return {
      ok: false,
      description: "an empty enum",
      reason: "an enum needs at least one member to have a variant",
    };
  }

  const seen = new Map<string, string>();
  const members: EnumMember[] = [];
  let next: number | undefined = 0;

  for (const member of declaration.members) {
    const name = nameText(member.name);
    if (name === undefined) {
      return {
        ok: false,
        description: "an enum with computed member names",
        reason: `member \`${member.name.getText(sourceFile)}\` has a computed name`,
      };
    }

    const value = enumMemberValue(member.initializer, next);
    if (value === undefined) {
      return {
        ok: false,
        description: "an enum with non-literal members",
        reason: `member \`${name}\` is not initialized with a string or number literal`,
      };
    }
    next = typeof value === "number" ? value + 1 : undefined;

    const key = literalKey(value);
    const previous = seen.get(key);
    if (previous !== undefined) {
      return {
        ok: false,
        description: "an enum with aliased members",
        reason: `members \`${previous}\` and \`${name}\` share the value ${JSON.stringify(value)}`,
      };
    }
    seen.set(key, name);
    members.push({ name, value });
  }

  return { ok: true, members };
}

function isAmbient(declaration: ts.EnumDeclaration): boolean {
  return (
    hasModifier(declaration, ts.SyntaxKind.DeclareKeyword) ||
    (declaration.flags & ts.NodeFlags.Ambient) !== 0
  );
}

function extractEnum(
  declaration: ts.EnumDeclaration,
  mode: InvocationMode,
  options: ExtractOptions,
): ExtractResult {
  // The companion namespace merges with the enum object at run time
  if (hasModifier(declaration, ts.SyntaxKind.ConstKeyword)) {
    return fail(
      mode,
      declaration,
      "a const enum",
      "a const enum has no runtime object to merge a namespace with",
    );
  }
  if (isAmbient(declaration)) {
    return fail(
      mode,
      declaration,
      "an ambient enum",
      "a declared enum has no implementation in this file to merge a namespace with",
    );
  }

  const read = readEnumMembers(declaration, options.sourceFile);
  if (!read.ok) return fail(mode, declaration, read.description, read.reason);

  const enumName = declaration.name.text;
  const accessorName = options.accessorName ?? DEFAULT_ACCESSOR_NAME;
  if (read.members.some((member) => member.name === accessorName)) {
    return fail(
      mode,
      declaration,
      "an enum with a member named like its accessor",
      `member \`${accessorName}\` would collide with the generated \`${accessorName}\` function`,
    );
  }

  return {
    ok: true,
    sumType: {
      form: "enum",
      name: enumName,
      generics: [],
      branches: read.members.map(({ name }): Branch => ({
        name,
        tag: { kind: "member", enumName, member: name },
        shape: { kind: "empty" },
      })),
      exported: hasModifier(declaration, ts.SyntaxKind.ExportKeyword),
    },
  };
}

// ============================================================================
// Discriminated unions
// ============================================================================

interface ResolvedMember {
  /** Name of the referenced declaration, for `A | B` written by reference */
  label?: string;
  elements: readonly ts.TypeElement[];
}

function literalOf(type: ts.TypeNode | undefined): LiteralValue | undefined {
  if (!type) return undefined;
  const node = unwrapParens(type);
  if (!ts.isLiteralTypeNode(node)) return undefined;

  const literal = node.literal;
  if (ts.isStringLiteral(literal) || ts.isNoSubstitutionTemplateLiteral(literal)) {
    return literal.text;
  }
  if (ts.isNumericLiteral(literal)) return Number(literal.text);
  if (literal.kind === ts.SyntaxKind.TrueKeyword) return true;
  if (literal.kind === ts.SyntaxKind.FalseKeyword) return false;
  if (
    ts.isPrefixUnaryExpression(literal) &&
    literal.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(literal.operand)
  ) {
    return -Number(literal.operand.text);
  }
  return undefined;
}

/**
 * A discriminant value: a literal type, or an enum member type (`Kind.Circle`)
 * of an enum declared in the same scope or file.
 */
interface TagValue {
  /** Identity of the runtime value */
  readonly key: string;
  readonly tag: BranchTag;
  /** Variant name when the member is written inline */
  readonly name: string;
  /** The value as written in messages */
  readonly display: string;
}

function enumMemberType(
  type: ts.TypeNode,
  scope: readonly ts.Statement[],
  sourceFile: ts.SourceFile,
): TagValue | undefined {
  const node = unwrapParens(type);
  if (
    !ts.isTypeReferenceNode(node) ||
    node.typeArguments ||
    !ts.isQualifiedName(node.typeName) ||
    !ts.isIdentifier(node.typeName.left)
  ) {
    return undefined;
  }

  const enumName = node.typeName.left.text;
  const member = node.typeName.right.text;
  const declaration = scope.find(
    (s): s is ts.EnumDeclaration =>
      ts.isEnumDeclaration(s) && s.name.text === enumName,
  );
  if (!declaration) return undefined;

  const read = readEnumMembers(declaration, sourceFile);
  const found = read.ok
    ? read.members.find((m) => m.name === member)
    : undefined;
  if (!found) return undefined;

  return {
    key: literalKey(found.value),
    tag: { kind: "member", enumName, member },
    name: member,
    display: propertyAccess(enumName, member),
  };
}

function tagValueOf(
  type: ts.TypeNode | undefined,
  scope: readonly ts.Statement[],
  sourceFile: ts.SourceFile,
): TagValue | undefined {
  if (!type) return undefined;
  const value = literalOf(type);
  if (value === undefined) return enumMemberType(type, scope, sourceFile);
  return {
    key: literalKey(value),
    tag: { kind: "literal", value },
    name: String(value),
    display: JSON.stringify(value),
  };
}

/** Required properties with a literal or enum member type, in declaration order */
function tagProperties(
  elements: readonly ts.TypeElement[],
  scope: readonly ts.Statement[],
  sourceFile: ts.SourceFile,
): Map<string, TagValue> {
  const result = new Map<string, TagValue>();
  for (const element of elements) {
    if (!ts.isPropertySignature(element) || element.questionToken) continue;
    const name = nameText(element.name);
    const value = tagValueOf(element.type, scope, sourceFile);
    if (name !== undefined && value !== undefined && !result.has(name)) {
      result.set(name, value);
    }
  }
  return result;
}

function elementName(element: ts.TypeElement): string {
  if (element.name) {
    const text = nameText(element.name);
    if (text !== undefined) return text;
  }
  if (ts.isIndexSignatureDeclaration(element)) return "[index]";
  if (ts.isCallSignatureDeclaration(element)) return "()";
  if (ts.isConstructSignatureDeclaration(element)) return "new()";
  return "[computed]";
}

function scopeStatements(
  declaration: ts.Statement,
  sourceFile: ts.SourceFile,
): readonly ts.Statement[] {
  const parent: ts.Node | undefined = declaration.parent;
  if (parent && (ts.isModuleBlock(parent) || ts.isBlock(parent))) {
    return [...parent.statements, ...sourceFile.statements];
  }
  return sourceFile.statements;
}

function resolveMember(
  member: ts.TypeNode,
  scope: readonly ts.Statement[],
  sourceFile: ts.SourceFile,
): ResolvedMember | string {
  const node = unwrapParens(member);

  if (ts.isTypeLiteralNode(node)) {
    return { elements: node.members };
  }

  if (ts.isTypeReferenceNode(node) && ts.isIdentifier(node.typeName)) {
    const name = node.typeName.text;

    const interfaces = scope.filter(
      (s): s is ts.InterfaceDeclaration =>
        ts.isInterfaceDeclaration(s) && s.name.text === name,
    );
    if (interfaces.length > 0) {
      return {
        label: name,
        elements: interfaces.flatMap((decl) => [...decl.members]),
      };
    }

    const alias = scope.find(
      (s): s is ts.TypeAliasDeclaration =>
        ts.isTypeAliasDeclaration(s) && s.name.text === name,
    );
    if (alias) {
      const aliased = unwrapParens(alias.type);
      if (ts.isTypeLiteralNode(aliased)) {
        return { label: name, elements: aliased.members };
      }
      return `\`${name}\` is not an object type`;
    }

    return `\`${name}\` is not declared as an interface or object type in this file`;
  }

  return `union member \`${node.getText(sourceFile)}\` is not an object type`;
}

function branchShape(
  elements: readonly ts.TypeElement[],
  discriminant: string,
): BranchShape {
  const payload = elements.filter(
    (element) =>
      !(
        ts.isPropertySignature(element) &&
        nameText(element.name) === discriminant
      ),
  );

  if (payload.length === 0) return { kind: "empty" };

  const [only] = payload;
  if (payload.length === 1 && ts.isPropertySignature(only) && only.type) {
    let type = unwrapParens(only.type);
    if (
      ts.isTypeOperatorNode(type) &&
      type.operator === ts.SyntaxKind.ReadonlyKeyword
    ) {
      type = unwrapParens(type.type);
    }
    if (ts.isTupleTypeNode(type) && type.elements.length > 0) {
      return {
        kind: "positional",
        field: elementName(only),
        arity: type.elements.length,
      };
    }
  }

  return { kind: "named", fields: payload.map(elementName) };
}

// `const` is only legal on function and class type parameters
const MODIFIER_NAMES = new Map<ts.SyntaxKind, GenericModifier>([
  [ts.SyntaxKind.InKeyword, "in"],
  [ts.SyntaxKind.OutKeyword, "out"],
]);

function extractGenerics(
  params: readonly ts.TypeParameterDeclaration[] | undefined,
  sourceFile: ts.SourceFile,
): GenericParam[] {
  return (params ?? []).map((param) => {
    const modifiers: GenericModifier[] = [];
    for (const modifier of param.modifiers ?? []) {
      const name = MODIFIER_NAMES.get(modifier.kind);
      if (name) modifiers.push(name);
    }
    return {
      name: param.name.text,
      modifiers,
      constraint: param.constraint?.getText(sourceFile),
      default: param.default?.getText(sourceFile),
    };
  });
}

function extractUnion(
  declaration: ts.TypeAliasDeclaration,
  mode: InvocationMode,
  options: ExtractOptions,
): ExtractResult {
  const { sourceFile } = options;
  const type = unwrapParens(declaration.type);

  if (!ts.isUnionTypeNode(type)) {
    return fail(
      mode,
      declaration,
      ts.isTypeLiteralNode(type) ? "an object type" : "a type alias that is not a union",
      "it describes a single shape, so there is no variant to name",
    );
  }

  const scope = scopeStatements(declaration, sourceFile);
  const members: ResolvedMember[] = [];
  for (const member of type.types) {
    const resolved = resolveMember(member, scope, sourceFile);
    if (typeof resolved === "string") {
      return fail(mode, declaration, "a union of non-object types", resolved);
    }
    members.push(resolved);
  }

  const literals = members.map((member) =>
    tagProperties(member.elements, scope, sourceFile),
  );
  const [first] = literals;
  const shared = [...first.keys()].filter((name) =>
    literals.every((props) => props.has(name)),
  );

  if (shared.length === 0) {
    return fail(
      mode,
      declaration,
      "a union without a literal discriminant",
      "its members share no required property with a literal type",
    );
  }

  const preference = options.discriminants ?? DEFAULT_DISCRIMINANTS;
  const candidates = [
    ...preference.filter((name) => shared.includes(name)),
    ...shared.filter((name) => !preference.includes(name)),
  ];

  let discriminant: string | undefined;
  let values: TagValue[] = [];
  let repeated: { property: string; value: TagValue } | undefined;

  for (const candidate of candidates) {
    const candidateValues: TagValue[] = [];
    const keys = new Set<string>();
    let duplicate: TagValue | undefined;
    for (const props of literals) {
      const value = props.get(candidate);
      if (value === undefined) continue;
      if (keys.has(value.key) && duplicate === undefined) duplicate = value;
      keys.add(value.key);
      candidateValues.push(value);
    }
    if (duplicate === undefined) {
      discriminant = candidate;
      values = candidateValues;
      break;
    }
    repeated ??= { property: candidate, value: duplicate };
  }

  if (discriminant === undefined) {
    const detail = repeated
      ? `discriminant \`${repeated.property}\` repeats the value ${repeated.value.display}`
      : "no discriminant has distinct values";
    return fail(mode, declaration, "a union without a literal discriminant", detail);
  }

  const branches: Branch[] = [];
  const names = new Set<string>();
  for (const [index, member] of members.entries()) {
    const value = values[index];
    const name = member.label ?? value.name;
    if (names.has(name)) {
      return fail(
        mode,
        declaration,
        "a union with ambiguous variant names",
        `two variants are both named \`${name}\``,
      );
    }
    names.add(name);
    branches.push({
      name,
      tag: value.tag,
      shape: branchShape(member.elements, discriminant),
    });
  }

  return {
    ok: true,
    sumType: {
      form: "union",
      name: declaration.name.text,
      discriminant,
      generics: extractGenerics(declaration.typeParameters, sourceFile),
      branches,
      exported: hasModifier(declaration, ts.SyntaxKind.ExportKeyword),
    },
  };
}
