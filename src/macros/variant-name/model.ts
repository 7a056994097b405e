/**
 * Data model shared by the variant-name engine stages.
 */

import type ts from "typescript";

/**
 * How the engine was invoked.
 *
 * - `attachment`: `@variantName` owns the declaration and re-emits it
 *   followed by the companion.
 * - `annotation`: `@derive VariantName` observes the declaration and emits
 *   the companion only.
 */
export type InvocationMode = "attachment" | "annotation";

/** Variance annotations, legal on type declarations only */
export type GenericModifier = "in" | "out";

export interface GenericParam {
  readonly name: string;
  readonly modifiers: readonly GenericModifier[];
  readonly constraint?: string;
  readonly default?: string;
}

export type BranchShape =
  | { readonly kind: "empty" }
  | { readonly kind: "positional"; readonly field: string; readonly arity: number }
  | { readonly kind: "named"; readonly fields: readonly string[] };

/**
 * Runtime value that identifies a branch. Unions discriminated by enum member
 * types (`{ kind: Kind.Circle }`) carry `member` tags too.
 */
export type BranchTag =
  | { readonly kind: "literal"; readonly value: string | number | boolean }
  | { readonly kind: "member"; readonly enumName: string; readonly member: string };

export interface Branch {
  /** Identifier of the branch, rendered verbatim as its name */
  readonly name: string;
  readonly tag: BranchTag;
  readonly shape: BranchShape;
}

interface SumTypeBase {
  readonly name: string;
  readonly generics: readonly GenericParam[];
  /** Non-empty, in declaration order */
  readonly branches: readonly Branch[];
  readonly exported: boolean;
}

/** `type Shape = Circle | Square` with a shared literal discriminant */
export interface UnionSumType extends SumTypeBase {
  readonly form: "union";
  readonly discriminant: string;
}

/** `enum Color { Red, Green }` */
export interface EnumSumType extends SumTypeBase {
  readonly form: "enum";
}

export type SumType = UnionSumType | EnumSumType;

/**
 * The declaration is not a sum type. `node` is where the diagnostic is
 * anchored: the declaration's name, or the statement when it has none.
 */
export interface InvalidTarget {
  readonly kind: "InvalidTarget";
  readonly mode: InvocationMode;
  readonly name: string;
  readonly node: ts.Node;
  /** Noun phrase for the message: "an interface", "a class" */
  readonly description: string;
  /** Why the declaration was rejected, reported as a note */
  readonly reason: string;
}

export type ExtractResult =
  | { readonly ok: true; readonly sumType: SumType }
  | { readonly ok: false; readonly error: InvalidTarget };

/** `@variantName` */
export const ATTRIBUTE_NAME = "variantName";

/** `@derive VariantName` */
export const DERIVE_NAME = "VariantName";
