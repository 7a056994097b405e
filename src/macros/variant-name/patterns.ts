/**
 * Branch Pattern Synthesizer
 */

import { propertyAccess } from "../../core/ast-utils.js";
import type { Branch, BranchTag, SumType } from "./model.js";

/**
 * A shape-matching test that identifies a branch and ignores its payload.
 * `test` is the expression the discriminant is compared against.
 */
export type BranchPattern =
  | { readonly kind: "bare"; readonly test: string }
  | { readonly kind: "positional"; readonly test: string }
  | { readonly kind: "named"; readonly test: string };

/** One case of the dispatch: the pattern and the literal it returns */
export interface DispatchArm {
  readonly pattern: BranchPattern;
  readonly name: string;
}

export function renderTag(tag: BranchTag): string {
  if (tag.kind === "member") return propertyAccess(tag.enumName, tag.member);
  return typeof tag.value === "string"
    ? JSON.stringify(tag.value)
    : String(tag.value);
}

export function synthesizePattern(branch: Branch): BranchPattern {
  const test = renderTag(branch.tag);
  switch (branch.shape.kind) {
    case "empty":
      return { kind: "bare", test };
    case "positional":
      return { kind: "positional", test };
    case "named":
      return { kind: "named", test };
  }
}

/**
 * One arm per branch, in declaration order.
 */
export function synthesizeArms(sumType: SumType): DispatchArm[] {
  return sumType.branches.map((branch) => ({
    pattern: synthesizePattern(branch),
    name: branch.name,
  }));
}

export function renderCaseLabel(pattern: BranchPattern): string {
  return `case ${pattern.test}:`;
}

/**
 * Human-readable form of a pattern: `Unit`, `Tuple(..)`, `Struct { .. }`.
 */
export function formatPattern(name: string, pattern: BranchPattern): string {
  switch (pattern.kind) {
    case "bare":
      return name;
    case "positional":
      return `${name}(..)`;
    case "named":
      return `${name} { .. }`;
  }
}
