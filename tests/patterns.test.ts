/**
 * Tests for branch patterns and generic signatures
 */

import { describe, it, expect } from "vitest";
import {
  extractSumType,
  formatPattern,
  preserveGenerics,
  renderCaseLabel,
  renderTag,
  synthesizeArms,
  synthesizePattern,
  type SumType,
} from "../src/macros/variant-name/index.js";
import { findStatement, parseSource } from "../src/test-utils/macro-context.js";
import { BASIC, GENERIC } from "./fixtures.js";

function sumTypeOf(source: string, name: string): SumType {
  const sourceFile = parseSource(source);
  const result = extractSumType(findStatement(sourceFile, name), "attachment", {
    sourceFile,
  });
  if (!result.ok) throw new Error(result.error.description);
  return result.sumType;
}

describe("renderTag", () => {
  it("quotes string literals", () => {
    expect(renderTag({ kind: "literal", value: "circle" })).toBe('"circle"');
    expect(renderTag({ kind: "literal", value: 'say "hi"' })).toBe(
      '"say \\"hi\\""',
    );
  });

  it("writes numbers and booleans bare", () => {
    expect(renderTag({ kind: "literal", value: 404 })).toBe("404");
    expect(renderTag({ kind: "literal", value: -1 })).toBe("-1");
    expect(renderTag({ kind: "literal", value: false })).toBe("false");
  });

  it("refers to enum members through the enum", () => {
    expect(
      renderTag({ kind: "member", enumName: "Letter", member: "A" }),
    ).toBe("Letter.A");
    expect(
      renderTag({ kind: "member", enumName: "Key", member: "page-up" }),
    ).toBe('Key["page-up"]');
  });
});

describe("synthesizePattern", () => {
  it("maps each branch shape to its pattern kind", () => {
    const [unit, tuple, struct] = sumTypeOf(BASIC, "Basic").branches;

    expect(synthesizePattern(unit)).toEqual({ kind: "bare", test: '"Unit"' });
    expect(synthesizePattern(tuple)).toEqual({
      kind: "positional",
      test: '"Tuple"',
    });
    expect(synthesizePattern(struct)).toEqual({
      kind: "named",
      test: '"Struct"',
    });
  });

  it("produces one arm per branch in declaration order", () => {
    const arms = synthesizeArms(sumTypeOf(BASIC, "Basic"));

    expect(arms.map((arm) => arm.name)).toEqual(["Unit", "Tuple", "Struct"]);
    expect(arms.map((arm) => renderCaseLabel(arm.pattern))).toEqual([
      'case "Unit":',
      'case "Tuple":',
      'case "Struct":',
    ]);
  });

  it("formats patterns for logs", () => {
    const arms = synthesizeArms(sumTypeOf(BASIC, "Basic"));

    expect(arms.map((arm) => formatPattern(arm.name, arm.pattern))).toEqual([
      "Unit",
      "Tuple(..)",
      "Struct { .. }",
    ]);
  });
});

describe("preserveGenerics", () => {
  it("renders nothing for a non-generic type", () => {
    expect(preserveGenerics([])).toEqual({ declaration: "", usage: "" });
  });

  it("keeps constraints and defaults in the declaration only", () => {
    const { generics } = sumTypeOf(GENERIC, "Generic");

    expect(preserveGenerics(generics)).toEqual({
      declaration: "<T, N extends number = 3>",
      usage: "<T, N>",
    });
  });

  it("drops variance annotations", () => {
    expect(
      preserveGenerics([
        { name: "T", modifiers: [], constraint: "readonly string[]" },
        { name: "U", modifiers: ["in", "out"] },
      ]),
    ).toEqual({
      declaration: "<T extends readonly string[], U>",
      usage: "<T, U>",
    });
  });
});
