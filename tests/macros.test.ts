/**
 * Tests for the variantName attribute and VariantName derive macros
 */

import { describe, it, expect } from "vitest";
import ts from "typescript";
import {
  variantNameAttribute,
  VariantNameDerive,
} from "../src/macros/index.js";
import type { Directive } from "../src/core/types.js";
import {
  createMacroTestContext,
  findStatement,
} from "../src/test-utils/macro-context.js";
import { BASIC, LETTER, POINT } from "./fixtures.js";

const directive: Directive = { name: "variantName", args: [], pos: 4 };

function asArray(result: ts.Statement | ts.Statement[]): ts.Statement[] {
  return Array.isArray(result) ? result : [result];
}

describe("variantNameAttribute", () => {
  it("returns the declaration followed by the companion namespace", () => {
    const { ctx, sourceFile, diagnostics } = createMacroTestContext(BASIC);
    const target = findStatement(sourceFile, "Basic");

    const [first, companion, ...rest] = asArray(
      variantNameAttribute.expand(ctx, directive, target),
    );

    expect(diagnostics).toEqual([]);
    expect(first).toBe(target);
    expect(rest).toEqual([]);
    expect(ts.isModuleDeclaration(companion)).toBe(true);
    expect(
      ts.isModuleDeclaration(companion) && ts.isIdentifier(companion.name)
        ? companion.name.text
        : undefined,
    ).toBe("Basic");
  });

  it("honors the configured accessor name", () => {
    const { ctx, sourceFile } = createMacroTestContext(LETTER, {
      accessorName: "nameOf",
    });
    const [, companion] = asArray(
      variantNameAttribute.expand(ctx, directive, findStatement(sourceFile, "Letter")),
    );

    const printed = ts
      .createPrinter({ newLine: ts.NewLineKind.LineFeed })
      .printNode(ts.EmitHint.Unspecified, companion, sourceFile);
    expect(printed).toContain('export function nameOf(value: Letter): "A" | "B" | "C" {');
  });

  it("reports an invalid target and returns it unchanged", () => {
    const { ctx, sourceFile, diagnostics } = createMacroTestContext(POINT);
    const target = findStatement(sourceFile, "Point");

    expect(variantNameAttribute.expand(ctx, directive, target)).toBe(target);
    expect(diagnostics.map((d) => d.message)).toEqual([
      "@variantName is only applicable to sum types: `Point` is an interface",
    ]);
    expect(ctx.getDiagnostics()).toEqual(diagnostics);
  });
});

describe("VariantNameDerive", () => {
  it("returns only the companion namespace", () => {
    const { ctx, sourceFile, diagnostics } = createMacroTestContext(BASIC);

    const statements = VariantNameDerive.expand(ctx, findStatement(sourceFile, "Basic"));

    expect(diagnostics).toEqual([]);
    expect(statements).toHaveLength(1);
    expect(statements.every(ts.isModuleDeclaration)).toBe(true);
  });

  it("reports an invalid target and returns nothing", () => {
    const { ctx, sourceFile, diagnostics } = createMacroTestContext(POINT);

    expect(VariantNameDerive.expand(ctx, findStatement(sourceFile, "Point"))).toEqual([]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      code: 9001,
      message:
        "@derive VariantName is only applicable to sum types: `Point` is an interface",
    });
  });
});
