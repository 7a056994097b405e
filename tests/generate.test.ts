/**
 * Tests for accessor generation from source text
 */

import { describe, it, expect } from "vitest";
import {
  emitDispatch,
  generateVariantName,
  preserveGenerics,
  synthesizeArms,
  type SumType,
  type VariantNameResult,
} from "../src/macros/variant-name/index.js";
import { diagnosticLocation } from "../src/core/diagnostics.js";
import { BASIC, BASIC_COMPANION, GENERIC, LETTER, POINT, SEQUENCE } from "./fixtures.js";

function expectCode(result: VariantNameResult): { companion: string; code: string } {
  if (!result.ok) throw new Error(result.diagnostic.message);
  return result;
}

describe("generateVariantName", () => {
  describe("attachment mode", () => {
    it("re-emits the declaration followed by the companion", () => {
      const { companion, code } = expectCode(generateVariantName(BASIC));

      expect(companion).toBe(BASIC_COMPANION);
      expect(code).toBe(`${BASIC}\n\n${BASIC_COMPANION}`);
    });

    it("switches on the enum value itself", () => {
      const { companion } = expectCode(generateVariantName(LETTER));

      expect(companion).toBe(`export namespace Letter {
  /**
   * Name of the active \`Letter\` variant.
   *
   * @inline
   */
  /* @__NO_SIDE_EFFECTS__ */
  export function variantName(value: Letter): "A" | "B" | "C" {
    switch (value) {
      case Letter.A:
        return "A";
      case Letter.B:
        return "B";
      case Letter.C:
        return "C";
    }
  }
}`);
    });

    it("expands the named target", () => {
      const { companion } = expectCode(
        generateVariantName(SEQUENCE, { target: "Sequence" }),
      );

      expect(companion).toContain(
        'export function variantName(value: Sequence): "A" | "B" | "C" {',
      );
      expect(companion).toContain("switch (value.tag) {");
      expect(companion).toContain('case "b":\n        return "B";');
    });
  });

  describe("annotation mode", () => {
    it("emits only the companion, with the generic signature", () => {
      const { companion, code } = expectCode(
        generateVariantName(GENERIC, { mode: "annotation" }),
      );

      expect(code).toBe(companion);
      expect(companion).toBe(`export namespace Generic {
  /**
   * Name of the active \`Generic\` variant.
   *
   * @inline
   */
  /* @__NO_SIDE_EFFECTS__ */
  export function variantName<T, N extends number = 3>(value: Generic<T, N>): "Empty" | "Ref" | "Array" {
    switch (value.kind) {
      case "Empty":
        return "Empty";
      case "Ref":
        return "Ref";
      case "Array":
        return "Array";
    }
  }
}`);
    });
  });

  describe("configuration", () => {
    it("names the accessor after accessorName", () => {
      const { companion } = expectCode(
        generateVariantName(BASIC, { config: { accessorName: "nameOf" } }),
      );

      expect(companion).toContain(
        'export function nameOf(value: Basic): "Unit" | "Tuple" | "Struct" {',
      );
    });

    it("follows the configured discriminant preference", () => {
      const source = `export type Event = { type: "a"; kind: "x" } | { type: "b"; kind: "y" };`;
      const { companion } = expectCode(
        generateVariantName(source, { config: { discriminants: ["type"] } }),
      );

      expect(companion).toContain("switch (value.type) {");
      expect(companion).toContain('export function variantName(value: Event): "a" | "b" {');
    });

    it("rejects an invalid accessor name", () => {
      expect(() =>
        generateVariantName(BASIC, { config: { accessorName: "two words" } }),
      ).toThrow('accessorName must be a valid identifier, got "two words" (in options)');
    });
  });

  it("keeps a non-exported companion local", () => {
    const { companion } = expectCode(
      generateVariantName(`type Local = { kind: "a" } | { kind: "b" };`),
    );

    expect(companion.startsWith("namespace Local {\n")).toBe(true);
  });

  it("reads discriminants that are not identifiers", () => {
    const { companion } = expectCode(
      generateVariantName(`type Quoted = { "my-kind": "a" } | { "my-kind": "b" };`),
    );

    expect(companion).toContain('switch (value["my-kind"]) {');
  });

  it("compares numeric discriminants without quotes", () => {
    const { companion } = expectCode(
      generateVariantName(`type Response = { status: 200 } | { status: 404 };`),
    );

    expect(companion).toContain('case 404:\n        return "404";');
  });

  describe("invalid targets", () => {
    it("reports one diagnostic at the declaration name", () => {
      const result = generateVariantName(POINT, { mode: "annotation" });
      if (result.ok) throw new Error("expected a diagnostic");

      const { diagnostic } = result;
      expect(diagnostic).toMatchObject({
        code: 9001,
        severity: "error",
        message:
          "@derive VariantName is only applicable to sum types: `Point` is an interface",
        notes: ["it describes a single shape, so there is no variant to name"],
        help: "declare `Point` as a union of object types sharing a literal discriminant, or as an enum",
      });
      expect(diagnosticLocation(diagnostic)).toEqual({
        fileName: "input.ts",
        start: 37,
        length: 5,
        line: 2,
        column: 11,
      });
    });

    it("names the attribute directive in attachment mode", () => {
      const result = generateVariantName(`class Widget {}`);
      if (result.ok) throw new Error("expected a diagnostic");

      expect(result.diagnostic.message).toBe(
        "@variantName is only applicable to sum types: `Widget` is a class",
      );
    });
  });

  it("throws when the source declares nothing", () => {
    expect(() => generateVariantName(`console.log("hi");`)).toThrow(
      "No declaration found in source",
    );
  });

  it("throws when the target is missing", () => {
    expect(() => generateVariantName(BASIC, { target: "Other" })).toThrow(
      "No declaration named `Other` found in source",
    );
  });
});

describe("emitDispatch", () => {
  const sumType: SumType = {
    form: "union",
    name: "Toggle",
    discriminant: "on",
    generics: [],
    exported: false,
    branches: [
      { name: "On", tag: { kind: "literal", value: true }, shape: { kind: "empty" } },
      { name: "Off", tag: { kind: "literal", value: false }, shape: { kind: "empty" } },
    ],
  };

  it("renders the companion from a model", () => {
    const { companion } = emitDispatch({
      sumType,
      arms: synthesizeArms(sumType),
      signature: preserveGenerics(sumType.generics),
      accessorName: "variantName",
      mode: "annotation",
    });

    expect(companion).toBe(`namespace Toggle {
  /**
   * Name of the active \`Toggle\` variant.
   *
   * @inline
   */
  /* @__NO_SIDE_EFFECTS__ */
  export function variantName(value: Toggle): "On" | "Off" {
    switch (value.on) {
      case true:
        return "On";
      case false:
        return "Off";
    }
  }
}`);
  });

  it("outputs the companion alone when attachment mode has no declaration text", () => {
    const output = emitDispatch({
      sumType,
      arms: synthesizeArms(sumType),
      signature: preserveGenerics(sumType.generics),
      accessorName: "variantName",
      mode: "attachment",
    });

    expect(output.code).toBe(output.companion);
  });

  it("prefixes the declaration text in attachment mode", () => {
    const declarationText = `type Toggle = { on: true } | { on: false };`;
    const output = emitDispatch({
      sumType,
      arms: synthesizeArms(sumType),
      signature: preserveGenerics(sumType.generics),
      accessorName: "variantName",
      mode: "attachment",
      declarationText,
    });

    expect(output.code).toBe(`${declarationText}\n\n${output.companion}`);
  });
});
