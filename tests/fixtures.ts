/**
 * Source fixtures shared by the variant-name tests.
 */

/** Unit, tuple-like and struct-like variants */
export const BASIC = `/** @variantName */
export type Basic =
  | { kind: "Unit" }
  | { kind: "Tuple"; values: readonly [number, number] }
  | { kind: "Struct"; field: number };`;

export const BASIC_COMPANION = `export namespace Basic {
  /**
   * Name of the active \`Basic\` variant.
   *
   * @inline
   */
  /* @__NO_SIDE_EFFECTS__ */
  export function variantName(value: Basic): "Unit" | "Tuple" | "Struct" {
    switch (value.kind) {
      case "Unit":
        return "Unit";
      case "Tuple":
        return "Tuple";
      case "Struct":
        return "Struct";
    }
  }
}`;

/** Type parameters with a constraint and a default */
export const GENERIC = `/** @derive VariantName */
export type Generic<T, N extends number = 3> =
  | { kind: "Empty" }
  | { kind: "Ref"; target: T }
  | { kind: "Array"; items: readonly T[]; size: N };`;

/** Variants written as references to interfaces */
export const SEQUENCE = `interface A {
  tag: "a";
}

interface B {
  tag: "b";
  payload: [string];
}

interface C {
  tag: "c";
  left: number;
  right: number;
}

/** @variantName */
export type Sequence = A | B | C;`;

export const LETTER = `/** @variantName */
export enum Letter {
  A,
  B,
  C,
}`;

/** A fixed-shape record with a generic signature */
export const POINT = `/** @derive VariantName */
interface Point<T> {
  x: T;
  y: T;
}`;

export const CONSTABLE = `/** @variantName */
export type Constable = { kind: "Alpha" } | { kind: "Beta"; weight: number };

export const NAME = Constable.variantName({ kind: "Beta", weight: 2 });
export const DYNAMIC = (c: Constable) => Constable.variantName(c);`;
