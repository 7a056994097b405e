/**
 * Dispatch Emitter
 *
 * Renders the companion namespace holding the accessor:
 *
 * ```typescript
 * export namespace Shape {
 *   /**
 *    * Name of the active `Shape` variant.
 *    *
 *    * @inline
 *    *\/
 *   /* @__NO_SIDE_EFFECTS__ *\/
 *   export function variantName(value: Shape): "Circle" | "Square" {
 *     switch (value.kind) {
 *       case "circle":
 *         return "Circle";
 *       case "square":
 *         return "Square";
 *     }
 *   }
 * }
 * ```
 */

import { propertyAccess } from "../../core/ast-utils.js";
import type { GenericSignature } from "./generics.js";
import type { InvocationMode, SumType } from "./model.js";
import { renderCaseLabel, type DispatchArm } from "./patterns.js";

export interface EmitInput {
  sumType: SumType;
  arms: readonly DispatchArm[];
  signature: GenericSignature;
  accessorName: string;
  mode: InvocationMode;
  /** Declaration text as written; re-emitted first in attachment mode */
  declarationText?: string;
}

export interface EmitOutput {
  /** The companion namespace alone */
  companion: string;
  /** Everything the invocation outputs */
  code: string;
}

const INDENT = "  ";

export function emitDispatch(input: EmitInput): EmitOutput {
  const { sumType, arms, signature, accessorName } = input;

  const subject =
    sumType.form === "enum"
      ? "value"
      : propertyAccess("value", sumType.discriminant);
  const returnType = arms.map((arm) => JSON.stringify(arm.name)).join(" | ");

  const body = [
    `/**`,
    ` * Name of the active \`${sumType.name}\` variant.`,
    ` *`,
    ` * @inline`,
    ` */`,
    `/* @__NO_SIDE_EFFECTS__ */`,
    `export function ${accessorName}${signature.declaration}(value: ${sumType.name}${signature.usage}): ${returnType} {`,
    `${INDENT}switch (${subject}) {`,
    ...arms.flatMap((arm) => [
      `${INDENT.repeat(2)}${renderCaseLabel(arm.pattern)}`,
      `${INDENT.repeat(3)}return ${JSON.stringify(arm.name)};`,
    ]),
    `${INDENT}}`,
    `}`,
  ];

  const companion = [
    `${sumType.exported ? "export " : ""}namespace ${sumType.name} {`,
    ...body.map((line) => `${INDENT}${line}`),
    `}`,
  ].join("\n");

  const code =
    input.mode === "attachment" && input.declarationText !== undefined
      ? `${input.declarationText}\n\n${companion}`
      : companion;

  return { companion, code };
}
