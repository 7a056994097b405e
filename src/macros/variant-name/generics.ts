/**
 * Generic Signature Preserver
 *
 * TypeScript keeps constraints inside the parameter list, so there is no
 * separate constraint clause to render: `declaration` carries them and
 * `usage` names the parameters.
 */

import type { GenericParam } from "./model.js";

export interface GenericSignature {
  /** `<T extends X = D, N>` for the generated function, or "" */
  readonly declaration: string;
  /** `<T, N>` for naming the type, or "" */
  readonly usage: string;
}

function renderParam(param: GenericParam): string {
  // `in`/`out` are only legal on type declarations
  let text = param.name;
  if (param.constraint !== undefined) text += ` extends ${param.constraint}`;
  if (param.default !== undefined) text += ` = ${param.default}`;
  return text;
}

export function preserveGenerics(
  params: readonly GenericParam[],
): GenericSignature {
  if (params.length === 0) return { declaration: "", usage: "" };
  return {
    declaration: `<${params.map(renderParam).join(", ")}>`,
    usage: `<${params.map((param) => param.name).join(", ")}>`,
  };
}
