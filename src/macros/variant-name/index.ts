/**
 * variant-name: a `variantName` accessor for sum types
 *
 * Two directives drive the same engine:
 *
 * ```typescript
 * /** @variantName *\/
 * export type Shape = Circle | Square;
 *
 * /** @derive VariantName *\/
 * export enum Color { Red, Green }
 * ```
 *
 * Both produce a companion namespace merged with the type, so the accessor
 * reads `Shape.variantName(shape)`.
 */

import ts from "typescript";
import {
  defineAttributeMacro,
  defineDeriveMacro,
  globalRegistry,
} from "../../core/registry.js";
import { declarationName } from "../../core/ast-utils.js";
import {
  resolveConfig,
  validateUserConfig,
  type VariantNameConfig,
  type VariantNameUserConfig,
} from "../../core/config.js";
import type { RichDiagnostic } from "../../core/diagnostics.js";
import type { MacroRegistry } from "../../core/types.js";
import { emitDispatch } from "./emit.js";
import { extractSumType } from "./extract.js";
import { preserveGenerics } from "./generics.js";
import {
  ATTRIBUTE_NAME,
  DERIVE_NAME,
  type InvocationMode,
  type SumType,
} from "./model.js";
import { formatPattern, synthesizeArms, type DispatchArm } from "./patterns.js";
import { directiveText, reportInvalidTarget } from "./report.js";

// ============================================================================
// Engine
// ============================================================================

export type VariantNameResult =
  | {
      ok: true;
      sumType: SumType;
      arms: DispatchArm[];
      /** The companion namespace alone */
      companion: string;
      /** Full output of the invocation */
      code: string;
    }
  | { ok: false; diagnostic: RichDiagnostic };

/**
 * Run extractor, synthesizer, preserver and emitter over one declaration.
 * On failure the result holds the single diagnostic and no code.
 */
export function expandVariantName(
  statement: ts.Statement,
  sourceFile: ts.SourceFile,
  mode: InvocationMode,
  config: Pick<VariantNameConfig, "accessorName" | "discriminants">,
): VariantNameResult {
  const extracted = extractSumType(statement, mode, {
    sourceFile,
    discriminants: config.discriminants,
    accessorName: config.accessorName,
  });
  if (!extracted.ok) {
    return {
      ok: false,
      diagnostic: reportInvalidTarget(extracted.error, sourceFile),
    };
  }

  const { sumType } = extracted;
  const arms = synthesizeArms(sumType);
  const { companion, code } = emitDispatch({
    sumType,
    arms,
    signature: preserveGenerics(sumType.generics),
    accessorName: config.accessorName,
    mode,
    declarationText:
      mode === "attachment"
        ? sourceFile.text.slice(
            statement.getStart(sourceFile, true),
            statement.getEnd(),
          )
        : undefined,
  });

  return { ok: true, sumType, arms, companion, code };
}

function logExpansion(
  config: VariantNameConfig,
  mode: InvocationMode,
  sumType: SumType,
  arms: readonly DispatchArm[],
): void {
  if (!config.verbose) return;
  const patterns = arms.map((arm) => formatPattern(arm.name, arm.pattern));
  console.log(
    `[variant-name] @${directiveText(mode)} on ${sumType.name}: ${patterns.join(", ")}`,
  );
}

// ============================================================================
// Text API
// ============================================================================

export interface GenerateOptions {
  /** Default: "attachment" */
  mode?: InvocationMode;
  /** Name of the declaration to expand; default: the first declaration */
  target?: string;
  /** Default: "input.ts" */
  fileName?: string;
  config?: VariantNameUserConfig;
}

/**
 * Generate the accessor for a declaration given as source text.
 *
 * @throws Error when the source declares nothing (or nothing named `target`)
 */
export function generateVariantName(
  source: string,
  options: GenerateOptions = {},
): VariantNameResult {
  const config = resolveConfig(validateUserConfig(options.config, "options"));
  const sourceFile = ts.createSourceFile(
    options.fileName ?? "input.ts",
    source,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS,
  );

  const statement = sourceFile.statements.find((s) => {
    const name = declarationName(s);
    return (
      name !== undefined &&
      (options.target === undefined || name.text === options.target)
    );
  });
  if (!statement) {
    throw new Error(
      options.target === undefined
        ? "No declaration found in source"
        : `No declaration named \`${options.target}\` found in source`,
    );
  }

  return expandVariantName(
    statement,
    sourceFile,
    options.mode ?? "attachment",
    config,
  );
}

// ============================================================================
// Macros
// ============================================================================

/**
 * `@variantName` - re-emits the declaration followed by its companion.
 */
export const variantNameAttribute = defineAttributeMacro({
  name: ATTRIBUTE_NAME,
  description:
    "Add a variantName accessor to a union or enum, keeping the declaration",

  expand(ctx, _directive, target) {
    const result = expandVariantName(
      target,
      ctx.sourceFile,
      "attachment",
      ctx.config,
    );
    if (!result.ok) {
      ctx.report(result.diagnostic);
      return target;
    }
    logExpansion(ctx.config, "attachment", result.sumType, result.arms);
    return [target, ...ctx.parseStatements(result.companion)];
  },
});

/**
 * `@derive VariantName` - emits the companion after the declaration.
 */
export const VariantNameDerive = defineDeriveMacro({
  name: DERIVE_NAME,
  description: "Derive a variantName accessor for a union or enum",

  expand(ctx, target) {
    const result = expandVariantName(
      target,
      ctx.sourceFile,
      "annotation",
      ctx.config,
    );
    if (!result.ok) {
      ctx.report(result.diagnostic);
      return [];
    }
    logExpansion(ctx.config, "annotation", result.sumType, result.arms);
    return ctx.parseStatements(result.companion);
  },
});

export function registerVariantNameMacros(registry: MacroRegistry): void {
  registry.register(variantNameAttribute);
  registry.register(VariantNameDerive);
}

registerVariantNameMacros(globalRegistry);

export { extractSumType, DEFAULT_DISCRIMINANTS } from "./extract.js";
export type { ExtractOptions } from "./extract.js";
export {
  synthesizePattern,
  synthesizeArms,
  renderCaseLabel,
  renderTag,
  formatPattern,
} from "./patterns.js";
export type { BranchPattern, DispatchArm } from "./patterns.js";
export { preserveGenerics } from "./generics.js";
export type { GenericSignature } from "./generics.js";
export { emitDispatch } from "./emit.js";
export type { EmitInput, EmitOutput } from "./emit.js";
export { reportInvalidTarget, directiveText } from "./report.js";
export { collectFoldTargets, foldAccessorCall } from "./fold.js";
export type { FoldTarget, FoldTargets, FoldedCall } from "./fold.js";
export * from "./model.js";
