/**
 * Diagnostic Reporter
 */

import type ts from "typescript";
import {
  DiagnosticBuilder,
  VN9001,
  type RichDiagnostic,
} from "../../core/diagnostics.js";
import {
  ATTRIBUTE_NAME,
  DERIVE_NAME,
  type InvalidTarget,
  type InvocationMode,
} from "./model.js";

/** The directive as the author wrote it */
export function directiveText(mode: InvocationMode): string {
  return mode === "attachment" ? ATTRIBUTE_NAME : `derive ${DERIVE_NAME}`;
}

/**
 * Turn an extraction failure into the single error diagnostic of the
 * invocation, anchored at the declaration's name.
 */
export function reportInvalidTarget(
  error: InvalidTarget,
  sourceFile: ts.SourceFile,
  emit?: (diagnostic: RichDiagnostic) => void,
): RichDiagnostic {
  return new DiagnosticBuilder(VN9001, sourceFile, emit)
    .at(error.node)
    .withArgs({
      directive: directiveText(error.mode),
      name: error.name,
      description: error.description,
    })
    .note(error.reason)
    .help(
      `declare \`${error.name}\` as a union of object types sharing a literal discriminant, or as an enum`,
    )
    .emit();
}
