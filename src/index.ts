/**
 * variant-name - a build-time `variantName` accessor for sum types
 *
 * @example
 * ```typescript
 * import { transformSource } from "variant-name";
 *
 * const { code } = transformSource(`
 *   /** @variantName *\/
 *   export type Shape =
 *     | { kind: "circle"; radius: number }
 *     | { kind: "square"; side: number };
 * `);
 * // code now ends with `export namespace Shape { ... }`
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  MacroKind,
  MacroContext,
  Directive,
  MacroDefinitionBase,
  AttributeMacro,
  DeriveMacro,
  MacroDefinition,
  MacroRegistry,
} from "./core/types.js";

// ============================================================================
// Registry & Context
// ============================================================================

export {
  globalRegistry,
  createRegistry,
  defineAttributeMacro,
  defineDeriveMacro,
} from "./core/registry.js";
export { MacroContextImpl, createMacroContext } from "./core/context.js";
export {
  stripPositions,
  parseStatementsWithComments,
  findDirectives,
  declarationName,
  propertyAccess,
} from "./core/ast-utils.js";

// ============================================================================
// Configuration
// ============================================================================

export {
  ConfigError,
  DEFAULT_CONFIG,
  defineConfig,
  loadConfig,
  resolveConfig,
  validateUserConfig,
} from "./core/config.js";
export type {
  VariantNameConfig,
  VariantNameUserConfig,
} from "./core/config.js";

// ============================================================================
// Diagnostics
// ============================================================================

export {
  DiagnosticBuilder,
  DiagnosticCategory,
  DIAGNOSTIC_CATALOG,
  VN9001,
  VN9002,
  VN9003,
  getDiagnosticDescriptor,
  diagnosticLocation,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
} from "./core/diagnostics.js";
export type {
  DiagnosticDescriptor,
  DiagnosticSeverity,
  DiagnosticLocation,
  RichDiagnostic,
  CLIRenderOptions,
} from "./core/diagnostics.js";

// ============================================================================
// Macros & Transformer
// ============================================================================

export * from "./macros/index.js";
export {
  variantNameTransformerFactory,
  transformSource,
} from "./transforms/macro-transformer.js";
export type {
  TransformerHooks,
  ExpansionEvent,
  FoldEvent,
  TransformSourceOptions,
  TransformSourceResult,
} from "./transforms/macro-transformer.js";
