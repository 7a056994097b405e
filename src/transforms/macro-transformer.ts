/**
 * Macro transformer: expands `@variantName` and `@derive` directives found in
 * JSDoc comments, then folds statically known accessor calls.
 */

import ts from "typescript";
import {
  declarationName,
  findDirectives,
} from "../core/ast-utils.js";
import {
  resolveConfig,
  validateUserConfig,
  type VariantNameConfig,
  type VariantNameUserConfig,
} from "../core/config.js";
import { createMacroContext, type MacroContextImpl } from "../core/context.js";
import {
  DiagnosticBuilder,
  VN9002,
  type RichDiagnostic,
} from "../core/diagnostics.js";
import { globalRegistry } from "../core/registry.js";
import type { Directive, MacroRegistry } from "../core/types.js";
import {
  collectFoldTargets,
  foldAccessorCall,
  type FoldTarget,
  type FoldTargets,
} from "../macros/variant-name/index.js";

export interface ExpansionEvent {
  /** Directive as written, without `@`: `variantName`, `derive VariantName` */
  directive: string;
  /** Name of the declaration that was expanded */
  name: string;
}

export interface FoldEvent {
  typeName: string;
  /** The string the call was replaced with */
  result: string;
}

export interface TransformerHooks {
  /** Macros to expand; default: the global registry */
  registry?: MacroRegistry;
  onDiagnostic?: (diagnostic: RichDiagnostic) => void;
  onExpand?: (event: ExpansionEvent) => void;
  onFold?: (event: FoldEvent) => void;
}

const DERIVE_DIRECTIVE = "derive";

/**
 * Create the TypeScript transformer factory.
 */
export function variantNameTransformerFactory(
  config: VariantNameConfig,
  hooks: TransformerHooks = {},
): ts.TransformerFactory<ts.SourceFile> {
  const registry = hooks.registry ?? globalRegistry;

  if (config.verbose) {
    console.log(
      `[variant-name] Registered macros: ${registry
        .getAll()
        .map((m) => m.name)
        .join(", ")}`,
    );
  }

  return (context: ts.TransformationContext) => {
    return (sourceFile: ts.SourceFile) => {
      if (config.verbose) {
        console.log(`[variant-name] Processing: ${sourceFile.fileName}`);
      }

      const ctx = createMacroContext(
        sourceFile,
        config,
        hooks.onDiagnostic,
        context.factory,
      );
      const transformer = new MacroTransformer(
        ctx,
        registry,
        hooks,
        context,
        config.fold
          ? collectFoldTargets(sourceFile, config)
          : new Map<string, FoldTarget[]>(),
      );

      return transformer.transformSourceFile(sourceFile);
    };
  };
}

class MacroTransformer {
  constructor(
    private readonly ctx: MacroContextImpl,
    private readonly registry: MacroRegistry,
    private readonly hooks: TransformerHooks,
    private readonly context: ts.TransformationContext,
    private readonly foldTargets: FoldTargets,
  ) {}

  private get verbose(): boolean {
    return this.ctx.config.verbose;
  }

  transformSourceFile(sourceFile: ts.SourceFile): ts.SourceFile {
    const expanded = this.visitStatementContainer(sourceFile.statements);
    const statements =
      this.foldTargets.size > 0
        ? expanded.map((statement) =>
            ts.visitNode(statement, this.fold, ts.isStatement),
          )
        : expanded;
    return this.context.factory.updateSourceFile(sourceFile, statements);
  }

  // -------------------------------------------------------------------------
  // Expansion
  // -------------------------------------------------------------------------

  private visitStatementContainer(
    statements: readonly ts.Statement[],
  ): ts.Statement[] {
    return statements.flatMap((statement) => {
      if (
        ts.isModuleDeclaration(statement) &&
        statement.body &&
        ts.isModuleBlock(statement.body)
      ) {
        const { factory } = this.context;
        const body = factory.updateModuleBlock(
          statement.body,
          this.visitStatementContainer(statement.body.statements),
        );
        return [
          factory.updateModuleDeclaration(
            statement,
            statement.modifiers,
            statement.name,
            body,
          ),
        ];
      }
      return this.expandStatement(statement);
    });
  }

  private expandStatement(statement: ts.Statement): ts.Statement[] {
    const directives = findDirectives(statement, this.ctx.sourceFile);
    if (directives.length === 0) return [statement];

    let primary: ts.Statement[] = [statement];
    const trailing: ts.Statement[] = [];

    for (const directive of directives) {
      if (directive.name === DERIVE_DIRECTIVE) {
        trailing.push(...this.expandDerives(directive, statement));
        continue;
      }

      // Other JSDoc tags (@param, @deprecated, ...) are not macros
      const macro = this.registry.getAttribute(directive.name);
      if (!macro) continue;
      const [target] = primary;
      if (!target || primary.length !== 1) continue;

      if (this.verbose) {
        console.log(`[variant-name] Expanding attribute macro: ${macro.name}`);
      }
      const result = this.guard(directive.name, statement, () =>
        macro.expand(this.ctx, directive, target),
      );
      if (result !== undefined) {
        primary = Array.isArray(result) ? result : [result];
      }
    }

    return [...primary, ...trailing];
  }

  private expandDerives(
    directive: Directive,
    statement: ts.Statement,
  ): ts.Statement[] {
    const statements: ts.Statement[] = [];

    for (const deriveName of directive.args) {
      const macro = this.registry.getDerive(deriveName);
      if (!macro) {
        new DiagnosticBuilder(VN9002, this.ctx.sourceFile, (d) =>
          this.ctx.report(d),
        )
          .at(declarationName(statement) ?? statement)
          .withArgs({ name: deriveName })
          .emit();
        continue;
      }

      if (this.verbose) {
        console.log(`[variant-name] Expanding derive macro: ${deriveName}`);
      }
      const result = this.guard(
        `${DERIVE_DIRECTIVE} ${deriveName}`,
        statement,
        () => macro.expand(this.ctx, statement),
      );
      if (result) statements.push(...result);
    }

    return statements;
  }

  /**
   * Run one expansion. A throwing macro is reported as an error and leaves
   * the statement as written; a macro that reports an error counts as not
   * expanded.
   */
  private guard<T>(
    directive: string,
    statement: ts.Statement,
    expand: () => T,
  ): T | undefined {
    const errorsBefore = this.errorCount();
    const name = declarationName(statement)?.text ?? "<anonymous>";

    let result: T;
    try {
      result = expand();
    } catch (error) {
      this.ctx.reportError(
        declarationName(statement) ?? statement,
        `@${directive} expansion failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return undefined;
    }

    if (this.errorCount() === errorsBefore) {
      this.hooks.onExpand?.({ directive, name });
    }
    return result;
  }

  private errorCount(): number {
    return this.ctx.getDiagnostics().filter((d) => d.severity === "error")
      .length;
  }

  // -------------------------------------------------------------------------
  // Folding
  // -------------------------------------------------------------------------

  private fold = (node: ts.Node): ts.Node => {
    if (ts.isCallExpression(node)) {
      const result = foldAccessorCall(
        node,
        this.foldTargets,
        this.ctx.config.accessorName,
      );
      if (result) {
        if (this.verbose) {
          console.log(
            `[variant-name] Folded ${result.typeName}.${this.ctx.config.accessorName}(...) to "${result.name}"`,
          );
        }
        this.hooks.onFold?.({ typeName: result.typeName, result: result.name });
        return this.ctx.createStringLiteral(result.name);
      }
    }
    return ts.visitEachChild(node, this.fold, this.context);
  };
}

// ============================================================================
// Convenience: source text in, source text out
// ============================================================================

export interface TransformSourceOptions {
  /** Default: "input.ts" */
  fileName?: string;
  config?: VariantNameConfig | VariantNameUserConfig;
  registry?: MacroRegistry;
}

export interface TransformSourceResult {
  code: string;
  diagnostics: RichDiagnostic[];
  /** Number of directives expanded without error */
  expanded: number;
  /** Number of accessor calls replaced by their result */
  folded: number;
}

/**
 * Parse, transform and print a source file.
 */
export function transformSource(
  source: string,
  options: TransformSourceOptions = {},
): TransformSourceResult {
  const fileName = options.fileName ?? "input.ts";
  const config = resolveConfig(validateUserConfig(options.config, "options"));
  const sourceFile = ts.createSourceFile(
    fileName,
    source,
    ts.ScriptTarget.Latest,
    true,
    fileName.endsWith(".tsx") ? ts.ScriptKind.TSX : ts.ScriptKind.TS,
  );

  const diagnostics: RichDiagnostic[] = [];
  let expanded = 0;
  let folded = 0;

  const result = ts.transform(sourceFile, [
    variantNameTransformerFactory(config, {
      registry: options.registry,
      onDiagnostic: (d) => diagnostics.push(d),
      onExpand: () => {
        expanded++;
      },
      onFold: () => {
        folded++;
      },
    }),
  ]);

  try {
    const printer = ts.createPrinter({
      newLine: ts.NewLineKind.LineFeed,
      removeComments: false,
    });
    const [transformed] = result.transformed;
    return {
      code: printer.printFile(transformed),
      diagnostics,
      expanded,
      folded,
    };
  } finally {
    result.dispose();
  }
}
