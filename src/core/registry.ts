/**
 * Macro Registry - Stores and retrieves macro definitions
 */

import type {
  MacroDefinition,
  MacroRegistry,
  AttributeMacro,
  DeriveMacro,
} from "./types.js";

/**
 * Human-readable name for error messages.
 */
const kindDisplayNames: Record<MacroDefinition["kind"], string> = {
  attribute: "Attribute macro",
  derive: "Derive macro",
};

class MacroRegistryImpl implements MacroRegistry {
  private attributes = new Map<string, AttributeMacro>();
  private derives = new Map<string, DeriveMacro>();

  register(macro: MacroDefinition): void {
    const existing =
      macro.kind === "attribute"
        ? this.attributes.get(macro.name)
        : this.derives.get(macro.name);
    if (existing) {
      throw new Error(
        `${kindDisplayNames[macro.kind]} with name '${macro.name}' is already registered`,
      );
    }

    if (macro.kind === "attribute") {
      this.attributes.set(macro.name, macro);
    } else {
      this.derives.set(macro.name, macro);
    }
  }

  getAttribute(name: string): AttributeMacro | undefined {
    return this.attributes.get(name);
  }

  getDerive(name: string): DeriveMacro | undefined {
    return this.derives.get(name);
  }

  getAll(): MacroDefinition[] {
    return [...this.attributes.values(), ...this.derives.values()];
  }

  /** Clear all registered macros (useful for testing) */
  clear(): void {
    this.attributes.clear();
    this.derives.clear();
  }
}

/** Global macro registry singleton */
export const globalRegistry = new MacroRegistryImpl();

/** Create a new isolated registry (for testing or scoped usage) */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

// ============================================================================
// Macro Definition Helpers
// ============================================================================

/** Define an attribute macro with type inference */
export function defineAttributeMacro(
  definition: Omit<AttributeMacro, "kind">,
): AttributeMacro {
  return { ...definition, kind: "attribute" };
}

/** Define a derive macro with type inference */
export function defineDeriveMacro(
  definition: Omit<DeriveMacro, "kind">,
): DeriveMacro {
  return { ...definition, kind: "derive" };
}
