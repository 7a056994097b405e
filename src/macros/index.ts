/**
 * Built-in Macros
 *
 * Importing this module registers every built-in macro with the global
 * registry.
 */

export * from "./variant-name/index.js";
