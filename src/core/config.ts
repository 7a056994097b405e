/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: VARIANT_NAME_* (highest priority, for CI overrides)
 * 2. Config files: .variantnamerc, .variantnamerc.json, variantname.config.js, etc.
 * 3. package.json: "variantname" key
 * 4. Defaults (lowest priority)
 *
 * @example Config file (.variantnamerc.json)
 * ```json
 * { "accessorName": "nameOf", "discriminants": ["type"] }
 * ```
 */

import ts from "typescript";
import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface VariantNameConfig {
  /** Name of the generated accessor function */
  accessorName: string;

  /** Discriminant properties tried first, in order */
  discriminants: string[];

  /** Replace statically known accessor calls with their result */
  fold: boolean;

  /** Log each expansion to the console */
  verbose: boolean;
}

export type VariantNameUserConfig = Partial<VariantNameConfig>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
    options?: { cause?: unknown },
  ) {
    super(source ? `${message} (in ${source})` : message, options);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: Readonly<VariantNameConfig> = Object.freeze({
  accessorName: "variantName",
  discriminants: ["kind", "_tag", "type", "tag"],
  fold: true,
  verbose: false,
});

/**
 * Identity helper for typed config files.
 */
export function defineConfig(
  config: VariantNameUserConfig,
): VariantNameUserConfig {
  return config;
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow a parsed config file (or programmatic overrides) to a user config.
 * Unknown keys are ignored.
 */
export function validateUserConfig(
  raw: unknown,
  source = "configuration",
): VariantNameUserConfig {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigError("Configuration must be an object", source);
  }

  const result: VariantNameUserConfig = {};

  const { accessorName, discriminants, fold, verbose } = raw;

  if (accessorName !== undefined) {
    if (
      typeof accessorName !== "string" ||
      !ts.isIdentifierText(accessorName, ts.ScriptTarget.Latest)
    ) {
      throw new ConfigError(
        `accessorName must be a valid identifier, got ${JSON.stringify(accessorName)}`,
        source,
      );
    }
    result.accessorName = accessorName;
  }

  if (discriminants !== undefined) {
    if (
      !Array.isArray(discriminants) ||
      !discriminants.every(
        (d): d is string => typeof d === "string" && d.length > 0,
      )
    ) {
      throw new ConfigError(
        "discriminants must be an array of non-empty strings",
        source,
      );
    }
    result.discriminants = [...discriminants];
  }

  if (fold !== undefined) {
    if (typeof fold !== "boolean") {
      throw new ConfigError("fold must be a boolean", source);
    }
    result.fold = fold;
  }

  if (verbose !== undefined) {
    if (typeof verbose !== "boolean") {
      throw new ConfigError("verbose must be a boolean", source);
    }
    result.verbose = verbose;
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "variantname";

/**
 * Load configuration from files, searching `searchFrom` (default: cwd).
 */
function loadConfigFromFiles(searchFrom?: string): VariantNameUserConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
    cache: false,
  });

  let result: { config: unknown; filepath: string } | null;
  try {
    result = explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(
      `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error },
    );
  }

  if (!result) return {};
  return validateUserConfig(result.config, result.filepath);
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "VARIANT_NAME_";

function parseEnvBoolean(key: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigError(
        `${key} must be a boolean, got ${JSON.stringify(value)}`,
        "environment",
      );
  }
}

/**
 * Load configuration from environment variables.
 *
 * VARIANT_NAME_ACCESSOR_NAME=nameOf → accessorName
 * VARIANT_NAME_DISCRIMINANTS=type,tag → discriminants
 * VARIANT_NAME_FOLD=false → fold
 * VARIANT_NAME_VERBOSE=1 → verbose
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): VariantNameUserConfig {
  const raw: Record<string, unknown> = {};

  const accessorName = env[`${ENV_PREFIX}ACCESSOR_NAME`];
  if (accessorName !== undefined) raw.accessorName = accessorName.trim();

  const discriminants = env[`${ENV_PREFIX}DISCRIMINANTS`];
  if (discriminants !== undefined) {
    raw.discriminants = discriminants
      .split(",")
      .map((d) => d.trim())
      .filter((d) => d.length > 0);
  }

  const fold = env[`${ENV_PREFIX}FOLD`];
  if (fold !== undefined) raw.fold = parseEnvBoolean(`${ENV_PREFIX}FOLD`, fold);

  const verbose = env[`${ENV_PREFIX}VERBOSE`];
  if (verbose !== undefined) {
    raw.verbose = parseEnvBoolean(`${ENV_PREFIX}VERBOSE`, verbose);
  }

  return validateUserConfig(raw, "environment");
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Merge user configuration over the defaults. Always returns a fresh object.
 */
export function resolveConfig(
  ...layers: VariantNameUserConfig[]
): VariantNameConfig {
  const merged: VariantNameConfig = {
    ...DEFAULT_CONFIG,
    discriminants: [...DEFAULT_CONFIG.discriminants],
  };
  for (const layer of layers) {
    if (layer.accessorName !== undefined) merged.accessorName = layer.accessorName;
    if (layer.discriminants !== undefined) {
      merged.discriminants = [...layer.discriminants];
    }
    if (layer.fold !== undefined) merged.fold = layer.fold;
    if (layer.verbose !== undefined) merged.verbose = layer.verbose;
  }
  return merged;
}

/**
 * Load configuration: defaults, then config file, then environment.
 */
export function loadConfig(
  searchFrom?: string,
  env: NodeJS.ProcessEnv = process.env,
): VariantNameConfig {
  return resolveConfig(loadConfigFromFiles(searchFrom), loadConfigFromEnv(env));
}
