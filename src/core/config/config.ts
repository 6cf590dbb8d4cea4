// src/core/config/config.ts
// Configuration system: defaults, environment, config files, overrides

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { type Scoping, isScoping, SCOPINGS } from "../eval/closure";

// =========================================================================
// Configuration Types
// =========================================================================

export type RuntimeConfig = {
  /** Resolution of free variables inside function bodies */
  scoping: Scoping;
};

export type ReplConfig = {
  /** Prompt shown before each expression */
  prompt: string;
  /** Prompt shown while parentheses are still open */
  continuationPrompt: string;
  /** Printed when input ends */
  farewell: string;
  /** Print the banner on interactive start */
  banner: boolean;
  /** Log parse and timing details to stderr */
  verbose: boolean;
};

export type SchemeConfig = {
  runtime: RuntimeConfig;
  repl: ReplConfig;
};

export type PartialSchemeConfig = {
  runtime?: Partial<RuntimeConfig>;
  repl?: Partial<ReplConfig>;
};

export class ConfigError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = "ConfigError";
  }
}

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  scoping: "lexical",
};

export const DEFAULT_REPL_CONFIG: ReplConfig = {
  prompt: ">> ",
  continuationPrompt: ".. ",
  farewell: "Bye!",
  banner: true,
  verbose: false,
};

export const DEFAULT_CONFIG: SchemeConfig = {
  runtime: DEFAULT_RUNTIME_CONFIG,
  repl: DEFAULT_REPL_CONFIG,
};

export const DEFAULT_CONFIG_FILES = [
  "minischeme.config.json",
  "minischeme.config.yaml",
  "minischeme.config.yml",
];

// =========================================================================
// Field Readers
// =========================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseBool(raw: string): boolean | undefined {
  const s = raw.trim().toLowerCase();
  if (s === "1" || s === "true" || s === "yes" || s === "on") return true;
  if (s === "0" || s === "false" || s === "no" || s === "off" || s === "") return false;
  return undefined;
}

function readScoping(v: unknown, source: string): Scoping | undefined {
  if (v === undefined) return undefined;
  if (typeof v === "string" && isScoping(v)) return v;
  throw new ConfigError(`scoping must be one of ${SCOPINGS.join(", ")}, got ${JSON.stringify(v)}`, source);
}

function readString(v: unknown, key: string, source: string): string | undefined {
  if (v === undefined) return undefined;
  if (typeof v === "string") return v;
  throw new ConfigError(`${key} must be a string`, source);
}

function readBool(v: unknown, key: string, source: string): boolean | undefined {
  if (v === undefined) return undefined;
  if (typeof v === "boolean") return v;
  if (typeof v === "string") {
    const b = parseBool(v);
    if (b !== undefined) return b;
  }
  throw new ConfigError(`${key} must be a boolean`, source);
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Read configuration from environment variables.
 * Fields whose variable is unset or empty stay undefined.
 */
export function configFromEnv(prefix = "MINISCHEME", env: NodeJS.ProcessEnv = process.env): PartialSchemeConfig {
  const source = "environment";
  const verbose = env[`${prefix}_VERBOSE`];
  const banner = env[`${prefix}_BANNER`];

  return {
    runtime: {
      scoping: readScoping(env[`${prefix}_SCOPING`] || undefined, source),
    },
    repl: {
      prompt: env[`${prefix}_PROMPT`] || undefined,
      farewell: env[`${prefix}_FAREWELL`] || undefined,
      banner: banner === undefined ? undefined : readBool(banner, `${prefix}_BANNER`, source),
      verbose: verbose === undefined ? undefined : readBool(verbose, `${prefix}_VERBOSE`, source),
    },
  };
}

/**
 * Create configuration from a plain object (e.g., parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: unknown, source = "object"): PartialSchemeConfig {
  if (!isRecord(data)) throw new ConfigError("config must be an object", source);
  const runtime = data.runtime ?? {};
  const repl = data.repl ?? {};
  if (!isRecord(runtime)) throw new ConfigError("runtime must be an object", source);
  if (!isRecord(repl)) throw new ConfigError("repl must be an object", source);

  return {
    runtime: {
      scoping: readScoping(runtime.scoping, source),
    },
    repl: {
      prompt: readString(repl.prompt, "prompt", source),
      continuationPrompt: readString(
        repl.continuationPrompt ?? repl.continuation_prompt,
        "continuationPrompt",
        source
      ),
      farewell: readString(repl.farewell, "farewell", source),
      banner: readBool(repl.banner, "banner", source),
      verbose: readBool(repl.verbose, "verbose", source),
    },
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialSchemeConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  try {
    if (ext === ".json") {
      data = JSON.parse(content);
    } else if (ext === ".yaml" || ext === ".yml") {
      data = parseYaml(content) ?? {};
    } else {
      throw new ConfigError(`Unsupported config file format: ${ext}`, filePath);
    }
  } catch (e) {
    if (e instanceof ConfigError) throw e;
    throw new ConfigError(`Cannot parse config: ${e instanceof Error ? e.message : String(e)}`, filePath);
  }

  return configFromObject(data, filePath);
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialSchemeConfig[]): SchemeConfig {
  let result: SchemeConfig = {
    runtime: { ...DEFAULT_RUNTIME_CONFIG },
    repl: { ...DEFAULT_REPL_CONFIG },
  };

  for (const cfg of configs) {
    const runtime = cfg.runtime ?? {};
    const repl = cfg.repl ?? {};
    // unset fields keep the earlier layer's value
    result = {
      runtime: {
        scoping: runtime.scoping ?? result.runtime.scoping,
      },
      repl: {
        prompt: repl.prompt ?? result.repl.prompt,
        continuationPrompt: repl.continuationPrompt ?? result.repl.continuationPrompt,
        farewell: repl.farewell ?? result.repl.farewell,
        banner: repl.banner ?? result.repl.banner,
        verbose: repl.verbose ?? result.repl.verbose,
      },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PartialSchemeConfig;
}): SchemeConfig {
  const layers: PartialSchemeConfig[] = [configFromEnv("MINISCHEME", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map((f) => path.join(cwd, f)).find((p) => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: SchemeConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isScoping(config.runtime.scoping)) {
    errors.push(`Unknown scoping: ${config.runtime.scoping}`);
  }
  if (config.repl.prompt.length === 0) {
    errors.push("prompt must not be empty");
  }
  if (config.repl.continuationPrompt.length === 0) {
    errors.push("continuationPrompt must not be empty");
  }
  if (config.runtime.scoping === "dynamic") {
    warnings.push("dynamic scoping: function bodies resolve free variables in the caller's environment");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
