// bin/minischeme-cli-lib.ts
// Shared CLI utilities for the minischeme command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { PartialSchemeConfig } from "../src/core/config";
import { isScoping } from "../src/core/eval/closure";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  config?: string;
  scoping?: string;
  verbose?: boolean;
  noBanner?: boolean;
  mode?: "repl" | "exec";
  /** Problems found while parsing, reported before anything runs */
  errors: string[];
};

export type CliConfig = {
  mode: "repl" | "exec";
  code?: string;
  configFile?: string;
  overrides: PartialSchemeConfig;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };

  const valueOf = (flag: string, i: number): string | undefined => {
    const v = args[i];
    if (v === undefined) result.errors.push(`${flag} requires a value`);
    return v;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--no-banner") {
      result.noBanner = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = valueOf(arg, ++i) ?? "";
      result.mode = "exec";
    } else if (arg === "--config" || arg === "-c") {
      result.config = valueOf(arg, ++i);
    } else if (arg === "--scoping") {
      const v = valueOf(arg, ++i);
      if (v !== undefined && !isScoping(v)) {
        result.errors.push(`--scoping must be lexical or dynamic, got '${v}'`);
      }
      result.scoping = v;
    } else {
      result.errors.push(`Unknown argument: ${arg}`);
    }
  }

  // Default mode is REPL if no exec mode was set
  if (!result.mode) {
    result.mode = "repl";
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
minischeme - a tiny Scheme-like expression evaluator

USAGE:
  minischeme [options]                Start the interactive REPL
  minischeme --eval <code>            Evaluate an expression and print it

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <code>                  Evaluate code and exit
  -c, --config <file>                Load a JSON or YAML config file
  --scoping <lexical|dynamic>        Where function bodies resolve free names
  --verbose                          Log parse and timing details to stderr
  --no-banner                        Skip the REPL banner

ENVIRONMENT:
  MINISCHEME_SCOPING, MINISCHEME_PROMPT, MINISCHEME_FAREWELL,
  MINISCHEME_BANNER, MINISCHEME_VERBOSE

REPL COMMANDS:
  :help, :h                          Show REPL help
  :env                               Show global bindings
  :reset                             Drop all global bindings
  :quit, :q                          Exit the REPL

EXAMPLES:
  minischeme                                   # Start REPL
  minischeme --eval "(+ 1 2)"                  # Prints 3
  minischeme --scoping dynamic -c my.config.yaml
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

function readVersion(pkgPath: string): string | undefined {
  if (!fs.existsSync(pkgPath)) return undefined;
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return undefined;
}

export function getVersion(): string {
  const version = readVersion(path.join(__dirname, "..", "package.json")) ?? "0.0.0";
  return `minischeme v${version}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): "repl" | "exec" {
  if (args.mode) {
    return args.mode;
  }
  if (args.eval !== undefined) {
    return "exec";
  }
  return "repl";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const scoping = args.scoping !== undefined && isScoping(args.scoping) ? args.scoping : undefined;

  const config: CliConfig = {
    mode: detectMode(args),
    overrides: {
      runtime: { scoping },
      repl: {
        verbose: args.verbose ? true : undefined,
        banner: args.noBanner ? false : undefined,
      },
    },
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }

  if (args.config) {
    config.configFile = args.config;
  }

  return config;
}
