#!/usr/bin/env -S npx tsx
// bin/minischeme.ts
// minischeme CLI - interactive REPL or one-shot evaluation
//
// Run:  npx tsx bin/minischeme.ts [options]

import * as fs from "fs";
import * as path from "path";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  type CliConfig,
} from "./minischeme-cli-lib";
import { ConfigError, loadConfig, validateConfig, type SchemeConfig } from "../src/core/config";
import { SchemeRuntime } from "../src/runtime";
import { runRepl } from "../src/repl/repl";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.errors.length > 0) {
    for (const err of cliArgs.errors) console.error(err);
    console.error("Run with --help for usage.");
    return 2;
  }

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  const cli = buildConfig(cliArgs);

  // Load environment variables from .env
  loadEnvFile();

  let config: SchemeConfig;
  try {
    config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error(`Config error: ${e.message}`);
    return 2;
  }
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    if (config.repl.verbose) console.error(`[verbose] warning: ${warning}`);
  }
  if (!validation.valid) {
    for (const err of validation.errors) console.error(`Config error: ${err}`);
    return 2;
  }

  const runtime = new SchemeRuntime(config.runtime);

  if (cli.mode === "exec") {
    return executeMode(runtime, cli);
  }

  await runRepl(runtime, config.repl, {
    input: process.stdin,
    output: process.stdout,
    error: process.stderr,
    interactive: process.stdin.isTTY === true,
  });
  return 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT SETUP
// ═══════════════════════════════════════════════════════════════════════════════

function loadEnvFile(): void {
  const envPath = path.join(process.cwd(), ".env");
  if (fs.existsSync(envPath)) {
    const envContent = fs.readFileSync(envPath, "utf8");
    for (const line of envContent.split("\n")) {
      const match = line.match(/^([^=#][^=]*)=(.*)$/);
      if (match && !process.env[match[1]]) {
        process.env[match[1]] = match[2].trim();
      }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (--eval)
// ═══════════════════════════════════════════════════════════════════════════════

function executeMode(runtime: SchemeRuntime, cli: CliConfig): number {
  const result = runtime.eval(cli.code ?? "");
  if (!result.ok) {
    console.error(result.error);
    return 1;
  }
  if (result.output) console.log(result.output);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
