// src/repl/repl.ts
// Read-eval-print loop over a pair of streams

import * as readline from "readline";
import type { ReplConfig } from "../core/config";
import { formatValue } from "../core/printer";
import type { SchemeRuntime } from "../runtime";

export type ReplState = {
  runtime: SchemeRuntime;
  config: ReplConfig;
  /** Collect lines until parentheses balance; otherwise each line stands alone */
  accumulate: boolean;
  /** Lines collected while parentheses are open */
  buffer: string;
  depth: number;
};

export type ReplStep = {
  output?: string;
  /** Diagnostic line for stderr (verbose mode) */
  log?: string;
  shouldExit?: boolean;
};

export type ReplIO = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  error?: NodeJS.WritableStream;
  /** Show banner and prompts, with line editing */
  interactive?: boolean;
};

export const REPL_HELP = `
Commands:
  :help, :h      Show this help
  :env           Show global bindings
  :reset         Drop all global bindings
  :quit, :q      Leave the REPL

Expressions:
  (+ 1 2)                      => 3
  (define a 7)                 => 7
  (define (double x) (* x 2))  => #<lambda double (x) (* x 2)>
  (double a)                   => 14
`.trim();

export function createReplState(runtime: SchemeRuntime, config: ReplConfig, accumulate = true): ReplState {
  return { runtime, config, accumulate, buffer: "", depth: 0 };
}

function parenDelta(line: string): number {
  let d = 0;
  for (const ch of line) {
    if (ch === "(") d++;
    if (ch === ")") d--;
  }
  return d;
}

function processCommand(state: ReplState, cmd: string): ReplStep {
  const [name] = cmd.split(/\s+/);
  switch (name) {
    case ":help":
    case ":h":
      return { output: REPL_HELP };
    case ":quit":
    case ":q":
      return { shouldExit: true };
    case ":env": {
      const binds = state.runtime.bindings();
      if (binds.length === 0) return { output: "(no bindings)" };
      return { output: binds.map(([k, v]) => `${k} = ${formatValue(v, { readable: true })}`).join("\n") };
    }
    case ":reset":
      state.runtime.reset();
      return { output: "Environment cleared." };
    default:
      return { output: `Unknown command: ${name}. Type :help for commands.` };
  }
}

/** Evaluate whatever has been collected and clear the buffer. */
export function flushBuffer(state: ReplState): ReplStep {
  const src = state.buffer;
  state.buffer = "";
  state.depth = 0;

  const start = performance.now();
  const result = state.runtime.eval(src);
  const log = state.config.verbose
    ? `[verbose] ${JSON.stringify(src)} -> ${result.ok ? result.value?.tag : result.errorKind ?? "Error"} (${(performance.now() - start).toFixed(2)}ms)`
    : undefined;

  if (!result.ok) return { output: result.error, log };
  return { output: result.output, log };
}

/**
 * Handle one input line. Commands start with `:`. With `accumulate` set,
 * expressions are collected until their parentheses balance; without it
 * every line is evaluated on its own.
 */
export function processReplLine(state: ReplState, line: string): ReplStep {
  const trimmed = line.trim();

  if (state.buffer === "") {
    if (trimmed.startsWith(":")) return processCommand(state, trimmed);
    if (trimmed === "") return {};
  }

  if (!state.accumulate) {
    state.buffer = line;
    return flushBuffer(state);
  }

  state.buffer += (state.buffer ? "\n" : "") + line;
  state.depth += parenDelta(line);
  if (state.depth > 0) return {};

  return flushBuffer(state);
}

export function currentPrompt(state: ReplState): string {
  return state.depth > 0 ? state.config.continuationPrompt : state.config.prompt;
}

export function bannerText(scoping: string): string {
  return [
    "═".repeat(60),
    "minischeme: a tiny Scheme-like evaluator",
    "═".repeat(60),
    `Builtins: + - * define   Scoping: ${scoping}`,
    "Type :help for commands, :quit or end of input to leave.",
    "",
  ].join("\n");
}

export async function runRepl(runtime: SchemeRuntime, config: ReplConfig, io: ReplIO): Promise<void> {
  const interactive = io.interactive ?? false;
  const println = (s: string) => io.output.write(s + "\n");
  // piped input is read one expression per line
  const state = createReplState(runtime, config, interactive);

  const rl = readline.createInterface({
    input: io.input,
    output: interactive ? io.output : undefined,
    terminal: interactive,
  });

  const emit = (step: ReplStep) => {
    if (step.log) io.error?.write(step.log + "\n");
    if (step.output !== undefined) println(step.output);
  };
  const prompt = () => {
    if (!interactive) return;
    rl.setPrompt(currentPrompt(state));
    rl.prompt();
  };

  if (interactive && config.banner) println(bannerText(runtime.scoping));
  prompt();

  let exited = false;
  try {
    for await (const line of rl) {
      const step = processReplLine(state, line);
      emit(step);
      if (step.shouldExit) {
        exited = true;
        break;
      }
      prompt();
    }
  } finally {
    rl.close();
  }

  // input ended inside an open expression: report it
  if (!exited && state.buffer !== "") emit(flushBuffer(state));

  println(interactive ? `\n${config.farewell}` : config.farewell);
}
