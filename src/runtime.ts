// src/runtime.ts
// SchemeRuntime - session object owning the global environment
//
// Usage:
//   import { SchemeRuntime } from "minischeme";
//
//   const scheme = new SchemeRuntime();
//   scheme.eval("(define (double x) (* x 2))");
//   console.log(scheme.eval("(double 21)").output); // 42

import type { Val } from "./core/eval/values";
import type { ErrorKind } from "./core/errors";
import type { PartialSchemeConfig, RuntimeConfig } from "./core/config";
import { Env, envEmpty } from "./core/eval/env";
import { evaluate } from "./core/eval/evaluate";
import { isSchemeError } from "./core/errors";
import { formatValue } from "./core/printer";
import { DEFAULT_RUNTIME_CONFIG } from "./core/config";

/**
 * Result of an eval operation
 */
export type EvalResult = {
  /** Whether evaluation succeeded */
  ok: boolean;

  /** The result value (if ok) */
  value?: Val;

  /** The value as the REPL prints it (if ok) */
  output?: string;

  /** Error message (if not ok) */
  error?: string;

  /** Error classification; absent for failures raised by the host */
  errorKind?: ErrorKind;
};

export class SchemeRuntime {
  private readonly config: RuntimeConfig;
  readonly env: Env;

  constructor(config: PartialSchemeConfig["runtime"] = {}) {
    this.config = { scoping: config.scoping ?? DEFAULT_RUNTIME_CONFIG.scoping };
    this.env = envEmpty();
  }

  get scoping(): RuntimeConfig["scoping"] {
    return this.config.scoping;
  }

  /** Evaluate `src` in the global environment; failures throw. */
  evaluate(src: string): Val {
    return evaluate(src, this.env, { scoping: this.config.scoping });
  }

  /**
   * Evaluate `src`, reporting failure in the result instead of throwing.
   * Bindings made before a failure are kept.
   */
  eval(src: string): EvalResult {
    try {
      const value = this.evaluate(src);
      return { ok: true, value, output: formatValue(value) };
    } catch (e) {
      if (isSchemeError(e)) {
        return { ok: false, error: e.message, errorKind: e.kind };
      }
      // the host stack gives out on very deeply nested input
      if (e instanceof RangeError) {
        return { ok: false, error: `Recursion too deep: ${e.message}` };
      }
      throw e;
    }
  }

  /** Global bindings in definition order. */
  bindings(): Array<[string, Val]> {
    return this.env.entries();
  }

  reset(): void {
    this.env.clear();
  }
}

/**
 * One-shot evaluation in a fresh environment.
 */
export function evalScheme(src: string, config: PartialSchemeConfig["runtime"] = {}): EvalResult {
  return new SchemeRuntime(config).eval(src);
}
