// src/core/eval/closure.ts
// User-defined functions: construction and call frames

import type { Expr } from "../ast";
import { ArityError } from "../errors";
import type { Env } from "./env";
import type { ClosureVal, Val } from "./values";

/**
 * Where a call frame's free variables are resolved.
 * - lexical: in the environment the closure was defined in
 * - dynamic: in the environment of the caller
 */
export type Scoping = "lexical" | "dynamic";

export const SCOPINGS: readonly Scoping[] = ["lexical", "dynamic"];

export function isScoping(s: string): s is Scoping {
  return s === "lexical" || s === "dynamic";
}

export function makeClosure(
  name: string,
  params: string[],
  body: Expr,
  source: string,
  env: Env
): ClosureVal {
  return { tag: "Closure", name, params: [...params], body, source, env };
}

/**
 * Build the frame a call to `closure` runs in. Parameter bindings, and any
 * `define` the body performs, live in this frame and are dropped with it.
 */
export function callFrame(closure: ClosureVal, args: Val[], callerEnv: Env, scoping: Scoping): Env {
  if (args.length !== closure.params.length) {
    throw new ArityError(closure.params.length, args.length);
  }
  const parent = scoping === "lexical" ? closure.env : callerEnv;
  return parent.extend(closure.params.map((p, i): [string, Val] => [p, args[i]]));
}
