// src/core/eval/values.ts
// Runtime values

import type { Expr } from "../ast";
import type { BuiltinSymbol } from "../reader/classify";
import type { Env } from "./env";

export type IntVal = { tag: "Int"; value: bigint };
export type FloatVal = { tag: "Float"; value: number };
export type NumVal = IntVal | FloatVal;

export type BuiltinVal = {
  tag: "Builtin";
  name: BuiltinSymbol;
  arity: number | "variadic";
  fn: (args: Val[], env: Env) => Val;
};

/**
 * ClosureVal: user-defined function.
 *
 * `body` is kept unevaluated until the closure is applied; `source` is the
 * text it was read from, for display. `env` is the environment the closure
 * was defined in, which is the parent of its call frames under lexical
 * scoping.
 */
export type ClosureVal = {
  tag: "Closure";
  name: string;
  params: string[];
  body: Expr;
  source: string;
  env: Env;
};

export type Val =
  | { tag: "Unit" }
  | IntVal
  | FloatVal
  | { tag: "Str"; s: string }
  | BuiltinVal
  | ClosureVal;

export const VUnit: Val = { tag: "Unit" };

export const int = (value: bigint | number): IntVal => ({ tag: "Int", value: BigInt(value) });
export const float = (value: number): FloatVal => ({ tag: "Float", value });
export const str = (s: string): Val => ({ tag: "Str", s });

export function isNumber(v: Val): v is NumVal {
  return v.tag === "Int" || v.tag === "Float";
}

export function isCallable(v: Val): v is BuiltinVal | ClosureVal {
  return v.tag === "Builtin" || v.tag === "Closure";
}
