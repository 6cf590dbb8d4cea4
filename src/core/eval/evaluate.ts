// src/core/eval/evaluate.ts
// Evaluator and combiner

import type { Body, Expr } from "../ast";
import { TypeMismatchError, UnboundVariableError } from "../errors";
import { read, readBody } from "../reader/read";
import { BUILTINS, getBuiltin } from "./builtins";
import { type Scoping, callFrame, makeClosure } from "./closure";
import type { Env } from "./env";
import type { BuiltinVal, ClosureVal, Val } from "./values";
import { VUnit, float, int, isCallable, str } from "./values";

export type EvalOptions = {
  /** Resolution of free variables inside function bodies (default: lexical) */
  scoping?: Scoping;
};

type Resolved = Required<EvalOptions>;

const DEFAULTS: Resolved = { scoping: "lexical" };

function resolve(options: EvalOptions): Resolved {
  return { scoping: options.scoping ?? DEFAULTS.scoping };
}

/**
 * Evaluate `expression` in `env`.
 *
 * Text is read into an Expr first, so a syntax error anywhere in it fails
 * the call before anything runs. `define` mutates `env` in place.
 */
export function evaluate(expression: string | Expr, env: Env, options: EvalOptions = {}): Val {
  const expr = typeof expression === "string" ? read(expression) : expression;
  return evalExpr(expr, env, resolve(options));
}

function evalExpr(e: Expr, env: Env, opts: Resolved): Val {
  switch (e.tag) {
    case "Empty":
      return VUnit;
    case "Num":
      return e.kind === "int" ? int(e.value) : float(e.value);
    case "Str":
      return str(e.s);
    case "Sym":
      return lookup(e.name, env);
    case "Form":
      return combine(evalBody(e.body, env, opts), env, opts);
    case "Seq": {
      const vals = evalBody(e.body, env, opts);
      return vals.length === 0 ? VUnit : vals[vals.length - 1];
    }
  }
}

function lookup(name: string, env: Env): Val {
  const builtin = getBuiltin(name);
  if (builtin) return builtin;
  const v = env.lookup(name);
  if (v === undefined) throw new UnboundVariableError(name);
  return v;
}

/**
 * Evaluate the words of a body. A define body yields the triple
 * [define, name, value] and leaves the binding itself to `combine`.
 */
function evalBody(body: Body, env: Env, opts: Resolved): Val[] {
  switch (body.tag) {
    case "Words":
      return body.items.map((item) => evalExpr(item, env, opts));
    case "Define":
      return [BUILTINS.define, str(body.name), evalExpr(body.rhs, env, opts)];
    case "DefineFn":
      return [
        BUILTINS.define,
        str(body.name),
        makeClosure(body.name, body.params, body.body, body.source, env),
      ];
  }
}

/** Values of the top-level words of `src`, before they are combined. */
export function evaluateWords(src: string, env: Env, options: EvalOptions = {}): Val[] {
  return evalBody(readBody(src), env, resolve(options));
}

/**
 * Reduce evaluated words to one value: a lone value is itself, a callable
 * head is applied to the rest, otherwise the last value wins.
 */
export function combine(vals: Val[], env: Env, options: EvalOptions = {}): Val {
  const opts: Resolved = resolve(options);
  if (vals.length === 0) return VUnit;
  if (vals.length === 1) return vals[0];

  const [head, ...args] = vals;
  switch (head.tag) {
    case "Builtin":
    case "Closure":
      return invoke(head, args, env, opts);
    case "Unit":
    case "Int":
    case "Float":
    case "Str":
      return args[args.length - 1];
  }
}

function invoke(fn: BuiltinVal | ClosureVal, args: Val[], env: Env, opts: Resolved): Val {
  if (fn.tag === "Builtin") return fn.fn(args, env);
  return evalExpr(fn.body, callFrame(fn, args, env, opts.scoping), opts);
}

/** Call `fn` with already evaluated arguments, zero arguments included. */
export function apply(fn: Val, args: Val[], env: Env, options: EvalOptions = {}): Val {
  if (!isCallable(fn)) throw new TypeMismatchError("apply", fn.tag);
  return invoke(fn, args, env, resolve(options));
}
