// src/core/eval/builtins.ts
// Builtin registry: + - * define
//
// Builtins live here and not in any Env, so a program can neither shadow nor
// redefine them.

import { ArityError, SchemeSyntaxError, TypeMismatchError } from "../errors";
import { type BuiltinSymbol, isBuiltinSymbol, isValidVariableName } from "../reader/classify";
import type { Env } from "./env";
import type { BuiltinVal, NumVal, Val } from "./values";
import { float, int, isNumber } from "./values";

function toFloat(v: NumVal): number {
  return v.tag === "Int" ? Number(v.value) : v.value;
}

function numeric(op: string, v: Val): NumVal {
  if (!isNumber(v)) throw new TypeMismatchError(op, v.tag);
  return v;
}

// Int op Int stays exact; a Float anywhere makes the result a Float.
function arith(
  a: NumVal,
  b: NumVal,
  onInt: (x: bigint, y: bigint) => bigint,
  onFloat: (x: number, y: number) => number
): NumVal {
  if (a.tag === "Int" && b.tag === "Int") return int(onInt(a.value, b.value));
  return float(onFloat(toFloat(a), toFloat(b)));
}

const addTwo = (a: NumVal, b: NumVal) => arith(a, b, (x, y) => x + y, (x, y) => x + y);
const subTwo = (a: NumVal, b: NumVal) => arith(a, b, (x, y) => x - y, (x, y) => x - y);
const mulTwo = (a: NumVal, b: NumVal) => arith(a, b, (x, y) => x * y, (x, y) => x * y);

function sum(op: string, args: Val[]): NumVal {
  return args.reduce<NumVal>((acc, v) => addTwo(acc, numeric(op, v)), int(0));
}

function add(args: Val[]): Val {
  return sum("+", args);
}

function sub(args: Val[]): Val {
  if (args.length === 0) {
    throw new ArityError(1, 0, "-: expected at least 1 arg, received 0");
  }
  const [first, ...rest] = args;
  return subTwo(numeric("-", first), sum("-", rest));
}

function mul(args: Val[]): Val {
  return args.reduce<NumVal>((acc, v) => mulTwo(acc, numeric("*", v)), int(1));
}

function define(args: Val[], env: Env): Val {
  if (args.length !== 2) {
    throw new ArityError(2, args.length, `define: expected 2 args, received ${args.length}`);
  }
  const [name, value] = args;
  if (name.tag !== "Str" || name.s.length === 0 || !isValidVariableName(name.s)) {
    throw new SchemeSyntaxError(`${name.tag === "Str" ? name.s : name.tag} is not a valid variable name`);
  }
  return env.define(name.s, value);
}

export const BUILTINS: Readonly<Record<BuiltinSymbol, BuiltinVal>> = {
  "+": { tag: "Builtin", name: "+", arity: "variadic", fn: add },
  "-": { tag: "Builtin", name: "-", arity: "variadic", fn: sub },
  "*": { tag: "Builtin", name: "*", arity: "variadic", fn: mul },
  define: { tag: "Builtin", name: "define", arity: 2, fn: define },
};

export function getBuiltin(name: string): BuiltinVal | undefined {
  return isBuiltinSymbol(name) ? BUILTINS[name] : undefined;
}
