// src/core/reader/classify.ts
// Lexical classification of words: numbers, strings, identifiers

import { SchemeSyntaxError } from "../errors";

/**
 * Reserved symbols. Each one names a builtin and can never be bound by
 * `define`, whatever the environment holds.
 */
export const BUILTIN_SYMBOLS = ["+", "-", "*", "define"] as const;

export type BuiltinSymbol = (typeof BUILTIN_SYMBOLS)[number];

const RESERVED: ReadonlySet<string> = new Set(BUILTIN_SYMBOLS);

export function isBuiltinSymbol(s: string): s is BuiltinSymbol {
  return RESERVED.has(s);
}

export function isNumericLiteral(s: string): boolean {
  if (s.length === 0 || s === ".") return false;
  return /^\d*\.?\d*$/.test(s);
}

export function isStringLiteral(s: string): boolean {
  return s.length >= 2 && s[0] === "\"" && s[s.length - 1] === "\"";
}

export function isPrimitive(s: string): boolean {
  return isNumericLiteral(s) || isStringLiteral(s) || s.length === 0;
}

export type NumericLiteral =
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number };

export function evaluateNumericLiteral(s: string): NumericLiteral {
  if (!isNumericLiteral(s)) {
    throw new SchemeSyntaxError(`Invalid numeric literal: ${s}`);
  }
  if (s.includes(".")) {
    return { kind: "float", value: Number.parseFloat(s) };
  }
  return { kind: "int", value: BigInt(s) };
}

/** Quotes are dropped; nothing inside is unescaped. */
export function evaluateStringLiteral(s: string): string {
  if (!isStringLiteral(s)) {
    throw new SchemeSyntaxError(`Invalid string literal: ${s}`);
  }
  return s.slice(1, -1);
}

export type Primitive =
  | { tag: "Empty" }
  | { tag: "Num"; literal: NumericLiteral }
  | { tag: "Str"; s: string };

export function evaluatePrimitive(s: string): Primitive {
  if (s.length === 0) return { tag: "Empty" };
  if (isNumericLiteral(s)) return { tag: "Num", literal: evaluateNumericLiteral(s) };
  if (isStringLiteral(s)) return { tag: "Str", s: evaluateStringLiteral(s) };
  throw new SchemeSyntaxError(`Invalid primitive expression: ${s}`);
}

export function isValidVariableName(name: string): boolean {
  if (isBuiltinSymbol(name)) return false;
  return /^\w*$/.test(name);
}
