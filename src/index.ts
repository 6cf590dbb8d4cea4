// src/index.ts
// minischeme - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// CORE RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { SchemeRuntime, evalScheme, type EvalResult } from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATOR
// ═══════════════════════════════════════════════════════════════════════════════

export { evaluate, evaluateWords, combine, apply, type EvalOptions } from "./core/eval/evaluate";
export { Env, envEmpty, envExtend } from "./core/eval/env";
export { BUILTINS, getBuiltin } from "./core/eval/builtins";
export { makeClosure, callFrame, isScoping, SCOPINGS, type Scoping } from "./core/eval/closure";
export type { Val, IntVal, FloatVal, NumVal, BuiltinVal, ClosureVal } from "./core/eval/values";
export { VUnit, int, float, str, isNumber, isCallable } from "./core/eval/values";

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export type { Expr, Body } from "./core/ast";
export { read, readBody, readWord } from "./core/reader/read";
export { splitWords, splitTree, groupWords, strip, isCompound, type Word } from "./core/reader/split";
export {
  BUILTIN_SYMBOLS,
  type BuiltinSymbol,
  isBuiltinSymbol,
  isNumericLiteral,
  isStringLiteral,
  isPrimitive,
  isValidVariableName,
  evaluateNumericLiteral,
  evaluateStringLiteral,
  evaluatePrimitive,
} from "./core/reader/classify";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & DISPLAY
// ═══════════════════════════════════════════════════════════════════════════════

export {
  SchemeError,
  SchemeSyntaxError,
  UnboundVariableError,
  ArityError,
  TypeMismatchError,
  isSchemeError,
  type ErrorKind,
} from "./core/errors";
export { formatValue, type FormatOptions } from "./core/printer";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG & REPL
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { runRepl, processReplLine, createReplState, type ReplState, type ReplIO } from "./repl/repl";
