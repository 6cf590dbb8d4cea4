// src/core/errors.ts
// Evaluation error classes

export type ErrorKind = "SyntaxError" | "ArityError" | "TypeError";

export class SchemeError extends Error {
  constructor(message: string, public readonly kind: ErrorKind) {
    super(message);
    this.name = "SchemeError";
  }
}

/** Malformed input: parentheses, literals, names, `define` shape. */
export class SchemeSyntaxError extends SchemeError {
  constructor(message: string) {
    super(message, "SyntaxError");
    this.name = "SchemeSyntaxError";
  }
}

export class UnboundVariableError extends SchemeSyntaxError {
  constructor(public readonly variable: string) {
    super(`Name ${variable} is not defined!`);
    this.name = "UnboundVariableError";
  }
}

export class ArityError extends SchemeError {
  constructor(
    public readonly expected: number,
    public readonly received: number,
    message = `Expected ${expected} args, received ${received}`
  ) {
    super(message, "ArityError");
    this.name = "ArityError";
  }
}

export class TypeMismatchError extends SchemeError {
  constructor(
    public readonly op: string,
    public readonly operand: string
  ) {
    super(`${op}: unsupported operand type ${operand}`, "TypeError");
    this.name = "TypeMismatchError";
  }
}

export function isSchemeError(e: unknown): e is SchemeError {
  return e instanceof SchemeError;
}
