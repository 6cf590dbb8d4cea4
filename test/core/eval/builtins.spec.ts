// test/core/eval/builtins.spec.ts
// Tests for the builtin registry

import { describe, it, expect } from "vitest";
import { BUILTINS, getBuiltin } from "../../../src/core/eval/builtins";
import { envEmpty } from "../../../src/core/eval/env";
import { int, float, str, VUnit } from "../../../src/core/eval/values";
import { BUILTIN_SYMBOLS } from "../../../src/core/reader/classify";
import { ArityError, SchemeSyntaxError, TypeMismatchError } from "../../../src/core/errors";

const call = (name: keyof typeof BUILTINS, ...args: Parameters<typeof int>[0][]) =>
  BUILTINS[name].fn(args.map((a) => int(a)), envEmpty());

describe("registry", () => {
  it("has an entry for every reserved symbol", () => {
    for (const name of BUILTIN_SYMBOLS) {
      expect(getBuiltin(name)?.name).toBe(name);
    }
  });

  it("knows nothing else", () => {
    expect(getBuiltin("lambda")).toBeUndefined();
    expect(getBuiltin("toString")).toBeUndefined();
    expect(getBuiltin("")).toBeUndefined();
  });

  it("records arity", () => {
    expect(BUILTINS["+"].arity).toBe("variadic");
    expect(BUILTINS.define.arity).toBe(2);
  });
});

describe("+ - *", () => {
  it("fold over their arguments", () => {
    expect(call("+", 1, 2, 3)).toEqual(int(6));
    expect(call("-", 10, 3, 2)).toEqual(int(5));
    expect(call("*", 2, 3, 4)).toEqual(int(24));
  });

  it("have identities for no arguments", () => {
    expect(call("+")).toEqual(int(0));
    expect(call("*")).toEqual(int(1));
  });

  it("- with one argument returns it", () => {
    expect(call("-", 7)).toEqual(int(7));
  });

  it("- with none is an arity error", () => {
    expect(() => call("-")).toThrow(ArityError);
  });

  it("promote to float when any operand is a float", () => {
    const env = envEmpty();
    expect(BUILTINS["+"].fn([int(1), float(0.5)], env)).toEqual(float(1.5));
    expect(BUILTINS["*"].fn([float(0.5), int(4)], env)).toEqual(float(2));
    expect(BUILTINS["-"].fn([int(1), float(0.25)], env)).toEqual(float(0.75));
  });

  it("reject non-numbers", () => {
    const env = envEmpty();
    expect(() => BUILTINS["+"].fn([int(1), str("2")], env)).toThrow(TypeMismatchError);
    expect(() => BUILTINS["-"].fn([str("2")], env)).toThrow("-: unsupported operand type Str");
    expect(() => BUILTINS["*"].fn([VUnit], env)).toThrow("*: unsupported operand type Unit");
  });
});

describe("define", () => {
  it("binds a name given as a string", () => {
    const env = envEmpty();
    expect(BUILTINS.define.fn([str("x"), int(4)], env)).toEqual(int(4));
    expect(env.lookup("x")).toEqual(int(4));
  });

  it("takes exactly two arguments", () => {
    expect(() => BUILTINS.define.fn([str("x")], envEmpty())).toThrow("define: expected 2 args, received 1");
  });

  it("validates the name", () => {
    const env = envEmpty();
    expect(() => BUILTINS.define.fn([str("+"), int(1)], env)).toThrow(SchemeSyntaxError);
    expect(() => BUILTINS.define.fn([str(""), int(1)], env)).toThrow(SchemeSyntaxError);
    expect(() => BUILTINS.define.fn([int(1), int(1)], env)).toThrow("Int is not a valid variable name");
    expect(env.size).toBe(0);
  });
});
