// test/core/reader/split.spec.ts
// Tests for the word splitter and paren stripper

import { describe, it, expect } from "vitest";
import { splitWords, splitTree, groupWords, strip, isCompound } from "../../../src/core/reader/split";
import { SchemeSyntaxError } from "../../../src/core/errors";

describe("splitWords", () => {
  const cases: Array<[string, string[]]> = [
    ["", [""]],
    ["2", ["2"]],
    ["( 2)", ["( 2)"]],
    ["2 4 5", ["2", "4", "5"]],
    ["2 (+ 4 4)", ["2", "(+ 4 4)"]],
    ["((4))", ["((4))"]],
    ["+ 1 (+ 3 (4))", ["+", "1", "(+ 3 (4))"]],
    ["  a\tb\nc  ", ["a", "b", "c"]],
    ["   ", []],
    ["a(b)", ["a", "(b)"]],
    ["(a)b", ["(a)", "b"]],
    ["(a) (b)", ["(a)", "(b)"]],
    ["define (f x y) (+ x\ty)", ["define", "(f x y)", "(+ x\ty)"]],
  ];

  for (const [input, words] of cases) {
    it(`${JSON.stringify(input)} -> ${JSON.stringify(words)}`, () => {
      expect(splitWords(input)).toEqual(words);
    });
  }

  it("keeps whitespace inside groups verbatim", () => {
    expect(splitWords("x (  a   b )")).toEqual(["x", "(  a   b )"]);
  });

  describe("unbalanced input", () => {
    for (const bad of ["(", ")", "()(2", "(a", "a)", "((a)", "(a))", ") ("]) {
      it(`rejects ${JSON.stringify(bad)}`, () => {
        expect(() => splitWords(bad)).toThrow(SchemeSyntaxError);
      });
    }

    it("names the imbalance", () => {
      expect(() => splitWords("(+ 1 2")).toThrow("Imbalanced parentheses");
    });
  });

  it("rejects groups glued together", () => {
    expect(() => splitWords("(a)(b)")).toThrow("Missing separator between expressions");
  });

  it("re-splits its own output joined with spaces to the same words", () => {
    const inputs = ["2 (+ 4 4)", "define (f x) (* x (+ 1 2))", "a  b\t(c (d e))", "((4))"];
    for (const src of inputs) {
      const words = splitWords(src);
      expect(splitWords(words.join(" "))).toEqual(words);
    }
  });
});

describe("splitTree", () => {
  it("splits groups into their inner words in the same pass", () => {
    expect(splitTree("a (b (c d))")).toEqual([
      { text: "a" },
      {
        text: "(b (c d))",
        glued: false,
        children: [
          { text: "b" },
          { text: "(c d)", glued: false, children: [{ text: "c" }, { text: "d" }] },
        ],
      },
    ]);
  });

  it("gives an empty group one empty word and a blank group none", () => {
    expect(groupWords(splitTree("()")[0])).toEqual([{ text: "" }]);
    expect(groupWords(splitTree("( )")[0])).toEqual([]);
  });

  it("defers glued groups below the top level to groupWords", () => {
    const [outer] = splitTree("(f (a)(b))");
    expect(outer.text).toBe("(f (a)(b))");
    expect(() => groupWords(outer)).toThrow("Missing separator between expressions");
  });

  it("splits deep nesting", () => {
    const depth = 5000;
    let word = splitTree("(".repeat(depth) + "x" + ")".repeat(depth))[0];
    for (let i = 1; i < depth; i++) {
      word = groupWords(word)[0];
    }
    expect(groupWords(word)).toEqual([{ text: "x" }]);
  });
});

describe("strip", () => {
  it("removes one enclosing pair", () => {
    expect(strip("(+ 2 5)")).toBe("+ 2 5");
    expect(strip("(( 4 ) )")).toBe("( 4 ) ");
    expect(strip("()")).toBe("");
  });

  it("is textual: first ( and last )", () => {
    expect(strip("x (a) (b) y")).toBe("a) (b");
  });

  it("fails without an opening paren", () => {
    expect(() => strip("+ 2 5)")).toThrow("Expecting (");
  });

  it("fails without a closing paren", () => {
    expect(() => strip("(")).toThrow("Expecting )");
    expect(() => strip(")(")).toThrow("Expecting )");
  });
});

describe("isCompound", () => {
  it("checks the first and last characters", () => {
    expect(isCompound("(+ 1 2)")).toBe(true);
    expect(isCompound("()")).toBe(true);
    expect(isCompound("")).toBe(false);
    expect(isCompound("( a")).toBe(false);
    expect(isCompound(" (a)")).toBe(false);
  });
});
