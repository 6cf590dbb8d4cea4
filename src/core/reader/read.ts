// src/core/reader/read.ts
// Text -> Expr. Syntax is validated once here, before anything is evaluated.

import type { Body, Expr } from "../ast";
import { EMPTY } from "../ast";
import { SchemeSyntaxError } from "../errors";
import {
  evaluateNumericLiteral,
  evaluateStringLiteral,
  isNumericLiteral,
  isStringLiteral,
  isValidVariableName,
} from "./classify";
import { type Word, groupWords, isCompound, splitTree, strip } from "./split";

export function read(src: string): Expr {
  if (isCompound(src)) {
    return { tag: "Form", body: readBody(strip(src)) };
  }
  const body = readBody(src);
  if (body.tag === "Words" && body.items.length === 1) {
    return body.items[0];
  }
  return { tag: "Seq", body };
}

export function readBody(src: string): Body {
  return bodyOf(splitTree(src));
}

export function readWord(word: string): Expr {
  if (isCompound(word)) return { tag: "Form", body: readBody(strip(word)) };
  return readNode({ text: word });
}

function bodyOf(words: Word[]): Body {
  if (words.length > 1 && words[0].text === "define") {
    return readDefine(words);
  }
  return { tag: "Words", items: words.map(readNode) };
}

function readNode(word: Word): Expr {
  if (word.children) return { tag: "Form", body: bodyOf(groupWords(word)) };
  const text = word.text;
  if (text.length === 0) return EMPTY;
  if (isNumericLiteral(text)) return { tag: "Num", ...evaluateNumericLiteral(text) };
  if (isStringLiteral(text)) return { tag: "Str", s: evaluateStringLiteral(text) };
  return { tag: "Sym", name: text };
}

function readDefine(words: Word[]): Body {
  if (words.length !== 3) {
    throw new SchemeSyntaxError("The 'define' keyword takes two args");
  }
  const [, target, value] = words;

  if (target.children) {
    // (define (name p1 p2 ...) body): the body stays unevaluated
    const [name = "", ...params] = groupWords(target).map((w) => w.text);
    checkName(name);
    params.forEach(checkName);
    return { tag: "DefineFn", name, params, body: readNode(value), source: value.text };
  }

  checkName(target.text);
  return { tag: "Define", name: target.text, rhs: readNode(value) };
}

function checkName(name: string): void {
  if (name.length === 0 || !isValidVariableName(name)) {
    throw new SchemeSyntaxError(`${name} is not a valid variable name`);
  }
}
