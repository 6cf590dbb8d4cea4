// src/core/reader/split.ts
// Structural splitting of expression text into top-level words

import { SchemeSyntaxError } from "../errors";

const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";

/**
 * A top-level word. Groups also carry their inner words, split in the same
 * pass, so nested groups are never scanned twice.
 */
export type Word = {
  text: string;
  /** Inner words of a parenthesized group */
  children?: Word[];
  /** Two groups inside this one touch with no separator */
  glued?: boolean;
};

type Frame = {
  words: Word[];
  /** Index of the opening paren; -1 at top level */
  open: number;
  atomStart: number;
  groupJustClosed: boolean;
  glued: boolean;
};

const frame = (open: number): Frame => ({ words: [], open, atomStart: -1, groupJustClosed: false, glued: false });

/**
 * Split `src` into its top-level words in one pass, building each group's
 * inner words along the way.
 *
 * Glued groups at top level fail at once. Deeper down they only mark the
 * enclosing group, which fails when its words are asked for.
 */
export function splitTree(src: string): Word[] {
  if (src.length === 0) return [{ text: src }];

  const stack: Frame[] = [frame(-1)];
  let top = stack[0];

  const flushAtom = (f: Frame, end: number) => {
    if (f.atomStart >= 0) {
      f.words.push({ text: src.slice(f.atomStart, end) });
      f.atomStart = -1;
    }
  };

  for (let i = 0; i < src.length; i++) {
    const c = src[i];
    if (c === "(") {
      if (top.groupJustClosed) {
        if (stack.length === 1) throw new SchemeSyntaxError("Missing separator between expressions");
        top.glued = true;
      }
      flushAtom(top, i);
      top.groupJustClosed = false;
      top = frame(i);
      stack.push(top);
    } else if (c === ")") {
      if (stack.length === 1) throw new SchemeSyntaxError("Imbalanced parentheses");
      flushAtom(top, i);
      const group = top;
      stack.pop();
      top = stack[stack.length - 1];
      // "()" reads like the empty text it encloses
      const words = group.words.length === 0 && i === group.open + 1 ? [{ text: "" }] : group.words;
      top.words.push({ text: src.slice(group.open, i + 1), children: words, glued: group.glued });
      top.groupJustClosed = true;
    } else if (isWS(c)) {
      flushAtom(top, i);
      top.groupJustClosed = false;
    } else {
      if (top.atomStart < 0) top.atomStart = i;
      top.groupJustClosed = false;
    }
  }

  if (stack.length !== 1) throw new SchemeSyntaxError("Imbalanced parentheses");
  flushAtom(top, src.length);
  return top.words;
}

/** Inner words of a group word. */
export function groupWords(word: Word): Word[] {
  if (word.glued) throw new SchemeSyntaxError("Missing separator between expressions");
  return word.children ?? [];
}

/**
 * Split `src` into its top-level words.
 *
 * Whitespace separates words only at depth 0. A parenthesized group is kept
 * verbatim, inner whitespace included, as a single word.
 *
 *   splitWords("2 (+ 4 4)")  // ["2", "(+ 4 4)"]
 *   splitWords("")           // [""]
 */
export function splitWords(src: string): string[] {
  return splitTree(src).map((w) => w.text);
}

/**
 * Remove one enclosing pair of parentheses: everything strictly between the
 * first `(` and the last `)`. Textual, not depth-aware.
 */
export function strip(src: string): string {
  const open = src.indexOf("(");
  if (open < 0) throw new SchemeSyntaxError("Expecting (");
  const close = src.lastIndexOf(")");
  if (close < open) throw new SchemeSyntaxError("Expecting )");
  return src.slice(open + 1, close);
}

export function isCompound(src: string): boolean {
  return src.length > 0 && src[0] === "(" && src[src.length - 1] === ")";
}
