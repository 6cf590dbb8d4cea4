// src/core/ast.ts
// Expression tree produced by the reader

export type Expr =
  | { tag: "Empty" }
  | { tag: "Num"; kind: "int"; value: bigint }
  | { tag: "Num"; kind: "float"; value: number }
  | { tag: "Str"; s: string }
  | { tag: "Sym"; name: string }
  | { tag: "Form"; body: Body }  // parenthesized: values are combined
  | { tag: "Seq"; body: Body };  // bare words: value of the last one

export type Body =
  | { tag: "Words"; items: Expr[] }
  | { tag: "Define"; name: string; rhs: Expr }
  | { tag: "DefineFn"; name: string; params: string[]; body: Expr; source: string };

export const EMPTY: Expr = { tag: "Empty" };
