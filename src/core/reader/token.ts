// src/core/reader/token.ts
// Resolved tokens: the only things a dictionary entry or an expression holds.

export type Op =
  | "dot"
  | "drop"
  | "dup"
  | "emit"
  | "minus"
  | "mod"
  | "plus"
  | "rot"
  | "slash"
  | "slash-mod"
  | "spaces"
  | "star"
  | "swap";

export type Token =
  | { readonly tag: "Builtin"; readonly op: Op }
  | { readonly tag: "Number"; readonly n: number };

/** Source word for each primitive. Matched before any dictionary lookup. */
export const PRIMITIVES: ReadonlyMap<string, Op> = new Map<string, Op>([
  [".", "dot"],
  ["-", "minus"],
  ["+", "plus"],
  ["*", "star"],
  ["/", "slash"],
  ["mod", "mod"],
  ["/mod", "slash-mod"],
  ["emit", "emit"],
  ["drop", "drop"],
  ["dup", "dup"],
  ["rot", "rot"],
  ["spaces", "spaces"],
  ["swap", "swap"],
]);

export const OP_WORDS: Readonly<Record<Op, string>> = Object.freeze({
  "dot": ".",
  "minus": "-",
  "plus": "+",
  "star": "*",
  "slash": "/",
  "mod": "mod",
  "slash-mod": "/mod",
  "emit": "emit",
  "drop": "drop",
  "dup": "dup",
  "rot": "rot",
  "spaces": "spaces",
  "swap": "swap",
});

export const builtin = (op: Op): Token => ({ tag: "Builtin", op });
export const num = (n: number): Token => ({ tag: "Number", n });

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;
