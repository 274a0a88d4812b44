// src/core/reader/tokenize.ts
// Word splitting and resolution of words into tokens.

import type { Outcome } from "../../outcome/outcome";
import { done, limitExceeded, undefinedWord } from "../../outcome/constructors";
import { type Token, PRIMITIVES, INT32_MAX, INT32_MIN, builtin, num } from "./token";

/** Read-only view of the dictionary the tokenizer resolves against. */
export interface WordLookup {
  lookup(name: string): readonly Token[] | undefined;
}

export type TokenizeOptions = {
  /** Upper bound on the number of tokens one line may expand to */
  maxTokens?: number;
};

const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\f";

/**
 * Split source text on ASCII whitespace, dropping empty words.
 */
export function splitWords(src: string): string[] {
  const words: string[] = [];
  let w = "";
  for (const c of src) {
    if (isWS(c)) {
      if (w) words.push(w);
      w = "";
      continue;
    }
    w += c;
  }
  if (w) words.push(w);
  return words;
}

/**
 * Parse a signed 32-bit decimal literal. Returns undefined for anything else,
 * including out-of-range digit strings.
 */
export function parseLiteral(word: string): number | undefined {
  if (!/^[+-]?\d+$/.test(word)) return undefined;
  const n = Number(word);
  if (n < INT32_MIN || n > INT32_MAX) return undefined;
  return n | 0;
}

/**
 * Resolve words in order: primitive name, integer literal, dictionary word.
 * Dictionary bodies are copied in, so the result never names another word.
 */
export function tokenize(
  words: Iterable<string>,
  dictionary: WordLookup,
  opts: TokenizeOptions = {}
): Outcome<Token[]> {
  const max = opts.maxTokens ?? Infinity;
  const toks: Token[] = [];

  for (const w of words) {
    const op = PRIMITIVES.get(w);
    if (op !== undefined) {
      toks.push(builtin(op));
    } else {
      const n = parseLiteral(w);
      if (n !== undefined) {
        toks.push(num(n));
      } else {
        const body = dictionary.lookup(w);
        if (!body) return undefinedWord(w);
        for (const t of body) toks.push(t);
      }
    }
    if (toks.length > max) return limitExceeded("maxDefinitionTokens", max);
  }

  return done(toks);
}
