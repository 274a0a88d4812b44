// src/core/eval/define.ts
// ": name body..." handling

import type { Outcome } from "../../outcome/outcome";
import { done, malformedDefinition } from "../../outcome/constructors";
import { flatMapOutcome } from "../../outcome/matchers";
import type { Token } from "../reader/token";
import { splitWords, tokenize, type TokenizeOptions } from "../reader/tokenize";
import type { Dictionary } from "./dictionary";

export const DEFINITION_MARKER = ":";

export type Definition = {
  name: string;
  tokens: readonly Token[];
};

/**
 * Define a word from the text following the marker. The body is resolved
 * against the dictionary as it stands now, then stored under the name.
 */
export function evalDefinition(
  src: string,
  dictionary: Dictionary,
  opts: TokenizeOptions = {}
): Outcome<Definition> {
  const [name, ...body] = splitWords(src);
  if (name === undefined) return malformedDefinition();

  return flatMapOutcome(tokenize(body, dictionary, opts), (tokens) => {
    dictionary.define(name, tokens);
    return done({ name, tokens });
  });
}
