// src/core/eval/dictionary.ts
// Word name -> fully expanded body

import type { Token } from "../reader/token";
import type { WordLookup } from "../reader/tokenize";
import { unwrap } from "../../outcome/matchers";
import { DEFINITION_MARKER, evalDefinition } from "./define";

export class Dictionary implements WordLookup {
  private readonly entries = new Map<string, readonly Token[]>();

  lookup(name: string): readonly Token[] | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Insert or replace. The stored body is a frozen copy. */
  define(name: string, tokens: readonly Token[]): void {
    this.entries.set(name, Object.freeze([...tokens]));
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Compound words every machine starts with. */
export const BOOTSTRAP_DEFINITIONS: readonly string[] = [
  ": space 32 emit",
  ": cr 13 emit 10 emit",
  ": over swap dup rot swap",
];

export function bootstrapDictionary(): Dictionary {
  const dictionary = new Dictionary();
  for (const line of BOOTSTRAP_DEFINITIONS) {
    unwrap(evalDefinition(line.slice(DEFINITION_MARKER.length), dictionary));
  }
  return dictionary;
}
