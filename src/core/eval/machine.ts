// src/core/eval/machine.ts
// The interpreter's only state: one dictionary and one stack.

import type { Outcome } from "../../outcome/outcome";
import type { Failure } from "../../outcome/failure";
import { mapOutcome, match, flatMapOutcome } from "../../outcome/matchers";
import type { Token } from "../reader/token";
import { splitWords, tokenize } from "../reader/tokenize";
import { DEFAULT_CONFIG, loadConfig, validateConfig, type MachineConfig, type PartialConfig } from "../config";
import { type TraceSink, nullTrace } from "../../ports/trace";
import { type ClockPort, systemClock } from "../../ports/clock";
import { Dictionary, bootstrapDictionary } from "./dictionary";
import { DEFINITION_MARKER, evalDefinition } from "./define";
import { evaluate } from "./evaluate";

export type MachineOptions = {
  config?: MachineConfig;
  trace?: TraceSink;
  clock?: ClockPort;
  /** Starting dictionary; a fresh bootstrap dictionary when omitted */
  dictionary?: Dictionary;
};

/**
 * Not safe for concurrent callers: every `eval` runs to completion and
 * mutates the machine in place.
 */
export class Machine {
  private readonly dictionary: Dictionary;
  private readonly values: number[] = [];
  private readonly config: MachineConfig;
  private readonly trace: TraceSink;
  private readonly clock: ClockPort;

  constructor(opts: MachineOptions = {}) {
    this.dictionary = opts.dictionary ?? bootstrapDictionary();
    this.config = opts.config ?? DEFAULT_CONFIG;
    this.trace = opts.trace ?? nullTrace;
    this.clock = opts.clock ?? systemClock;
  }

  /**
   * Define a word (line starts with ":") or evaluate an expression.
   * Definitions print nothing. On failure the stack keeps whatever the
   * tokens before the failing one did to it.
   */
  eval(line: string): Outcome<string> {
    const start = this.clock.nowMs();

    const result = line.startsWith(DEFINITION_MARKER)
      ? this.evalDef(line.slice(DEFINITION_MARKER.length))
      : this.evalExpr(line);

    const durationMs = this.clock.nowMs() - start;
    const fault = match<string, Failure | null>(result, {
      done: () => null,
      fail: (f) => f.failure,
    });
    if (fault) {
      this.trace.emit({ tag: "E_Fault", reason: fault.reason, message: fault.message });
    }
    this.trace.emit({
      tag: "E_Eval",
      line,
      outcome: result.tag,
      stackDepth: this.values.length,
      durationMs,
    });

    return { ...result, meta: { ...result.meta, durationMs } };
  }

  /** Copy of the stack, bottom first. */
  get stack(): number[] {
    return [...this.values];
  }

  words(): string[] {
    return this.dictionary.names();
  }

  lookup(name: string): Token[] | undefined {
    const body = this.dictionary.lookup(name);
    return body ? [...body] : undefined;
  }

  private evalDef(src: string): Outcome<string> {
    const defined = evalDefinition(src, this.dictionary, {
      maxTokens: this.config.limits.maxDefinitionTokens,
    });
    return mapOutcome(defined, ({ name, tokens }) => {
      this.trace.emit({ tag: "E_Define", name, tokens: tokens.length });
      return "";
    });
  }

  private evalExpr(src: string): Outcome<string> {
    const { limits } = this.config;
    const tokens = tokenize(splitWords(src), this.dictionary, { maxTokens: limits.maxDefinitionTokens });
    return flatMapOutcome(tokens, (toks) =>
      evaluate(toks, this.values, {
        maxStackDepth: limits.maxStackDepth,
        maxOutputLength: limits.maxOutputLength,
      })
    );
  }
}

/**
 * Build a machine configured from the environment and any
 * `stackforth.config.json` in the working directory. Throws when the
 * resulting limits do not validate.
 */
export function createMachine(
  opts: Omit<MachineOptions, "config"> & { configFile?: string; overrides?: PartialConfig } = {}
): Machine {
  const { configFile, overrides, ...rest } = opts;
  const config = loadConfig({ configFile, overrides });
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new Error(`Invalid configuration: ${errors.join("; ")}`);
  }
  return new Machine({ ...rest, config });
}
