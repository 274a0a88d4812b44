// src/core/eval/evaluate.ts
// Executes resolved tokens against the stack, collecting printed text.

import type { Outcome } from "../../outcome/outcome";
import {
  done,
  stackUnderflow,
  divisionByZero,
  invalidCodePoint,
  limitExceeded,
} from "../../outcome/constructors";
import { type Op, type Token, OP_WORDS } from "../reader/token";
import { OUTPUT_LENGTH_CEILING } from "../config/config";

export type EvaluateOptions = {
  maxStackDepth?: number;
  maxOutputLength?: number;
};

/** Printed fragment of a primitive, or null when it prints nothing. */
type StepResult = Outcome<string | null>;

const NONE: StepResult = done(null);

const MAX_CODE_POINT = 0x10ffff;

const isSurrogate = (v: number) => v >= 0xd800 && v <= 0xdfff;

type BinaryOp = "plus" | "minus" | "star" | "slash" | "mod";

function arith(op: BinaryOp, a: number, b: number): number {
  switch (op) {
    case "plus": return (a + b) | 0;
    case "minus": return (a - b) | 0;
    case "star": return Math.imul(a, b);
    case "slash": return Math.trunc(a / b) | 0;
    case "mod": return (a % b) | 0;
  }
}

function step(op: Op, stack: number[], room: number, maxOutput: number): StepResult {
  const word = OP_WORDS[op];

  switch (op) {
    case "dot": {
      const a = stack.pop();
      if (a === undefined) return stackUnderflow(word);
      return done(String(a));
    }

    case "drop": {
      if (stack.pop() === undefined) return stackUnderflow(word);
      return NONE;
    }

    case "dup": {
      if (stack.length === 0) return stackUnderflow(word);
      stack.push(stack[stack.length - 1]);
      return NONE;
    }

    case "minus":
    case "plus":
    case "star":
    case "slash":
    case "mod": {
      const b = stack.pop();
      if (b === undefined) return stackUnderflow(word);
      const a = stack.pop();
      if (a === undefined) return stackUnderflow(word);
      if (b === 0 && (op === "slash" || op === "mod")) return divisionByZero(word);
      stack.push(arith(op, a, b));
      return NONE;
    }

    case "slash-mod": {
      const b = stack.pop();
      if (b === undefined) return stackUnderflow(word);
      const a = stack.pop();
      if (a === undefined) return stackUnderflow(word);
      if (b === 0) return divisionByZero(word);
      stack.push(arith("mod", a, b));
      stack.push(arith("slash", a, b));
      return NONE;
    }

    case "rot": {
      if (stack.length < 3) return stackUnderflow(word);
      const [third] = stack.splice(stack.length - 3, 1);
      stack.push(third);
      return NONE;
    }

    case "swap": {
      const a = stack.pop();
      if (a === undefined) return stackUnderflow(word);
      const b = stack.pop();
      if (b === undefined) return stackUnderflow(word);
      stack.push(a);
      stack.push(b);
      return NONE;
    }

    case "emit": {
      const v = stack.pop();
      if (v === undefined) return stackUnderflow(word);
      if (v < 0 || v > MAX_CODE_POINT || isSurrogate(v)) return invalidCodePoint(v);
      return done(String.fromCodePoint(v));
    }

    case "spaces": {
      const n = stack.pop();
      if (n === undefined) return stackUnderflow(word);
      // negative counts print nothing
      const count = Math.max(0, n);
      if (count >= room) return limitExceeded("maxOutputLength", maxOutput);
      return done(" ".repeat(count));
    }

    default: {
      const unreachable: never = op;
      throw new Error(`step: unknown primitive ${String(unreachable)}`);
    }
  }
}

/**
 * Run tokens in order, mutating `stack` in place. Each printed fragment is
 * followed by one space. Stops at the first failing token; whatever the
 * earlier tokens did to the stack stays done.
 *
 * Output never grows past OUTPUT_LENGTH_CEILING, whatever `maxOutputLength`
 * asks for. A push that would take the stack past `maxStackDepth` fails
 * before it happens.
 */
export function evaluate(
  tokens: readonly Token[],
  stack: number[],
  opts: EvaluateOptions = {}
): Outcome<string> {
  const maxDepth = opts.maxStackDepth ?? Infinity;
  const maxOutput = Math.min(opts.maxOutputLength ?? Infinity, OUTPUT_LENGTH_CEILING);
  let out = "";

  for (const t of tokens) {
    const grows = t.tag === "Number" || t.op === "dup";
    if (grows && stack.length >= maxDepth) return limitExceeded("maxStackDepth", maxDepth);

    if (t.tag === "Number") {
      stack.push(t.n);
    } else {
      const r = step(t.op, stack, maxOutput - out.length, maxOutput);
      if (r.tag === "Fail") return r;
      if (r.value !== null) {
        out += r.value + " ";
        if (out.length > maxOutput) return limitExceeded("maxOutputLength", maxOutput);
      }
    }
  }

  return done(out);
}
