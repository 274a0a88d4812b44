// test/eval/evaluate.spec.ts
// Primitive semantics, run directly against a stack

import { describe, it, expect } from "vitest";
import { evaluate } from "../../src/core/eval/evaluate";
import { type Op, type Token, builtin, num } from "../../src/core/reader/token";
import { OUTPUT_LENGTH_CEILING } from "../../src/core/config";

function run(tokens: Token[], stack: number[] = []) {
  const r = evaluate(tokens, stack);
  return { r, stack };
}

const ops = (...xs: Array<number | Op>): Token[] =>
  xs.map((x) => (typeof x === "number" ? num(x) : builtin(x)));

describe("evaluate", () => {
  describe("arithmetic", () => {
    const cases: Array<[number, number, Op, number]> = [
      [3, 4, "plus", 7],
      [3, 4, "minus", -1],
      [3, 4, "star", 12],
      [12, 3, "slash", 4],
      [8, 3, "slash", 2],
      [-7, 2, "slash", -3],
      [7, -2, "slash", -3],
      [8, 3, "mod", 2],
      [-7, 2, "mod", -1],
      [7, -2, "mod", 1],
    ];

    it.each(cases)("%i %i %s -> %i", (a, b, op, want) => {
      const { r, stack } = run(ops(a, b, op));
      expect(r.tag).toBe("Done");
      expect(stack).toEqual([want]);
    });

    it("wraps to 32 bits", () => {
      expect(run(ops(2147483647, 1, "plus")).stack).toEqual([-2147483648]);
      expect(run(ops(-2147483648, 1, "minus")).stack).toEqual([2147483647]);
      expect(run(ops(65536, 65536, "star")).stack).toEqual([0]);
      expect(run(ops(-2147483648, -1, "slash")).stack).toEqual([-2147483648]);
      expect(run(ops(-2147483648, -1, "mod")).stack).toEqual([0]);
    });

    it("pushes remainder then quotient for /mod", () => {
      expect(run(ops(7, 2, "slash-mod")).stack).toEqual([1, 3]);
      expect(run(ops(-7, 2, "slash-mod")).stack).toEqual([-1, -3]);
    });

    it.each<Op>(["slash", "mod", "slash-mod"])("fails %s by zero without a result", (op) => {
      const { r, stack } = run(ops(9, 1, 0, op));
      expect(r.tag).toBe("Fail");
      if (r.tag === "Fail") expect(r.failure.reason).toBe("division-by-zero");
      expect(stack).toEqual([9]);
    });
  });

  describe("stack words", () => {
    it("dup copies the top", () => {
      expect(run(ops(5, "dup")).stack).toEqual([5, 5]);
    });

    it("drop discards the top", () => {
      expect(run(ops(1, 2, "drop")).stack).toEqual([1]);
    });

    it("swap exchanges the top two", () => {
      expect(run(ops(1, 2, "swap")).stack).toEqual([2, 1]);
    });

    it("rot brings the third to the top", () => {
      expect(run(ops(1, 2, 3, "rot")).stack).toEqual([2, 3, 1]);
      expect(run(ops(9, 1, 2, 3, "rot")).stack).toEqual([9, 2, 3, 1]);
    });

    it("rot needs three values and leaves fewer untouched", () => {
      const { r, stack } = run(ops(1, 2, "rot"));
      expect(r.tag).toBe("Fail");
      expect(stack).toEqual([1, 2]);
    });
  });

  describe("underflow", () => {
    it.each<Op>(["dot", "drop", "dup", "emit", "spaces", "swap", "plus", "slash-mod", "rot"])(
      "%s on an empty stack",
      (op) => {
        const { r } = run(ops(op));
        expect(r.tag).toBe("Fail");
        if (r.tag === "Fail") expect(r.failure.reason).toBe("stack-underflow");
      }
    );

    it("names the source word", () => {
      const { r } = run(ops("slash-mod"));
      if (r.tag !== "Fail") throw new Error("expected failure");
      expect(r.failure.message).toBe("/mod: stack underflow");
    });

    it("keeps what was already popped off", () => {
      const { r, stack } = run(ops(4, "plus"));
      expect(r.tag).toBe("Fail");
      expect(stack).toEqual([]);
    });
  });

  describe("output", () => {
    it("prints numbers with a trailing space", () => {
      expect(run(ops(1, 2, "dot", "dot")).r).toEqual({ tag: "Done", value: "2 1 ", meta: {} });
    });

    it("prints negative numbers", () => {
      expect(run(ops(-15, "dot")).r).toEqual({ tag: "Done", value: "-15 ", meta: {} });
    });

    it("emits characters", () => {
      expect(run(ops(72, "emit", 105, "emit")).r).toEqual({ tag: "Done", value: "H i ", meta: {} });
      expect(run(ops(128512, "emit")).r).toEqual({ tag: "Done", value: "\u{1F600} ", meta: {} });
      expect(run(ops(0, "emit")).r).toEqual({ tag: "Done", value: "\u0000 ", meta: {} });
    });

    it.each<[number, string]>([
      [-1, "emit: out of bounds"],
      [0xd800, "emit: invalid unicode 0xd800"],
      [0xdfff, "emit: invalid unicode 0xdfff"],
      [0x110000, "emit: invalid unicode 0x110000"],
    ])("rejects %i", (v, message) => {
      const { r, stack } = run(ops(v, "emit"));
      if (r.tag !== "Fail") throw new Error("expected failure");
      expect(r.failure.reason).toBe("invalid-code-point");
      expect(r.failure.message).toBe(message);
      expect(stack).toEqual([]);
    });

    it("prints n spaces then the separator", () => {
      expect(run(ops(3, "spaces")).r).toEqual({ tag: "Done", value: "    ", meta: {} });
      expect(run(ops(0, "spaces")).r).toEqual({ tag: "Done", value: " ", meta: {} });
    });

    it("treats a negative spaces count as zero", () => {
      const { r, stack } = run(ops(-4, "spaces"));
      expect(r).toEqual({ tag: "Done", value: " ", meta: {} });
      expect(stack).toEqual([]);
    });

    it("returns an empty string when nothing prints", () => {
      expect(run(ops(1, 2, "plus")).r).toEqual({ tag: "Done", value: "", meta: {} });
    });
  });

  describe("limits", () => {
    it("refuses a push past maxStackDepth", () => {
      const stack: number[] = [];
      const r = evaluate(ops(1, 2, 3, 4), stack, { maxStackDepth: 2 });
      if (r.tag !== "Fail") throw new Error("expected failure");
      expect(r.failure.message).toBe("maxStackDepth: limit exceeded (2)");
      expect(stack).toEqual([1, 2]);
    });

    it("refuses a dup past maxStackDepth", () => {
      const stack: number[] = [];
      const r = evaluate(ops(1, 2, "dup"), stack, { maxStackDepth: 2 });
      expect(r.tag).toBe("Fail");
      expect(stack).toEqual([1, 2]);
    });

    it("lets /mod run on a full stack", () => {
      const stack: number[] = [];
      expect(evaluate(ops(7, 2, "slash-mod"), stack, { maxStackDepth: 2 }).tag).toBe("Done");
      expect(stack).toEqual([1, 3]);
    });

    it("caps spaces even with default options", () => {
      const stack: number[] = [];
      const r = evaluate(ops(2147483647, "spaces"), stack);
      if (r.tag !== "Fail") throw new Error("expected failure");
      expect(r.failure.reason).toBe("limit-exceeded");
      expect(r.failure.message).toBe(`maxOutputLength: limit exceeded (${OUTPUT_LENGTH_CEILING})`);
      expect(stack).toEqual([]);
    });

    it("caps output when maxOutputLength is above the ceiling", () => {
      const r = evaluate(ops(2147483647, "spaces"), [], { maxOutputLength: 2 ** 31 });
      expect(r.tag).toBe("Fail");
    });

    it("refuses to print past maxOutputLength", () => {
      expect(evaluate(ops(1, "dot", 2, "dot"), [], { maxOutputLength: 4 })).toEqual({
        tag: "Done",
        value: "1 2 ",
        meta: {},
      });
      expect(evaluate(ops(1, "dot", 2, "dot", 3, "dot"), [], { maxOutputLength: 4 }).tag).toBe("Fail");
    });

    it("checks spaces before building the string", () => {
      const stack: number[] = [];
      const r = evaluate(ops(2147483647, "spaces"), stack, { maxOutputLength: 100 });
      if (r.tag !== "Fail") throw new Error("expected failure");
      expect(r.failure.message).toBe("maxOutputLength: limit exceeded (100)");
      expect(stack).toEqual([]);
    });
  });
});
