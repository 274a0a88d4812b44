// test/eval/dictionary.spec.ts
// Dictionary storage, bootstrap words and definitions

import { describe, it, expect } from "vitest";
import { Dictionary, bootstrapDictionary } from "../../src/core/eval/dictionary";
import { evalDefinition } from "../../src/core/eval/define";
import { builtin, num } from "../../src/core/reader/token";

describe("Dictionary", () => {
  it("stores a frozen copy of the body", () => {
    const d = new Dictionary();
    const body = [num(1)];
    d.define("x", body);
    body.push(num(2));
    expect(d.lookup("x")).toEqual([num(1)]);
    expect(Object.isFrozen(d.lookup("x"))).toBe(true);
  });

  it("overwrites on redefinition", () => {
    const d = new Dictionary();
    d.define("x", [num(1)]);
    d.define("x", [num(2)]);
    expect(d.lookup("x")).toEqual([num(2)]);
    expect(d.size).toBe(1);
  });

  it("is case-sensitive", () => {
    const d = new Dictionary();
    d.define("Foo", [num(1)]);
    expect(d.has("Foo")).toBe(true);
    expect(d.has("foo")).toBe(false);
  });

  it("lists names sorted", () => {
    const d = new Dictionary();
    d.define("zeta", []);
    d.define("alpha", []);
    expect(d.names()).toEqual(["alpha", "zeta"]);
  });
});

describe("bootstrapDictionary", () => {
  const d = bootstrapDictionary();

  it("defines space, cr and over", () => {
    expect(d.names()).toEqual(["cr", "over", "space"]);
  });

  it("expands them to primitives", () => {
    expect(d.lookup("space")).toEqual([num(32), builtin("emit")]);
    expect(d.lookup("cr")).toEqual([num(13), builtin("emit"), num(10), builtin("emit")]);
    expect(d.lookup("over")).toEqual([builtin("swap"), builtin("dup"), builtin("rot"), builtin("swap")]);
  });

  it("gives each machine its own dictionary", () => {
    const other = bootstrapDictionary();
    other.define("space", [num(0)]);
    expect(d.lookup("space")).toEqual([num(32), builtin("emit")]);
  });
});

describe("evalDefinition", () => {
  it("stores the resolved body under the first word", () => {
    const d = new Dictionary();
    const r = evalDefinition(" sq dup *", d);
    expect(r).toEqual({ tag: "Done", value: { name: "sq", tokens: [builtin("dup"), builtin("star")] }, meta: {} });
    expect(d.lookup("sq")).toEqual([builtin("dup"), builtin("star")]);
  });

  it("allows an empty body", () => {
    const d = new Dictionary();
    expect(evalDefinition(" nop", d).tag).toBe("Done");
    expect(d.lookup("nop")).toEqual([]);
  });

  it("fails without a name", () => {
    const d = new Dictionary();
    const r = evalDefinition("   ", d);
    expect(r.tag).toBe("Fail");
    if (r.tag === "Fail") {
      expect(r.failure.reason).toBe("malformed-definition");
      expect(r.failure.message).toBe("no name specified for definition");
    }
    expect(d.size).toBe(0);
  });

  it("leaves the dictionary alone when the body does not resolve", () => {
    const d = new Dictionary();
    d.define("x", [num(1)]);
    const r = evalDefinition(" x nope", d);
    expect(r.tag).toBe("Fail");
    expect(d.lookup("x")).toEqual([num(1)]);
  });

  it("may refer to the previous version of itself", () => {
    const d = new Dictionary();
    evalDefinition(" x 1", d);
    evalDefinition(" x x x +", d);
    expect(d.lookup("x")).toEqual([num(1), num(1), builtin("plus")]);
  });
});
