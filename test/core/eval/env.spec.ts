// test/core/eval/env.spec.ts

import { describe, it, expect } from "vitest";
import { Scope } from "../../../src/core/eval/env";

describe("Scope", () => {
  it("binds and reads in the global scope", () => {
    const global = Scope.global();
    global.assign("x", 1);
    expect(global.lookup("x")).toBe(1);
    expect(global.lookup("y")).toBeUndefined();
  });

  it("reads through blocks and call frames", () => {
    const global = Scope.global();
    global.assign("x", 1);
    const inner = global.enterCall([["a", 2]]).enterBlock();
    expect(inner.lookup("x")).toBe(1);
    expect(inner.lookup("a")).toBe(2);
  });

  it("updates an existing binding within the same call frame", () => {
    const frame = Scope.global().enterCall([["a", 2]]);
    const block = frame.enterBlock();
    block.assign("a", 5);
    expect(frame.lookup("a")).toBe(5);
  });

  it("binds new names in the innermost scope", () => {
    const frame = Scope.global().enterCall([]);
    const block = frame.enterBlock();
    block.assign("t", 1);
    expect(block.lookup("t")).toBe(1);
    expect(frame.lookup("t")).toBeUndefined();
  });

  it("never writes across a call boundary", () => {
    const caller = Scope.global().enterCall([]).enterBlock();
    caller.assign("x", 10);
    const callee = caller.enterCall([]).enterBlock();
    callee.assign("x", 99);
    expect(callee.lookup("x")).toBe(99);
    expect(caller.lookup("x")).toBe(10);
  });

  it("records its kind", () => {
    const global = Scope.global();
    expect(global.kind).toBe("global");
    expect(global.enterCall([]).kind).toBe("call");
    expect(global.enterBlock().parent).toBe(global);
  });
});
