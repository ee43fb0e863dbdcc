import { describe, it, expect } from "vitest";
import { LabelTrie } from "../../src/core/naming/trie";
import { address, showAddress } from "../../src/core/naming/address";

describe("LabelTrie", () => {
  it("stores and retrieves by full path", () => {
    const t = new LabelTrie<number>();
    t.set(address("a.b"), 1);
    t.set(address("a"), 2);
    expect(t.get(address("a.b"))).toBe(1);
    expect(t.get(address("a"))).toBe(2);
    expect(t.get(address("a.c"))).toBeUndefined();
    expect(t.has(address("a.b.c"))).toBe(false);
    expect(t.size).toBe(2);
  });

  it("overwrites without changing the size", () => {
    const t = new LabelTrie<string>();
    t.set(address("x"), "one");
    t.set(address("x"), "two");
    expect(t.get(address("x"))).toBe("two");
    expect(t.size).toBe(1);
  });

  it("lists entries in label order, optionally under a prefix", () => {
    const t = new LabelTrie<number>();
    t.set(address("b"), 1);
    t.set(address("a.z"), 2);
    t.set(address("a.m"), 3);
    t.set(address("a"), 4);
    expect(t.keys().map(showAddress)).toEqual(["a", "a.m", "a.z", "b"]);
    expect(t.values(address("a"))).toEqual([4, 3, 2]);
    expect(t.entries(address("nope"))).toEqual([]);
  });

  it("deletes a single entry and keeps its descendants", () => {
    const t = new LabelTrie<number>();
    t.set(address("m"), 1);
    t.set(address("m.f"), 2);
    expect(t.delete(address("m"))).toBe(true);
    expect(t.delete(address("m"))).toBe(false);
    expect(t.get(address("m.f"))).toBe(2);
    expect(t.size).toBe(1);
  });

  it("deletes a whole branch", () => {
    const t = new LabelTrie<number>();
    t.set(address("m.f"), 1);
    t.set(address("m.g.h"), 2);
    t.set(address("n"), 3);
    expect(t.deleteBranch(address("m"))).toBe(2);
    expect(t.keys().map(showAddress)).toEqual(["n"]);
    expect(t.size).toBe(1);
    expect(t.deleteBranch(address("zzz"))).toBe(0);
  });
});
