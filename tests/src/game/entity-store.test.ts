import { describe, expect, it } from "vitest";
import { EntityStore } from "../../../src/game/entity-store";

describe("EntityStore", () => {
  it("hands out increasing handles starting at 1", () => {
    const store = new EntityStore<string>();
    expect(store.insert("a")).toBe(1);
    expect(store.insert("b")).toBe(2);
    expect(store.size).toBe(2);
  });

  it("never reuses a removed handle", () => {
    const store = new EntityStore<string>();
    const first = store.insert("a");
    expect(store.remove(first)).toBe(true);
    expect(store.insert("b")).toBe(2);
    expect(store.snapshot()).toEqual([[2, "b"]]);
  });

  it("reports false when removing an unknown handle", () => {
    expect(new EntityStore<number>().remove(7)).toBe(false);
  });

  it("replaces in place without changing iteration order", () => {
    const store = new EntityStore<string>();
    const a = store.insert("a");
    store.insert("b");
    store.replace(a, "a2");
    expect(Array.from(store.values())).toEqual(["a2", "b"]);
  });

  it("refuses to replace a missing entity", () => {
    const store = new EntityStore<string>();
    expect(() => store.replace(3, "x")).toThrow("No live entity with handle 3");
  });

  it("snapshot is unaffected by later removals", () => {
    const store = new EntityStore<string>();
    store.insert("a");
    store.insert("b");
    const snapshot = store.snapshot();
    for (const [handle] of snapshot) {
      store.remove(handle);
    }
    expect(snapshot).toEqual([
      [1, "a"],
      [2, "b"],
    ]);
    expect(store.size).toBe(0);
  });
});
