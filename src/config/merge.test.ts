import { describe, expect, it } from "vitest";
import { isTable, mergeTables } from "./merge";

describe("mergeTables", () => {
  it("merges nested tables and lets the override win", () => {
    const base = { site: { title: "Default", language: "en" }, build: { posts_per_page: 10 } };
    const override = { site: { title: "Mine" } };

    expect(mergeTables(base, override)).toEqual({
      site: { title: "Mine", language: "en" },
      build: { posts_per_page: 10 },
    });
  });

  it("replaces arrays and scalars instead of merging them", () => {
    const merged = mergeTables({ tags: ["a", "b"], count: 1 }, { tags: ["c"], count: { nested: true } });
    expect(merged).toEqual({ tags: ["c"], count: { nested: true } });
  });

  it("adds keys that only exist in the override", () => {
    expect(mergeTables({ a: 1 }, { b: { c: 2 } })).toEqual({ a: 1, b: { c: 2 } });
  });

  it("does not mutate its inputs", () => {
    const base = { site: { title: "Default" } };
    const override = { site: { title: "Mine" } };
    mergeTables(base, override);
    expect(base).toEqual({ site: { title: "Default" } });
    expect(override).toEqual({ site: { title: "Mine" } });
  });
});

describe("isTable", () => {
  it("accepts plain objects only", () => {
    expect(isTable({})).toBe(true);
    expect(isTable([])).toBe(false);
    expect(isTable(null)).toBe(false);
    expect(isTable(new Date(0))).toBe(false);
    expect(isTable("text")).toBe(false);
  });
});
