import { describe, it, expect } from "vitest";
import { MetadataSchema, mergeMetadata, type Metadata } from "../metadata.js";

describe("mergeMetadata", () => {
  it("overwrites scalar keys and adds new ones", () => {
    const target: Metadata = { extractor: "a", score: 1 };
    mergeMetadata(target, { extractor: "b", label: "ORG" });
    expect(target).toEqual({ extractor: "b", score: 1, label: "ORG" });
  });

  it("appends list-valued keys instead of replacing them", () => {
    const target: Metadata = { observations: [{ source: "m1" }] };
    mergeMetadata(target, { observations: [{ source: "m2" }] });
    expect(target.observations).toEqual([{ source: "m1" }, { source: "m2" }]);
  });

  it("keeps every confirming observation, even an identical one", () => {
    const observation = { source: "m1", timestamp: "2024-05-10T08:30:00.000Z" };
    const target: Metadata = { tags: ["a", "b"], observations: [observation] };
    mergeMetadata(target, { tags: ["b", "c"], observations: [{ ...observation }] });
    expect(target.tags).toEqual(["a", "b", "b", "c"]);
    expect(target.observations).toEqual([observation, observation]);
  });

  it("merges nested maps recursively", () => {
    const target: Metadata = { model: { name: "small", labels: ["PERSON"] } };
    mergeMetadata(target, { model: { version: 3, labels: ["ORG"] } });
    expect(target).toEqual({ model: { name: "small", version: 3, labels: ["PERSON", "ORG"] } });
  });

  it("replaces a list with a scalar when the shapes differ", () => {
    const target: Metadata = { tags: ["a"] };
    mergeMetadata(target, { tags: "none" });
    expect(target.tags).toBe("none");
  });

  it("copies incoming values rather than aliasing them", () => {
    const incoming: Metadata = { nested: { value: 1 } };
    const target: Metadata = {};
    mergeMetadata(target, incoming);
    expect(target.nested).toEqual({ value: 1 });
    expect(target.nested).not.toBe(incoming.nested);
  });

  it("adds a __proto__ key as an own property", () => {
    const incoming: Metadata = Object.defineProperty({ k: 1 }, "__proto__", {
      value: { polluted: true },
      enumerable: true,
      configurable: true,
      writable: true,
    });
    const target: Metadata = {};
    mergeMetadata(target, incoming);

    expect(Object.hasOwn(target, "__proto__")).toBe(true);
    expect(Object.getPrototypeOf(target)).toBe(Object.prototype);
    expect(Object.keys(target)).toEqual(["k", "__proto__"]);
    expect("polluted" in {}).toBe(false);
  });
});

describe("MetadataSchema", () => {
  it("accepts arbitrarily nested values", () => {
    const value = { a: [1, "two", { three: [false, null] }], b: { c: { d: "e" } } };
    expect(MetadataSchema.parse(value)).toEqual(value);
  });

  it("rejects values outside the value model", () => {
    expect(MetadataSchema.safeParse({ when: new Date(0) }).success).toBe(false);
    expect(MetadataSchema.safeParse({ missing: undefined }).success).toBe(false);
  });

  it("rejects a __proto__ key at any depth", () => {
    expect(MetadataSchema.safeParse(JSON.parse('{"__proto__": {"x": 1}}')).success).toBe(false);
    expect(MetadataSchema.safeParse(JSON.parse('{"a": {"__proto__": 1}}')).success).toBe(false);
  });
});
