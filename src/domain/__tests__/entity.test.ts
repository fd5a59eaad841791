import { describe, it, expect, vi, afterEach } from "vitest";
import { createEntity, createRelationship, cloneEntity, cloneRelationship } from "../entity.js";
import { ValidationError } from "../../errors.js";

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const omar = {
  name: "Omar",
  type: "Person",
  sourceText: "Omar",
  startPosition: 0,
  endPosition: 4,
  confidence: 0.8,
};

afterEach(() => {
  vi.useRealTimers();
});

describe("createEntity", () => {
  it("mints a random v4 id", () => {
    const a = createEntity(omar);
    const b = createEntity(omar);
    expect(a.id).toMatch(UUID_V4);
    expect(b.id).toMatch(UUID_V4);
    expect(a.id).not.toBe(b.id);
  });

  it("stamps created_at when absent", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-01T12:00:00.000Z"));
    const entity = createEntity({ ...omar, metadata: { extractor: "test" } });
    expect(entity.metadata).toEqual({ extractor: "test", created_at: "2024-03-01T12:00:00.000Z" });
  });

  it("keeps a caller-supplied created_at", () => {
    const entity = createEntity({ ...omar, metadata: { created_at: "2020-01-01T00:00:00.000Z" } });
    expect(entity.metadata.created_at).toBe("2020-01-01T00:00:00.000Z");
  });

  it("does not mutate the caller's metadata", () => {
    const metadata = { extractor: "test" };
    createEntity({ ...omar, metadata });
    expect(metadata).toEqual({ extractor: "test" });
  });

  it("copies the fields through", () => {
    const entity = createEntity(omar);
    expect(entity).toMatchObject(omar);
  });

  it("accepts an empty span", () => {
    expect(createEntity({ ...omar, startPosition: 3, endPosition: 3 }).endPosition).toBe(3);
  });

  it("rejects an inverted span", () => {
    expect(() => createEntity({ ...omar, startPosition: 5, endPosition: 4 })).toThrow(ValidationError);
  });

  it("rejects negative or fractional positions", () => {
    expect(() => createEntity({ ...omar, startPosition: -1 })).toThrow(ValidationError);
    expect(() => createEntity({ ...omar, endPosition: 4.5 })).toThrow(ValidationError);
  });

  it("rejects confidence outside [0, 1]", () => {
    expect(() => createEntity({ ...omar, confidence: 1.2 })).toThrow('Invalid "confidence"');
    expect(() => createEntity({ ...omar, confidence: Number.NaN })).toThrow(ValidationError);
  });
});

describe("createRelationship", () => {
  it("mints an id and stamps created_at", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-01T12:00:00.000Z"));
    const rel = createRelationship({ sourceEntity: "a", targetEntity: "b", type: "relatesTo", confidence: 0.7 });
    expect(rel.id).toMatch(UUID_V4);
    expect(rel).toMatchObject({ sourceEntity: "a", targetEntity: "b", type: "relatesTo", confidence: 0.7 });
    expect(rel.metadata).toEqual({ created_at: "2024-03-01T12:00:00.000Z" });
  });

  it("rejects confidence outside [0, 1]", () => {
    expect(() =>
      createRelationship({ sourceEntity: "a", targetEntity: "b", type: "relatesTo", confidence: -0.1 }),
    ).toThrow(ValidationError);
  });
});

describe("cloning", () => {
  it("deep-copies entity metadata and keeps the id", () => {
    const entity = createEntity({ ...omar, metadata: { tags: ["x"] } });
    const copy = cloneEntity(entity);
    expect(copy.id).toBe(entity.id);
    expect(copy.metadata).toEqual(entity.metadata);
    expect(copy.metadata.tags).not.toBe(entity.metadata.tags);
  });

  it("re-points relationship endpoints when asked", () => {
    const rel = createRelationship({ sourceEntity: "a", targetEntity: "b", type: "relatesTo", confidence: 0.7 });
    const copy = cloneRelationship(rel, { sourceEntity: "c", targetEntity: "b" });
    expect(copy).toMatchObject({ id: rel.id, sourceEntity: "c", targetEntity: "b" });
    expect(rel.sourceEntity).toBe("a");
  });
});
