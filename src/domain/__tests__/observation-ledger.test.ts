import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createEntity, createRelationship } from "../entity.js";
import {
  recordEntityObservation,
  recordRelationshipObservation,
  readEntityObservations,
  readRelationshipObservations,
} from "../observation-ledger.js";

const NOW = "2024-05-10T08:30:00.000Z";

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date(NOW));
});

afterEach(() => {
  vi.useRealTimers();
});

function acme() {
  return createEntity({
    name: "Acme",
    type: "Organization",
    sourceText: "Acme",
    startPosition: 14,
    endPosition: 18,
    confidence: 0.8,
  });
}

describe("recordEntityObservation", () => {
  it("initializes the list and records the full observation", () => {
    const entity = acme();
    recordEntityObservation(entity, {
      source: "msg-1",
      contextBefore: "Omar works at ",
      contextAfter: ". Alice",
      extractor: "PatternEntityExtractor",
    });

    expect(entity.metadata.observations).toEqual([
      {
        timestamp: NOW,
        source: "msg-1",
        extractor: "PatternEntityExtractor",
        context: { before: "Omar works at ", exact: "Acme", after: ". Alice" },
        position: { start: 14, end: 18 },
        confidence: 0.8,
      },
    ]);
  });

  it("defaults the extractor and contexts", () => {
    const entity = acme();
    recordEntityObservation(entity, { source: "msg-1" });
    const [observation] = readEntityObservations(entity);
    expect(observation.extractor).toBe("unknown");
    expect(observation.context).toEqual({ before: "", exact: "Acme", after: "" });
  });

  it("appends without overwriting earlier observations", () => {
    const entity = acme();
    recordEntityObservation(entity, { source: "msg-1" });
    recordEntityObservation(entity, { source: "msg-2", span: { start: 35, end: 39, text: "Acme" } });

    const observations = readEntityObservations(entity);
    expect(observations.map((o) => o.source)).toEqual(["msg-1", "msg-2"]);
    expect(observations[1].position).toEqual({ start: 35, end: 39 });
  });

  it("records the confidence held at observation time", () => {
    const entity = acme();
    recordEntityObservation(entity, { source: "msg-1" });
    entity.confidence = 0.95;
    recordEntityObservation(entity, { source: "msg-2" });
    expect(readEntityObservations(entity).map((o) => o.confidence)).toEqual([0.8, 0.95]);
  });

  it("keeps a pre-existing non-list value as the first item", () => {
    const entity = acme();
    entity.metadata.observations = "legacy";
    recordEntityObservation(entity, { source: "msg-1" });
    const list = entity.metadata.observations;
    expect(Array.isArray(list) && list[0]).toBe("legacy");
    expect(readEntityObservations(entity)).toHaveLength(1);
  });
});

describe("recordRelationshipObservation", () => {
  it("records a single context string and no position", () => {
    const rel = createRelationship({ sourceEntity: "a", targetEntity: "b", type: "relatesTo", confidence: 0.7 });
    recordRelationshipObservation(rel, { source: "msg-1", context: "Both entities are of type Person" });

    expect(rel.metadata.observations).toEqual([
      {
        timestamp: NOW,
        source: "msg-1",
        extractor: "unknown",
        context: "Both entities are of type Person",
        confidence: 0.7,
      },
    ]);
    expect(readRelationshipObservations(rel)).toHaveLength(1);
  });

  it("reads nothing from a record without observations", () => {
    const rel = createRelationship({ sourceEntity: "a", targetEntity: "b", type: "relatesTo", confidence: 0.7 });
    expect(readRelationshipObservations(rel)).toEqual([]);
  });
});
