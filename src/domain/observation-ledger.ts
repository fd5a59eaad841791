// =============================================================================
// Observation Ledger — Append-only provenance under `metadata.observations`
// =============================================================================

import type { Entity, Relationship } from "./entity.js";
import type { Metadata, MetadataValue } from "./metadata.js";
import {
  EntityObservationSchema,
  RelationshipObservationSchema,
  type EntityObservation,
  type RelationshipObservation,
} from "./extraction.schema.js";

export const OBSERVATIONS_KEY = "observations";

const UNKNOWN_EXTRACTOR = "unknown";

export interface EntityObservationInput {
  /** Identifier of the observed text or message */
  source: string;
  contextBefore?: string;
  contextAfter?: string;
  extractor?: string;
  /** Mention being observed; defaults to the entity's own text and offsets */
  span?: { start: number; end: number; text: string };
}

export interface RelationshipObservationInput {
  source: string;
  context?: string;
  extractor?: string;
}

function observationList(metadata: Metadata): MetadataValue[] {
  const current = metadata[OBSERVATIONS_KEY];
  if (Array.isArray(current)) return current;
  const list: MetadataValue[] = current === undefined ? [] : [current];
  metadata[OBSERVATIONS_KEY] = list;
  return list;
}

export function recordEntityObservation(entity: Entity, input: EntityObservationInput): void {
  const span = input.span ?? { start: entity.startPosition, end: entity.endPosition, text: entity.sourceText };
  const observation: EntityObservation = {
    timestamp: new Date().toISOString(),
    source: input.source,
    extractor: input.extractor ?? UNKNOWN_EXTRACTOR,
    context: {
      before: input.contextBefore ?? "",
      exact: span.text,
      after: input.contextAfter ?? "",
    },
    position: { start: span.start, end: span.end },
    confidence: entity.confidence,
  };
  observationList(entity.metadata).push(observation);
}

export function recordRelationshipObservation(relationship: Relationship, input: RelationshipObservationInput): void {
  const observation: RelationshipObservation = {
    timestamp: new Date().toISOString(),
    source: input.source,
    extractor: input.extractor ?? UNKNOWN_EXTRACTOR,
    context: input.context ?? "",
    confidence: relationship.confidence,
  };
  observationList(relationship.metadata).push(observation);
}

/** Well-formed entity observations, in recording order. */
export function readEntityObservations(entity: Entity): EntityObservation[] {
  const list = entity.metadata[OBSERVATIONS_KEY];
  if (!Array.isArray(list)) return [];
  return list.flatMap((item) => {
    const parsed = EntityObservationSchema.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  });
}

/** Well-formed relationship observations, in recording order. */
export function readRelationshipObservations(relationship: Relationship): RelationshipObservation[] {
  const list = relationship.metadata[OBSERVATIONS_KEY];
  if (!Array.isArray(list)) return [];
  return list.flatMap((item) => {
    const parsed = RelationshipObservationSchema.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  });
}
