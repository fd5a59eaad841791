// =============================================================================
// Entity & Relationship — Extraction records and the factory that mints them
// =============================================================================

import { randomUUID } from "node:crypto";
import { ValidationError } from "../errors.js";
import { cloneMetadata, type Metadata } from "./metadata.js";
import type { EntityRecord, RelationshipRecord } from "./extraction.schema.js";

export interface Entity {
  readonly id: string;
  readonly name: string;
  /** Open-ended category tag, e.g. "Person" */
  readonly type: string;
  readonly sourceText: string;
  /** Start offset in source text */
  readonly startPosition: number;
  /** End offset in source text (exclusive) */
  readonly endPosition: number;
  /** In [0, 1]; only ever raised, by the composite merge */
  confidence: number;
  metadata: Metadata;
}

export interface Relationship {
  readonly id: string;
  /** Entity id */
  readonly sourceEntity: string;
  /** Entity id */
  readonly targetEntity: string;
  readonly type: string;
  confidence: number;
  metadata: Metadata;
}

export interface CreateEntityInput {
  name: string;
  type: string;
  sourceText: string;
  startPosition: number;
  endPosition: number;
  confidence: number;
  metadata?: Metadata;
}

export interface CreateRelationshipInput {
  sourceEntity: string;
  targetEntity: string;
  type: string;
  confidence: number;
  metadata?: Metadata;
}

function assertConfidence(confidence: number): void {
  if (Number.isNaN(confidence) || confidence < 0 || confidence > 1) {
    throw new ValidationError(`must lie in [0, 1], got ${confidence}`, "confidence");
  }
}

function stampCreation(metadata: Metadata | undefined): Metadata {
  const stamped: Metadata = { ...metadata };
  if (!("created_at" in stamped)) {
    stamped.created_at = new Date().toISOString();
  }
  return stamped;
}

/** Mint a new entity with a fresh id and a `created_at` stamp. */
export function createEntity(input: CreateEntityInput): Entity {
  const { startPosition, endPosition } = input;
  if (!Number.isInteger(startPosition) || startPosition < 0) {
    throw new ValidationError(`must be a non-negative integer, got ${startPosition}`, "startPosition");
  }
  if (!Number.isInteger(endPosition) || endPosition < startPosition) {
    throw new ValidationError(`must be an integer not below startPosition (${startPosition}), got ${endPosition}`, "endPosition");
  }
  assertConfidence(input.confidence);

  return {
    id: randomUUID(),
    name: input.name,
    type: input.type,
    sourceText: input.sourceText,
    startPosition,
    endPosition,
    confidence: input.confidence,
    metadata: stampCreation(input.metadata),
  };
}

/** Mint a new relationship with a fresh id and a `created_at` stamp. */
export function createRelationship(input: CreateRelationshipInput): Relationship {
  assertConfidence(input.confidence);

  return {
    id: randomUUID(),
    sourceEntity: input.sourceEntity,
    targetEntity: input.targetEntity,
    type: input.type,
    confidence: input.confidence,
    metadata: stampCreation(input.metadata),
  };
}

export function cloneEntity(entity: Entity): Entity {
  return { ...entity, metadata: cloneMetadata(entity.metadata) };
}

export function cloneRelationship(relationship: Relationship, endpoints?: { sourceEntity: string; targetEntity: string }): Relationship {
  return { ...relationship, ...endpoints, metadata: cloneMetadata(relationship.metadata) };
}

// -----------------------------------------------------------------------------
// Record mapping
// -----------------------------------------------------------------------------

export function entityToRecord(entity: Entity): EntityRecord {
  return {
    id: entity.id,
    name: entity.name,
    type: entity.type,
    source_text: entity.sourceText,
    start_position: entity.startPosition,
    end_position: entity.endPosition,
    confidence: entity.confidence,
    metadata: cloneMetadata(entity.metadata),
  };
}

export function entityFromRecord(record: EntityRecord): Entity {
  return {
    id: record.id,
    name: record.name,
    type: record.type,
    sourceText: record.source_text,
    startPosition: record.start_position,
    endPosition: record.end_position,
    confidence: record.confidence,
    metadata: record.metadata,
  };
}

export function relationshipToRecord(relationship: Relationship): RelationshipRecord {
  return {
    id: relationship.id,
    source_entity: relationship.sourceEntity,
    target_entity: relationship.targetEntity,
    type: relationship.type,
    confidence: relationship.confidence,
    metadata: cloneMetadata(relationship.metadata),
  };
}

export function relationshipFromRecord(record: RelationshipRecord): Relationship {
  return {
    id: record.id,
    sourceEntity: record.source_entity,
    targetEntity: record.target_entity,
    type: record.type,
    confidence: record.confidence,
    metadata: record.metadata,
  };
}
