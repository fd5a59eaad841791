// =============================================================================
// EntityCollection — Indexed entities & relationships for one source document
// =============================================================================

import { SerializationError } from "../errors.js";
import {
  entityFromRecord,
  entityToRecord,
  relationshipFromRecord,
  relationshipToRecord,
  type Entity,
  type Relationship,
} from "./entity.js";
import { EntityCollectionRecordSchema, type EntityCollectionRecord } from "./extraction.schema.js";

export interface DanglingReference {
  relationshipId: string;
  /** Endpoint ids that do not resolve to an entity of the collection */
  missingSource?: string;
  missingTarget?: string;
}

/** The dedup key: exact name + type identity. */
export function entityKey(name: string, type: string): string {
  return JSON.stringify([name, type]);
}

function pushIndexed<V>(index: Map<string, V[]>, key: string, value: V): void {
  const bucket = index.get(key);
  if (bucket) bucket.push(value);
  else index.set(key, [value]);
}

export class EntityCollection {
  sourceId: string | undefined;

  private readonly entityList: Entity[] = [];
  private readonly relationshipList: Relationship[] = [];
  private readonly entitiesById = new Map<string, Entity>();
  private readonly entitiesByKey = new Map<string, Entity>();
  private readonly entitiesByType = new Map<string, Entity[]>();
  private readonly relationshipsByType = new Map<string, Relationship[]>();
  // entity id → relationships it takes part in, as source or target
  private readonly relationshipsByEntity = new Map<string, Relationship[]>();

  constructor(sourceId?: string) {
    this.sourceId = sourceId;
  }

  get entities(): readonly Entity[] {
    return this.entityList;
  }

  get relationships(): readonly Relationship[] {
    return this.relationshipList;
  }

  get entityCount(): number {
    return this.entityList.length;
  }

  get relationshipCount(): number {
    return this.relationshipList.length;
  }

  addEntity(entity: Entity): void {
    this.entityList.push(entity);
    if (!this.entitiesById.has(entity.id)) this.entitiesById.set(entity.id, entity);
    const key = entityKey(entity.name, entity.type);
    if (!this.entitiesByKey.has(key)) this.entitiesByKey.set(key, entity);
    pushIndexed(this.entitiesByType, entity.type, entity);
  }

  addRelationship(relationship: Relationship): void {
    this.relationshipList.push(relationship);
    pushIndexed(this.relationshipsByType, relationship.type, relationship);
    pushIndexed(this.relationshipsByEntity, relationship.sourceEntity, relationship);
    if (relationship.targetEntity !== relationship.sourceEntity) {
      pushIndexed(this.relationshipsByEntity, relationship.targetEntity, relationship);
    }
  }

  /** Ids are minted unique by the factory; should two records share one, the first wins. */
  getEntityById(id: string): Entity | undefined {
    return this.entitiesById.get(id);
  }

  /** First inserted entity carrying this exact name and type. */
  findEntity(name: string, type: string): Entity | undefined {
    return this.entitiesByKey.get(entityKey(name, type));
  }

  getEntitiesByType(type: string): Entity[] {
    return [...(this.entitiesByType.get(type) ?? [])];
  }

  getRelationshipsByType(type: string): Relationship[] {
    return [...(this.relationshipsByType.get(type) ?? [])];
  }

  getRelationshipsForEntity(entityId: string): Relationship[] {
    return [...(this.relationshipsByEntity.get(entityId) ?? [])];
  }

  /** Integrity check: every relationship with an endpoint missing from the collection. */
  findDanglingRelationships(): DanglingReference[] {
    const dangling: DanglingReference[] = [];
    for (const rel of this.relationshipList) {
      const sourceMissing = !this.entitiesById.has(rel.sourceEntity);
      const targetMissing = !this.entitiesById.has(rel.targetEntity);
      if (!sourceMissing && !targetMissing) continue;
      const report: DanglingReference = { relationshipId: rel.id };
      if (sourceMissing) report.missingSource = rel.sourceEntity;
      if (targetMissing) report.missingTarget = rel.targetEntity;
      dangling.push(report);
    }
    return dangling;
  }

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------

  toRecord(): EntityCollectionRecord {
    return {
      entities: this.entityList.map(entityToRecord),
      relationships: this.relationshipList.map(relationshipToRecord),
      source_id: this.sourceId ?? null,
    };
  }

  toJSON(): EntityCollectionRecord {
    return this.toRecord();
  }

  serialize(space?: number): string {
    return JSON.stringify(this.toRecord(), null, space);
  }

  /** Decode an interchange record. All-or-nothing: any defect fails the whole decode. */
  static fromRecord(record: unknown): EntityCollection {
    const parsed = EntityCollectionRecordSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
      throw new SerializationError("Invalid entity collection record", issues);
    }

    const data = parsed.data;
    const collection = new EntityCollection(data.source_id ?? undefined);
    for (const entity of data.entities) collection.addEntity(entityFromRecord(entity));
    for (const rel of data.relationships) collection.addRelationship(relationshipFromRecord(rel));
    return collection;
  }

  static deserialize(json: string): EntityCollection {
    let record: unknown;
    try {
      record = JSON.parse(json);
    } catch (error) {
      throw new SerializationError("Malformed JSON document", [error instanceof Error ? error.message : String(error)]);
    }
    return EntityCollection.fromRecord(record);
  }
}
