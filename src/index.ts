// =============================================================================
// entity-extraction-core — Public API
// =============================================================================

// Domain
export type { Entity, Relationship, CreateEntityInput, CreateRelationshipInput } from "./domain/entity.js";
export {
  createEntity,
  createRelationship,
  cloneEntity,
  cloneRelationship,
  entityToRecord,
  entityFromRecord,
  relationshipToRecord,
  relationshipFromRecord,
} from "./domain/entity.js";
export { EntityCollection, entityKey } from "./domain/entity-collection.js";
export type { DanglingReference } from "./domain/entity-collection.js";
export { clampConfidence, entityConfidence, relationshipConfidence } from "./domain/confidence.js";
export {
  OBSERVATIONS_KEY,
  recordEntityObservation,
  recordRelationshipObservation,
  readEntityObservations,
  readRelationshipObservations,
} from "./domain/observation-ledger.js";
export type { EntityObservationInput, RelationshipObservationInput } from "./domain/observation-ledger.js";
export { MetadataSchema, MetadataValueSchema, mergeMetadata, isMetadataMap } from "./domain/metadata.js";
export type { Metadata, MetadataValue, MetadataPrimitive } from "./domain/metadata.js";
export {
  EntityRecordSchema,
  RelationshipRecordSchema,
  EntityCollectionRecordSchema,
  EntityObservationSchema,
  RelationshipObservationSchema,
} from "./domain/extraction.schema.js";
export type {
  EntityRecord,
  RelationshipRecord,
  EntityCollectionRecord,
  EntityObservation,
  RelationshipObservation,
} from "./domain/extraction.schema.js";

// Ports
export type { EntityExtractorPort, ExtractionParams } from "./ports/entity-extractor.port.js";
export type { NerModelPort, NerSpan, NerRelation, NerAnalysis } from "./ports/ner-model.port.js";

// Adapters
export {
  PatternEntityExtractor,
  PatternEntityExtractorConfigSchema,
  DEFAULT_ENTITY_PATTERNS,
} from "./adapters/entity-extractor/pattern.adapter.js";
export type { PatternEntityExtractorConfig, EntityPattern } from "./adapters/entity-extractor/pattern.adapter.js";
export {
  ModelEntityExtractor,
  DEFAULT_LABEL_MAPPING,
  DEFAULT_LABEL_CONFIDENCE,
  relationTypeForPredicate,
} from "./adapters/entity-extractor/model.adapter.js";
export type { ModelEntityExtractorOptions } from "./adapters/entity-extractor/model.adapter.js";
export { CompositeEntityExtractor, createCompositeExtractor } from "./adapters/entity-extractor/composite.adapter.js";
export type {
  CompositeEntityExtractorOptions,
  CapabilityFailure,
  MergeResult,
} from "./adapters/entity-extractor/composite.adapter.js";

// Errors
export {
  ExtractionError,
  ValidationError,
  SerializationError,
  CapabilityError,
  CapabilityTimeoutError,
  ModelUnavailableError,
} from "./errors.js";

// Logging & config
export { createConsoleLogger, silentLogger, isLevelEnabled } from "./logging.js";
export type { Logger, LogEntry, LogLevel, ConsoleLoggerOptions } from "./logging.js";
export { ExtractionConfigSchema, ENV_MAP, parseExtractionConfig, loadExtractionConfig } from "./config.js";
export type { ExtractionConfig, ExtractionConfigInput } from "./config.js";
