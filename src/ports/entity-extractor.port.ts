// =============================================================================
// EntityExtractorPort — Extract entities and relationships from text
// =============================================================================

import type { EntityCollection } from "../domain/entity-collection.js";

export interface ExtractionParams {
  /** Identifier of the originating text or message */
  sourceId?: string;
  [key: string]: unknown;
}

/**
 * An extraction capability.
 *
 * Implementations must be pure with respect to their inputs: the same text and
 * params yield semantically equivalent entities (modulo fresh ids), and the
 * returned collection is owned by the caller.
 */
export interface EntityExtractorPort {
  /** Recorded as `extractor` on observations and diagnostics */
  readonly name: string;
  extractEntities(text: string, params?: ExtractionParams): Promise<EntityCollection>;
}
