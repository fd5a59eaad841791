// =============================================================================
// Extraction Schema — Interchange records & observation shapes
// =============================================================================

import { z } from "zod";
import { MetadataSchema } from "./metadata.js";

const confidence = z.number().min(0).max(1);
const position = z.number().int().nonnegative();

export const EntityRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    type: z.string(),
    source_text: z.string(),
    start_position: position,
    end_position: position,
    confidence,
    metadata: MetadataSchema.default({}),
  })
  .refine((record) => record.start_position <= record.end_position, {
    message: "start_position must not exceed end_position",
    path: ["end_position"],
  });

export type EntityRecord = z.infer<typeof EntityRecordSchema>;

export const RelationshipRecordSchema = z.object({
  id: z.string().min(1),
  source_entity: z.string().min(1),
  target_entity: z.string().min(1),
  type: z.string(),
  confidence,
  metadata: MetadataSchema.default({}),
});

export type RelationshipRecord = z.infer<typeof RelationshipRecordSchema>;

export const EntityCollectionRecordSchema = z.object({
  entities: z.array(EntityRecordSchema).default([]),
  relationships: z.array(RelationshipRecordSchema).default([]),
  source_id: z.string().nullable().default(null),
});

export type EntityCollectionRecord = z.infer<typeof EntityCollectionRecordSchema>;

// -----------------------------------------------------------------------------
// Observations
// -----------------------------------------------------------------------------

export const EntityObservationSchema = z.object({
  timestamp: z.string(),
  source: z.string(),
  extractor: z.string(),
  context: z.object({
    before: z.string(),
    exact: z.string(),
    after: z.string(),
  }),
  position: z.object({
    start: position,
    end: position,
  }),
  confidence,
});

export type EntityObservation = z.infer<typeof EntityObservationSchema>;

export const RelationshipObservationSchema = z.object({
  timestamp: z.string(),
  source: z.string(),
  extractor: z.string(),
  context: z.string(),
  confidence,
});

export type RelationshipObservation = z.infer<typeof RelationshipObservationSchema>;
