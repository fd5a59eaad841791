// =============================================================================
// Metadata — Open, recursive value bag carried by entities and relationships
// =============================================================================

import { z } from "zod";

export type MetadataPrimitive = string | number | boolean | null;

export type MetadataValue = MetadataPrimitive | MetadataValue[] | { [key: string]: MetadataValue };

export type Metadata = { [key: string]: MetadataValue };

// Assigning "__proto__" would replace an object's prototype instead of adding a key
const MetadataKeySchema = z.string().refine((key) => key !== "__proto__", {
  message: 'The key "__proto__" is reserved',
});

export const MetadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(MetadataValueSchema),
    z.record(MetadataKeySchema, MetadataValueSchema),
  ]),
);

export const MetadataSchema: z.ZodType<Metadata> = z.record(MetadataKeySchema, MetadataValueSchema);

export function isMetadataMap(value: MetadataValue | undefined): value is Metadata {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function cloneMetadata<T extends MetadataValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Union `incoming` into `target` in place.
 *
 * Lists are concatenated, maps are merged recursively, anything else is
 * overwritten. An `observations` list therefore only ever grows, one item per
 * confirming observation.
 */
export function mergeMetadata(target: Metadata, incoming: Metadata): void {
  for (const [key, value] of Object.entries(incoming)) {
    const current = Object.hasOwn(target, key) ? target[key] : undefined;
    if (Array.isArray(current) && Array.isArray(value)) {
      current.push(...value.map((item) => cloneMetadata(item)));
    } else if (isMetadataMap(current) && isMetadataMap(value)) {
      mergeMetadata(current, value);
    } else {
      Object.defineProperty(target, key, {
        value: cloneMetadata(value),
        writable: true,
        enumerable: true,
        configurable: true,
      });
    }
  }
}
