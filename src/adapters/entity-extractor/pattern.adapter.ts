// =============================================================================
// PatternEntityExtractor — Literal/regex pattern-based entity extraction (NER-lite)
// =============================================================================

import { z } from "zod";
import type { EntityExtractorPort, ExtractionParams } from "../../ports/entity-extractor.port.js";
import { EntityCollection } from "../../domain/entity-collection.js";
import { createEntity, createRelationship } from "../../domain/entity.js";
import { recordEntityObservation, recordRelationshipObservation } from "../../domain/observation-ledger.js";
import { ValidationError } from "../../errors.js";

/** A literal string matches verbatim; a RegExp names the entity by its first group. */
export type EntityPattern = string | RegExp;

/** Default patterns for common entities */
export const DEFAULT_ENTITY_PATTERNS: Record<string, EntityPattern[]> = {
  Person: [/\b([A-Z][a-z]+ [A-Z][a-z]+)\b/g],
  Email: [/\b([a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,})\b/g],
  Url: [/\bhttps?:\/\/[^\s<>"]+/g],
  Date: [/\b(\d{4}-\d{2}-\d{2})\b/g],
};

export const PatternEntityExtractorConfigSchema = z.object({
  entityPatterns: z
    .record(z.string(), z.array(z.union([z.string().min(1), z.instanceof(RegExp)])))
    .default(DEFAULT_ENTITY_PATTERNS),
  baseConfidence: z.number().min(0).max(1).default(0.8),
  relationshipConfidence: z.number().min(0).max(1).default(0.7),
  /** Type of the pairwise links drawn between entities of one type */
  relationType: z.string().min(1).default("relatesTo"),
  /** Characters of context kept on each side of a mention */
  contextWindow: z.number().int().nonnegative().default(50),
});

export type PatternEntityExtractorConfig = z.input<typeof PatternEntityExtractorConfigSchema>;

interface Mention {
  name: string;
  text: string;
  start: number;
  end: number;
}

function* literalMentions(text: string, literal: string): Generator<Mention> {
  let from = 0;
  for (;;) {
    const idx = text.indexOf(literal, from);
    if (idx === -1) return;
    yield { name: literal, text: literal, start: idx, end: idx + literal.length };
    from = idx + literal.length;
  }
}

function* regexMentions(text: string, source: RegExp): Generator<Mention> {
  // Fresh instance so lastIndex never leaks between calls
  const flags = source.flags.includes("g") ? source.flags : `${source.flags}g`;
  const pattern = new RegExp(source.source, flags);
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    if (match[0].length === 0) {
      pattern.lastIndex++;
      continue;
    }
    yield {
      name: match[1] ?? match[0],
      text: match[0],
      start: match.index,
      end: match.index + match[0].length,
    };
  }
}

export class PatternEntityExtractor implements EntityExtractorPort {
  readonly name = "PatternEntityExtractor";
  private readonly config: z.output<typeof PatternEntityExtractorConfigSchema>;

  constructor(config: PatternEntityExtractorConfig = {}) {
    const parsed = PatternEntityExtractorConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "), "config");
    }
    this.config = parsed.data;
  }

  async extractEntities(text: string, params: ExtractionParams = {}): Promise<EntityCollection> {
    const collection = new EntityCollection(params.sourceId);
    const source = params.sourceId ?? "unknown";

    for (const [type, patterns] of Object.entries(this.config.entityPatterns)) {
      for (const pattern of patterns) {
        const mentions = typeof pattern === "string" ? literalMentions(text, pattern) : regexMentions(text, pattern);
        for (const mention of mentions) {
          this.observe(collection, text, type, mention, source);
        }
      }
    }

    this.relateWithinTypes(collection, source);
    return collection;
  }

  private observe(collection: EntityCollection, text: string, type: string, mention: Mention, source: string): void {
    const { contextWindow } = this.config;
    const observation = {
      source,
      extractor: this.name,
      contextBefore: text.slice(Math.max(0, mention.start - contextWindow), mention.start),
      contextAfter: text.slice(mention.end, mention.end + contextWindow),
      span: { start: mention.start, end: mention.end, text: mention.text },
    };

    // Repeated mentions confirm the first entity instead of minting another
    const existing = collection.findEntity(mention.name, type);
    if (existing) {
      recordEntityObservation(existing, observation);
      return;
    }

    const entity = createEntity({
      name: mention.name,
      type,
      sourceText: mention.text,
      startPosition: mention.start,
      endPosition: mention.end,
      confidence: this.config.baseConfidence,
      metadata: { extractor: this.name },
    });
    recordEntityObservation(entity, observation);
    collection.addEntity(entity);
  }

  private relateWithinTypes(collection: EntityCollection, source: string): void {
    for (const type of Object.keys(this.config.entityPatterns)) {
      const entities = collection.getEntitiesByType(type);
      for (let i = 0; i < entities.length - 1; i++) {
        for (let j = i + 1; j < entities.length; j++) {
          const relationship = createRelationship({
            sourceEntity: entities[i].id,
            targetEntity: entities[j].id,
            type: this.config.relationType,
            confidence: this.config.relationshipConfidence,
            metadata: { extractor: this.name },
          });
          recordRelationshipObservation(relationship, {
            source,
            context: `Both entities are of type ${type}`,
            extractor: this.name,
          });
          collection.addRelationship(relationship);
        }
      }
    }
  }
}
