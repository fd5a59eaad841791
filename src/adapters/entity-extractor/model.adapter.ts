// =============================================================================
// ModelEntityExtractor — Entity extraction backed by a named-entity model
// =============================================================================

import type { EntityExtractorPort, ExtractionParams } from "../../ports/entity-extractor.port.js";
import type { NerModelPort, NerSpan } from "../../ports/ner-model.port.js";
import { EntityCollection } from "../../domain/entity-collection.js";
import { createEntity, createRelationship, type Entity } from "../../domain/entity.js";
import { entityConfidence, relationshipConfidence } from "../../domain/confidence.js";
import { recordEntityObservation, recordRelationshipObservation } from "../../domain/observation-ledger.js";
import { ModelUnavailableError } from "../../errors.js";
import { createConsoleLogger, emit, describeError, type Logger } from "../../logging.js";

/** Model label → entity type */
export const DEFAULT_LABEL_MAPPING: Record<string, string> = {
  PERSON: "Person",
  ORG: "Organization",
  GPE: "Location",
  LOC: "Location",
  PRODUCT: "Product",
  EVENT: "Event",
  WORK_OF_ART: "CreativeWork",
  LAW: "Resource",
  LANGUAGE: "Technology",
  DATE: "Time",
  TIME: "Time",
  MONEY: "Value",
  QUANTITY: "Value",
  PERCENT: "Value",
  CARDINAL: "Value",
  ORDINAL: "Value",
};

/** Base confidence per model label */
export const DEFAULT_LABEL_CONFIDENCE: Record<string, number> = {
  PERSON: 0.85,
  ORG: 0.8,
  GPE: 0.85,
  LOC: 0.75,
  PRODUCT: 0.7,
  EVENT: 0.7,
  WORK_OF_ART: 0.65,
  LAW: 0.7,
  LANGUAGE: 0.8,
  DATE: 0.9,
  TIME: 0.9,
  MONEY: 0.9,
  QUANTITY: 0.85,
  PERCENT: 0.9,
  CARDINAL: 0.75,
  ORDINAL: 0.8,
};

const UNKNOWN_LABEL_CONFIDENCE = 0.6;
const RELATION_STRENGTH = 0.7;

const PREDICATE_RELATION_TYPES: Array<[string[], string]> = [
  [["use", "utilize", "employ"], "uses"],
  [["work", "collaborate"], "worksOn"],
  [["have", "own", "possess"], "has"],
  [["depend", "rely"], "dependsOn"],
  [["create", "make", "develop", "build"], "creates"],
];

export function relationTypeForPredicate(predicate: string): string {
  const lemma = predicate.toLowerCase();
  for (const [lemmas, type] of PREDICATE_RELATION_TYPES) {
    if (lemmas.includes(lemma)) return type;
  }
  return "relatesTo";
}

export interface ModelEntityExtractorOptions {
  labelMapping?: Record<string, string>;
  labelConfidence?: Record<string, number>;
  /** Spans scoring below this are dropped (default: 0.5) */
  minConfidence?: number;
  /** Characters of context kept on each side of a mention (default: 50) */
  contextWindow?: number;
  /** Defaults to a console logger at "info" */
  logger?: Logger;
}

export class ModelEntityExtractor implements EntityExtractorPort {
  readonly name: string;
  private readonly labelMapping: Record<string, string>;
  private readonly labelConfidence: Record<string, number>;
  private readonly minConfidence: number;
  private readonly contextWindow: number;
  private readonly logger: Logger;
  private loaded = false;

  constructor(private readonly model: NerModelPort, options: ModelEntityExtractorOptions = {}) {
    this.name = `ModelEntityExtractor(${model.name})`;
    this.labelMapping = options.labelMapping ?? DEFAULT_LABEL_MAPPING;
    this.labelConfidence = options.labelConfidence ?? DEFAULT_LABEL_CONFIDENCE;
    this.minConfidence = options.minConfidence ?? 0.5;
    this.contextWindow = options.contextWindow ?? 50;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /** Load the model once; a failed load is retried on the next call. */
  async ensureLoaded(): Promise<void> {
    if (this.loaded) return;
    try {
      await this.model.load();
      this.loaded = true;
    } catch (error) {
      emit(this.logger, "warn", "model:load-failed", { model: this.model.name, error: describeError(error) });
      throw new ModelUnavailableError(this.name, this.model.name, error);
    }
  }

  /** Label base score scaled down for very short mentions. */
  scoreSpan(span: NerSpan): number {
    const base = this.labelConfidence[span.label] ?? UNKNOWN_LABEL_CONFIDENCE;
    const lengthFactor = Math.min(1, Math.max(0.7, span.text.length / 5));
    return entityConfidence(base, lengthFactor, 0, 1);
  }

  async extractEntities(text: string, params: ExtractionParams = {}): Promise<EntityCollection> {
    await this.ensureLoaded();
    const analysis = await this.model.analyze(text);
    const collection = new EntityCollection(params.sourceId);
    const source = params.sourceId ?? "unknown";

    // span index → entity, for spans that survived mapping and thresholding
    const bySpan = new Map<number, Entity>();

    analysis.spans.forEach((span, index) => {
      const type = this.labelMapping[span.label];
      if (type === undefined) return;
      const confidence = this.scoreSpan(span);
      if (confidence < this.minConfidence) return;

      const entity = createEntity({
        name: span.text,
        type,
        sourceText: span.text,
        startPosition: span.start,
        endPosition: span.end,
        confidence,
        metadata: { model_label: span.label },
      });
      const [contextBefore, contextAfter] = this.contextAround(text, span);
      recordEntityObservation(entity, { source, contextBefore, contextAfter, extractor: this.name });
      collection.addEntity(entity);
      bySpan.set(index, entity);
    });

    for (const relation of analysis.relations ?? []) {
      const subject = bySpan.get(relation.subject);
      const object = bySpan.get(relation.object);
      if (!subject || !object) continue;

      const relationship = createRelationship({
        sourceEntity: subject.id,
        targetEntity: object.id,
        type: relationTypeForPredicate(relation.predicate),
        confidence: relationshipConfidence(subject.confidence, object.confidence, RELATION_STRENGTH),
        metadata: { verb: relation.predicate, sentence: relation.sentence },
      });
      recordRelationshipObservation(relationship, { source, context: relation.sentence, extractor: this.name });
      collection.addRelationship(relationship);
    }

    return collection;
  }

  private contextAround(text: string, span: NerSpan): [string, string] {
    const window = this.contextWindow;
    const beforeStart = Math.max(0, span.start - window);
    const afterEnd = Math.min(text.length, span.end + window);
    const before = (beforeStart > 0 ? "..." : "") + text.slice(beforeStart, span.start);
    const after = text.slice(span.end, afterEnd) + (afterEnd < text.length ? "..." : "");
    return [before, after];
  }
}
