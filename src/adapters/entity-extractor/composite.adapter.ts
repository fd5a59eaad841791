// =============================================================================
// CompositeEntityExtractor — Merge several capabilities into one collection
// =============================================================================

import type { EntityExtractorPort, ExtractionParams } from "../../ports/entity-extractor.port.js";
import { EntityCollection } from "../../domain/entity-collection.js";
import { cloneEntity, cloneRelationship } from "../../domain/entity.js";
import { mergeMetadata } from "../../domain/metadata.js";
import { CapabilityError, CapabilityTimeoutError } from "../../errors.js";
import { createConsoleLogger, describeError, emit, type Logger } from "../../logging.js";
import type { ExtractionConfig } from "../../config.js";

export interface CompositeEntityExtractorOptions {
  /** "sequential" (default) or "parallel"; results are committed in list order either way */
  concurrency?: "sequential" | "parallel";
  /** Per-capability timeout in ms; exceeding it counts as a failure */
  timeoutMs?: number;
  /** Defaults to a console logger at "info" */
  logger?: Logger;
}

/** Non-fatal diagnostic for a capability that contributed nothing. */
export interface CapabilityFailure {
  extractor: string;
  /** Position of the capability in the composite's list */
  index: number;
  /** Positions from this composite down through nested composites to the failed capability */
  path: number[];
  error: CapabilityError;
}

export interface MergeResult {
  collection: EntityCollection;
  failures: CapabilityFailure[];
}

type Outcome = { ok: true; result: MergeResult } | { ok: false; error: CapabilityError };

/**
 * Runs every capability over the same text and merges their collections.
 *
 * Entities converge on the exact `(name, type)` key: a duplicate raises the
 * canonical entity's confidence (never lowers it) and unions its metadata.
 * Relationships accumulate unconditionally. Capability order decides which
 * entity instance, and so which id, is canonical. Failures of a nested
 * composite are reported by the outer one under the nested composite's index.
 *
 * @example
 * ```ts
 * const composite = new CompositeEntityExtractor([patterns, model]);
 * const { collection, failures } = await composite.merge(text, { sourceId: "msg-1" });
 * ```
 */
export class CompositeEntityExtractor implements EntityExtractorPort {
  readonly name = "CompositeEntityExtractor";
  private readonly extractors: readonly EntityExtractorPort[];
  private readonly concurrency: "sequential" | "parallel";
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor(extractors: EntityExtractorPort[], options: CompositeEntityExtractorOptions = {}) {
    this.extractors = [...extractors];
    this.concurrency = options.concurrency ?? "sequential";
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /** Failed capabilities are logged; call {@link merge} to receive them as well. */
  async extractEntities(text: string, params: ExtractionParams = {}): Promise<EntityCollection> {
    const { collection } = await this.merge(text, params);
    return collection;
  }

  async merge(text: string, params: ExtractionParams = {}): Promise<MergeResult> {
    const start = Date.now();
    const result = new EntityCollection(params.sourceId);
    const failures: CapabilityFailure[] = [];
    // non-canonical entity id → canonical id it was collapsed into
    const aliases = new Map<string, string>();

    const commit = (index: number, outcome: Outcome): void => {
      const extractor = this.extractors[index];
      if (outcome.ok) {
        this.absorb(result, outcome.result.collection, aliases);
        // Failures inside a nested composite were logged there
        for (const nested of outcome.result.failures) {
          failures.push({ ...nested, index, path: [index, ...nested.path] });
        }
        return;
      }
      failures.push({ extractor: extractor.name, index, path: [index], error: outcome.error });
      emit(this.logger, "warn", "capability:failed", {
        extractor: extractor.name,
        index,
        error: describeError(outcome.error),
      });
    };

    if (this.concurrency === "parallel") {
      const outcomes = await Promise.all(this.extractors.map((extractor) => this.run(extractor, text, params)));
      outcomes.forEach((outcome, index) => commit(index, outcome));
    } else {
      for (let index = 0; index < this.extractors.length; index++) {
        commit(index, await this.run(this.extractors[index], text, params));
      }
    }

    emit(this.logger, "info", "merge:complete", {
      sourceId: params.sourceId,
      extractorCount: this.extractors.length,
      failedCount: failures.length,
      entityCount: result.entityCount,
      relationshipCount: result.relationshipCount,
      durationMs: Date.now() - start,
    });

    return { collection: result, failures };
  }

  /** Run one capability; never rejects. */
  private async run(extractor: EntityExtractorPort, text: string, params: ExtractionParams): Promise<Outcome> {
    const start = Date.now();
    emit(this.logger, "debug", "capability:start", { extractor: extractor.name });
    try {
      // Wrapped so a synchronous throw is caught like a rejection
      const pending = Promise.resolve().then(() => collect(extractor, text, params));
      const result = await this.withTimeout(pending, extractor.name);
      emit(this.logger, "debug", "capability:complete", {
        extractor: extractor.name,
        entityCount: result.collection.entityCount,
        relationshipCount: result.collection.relationshipCount,
        durationMs: Date.now() - start,
      });
      return { ok: true, result };
    } catch (error) {
      return { ok: false, error: CapabilityError.from(extractor.name, error) };
    }
  }

  private async withTimeout<T>(pending: Promise<T>, extractor: string): Promise<T> {
    const timeoutMs = this.timeoutMs;
    if (timeoutMs === undefined) return pending;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new CapabilityTimeoutError(extractor, timeoutMs)), timeoutMs);
    });
    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Fold one capability's collection into the result, in its internal order. */
  private absorb(result: EntityCollection, incoming: EntityCollection, aliases: Map<string, string>): void {
    for (const entity of incoming.entities) {
      const existing = result.findEntity(entity.name, entity.type);
      if (!existing) {
        result.addEntity(cloneEntity(entity));
        continue;
      }
      // Confirming observation: certainty only grows
      if (entity.confidence > existing.confidence) {
        existing.confidence = entity.confidence;
      }
      mergeMetadata(existing.metadata, entity.metadata);
      if (entity.id !== existing.id) aliases.set(entity.id, existing.id);
    }

    for (const relationship of incoming.relationships) {
      result.addRelationship(
        cloneRelationship(relationship, {
          sourceEntity: aliases.get(relationship.sourceEntity) ?? relationship.sourceEntity,
          targetEntity: aliases.get(relationship.targetEntity) ?? relationship.targetEntity,
        }),
      );
    }
  }
}

/** A nested composite reports its own failures; any other capability reports none. */
async function collect(extractor: EntityExtractorPort, text: string, params: ExtractionParams): Promise<MergeResult> {
  if (extractor instanceof CompositeEntityExtractor) return extractor.merge(text, params);
  return { collection: await extractor.extractEntities(text, params), failures: [] };
}

/** Build a composite from a loaded {@link ExtractionConfig}, logging to the console. */
export function createCompositeExtractor(
  extractors: EntityExtractorPort[],
  config: ExtractionConfig,
  logger: Logger = createConsoleLogger({ level: config.logLevel }),
): CompositeEntityExtractor {
  return new CompositeEntityExtractor(extractors, {
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
    logger,
  });
}
