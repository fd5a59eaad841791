// =============================================================================
// 01 — Composite extraction over a pattern capability and a model capability
// =============================================================================
//
// Runs two capabilities over one message and prints the merged collection:
//   1. PatternEntityExtractor — literal and regex patterns
//   2. ModelEntityExtractor   — a toy keyword model behind NerModelPort
//
// Usage: npx tsx examples/01-composite-extraction.ts

import {
  CompositeEntityExtractor,
  ModelEntityExtractor,
  PatternEntityExtractor,
  createConsoleLogger,
  loadExtractionConfig,
  readEntityObservations,
  type NerAnalysis,
  type NerModelPort,
} from "../src/index.js";

// Labels every capitalised word it knows about; stands in for a real NER model.
const keywordModel: NerModelPort = {
  name: "keyword-model",
  async load() {},
  async analyze(text: string): Promise<NerAnalysis> {
    const labels: Record<string, string> = { Acme: "ORG", Paris: "GPE", Omar: "PERSON" };
    const spans = [...text.matchAll(/\b[A-Z][a-z]+\b/g)].flatMap((match) => {
      const label = labels[match[0]];
      const start = match.index ?? 0;
      return label ? [{ text: match[0], label, start, end: start + match[0].length }] : [];
    });
    return { spans };
  },
};

async function main(): Promise<void> {
  const config = loadExtractionConfig();
  const logger = createConsoleLogger({ level: config.logLevel });

  const composite = new CompositeEntityExtractor(
    [
      new PatternEntityExtractor({
        entityPatterns: { Person: ["Omar", "Alice"], Organization: ["Acme"] },
        contextWindow: 30,
      }),
      new ModelEntityExtractor(keywordModel, { contextWindow: 30, logger }),
    ],
    { concurrency: config.concurrency, timeoutMs: config.timeoutMs, logger },
  );

  const text = "Omar works at Acme in Paris. Alice works at Acme too.";
  const { collection, failures } = await composite.merge(text, { sourceId: "msg-1" });

  for (const entity of collection.entities) {
    const seen = readEntityObservations(entity).length;
    console.log(`${entity.type.padEnd(12)} ${entity.name.padEnd(8)} ${entity.confidence.toFixed(2)} (${seen} observations)`);
  }
  console.log(`${collection.relationshipCount} relationships, ${failures.length} failed capabilities`);
  console.log(collection.serialize(2));
}

main().catch(console.error);
