// =============================================================================
// NerModelPort — Named-entity recognition model behind a model capability
// =============================================================================

export interface NerSpan {
  text: string;
  /** Model label, e.g. "PERSON", "ORG" */
  label: string;
  start: number;
  end: number;
}

export interface NerRelation {
  /** Index into `spans` of the grammatical subject */
  subject: number;
  /** Index into `spans` of the object */
  object: number;
  /** Lemma of the verb linking them */
  predicate: string;
  sentence: string;
}

export interface NerAnalysis {
  spans: NerSpan[];
  relations?: NerRelation[];
}

export interface NerModelPort {
  readonly name: string;
  /** Load model resources; rejects when the model is unavailable */
  load(): Promise<void>;
  analyze(text: string): Promise<NerAnalysis>;
}
