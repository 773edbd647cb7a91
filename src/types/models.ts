/**
 * Artifact models — the parsed shapes the verification engine consumes.
 * Argument graphs come from reconstruction and map markup, annotation trees
 * from annotated source text. Both are produced outside the engine.
 */

// ── Argument graphs ──

export type Valence = 'support' | 'attack' | 'contradict';

/**
 * grounded: follows from the inferential structure of a reconstruction.
 * sketched: asserted in a map.
 * axiomatic: declared on its own authority.
 */
export type DialecticalType = 'grounded' | 'sketched' | 'axiomatic';

/** Free-form inline data attached to a proposition or argument. */
export type InlineData = Record<string, unknown>;

export interface Proposition {
  label: string;
  texts: string[];
  data: InlineData;
}

export interface Premise {
  kind: 'premise';
  /** Item label within the argument, e.g. "1". */
  label: string;
  propositionLabel: string;
}

export interface Conclusion {
  kind: 'conclusion';
  label: string;
  propositionLabel: string;
  /** Inference metadata, e.g. `{ from: ['1', '2'] }`. */
  inferenceData: InlineData;
}

export type PcsItem = Premise | Conclusion;

export interface Argument {
  label: string | null;
  gists: string[];
  pcs: PcsItem[];
  data: InlineData;
}

export interface DialecticalRelation {
  source: string;
  target: string;
  valence: Valence;
  dialectics: DialecticalType[];
}

export interface ArgumentGraph {
  arguments: Argument[];
  propositions: Proposition[];
  relations: DialecticalRelation[];
}

// ── Annotation trees ──

export interface AnnotationElement {
  tag: string;
  attributes: Record<string, string>;
  children: AnnotationNode[];
}

/** Text nodes are plain strings. */
export type AnnotationNode = string | AnnotationElement;

export interface AnnotationTree {
  nodes: AnnotationNode[];
}
