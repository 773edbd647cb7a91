/**
 * Builders for argument graphs, annotation trees and artifact records.
 */

import type {
  AnnotationElement,
  AnnotationNode,
  AnnotationTree,
  Argument,
  ArgumentGraph,
  Conclusion,
  DialecticalRelation,
  DialecticalType,
  InlineData,
  PcsItem,
  Premise,
  Proposition,
  Valence,
} from '../../src/types/models.js';
import type { AnnotationRecord, GraphRecord } from '../../src/types/verification.js';

export function prop(label: string, text: string = label, data: InlineData = {}): Proposition {
  return { label, texts: [text], data };
}

export function premise(label: string, propositionLabel: string): Premise {
  return { kind: 'premise', label, propositionLabel };
}

export function conclusion(label: string, propositionLabel: string, from?: string[]): Conclusion {
  return { kind: 'conclusion', label, propositionLabel, inferenceData: from ? { from } : {} };
}

export function argument(label: string | null, pcs: PcsItem[] = [], gists: string[] = [`Gist of ${label}`]): Argument {
  return { label, gists, pcs, data: {} };
}

export function relation(
  source: string,
  target: string,
  valence: Valence,
  dialectics: DialecticalType[] = ['grounded']
): DialecticalRelation {
  return { source, target, valence, dialectics };
}

export function graph(parts: Partial<ArgumentGraph> = {}): ArgumentGraph {
  return {
    arguments: parts.arguments ?? [],
    propositions: parts.propositions ?? [],
    relations: parts.relations ?? [],
  };
}

export function graphRecord(id: string, data: ArgumentGraph | null, frontMatter: Record<string, string> = {}): GraphRecord {
  return { id, kind: 'argument-graph', parsedData: data, rawSnippet: '', frontMatter };
}

export function segment(id: string | null, children: AnnotationNode[] | string, attributes: Record<string, string> = {}): AnnotationElement {
  return {
    tag: 'proposition',
    attributes: id === null ? attributes : { id, ...attributes },
    children: typeof children === 'string' ? [children] : children,
  };
}

export function tree(...nodes: AnnotationNode[]): AnnotationTree {
  return { nodes };
}

export function annotationRecord(
  id: string,
  data: AnnotationTree | null,
  frontMatter: Record<string, string> = {}
): AnnotationRecord {
  return { id, kind: 'annotation-tree', parsedData: data, rawSnippet: '', frontMatter };
}

/** Proposition whose inline data carries a formalization and declarations. */
export function formalized(label: string, formalization: string, declarations?: Record<string, string>): Proposition {
  const data: InlineData = { formalization };
  if (declarations) data.declarations = declarations;
  return prop(label, `Text of ${label}`, data);
}

/** Argument graph with one argument over the given formalized propositions, last one the conclusion. */
export function formalizedArgument(
  label: string,
  formulas: Array<[formalization: string, declarations?: Record<string, string>]>
): ArgumentGraph {
  const propositions = formulas.map(([f, d], i) => formalized(`${label}-${i + 1}`, f, d));
  const last = formulas.length;
  const pcs: PcsItem[] = propositions.map((p, i) =>
    i + 1 < last
      ? premise(String(i + 1), p.label)
      : conclusion(String(last), p.label, Array.from({ length: last - 1 }, (_, k) => String(k + 1)))
  );
  return graph({ arguments: [argument(label, pcs)], propositions });
}
