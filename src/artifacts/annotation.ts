/**
 * Annotation tree queries.
 * Segments are the `proposition` elements of an annotated source text.
 */

import type { AnnotationElement, AnnotationNode, AnnotationTree } from '../types/models.js';

export const SEGMENT_TAG = 'proposition';

export const SEGMENT_ATTRIBUTES: readonly string[] = [
  'id',
  'supports',
  'attacks',
  'argument_label',
  'ref_reco_label',
];

/** Every element of the tree, in document order. */
export function allElements(tree: AnnotationTree): AnnotationElement[] {
  const out: AnnotationElement[] = [];
  const walk = (nodes: AnnotationNode[]) => {
    for (const node of nodes) {
      if (typeof node === 'string') continue;
      out.push(node);
      walk(node.children);
    }
  };
  walk(tree.nodes);
  return out;
}

export function segments(tree: AnnotationTree): AnnotationElement[] {
  return allElements(tree).filter((e) => e.tag === SEGMENT_TAG);
}

export function textOf(nodes: AnnotationNode[]): string {
  return nodes.map((node) => (typeof node === 'string' ? node : textOf(node.children))).join('');
}

/** Whitespace-separated id list of an attribute such as `supports`. */
export function idList(element: AnnotationElement, attribute: string): string[] {
  return (element.attributes[attribute] ?? '').split(/\s+/).filter(Boolean);
}

export function segmentIds(tree: AnnotationTree): Set<string> {
  return new Set(
    segments(tree)
      .map((s) => s.attributes.id)
      .filter((id): id is string => Boolean(id))
  );
}

export interface AnnotatedRelation {
  from: string;
  to: string;
  valence: 'support' | 'attack';
}

/** Support and attack references between existing segments. */
export function annotatedRelations(tree: AnnotationTree): AnnotatedRelation[] {
  const ids = segmentIds(tree);
  const relations: AnnotatedRelation[] = [];
  for (const segment of segments(tree)) {
    const from = segment.attributes.id;
    if (!from) continue;
    for (const to of idList(segment, 'supports')) {
      if (ids.has(to)) relations.push({ from, to, valence: 'support' });
    }
    for (const to of idList(segment, 'attacks')) {
      if (ids.has(to)) relations.push({ from, to, valence: 'attack' });
    }
  }
  return relations;
}
