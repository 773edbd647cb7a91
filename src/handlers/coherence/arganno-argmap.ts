/**
 * Annotated source text against argument map.
 * Segments attach to map nodes through `argument_label`; nodes list their
 * segments in `annotation_ids`. Annotated and mapped relations must mirror
 * each other.
 */

import { annotatedRelations, segmentIds, segments, type AnnotatedRelation } from '../../artifacts/annotation.js';
import { annotationIds, nodeLabels } from '../../artifacts/graph.js';
import { isOpposing } from '../../logic/dialectics.js';
import type { AnnotationTree, ArgumentGraph, Valence } from '../../types/models.js';
import {
  CoherenceHandler,
  asAnnotation,
  asGraph,
  type CoherenceHandlerOptions,
} from '../CoherenceHandler.js';
import { CompositeHandler } from '../CompositeHandler.js';

/** Segment id to the map node it is attached to. */
function segmentNodes(tree: AnnotationTree, map: ArgumentGraph): Map<string, string> {
  const labels = nodeLabels(map);
  const nodes = new Map<string, string>();
  for (const segment of segments(tree)) {
    const { id, argument_label: label } = segment.attributes;
    if (id && label !== undefined && labels.has(label)) nodes.set(id, label);
  }
  return nodes;
}

function nodeData(map: ArgumentGraph): Array<{ label: string; data: Record<string, unknown> }> {
  return [
    ...map.propositions.map((p) => ({ label: p.label, data: p.data })),
    ...map.arguments.flatMap((a) => (a.label ? [{ label: a.label, data: a.data }] : [])),
  ];
}

export class AnnoMapElementsHandler extends CoherenceHandler<AnnotationTree, ArgumentGraph> {
  constructor(name: string, opts: CoherenceHandlerOptions) {
    super(name, [asAnnotation, asGraph], opts);
  }

  protected compare(tree: AnnotationTree, map: ArgumentGraph): string[] {
    const messages: string[] = [];
    const labels = nodeLabels(map);
    const ids = segmentIds(tree);
    const nodes = segmentNodes(tree, map);

    for (const segment of segments(tree)) {
      const { id, argument_label: label } = segment.attributes;
      if (label === undefined || !labels.has(label)) {
        messages.push(
          `Illegal 'argument_label' reference of segment with id=${id}: no node with label '${label}' in the map.`
        );
      }
    }

    for (const node of nodeData(map)) {
      const refs = annotationIds(node.data) ?? [];
      if (refs.length === 0) {
        messages.push(`Missing 'annotation_ids' of node '${node.label}'.`);
        continue;
      }
      for (const ref of refs) {
        if (!ids.has(ref)) {
          messages.push(
            `Illegal 'annotation_ids' reference of node '${node.label}': no segment with id='${ref}' in the annotation.`
          );
        } else if (nodes.get(ref) !== node.label) {
          messages.push(
            `Label reference mismatch: node '${node.label}' lists segment ${ref}, but that segment is attached to ${
              nodes.has(ref) ? `'${nodes.get(ref)}'` : 'no node of the map'
            }.`
          );
        }
      }
    }

    return messages;
  }
}

const sameKind = (a: Valence, b: Valence) => (a === 'support' ? b === 'support' : isOpposing(b) && isOpposing(a));

export class AnnoMapRelationsHandler extends CoherenceHandler<AnnotationTree, ArgumentGraph> {
  constructor(name: string, opts: CoherenceHandlerOptions) {
    super(name, [asAnnotation, asGraph], opts);
  }

  protected compare(tree: AnnotationTree, map: ArgumentGraph): string[] {
    const messages: string[] = [];
    const nodes = segmentNodes(tree, map);
    const annotated: Array<AnnotatedRelation & { source: string; target: string }> = [];

    for (const relation of annotatedRelations(tree)) {
      const source = nodes.get(relation.from);
      const target = nodes.get(relation.to);
      if (source === undefined || target === undefined || source === target) continue;
      annotated.push({ ...relation, source, target });
    }

    for (const relation of annotated) {
      const mirrored = map.relations.some(
        (r) => r.source === relation.source && r.target === relation.target && sameKind(relation.valence, r.valence)
      );
      if (!mirrored) {
        messages.push(
          `Annotated ${relation.valence} relation ${relation.from} -> ${relation.to} is not matched by any relation in the map.`
        );
      }
    }

    const annotatedNodes = new Set(nodes.values());
    for (const relation of map.relations) {
      if (!annotatedNodes.has(relation.source) || !annotatedNodes.has(relation.target)) continue;
      const mirrored = annotated.some(
        (a) => a.source === relation.source && a.target === relation.target && sameKind(a.valence, relation.valence)
      );
      if (!mirrored) {
        messages.push(
          `Dialectical ${relation.valence} relation ${relation.source} -> ${relation.target} is not matched by any relation in the annotation.`
        );
      }
    }

    return messages;
  }
}

export function createArgannoArgmapHandler(opts: CoherenceHandlerOptions): CompositeHandler {
  return new CompositeHandler(
    'arganno_argmap',
    [
      new AnnoMapElementsHandler('arganno_argmap.elements', opts),
      new AnnoMapRelationsHandler('arganno_argmap.relations', opts),
    ],
    opts
  );
}
