/**
 * Argument graph queries.
 */

import type {
  Argument,
  ArgumentGraph,
  Conclusion,
  DialecticalRelation,
  PcsItem,
  Proposition,
} from '../types/models.js';

export function findArgument(graph: ArgumentGraph, label: string): Argument | undefined {
  return graph.arguments.find((a) => a.label === label);
}

export function findProposition(graph: ArgumentGraph, label: string): Proposition | undefined {
  return graph.propositions.find((p) => p.label === label);
}

export function relationsBetween(
  graph: ArgumentGraph,
  source: string | undefined,
  target: string | undefined
): DialecticalRelation[] {
  if (source === undefined || target === undefined) return [];
  return graph.relations.filter((r) => r.source === source && r.target === target);
}

export function isConclusion(item: PcsItem): item is Conclusion {
  return item.kind === 'conclusion';
}

/** Display name used in messages, e.g. `<A>`. */
export function argumentName(argument: Argument): string {
  return argument.label ? `<${argument.label}>` : '<unlabeled argument>';
}

/** The labels a conclusion is inferred from, or null if the entry is missing or malformed. */
export function inferenceRefs(item: Conclusion, fromKey: string): string[] | null {
  const refs = item.inferenceData[fromKey];
  if (!Array.isArray(refs)) return null;
  const labels: string[] = [];
  for (const ref of refs) {
    if (typeof ref !== 'string' && typeof ref !== 'number') return null;
    labels.push(String(ref));
  }
  return labels;
}

/** Item labels a conclusion depends on, directly or through intermediate conclusions. */
export function inferenceChain(argument: Argument, label: string, fromKey: string): Set<string> {
  const used = new Set<string>();
  const pending = [label];

  while (pending.length > 0) {
    const current = pending.pop();
    const item = argument.pcs.find((i) => i.label === current);
    if (!item || !isConclusion(item)) continue;
    for (const ref of inferenceRefs(item, fromKey) ?? []) {
      if (used.has(ref)) continue;
      used.add(ref);
      pending.push(ref);
    }
  }

  return used;
}

/** Proposition text of the final item, i.e. the main conclusion. */
export function mainConclusion(graph: ArgumentGraph, argument: Argument): Proposition | undefined {
  const last = argument.pcs[argument.pcs.length - 1];
  return last ? findProposition(graph, last.propositionLabel) : undefined;
}

export function premisePropositions(graph: ArgumentGraph, argument: Argument): Proposition[] {
  return argument.pcs
    .filter((item) => !isConclusion(item))
    .map((item) => findProposition(graph, item.propositionLabel))
    .filter((p): p is Proposition => p !== undefined);
}

/** Segment ids a proposition or argument points to, or null when it declares none. */
export function annotationIds(data: Record<string, unknown>): string[] | null {
  const ids = data['annotation_ids'];
  if (ids === undefined || ids === null) return null;
  if (!Array.isArray(ids)) return [String(ids)];
  return ids.map((id) => String(id));
}

/** Labels of all arguments and claims, i.e. the nodes of a map. */
export function nodeLabels(graph: ArgumentGraph): Set<string> {
  return new Set([
    ...graph.propositions.map((p) => p.label),
    ...graph.arguments.map((a) => a.label).filter((l): l is string => Boolean(l)),
  ]);
}
