/**
 * Informal dialectical tests between propositions: identity by label or
 * shared text, contradiction by declared relation or negation wording, and
 * support/attack paths through at most one intermediate claim.
 */

import { relationsBetween } from '../artifacts/graph.js';
import type { ArgumentGraph, Proposition, Valence } from '../types/models.js';

const NEGATION_SCHEMES: Array<(text: string) => string> = [
  (t) => `NOT: ${t}`,
  (t) => `Not: ${t}`,
  (t) => `NOT ${t}`,
  (t) => `Not ${t}`,
];

export function areIdentical(a: Proposition | undefined, b: Proposition | undefined): boolean {
  if (!a || !b) return false;
  return a.label === b.label || a.texts.some((text) => b.texts.includes(text));
}

export function areContradictory(
  a: Proposition | undefined,
  b: Proposition | undefined,
  graph?: ArgumentGraph
): boolean {
  if (!a || !b || a.label === b.label) return false;

  if (
    graph?.relations.some(
      (r) =>
        r.source !== r.target &&
        [a.label, b.label].includes(r.source) &&
        [a.label, b.label].includes(r.target) &&
        isOpposing(r.valence)
    )
  ) {
    return true;
  }

  const negationsOf = (p: Proposition) =>
    p.texts.flatMap((text) => NEGATION_SCHEMES.map((scheme) => scheme(text)));
  const negA = negationsOf(a);
  const negB = negationsOf(b);
  return a.texts.some((t) => negB.includes(t)) || b.texts.some((t) => negA.includes(t));
}

export function isOpposing(valence: Valence): boolean {
  return valence === 'attack' || valence === 'contradict';
}

/** Support directly, or via one claim (support-support or attack-attack). */
export function indirectlySupports(from: string, to: string, map: ArgumentGraph): boolean {
  if (from === to) return true;
  if (relationsBetween(map, from, to).some((r) => r.valence === 'support')) return true;

  return viaIntermediate(from, to, map, (first, second) =>
    (first === 'support' && second === 'support') || (isOpposing(first) && isOpposing(second))
  );
}

/** Attack directly, or via one claim (support-attack or attack-support). */
export function indirectlyAttacks(from: string, to: string, map: ArgumentGraph): boolean {
  if (from === to) return false;
  if (relationsBetween(map, from, to).some((r) => r.valence === 'attack')) return true;

  return viaIntermediate(from, to, map, (first, second) =>
    (first === 'support' && isOpposing(second)) || (isOpposing(first) && second === 'support')
  );
}

function viaIntermediate(
  from: string,
  to: string,
  map: ArgumentGraph,
  composes: (first: Valence, second: Valence) => boolean
): boolean {
  return map.propositions.some((p) => {
    if (p.label === from || p.label === to) return false;
    const firstLeg = relationsBetween(map, from, p.label);
    const secondLeg = relationsBetween(map, p.label, to);
    return firstLeg.some((r1) => secondLeg.some((r2) => composes(r1.valence, r2.valence)));
  });
}
