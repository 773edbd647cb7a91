/**
 * Argument map against reconstruction.
 * Every map node must be reconstructed, and every sketched map relation
 * must be borne out by the reconstructed premises and conclusions.
 */

import {
  findArgument,
  findProposition,
  mainConclusion,
  premisePropositions,
} from '../../artifacts/graph.js';
import { areContradictory, areIdentical } from '../../logic/dialectics.js';
import type { Argument, ArgumentGraph, DialecticalRelation, Proposition } from '../../types/models.js';
import { CoherenceHandler, asGraph, type CoherenceHandlerOptions } from '../CoherenceHandler.js';
import { CompositeHandler } from '../CompositeHandler.js';

export class MapRecoElementsHandler extends CoherenceHandler<ArgumentGraph, ArgumentGraph> {
  constructor(name: string, opts: CoherenceHandlerOptions) {
    super(name, [asGraph, asGraph], opts);
  }

  protected compare(map: ArgumentGraph, reco: ArgumentGraph): string[] {
    return mapRecoElementMessages(map, reco);
  }
}

function mapRecoElementMessages(map: ArgumentGraph, reco: ArgumentGraph): string[] {
  const messages: string[] = [];
  const labels = (g: ArgumentGraph) =>
    new Set(g.arguments.map((a) => a.label).filter((l): l is string => Boolean(l)));
  const mapArguments = labels(map);
  const recoArguments = labels(reco);
  const recoClaims = new Set(reco.propositions.map((p) => p.label));

  for (const label of mapArguments) {
    if (!recoArguments.has(label)) {
      messages.push(`Argument <${label}> in the map is not reconstructed (argument label mismatch).`);
    }
  }
  for (const label of recoArguments) {
    if (!mapArguments.has(label)) {
      messages.push(`Reconstructed argument <${label}> is not in the map (argument label mismatch).`);
    }
  }
  for (const claim of map.propositions) {
    if (!recoClaims.has(claim.label)) {
      messages.push(
        `Claim [${claim.label}] in the map has no corresponding proposition in the reconstructions (proposition label mismatch).`
      );
    }
  }
  return messages;
}

type Node = { kind: 'argument'; argument: Argument } | { kind: 'claim'; proposition: Proposition };

/** The reconstruction's counterpart of a map node. */
function counterpart(label: string, map: ArgumentGraph, reco: ArgumentGraph): Node | null {
  if (findArgument(map, label)) {
    const argument = findArgument(reco, label);
    return argument ? { kind: 'argument', argument } : null;
  }
  const proposition = findProposition(reco, label);
  return proposition ? { kind: 'claim', proposition } : null;
}

export class MapInfrecoRelationsHandler extends CoherenceHandler<ArgumentGraph, ArgumentGraph> {
  constructor(name: string, opts: CoherenceHandlerOptions) {
    super(name, [asGraph, asGraph], opts);
  }

  protected compare(map: ArgumentGraph, reco: ArgumentGraph): string[] {
    const messages: string[] = [];
    for (const relation of map.relations) {
      if (!relation.dialectics.includes('sketched')) continue;
      const source = counterpart(relation.source, map, reco);
      const target = counterpart(relation.target, map, reco);
      if (!source || !target) continue;
      const message = groundingProblem(relation, source, target, reco);
      if (message) messages.push(message);
    }
    return messages;
  }
}

function groundingProblem(
  relation: DialecticalRelation,
  source: Node,
  target: Node,
  reco: ArgumentGraph
): string | null {
  if (relation.valence !== 'support' && relation.valence !== 'attack') return null;
  const support = relation.valence === 'support';
  const intro = (from: string, to: string) =>
    `Sketched ${relation.valence} relation from ${from} to ${to} in the map is not grounded in the reconstruction`;

  if (target.kind === 'argument') {
    if (target.argument.pcs.length === 0) return null;
    const premises = premisePropositions(reco, target.argument);
    let claim: Proposition | undefined;
    let from: string;
    if (source.kind === 'argument') {
      if (source.argument.pcs.length === 0) return null;
      claim = mainConclusion(reco, source.argument);
      from = `<${relation.source}>`;
    } else {
      claim = source.proposition;
      from = `[${relation.source}]`;
    }
    const grounded = premises.some((p) => (support ? areIdentical(p, claim) : areContradictory(p, claim, reco)));
    if (grounded) return null;
    const subject = source.kind === 'argument' ? `the conclusion of ${from}` : `proposition ${from}`;
    return `${intro(from, `<${relation.target}>`)}: ${subject} does not ${
      support ? 'figure as premise in' : 'contradict any premise in'
    } <${relation.target}>.`;
  }

  if (source.kind === 'argument') {
    if (source.argument.pcs.length === 0) return null;
    const conclusion = mainConclusion(reco, source.argument);
    const grounded = support
      ? areIdentical(conclusion, target.proposition)
      : areContradictory(conclusion, target.proposition, reco);
    if (grounded) return null;
    return `${intro(`<${relation.source}>`, `[${relation.target}]`)}: proposition [${relation.target}] does not ${
      support ? 'figure as conclusion of' : 'contradict the conclusion of'
    } <${relation.source}>.`;
  }

  return null;
}

export function createArgmapInfrecoHandler(opts: CoherenceHandlerOptions): CompositeHandler {
  return new CompositeHandler(
    'argmap_infreco',
    [
      new MapRecoElementsHandler('argmap_infreco.elements', opts),
      new MapInfrecoRelationsHandler('argmap_infreco.relations', opts),
    ],
    opts
  );
}
