/**
 * Argument map against logical reconstruction.
 * Sketched map relations need grounded counterparts, and grounded
 * reconstruction relations between map nodes must show in the map.
 */

import { nodeLabels, relationsBetween } from '../../artifacts/graph.js';
import { indirectlyAttacks, indirectlySupports } from '../../logic/dialectics.js';
import type { ArgumentGraph } from '../../types/models.js';
import { CoherenceHandler, asGraph, type CoherenceHandlerOptions } from '../CoherenceHandler.js';
import { CompositeHandler } from '../CompositeHandler.js';
import { MapRecoElementsHandler } from './argmap-infreco.js';

export class MapLogrecoRelationsHandler extends CoherenceHandler<ArgumentGraph, ArgumentGraph> {
  constructor(name: string, opts: CoherenceHandlerOptions) {
    super(name, [asGraph, asGraph], opts);
  }

  protected compare(map: ArgumentGraph, reco: ArgumentGraph): string[] {
    const messages: string[] = [];
    const recoNodes = nodeLabels(reco);
    const mapNodes = nodeLabels(map);

    for (const relation of map.relations) {
      if (!recoNodes.has(relation.source) || !recoNodes.has(relation.target)) continue;
      if (!relation.dialectics.includes('sketched')) continue;

      const matches = relationsBetween(reco, relation.source, relation.target).filter(
        (r) => r.valence === relation.valence
      );
      if (matches.some((r) => r.dialectics.includes('grounded'))) continue;

      const where = `Dialectical ${relation.valence} relation from node '${relation.source}' to node '${relation.target}' in the map`;
      messages.push(
        matches.length === 0
          ? `${where} is not matched by any relation in the reconstruction.`
          : `${where} is not grounded in the logical reconstructions.`
      );
    }

    for (const relation of reco.relations) {
      if (!mapNodes.has(relation.source) || !mapNodes.has(relation.target)) continue;
      if (!relation.dialectics.includes('grounded')) continue;

      const captured =
        relation.valence === 'support'
          ? indirectlySupports(relation.source, relation.target, map)
          : relation.valence === 'attack'
            ? indirectlyAttacks(relation.source, relation.target, map)
            : true;
      if (!captured) {
        messages.push(
          `According to the reconstructions, item '${relation.source}' ${relation.valence}s item '${relation.target}', but the map does not capture this relation.`
        );
      }
    }

    return messages;
  }
}

export function createArgmapLogrecoHandler(opts: CoherenceHandlerOptions): CompositeHandler {
  return new CompositeHandler(
    'argmap_logreco',
    [
      new MapRecoElementsHandler('argmap_logreco.elements', opts),
      new MapLogrecoRelationsHandler('argmap_logreco.relations', opts),
    ],
    opts
  );
}
