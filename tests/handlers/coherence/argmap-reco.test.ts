import { describe, it, expect } from 'vitest';
import { createArgmapInfrecoHandler } from '../../../src/handlers/coherence/argmap-infreco.js';
import { createArgmapLogrecoHandler } from '../../../src/handlers/coherence/argmap-logreco.js';
import type { CoherenceHandlerOptions } from '../../../src/handlers/CoherenceHandler.js';
import type { CompositeHandler } from '../../../src/handlers/CompositeHandler.js';
import type { ArgumentGraph } from '../../../src/types/models.js';
import { VerificationContext } from '../../../src/verification/VerificationContext.js';
import { DEFAULT_COHERENCE_CRITERIA, roleFilter } from '../../../src/verification/filters.js';
import { argument, conclusion, graph, graphRecord, premise, prop, relation } from '../../fixtures/builders.js';

const filters = (role: 'infreco' | 'logreco'): CoherenceHandlerOptions => ({
  filters: [
    roleFilter('argmap', DEFAULT_COHERENCE_CRITERIA.argmap),
    roleFilter(role, DEFAULT_COHERENCE_CRITERIA[role]),
  ],
});

async function run(handler: CompositeHandler, map: ArgumentGraph, reco: ArgumentGraph) {
  const ctx = new VerificationContext({
    records: [
      graphRecord('map', map, { filename: 'map.ad' }),
      graphRecord('reco', reco, { filename: 'reconstructions.ad' }),
    ],
  });
  await handler.process(ctx);
  return ctx;
}

const map = graph({
  propositions: [prop('Less meat', 'We should eat less meat.')],
  arguments: [argument('Suffering', [], ['Animals suffer.'])],
  relations: [relation('Suffering', 'Less meat', 'support', ['sketched'])],
});

const suffering = (conclusionLabel: string) =>
  argument('Suffering', [premise('1', 'suffer'), conclusion('2', conclusionLabel, ['1'])]);

describe('argmap_infreco', () => {
  it('should accept a reconstruction that bears out the map', async () => {
    const reco = graph({
      arguments: [suffering('Less meat')],
      propositions: [prop('suffer', 'Animals suffer.'), prop('Less meat', 'We should eat less meat.')],
    });

    const ctx = await run(createArgmapInfrecoHandler(filters('infreco')), map, reco);

    expect(ctx.summary()).toEqual({
      'argmap_infreco.elements': { isValid: true, message: null },
      'argmap_infreco.relations': { isValid: true, message: null },
    });
  });

  it('should flag a sketched support the conclusion does not bear out', async () => {
    const reco = graph({
      arguments: [suffering('stop')],
      propositions: [
        prop('suffer', 'Animals suffer.'),
        prop('stop', 'We must stop eating meat.'),
        prop('Less meat', 'We should eat less meat.'),
      ],
    });

    const ctx = await run(createArgmapInfrecoHandler(filters('infreco')), map, reco);

    expect(ctx.latestResult('argmap_infreco.relations')?.message).toBe(
      'Sketched support relation from <Suffering> to [Less meat] in the map is not grounded in the reconstruction: proposition [Less meat] does not figure as conclusion of <Suffering>.'
    );
  });

  it('should list nodes missing on either side', async () => {
    const wider = graph({
      propositions: [prop('Health', 'Meat is unhealthy.')],
      arguments: [argument('Taste')],
    });
    const reco = graph({ arguments: [argument('Extra', [premise('1', 'x'), conclusion('2', 'y', ['1'])])] });

    const ctx = await run(createArgmapInfrecoHandler(filters('infreco')), wider, reco);

    expect(ctx.latestResult('argmap_infreco.elements')?.message).toBe(
      [
        'Argument <Taste> in the map is not reconstructed (argument label mismatch).',
        'Reconstructed argument <Extra> is not in the map (argument label mismatch).',
        'Claim [Health] in the map has no corresponding proposition in the reconstructions (proposition label mismatch).',
      ].join(' - ')
    );
  });
});

describe('argmap_logreco', () => {
  it('should accept grounded counterparts of sketched relations', async () => {
    const reco = graph({
      arguments: [suffering('Less meat')],
      propositions: [prop('suffer'), prop('Less meat', 'We should eat less meat.')],
      relations: [relation('Suffering', 'Less meat', 'support', ['grounded'])],
    });

    const ctx = await run(createArgmapLogrecoHandler(filters('logreco')), map, reco);

    expect(ctx.latestResult('argmap_logreco.relations')).toMatchObject({ isValid: true, message: null });
  });

  it('should flag ungrounded and uncaptured relations', async () => {
    const withTaste = graph({ ...map, propositions: [...map.propositions, prop('Taste', 'Meat is tasty.')] });
    const reco = graph({
      arguments: [suffering('Less meat')],
      propositions: [prop('suffer'), prop('Less meat'), prop('Taste')],
      relations: [
        relation('Suffering', 'Less meat', 'support', ['sketched']),
        relation('Less meat', 'Taste', 'attack', ['grounded']),
      ],
    });

    const ctx = await run(createArgmapLogrecoHandler(filters('logreco')), withTaste, reco);

    expect(ctx.latestResult('argmap_logreco.relations')?.message).toBe(
      "Dialectical support relation from node 'Suffering' to node 'Less meat' in the map is not grounded in the logical reconstructions. - " +
        "According to the reconstructions, item 'Less meat' attacks item 'Taste', but the map does not capture this relation."
    );
  });
});
