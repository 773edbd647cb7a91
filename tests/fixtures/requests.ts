/**
 * Request payloads as clients send them.
 */

import type { ArtifactInput } from '../../src/types/api.js';

/** A formalized modus ponens reconstruction that passes every logreco check. */
export function reconstructionInput(conclusionFormula = 'q', id = 'reco'): ArtifactInput {
  return {
    id,
    kind: 'argument-graph',
    metadata: { filename: 'reconstructions.ad' },
    data: {
      arguments: [
        {
          label: 'Suffering',
          gists: ['Animals suffer, so we should eat less meat.'],
          pcs: [
            { kind: 'premise', label: '1', propositionLabel: 'Animals suffer' },
            { kind: 'premise', label: '2', propositionLabel: 'Suffering matters' },
            { kind: 'conclusion', label: '3', propositionLabel: 'Less meat', inferenceData: { from: ['1', '2'] } },
          ],
        },
      ],
      propositions: [
        {
          label: 'Animals suffer',
          texts: ['Animals suffer.'],
          data: { formalization: 'p', declarations: { p: 'Animals suffer.' } },
        },
        {
          label: 'Suffering matters',
          texts: ['If animals suffer, we should eat less meat.'],
          data: { formalization: 'p -> q', declarations: { q: 'We should eat less meat.' } },
        },
        { label: 'Less meat', texts: ['We should eat less meat.'], data: { formalization: conclusionFormula } },
      ],
    },
  };
}

export function mapInput(id = 'map'): ArtifactInput {
  return {
    id,
    kind: 'argument-graph',
    metadata: { filename: 'map.ad' },
    data: {
      arguments: [{ label: 'Suffering', gists: ['Animals suffer.'] }],
      propositions: [{ label: 'Less meat', texts: ['We should eat less meat.'] }],
      relations: [{ source: 'Suffering', target: 'Less meat', valence: 'support', dialectics: ['sketched'] }],
    },
  };
}
