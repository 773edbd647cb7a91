/**
 * Well-formedness checks for argument maps, with ids `argmap.<check>`.
 */

import { argumentName } from '../artifacts/graph.js';
import { shorten } from '../artifacts/text.js';
import type { ArgumentGraph } from '../types/models.js';
import type { CheckOutcome, CheckResult, GraphRecord } from '../types/verification.js';
import { fail, pass, toResult } from '../verification/outcome.js';
import { GraphHandler, type RecordHandlerOptions } from './RecordHandler.js';

export type MapCheck = (map: ArgumentGraph) => CheckOutcome;

export const MAP_CHECKS: Readonly<Record<string, MapCheck>> = Object.freeze({
  'complete-claims': (map: ArgumentGraph) => {
    const incomplete = [
      ...map.propositions
        .filter((p) => !p.label)
        .map((p) => (p.texts[0] ? shorten(p.texts[0], 40) : 'Empty claim')),
      ...map.arguments
        .filter((a) => !a.label)
        .map((a) => (a.gists[0] ? shorten(a.gists[0], 40) : 'Empty argument')),
    ];
    return incomplete.length > 0 ? fail(`Missing labels for nodes: ${incomplete.join(', ')}.`) : pass();
  },

  'no-duplicate-labels': (map: ArgumentGraph) => {
    const duplicates = [
      ...map.propositions.filter((p) => p.label && p.texts.length > 1).map((p) => `[${p.label}]`),
      ...map.arguments.filter((a) => a.label && a.gists.length > 1).map((a) => `<${a.label}>`),
    ];
    return duplicates.length > 0
      ? fail(`Labels declared with different texts: ${duplicates.join(', ')}.`)
      : pass();
  },

  'no-pcs': (map: ArgumentGraph) => {
    const detailed = map.arguments.filter((a) => a.pcs.length > 0).map((a) => argumentName(a));
    return detailed.length > 0
      ? fail(
          `Found detailed reconstructions of individual arguments as premise-conclusion structures: ${detailed.join(', ')}.`
        )
      : pass();
  },
});

export class MapChecksHandler extends GraphHandler {
  constructor(opts: RecordHandlerOptions) {
    super('argmap.checks', opts);
  }

  protected evaluate(record: GraphRecord, map: ArgumentGraph): CheckResult[] {
    return Object.entries(MAP_CHECKS)
      .map(([id, check]) => toResult(`argmap.${id}`, [record.id], check(map)))
      .filter((result): result is CheckResult => result !== null);
  }
}
