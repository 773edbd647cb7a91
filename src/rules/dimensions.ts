/**
 * Dimension tables.
 * A dimension groups rules under one reported check. These tables are the
 * only place rules are put to use.
 */

import type { RuleId } from './argument-rules.js';

export interface Dimension {
  readonly id: string;
  readonly rules: readonly RuleId[];
}

export type DimensionTable = readonly Dimension[];

/** Build an immutable table from dimension id to rule ids, in order. */
export function createDimensionTable(entries: Record<string, RuleId[]>): DimensionTable {
  return Object.freeze(
    Object.entries(entries).map(([id, rules]) => Object.freeze({ id, rules: Object.freeze([...rules]) }))
  );
}

const MALFORMED_ARGUMENT: RuleId[] = [
  'has-arguments',
  'has-pcs',
  'starts-with-premise',
  'ends-with-conclusion',
  'no-duplicate-pcs-labels',
];

export const INFRECO_DIMENSIONS = createDimensionTable({
  'malformed-argument': MALFORMED_ARGUMENT,
  'missing-label-gist': ['has-label', 'has-gist', 'not-multiple-gists'],
  'missing-inference-data': ['has-inference-data'],
  'dangling-reference': ['prop-refs-exist'],
  'unused-proposition': ['uses-all-props'],
  'disallowed-material': [
    'has-unique-argument',
    'no-extra-propositions',
    'only-grounded-relations',
    'no-prop-inline-data',
    'no-arg-inline-data',
  ],
});

export const LOGRECO_DIMENSIONS = createDimensionTable({
  'malformed-argument': MALFORMED_ARGUMENT,
  'missing-label-gist': ['has-label', 'has-gist', 'not-multiple-gists'],
  'missing-inference-data': ['has-inference-data'],
  'dangling-reference': ['prop-refs-exist'],
  'unused-proposition': ['uses-all-props'],
  'disallowed-material': [
    'has-unique-argument',
    'no-extra-propositions',
    'only-grounded-relations',
    'no-arg-inline-data',
  ],
  'flawed-formalization': ['well-formed-formalizations'],
});

/** For reconstructions compared with maps or annotations: several arguments, derived relations, annotation ids. */
export const INFRECO_MULTI_DIMENSIONS = createDimensionTable({
  'malformed-argument': MALFORMED_ARGUMENT,
  'missing-label-gist': ['has-label'],
  'missing-inference-data': ['has-inference-data'],
  'dangling-reference': ['prop-refs-exist'],
  'unused-proposition': ['uses-all-props'],
  'disallowed-material': ['has-at-least-n-arguments', 'no-extra-propositions'],
});

export const LOGRECO_MULTI_DIMENSIONS = createDimensionTable({
  'malformed-argument': MALFORMED_ARGUMENT,
  'missing-label-gist': ['has-label'],
  'missing-inference-data': ['has-inference-data'],
  'dangling-reference': ['prop-refs-exist'],
  'unused-proposition': ['uses-all-props'],
  'disallowed-material': ['has-at-least-n-arguments', 'no-extra-propositions'],
  'flawed-formalization': ['well-formed-formalizations'],
});
