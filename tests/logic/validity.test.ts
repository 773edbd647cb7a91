import { describe, it, expect, beforeEach } from 'vitest';
import { checkValidity, describeFault } from '../../src/logic/validity.js';
import { parseFormula } from '../../src/logic/parser.js';
import type { NamedFormula, ValidityQuery } from '../../src/logic/smtlib.js';
import { MockTheoremProver } from '../mocks/MockTheoremProver.js';

function named(name: string, text: string): NamedFormula {
  const result = parseFormula(text);
  if (!result.ok) throw new Error(result.error);
  return { name, formula: result.formula };
}

function query(premises: string[], conclusion: string): ValidityQuery {
  return {
    premises: premises.map((p, i) => named(String(i + 1), p)),
    conclusion: named(String(premises.length + 1), conclusion),
    declarations: new Map(),
  };
}

describe('checkValidity', () => {
  let prover: MockTheoremProver;

  beforeEach(() => {
    prover = new MockTheoremProver();
  });

  it('should find modus ponens valid', async () => {
    const outcome = await checkValidity(prover, query(['p', 'p -> q'], 'q'));

    expect(outcome.kind).toBe('valid');
    expect(outcome.program).toContain('(assert (not argument))');
  });

  it('should find an inference from a disjunction to a disjunct invalid', async () => {
    const outcome = await checkValidity(prover, query(['p | q'], 'p'));

    expect(outcome.kind).toBe('invalid');
  });

  it('should hand premises and the negated conclusion to the prover', async () => {
    await checkValidity(prover, query(['p'], 'q'));

    expect(prover.queries[0].assertions).toEqual([
      { type: 'atom', name: 'p' },
      { type: 'not', operand: { type: 'atom', name: 'q' } },
    ]);
  });

  it('should turn an undecided instance into a fault', async () => {
    const outcome = await checkValidity(prover, query(['all x.F(x)'], 'F(a)'));

    expect(outcome).toMatchObject({
      kind: 'fault',
      error: 'truth-table returned unknown (timeout or undecided instance)',
    });
  });

  it('should turn a prover error into a fault', async () => {
    prover.failWith = new Error('out of memory');

    const outcome = await checkValidity(prover, query(['p'], 'p'));

    expect(outcome).toMatchObject({ kind: 'fault', error: 'truth-table failed: out of memory' });
  });

  it('should describe a fault with its program', async () => {
    prover.failWith = new Error('out of memory');
    const outcome = await checkValidity(prover, query(['p'], 'p'));
    if (outcome.kind !== 'fault') throw new Error('expected a fault');

    expect(describeFault(outcome)).toBe(
      `could not be decided: truth-table failed: out of memory. SMT-LIB program:\n${outcome.program}`
    );
  });
});
