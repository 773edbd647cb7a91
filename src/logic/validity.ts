/**
 * Validity query primitive.
 *
 * Asks the prover whether premises and the negated conclusion are jointly
 * unsatisfiable. Solver trouble is returned as a `fault`, never thrown and
 * never read as a verdict.
 */

import type { ITheoremProver, SatVerdict } from '../providers/ITheoremProver.js';
import { negate } from './formula.js';
import { buildValidityProgram, type ValidityQuery } from './smtlib.js';

export type ValidityOutcome =
  | { kind: 'valid'; program: string }
  | { kind: 'invalid'; program: string }
  | { kind: 'fault'; program: string; error: string };

export async function checkValidity(
  prover: ITheoremProver,
  query: ValidityQuery
): Promise<ValidityOutcome> {
  const program = buildValidityProgram(query);
  const assertions = [
    ...query.premises.map((p) => p.formula),
    negate(query.conclusion.formula),
  ];

  let verdict: SatVerdict;
  try {
    verdict = await prover.checkSat({ program, assertions });
  } catch (err) {
    return {
      kind: 'fault',
      program,
      error: `${prover.name} failed: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  switch (verdict) {
    case 'unsat':
      return { kind: 'valid', program };
    case 'sat':
      return { kind: 'invalid', program };
    case 'unknown':
      return {
        kind: 'fault',
        program,
        error: `${prover.name} returned unknown (timeout or undecided instance)`,
      };
  }
}

/** Message fragment for an outcome that could not be decided. */
export function describeFault(outcome: Extract<ValidityOutcome, { kind: 'fault' }>): string {
  return `could not be decided: ${outcome.error}. SMT-LIB program:\n${outcome.program}`;
}
