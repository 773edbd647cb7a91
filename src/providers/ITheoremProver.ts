/**
 * Theorem prover interface.
 * Wraps a satisfiability backend (Z3 in production, a truth-table
 * stand-in in tests).
 */

import type { Formula } from '../logic/formula.js';

export type SatVerdict = 'sat' | 'unsat' | 'unknown';

/**
 * One satisfiability question in two encodings: the SMT-LIB program and
 * the formulas it asserts. Backends read whichever they understand.
 */
export interface SatQuery {
  program: string;
  assertions: Formula[];
}

export interface ITheoremProver {
  /** Backend name, surfaced in diagnostics. */
  readonly name: string;

  /**
   * Decide whether the assertions are jointly satisfiable.
   * Throws on backend errors; 'unknown' covers timeouts and undecided instances.
   */
  checkSat(query: SatQuery): Promise<SatVerdict>;
}
