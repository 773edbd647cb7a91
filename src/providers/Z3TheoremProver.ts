/**
 * Z3 theorem prover.
 * Runs SMT-LIB programs on the WebAssembly build of Z3 (z3-solver).
 * The module is loaded on first use and shared by every later query.
 */

import type { ILogProvider } from './ILogProvider.js';
import type { ITheoremProver, SatQuery, SatVerdict } from './ITheoremProver.js';

export const DEFAULT_SOLVER_TIMEOUT_MS = 10_000;

/** The part of a z3-solver Solver this provider drives. */
export interface SmtSolver {
  set(key: string, value: number): void;
  fromString(program: string): void;
  check(): Promise<SatVerdict>;
}

/** Returns a fresh solver for each query. */
export type SolverFactory = () => Promise<SmtSolver>;

let z3Solvers: Promise<() => SmtSolver> | null = null;

async function loadZ3(): Promise<() => SmtSolver> {
  const { init } = await import('z3-solver');
  const { Context } = await init();
  const ctx = new Context('main');
  return () => new ctx.Solver();
}

const z3SolverFactory: SolverFactory = async () => {
  z3Solvers ??= loadZ3().catch((err: unknown) => {
    z3Solvers = null;
    throw err;
  });
  const create = await z3Solvers;
  return create();
};

export class Z3TheoremProver implements ITheoremProver {
  readonly name = 'z3';

  private readonly timeoutMs: number;
  private readonly createSolver: SolverFactory;
  private readonly logger: ILogProvider | null;
  /** Z3 runs one async check at a time per context. */
  private tail: Promise<void> = Promise.resolve();

  constructor(opts?: {
    timeoutMs?: number;
    createSolver?: SolverFactory;
    logger?: ILogProvider;
  }) {
    this.timeoutMs = opts?.timeoutMs ?? DEFAULT_SOLVER_TIMEOUT_MS;
    this.createSolver = opts?.createSolver ?? z3SolverFactory;
    this.logger = opts?.logger ?? null;
  }

  checkSat(query: SatQuery): Promise<SatVerdict> {
    const run = this.tail.then(() => this.run(query));
    // The queue advances whether or not this query failed; callers see the failure via `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async run(query: SatQuery): Promise<SatVerdict> {
    const start = performance.now();
    try {
      const solver = await this.createSolver();
      solver.set('timeout', this.timeoutMs);
      solver.fromString(query.program);
      const verdict = await solver.check();

      if (verdict === 'unknown') {
        this.logger?.warn('Solver returned unknown', {
          timeoutMs: this.timeoutMs,
          durationMs: Math.round(performance.now() - start),
        });
      }
      return verdict;
    } catch (err) {
      this.logger?.warn('Solver failed', {
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }
}
