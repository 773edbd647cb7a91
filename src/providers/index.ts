export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export type { ITheoremProver, SatQuery, SatVerdict } from './ITheoremProver.js';
export { Z3TheoremProver, DEFAULT_SOLVER_TIMEOUT_MS } from './Z3TheoremProver.js';
export type { SmtSolver, SolverFactory } from './Z3TheoremProver.js';
