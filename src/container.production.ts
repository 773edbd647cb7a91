/**
 * Production container: Z3 prover, console logging.
 * Reads SOLVER_TIMEOUT_MS, LOG_LEVEL and LOG_TO_CONSOLE once per cold start.
 */

import { createContainer, type Container } from './container.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';
import { DEFAULT_SOLVER_TIMEOUT_MS, Z3TheoremProver } from './providers/Z3TheoremProver.js';

let cached: Container | null = null;

export interface ProductionSettings {
  solverTimeoutMs: number;
  logLevel: LogLevel;
  logToConsole: boolean;
}

export function readSettings(env: NodeJS.ProcessEnv): ProductionSettings {
  const timeout = env.SOLVER_TIMEOUT_MS;
  const solverTimeoutMs = timeout === undefined ? DEFAULT_SOLVER_TIMEOUT_MS : Number(timeout);
  if (!Number.isInteger(solverTimeoutMs) || solverTimeoutMs <= 0) {
    throw new Error(`SOLVER_TIMEOUT_MS must be a positive integer, got "${timeout}"`);
  }

  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  const toConsole = env.LOG_TO_CONSOLE ?? 'true';
  if (toConsole !== 'true' && toConsole !== 'false') {
    throw new Error(`LOG_TO_CONSOLE must be "true" or "false", got "${toConsole}"`);
  }

  return { solverTimeoutMs, logLevel, logToConsole: toConsole === 'true' };
}

export function getProductionContainer(): Container {
  if (cached) return cached;

  const settings = readSettings(process.env);
  const logProvider = new ConsoleLogProvider({
    outputToConsole: settings.logToConsole,
    minLevel: settings.logLevel,
  });

  cached = createContainer({
    logProvider,
    prover: new Z3TheoremProver({ timeoutMs: settings.solverTimeoutMs, logger: logProvider }),
  });

  return cached;
}
