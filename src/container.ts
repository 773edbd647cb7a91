/**
 * Dependency wiring.
 * Constructs the registry and services around a prover and a log sink.
 * Production passes Z3; tests pass an in-process stand-in.
 */

import type { ILogProvider } from './providers/ILogProvider.js';
import type { ITheoremProver } from './providers/ITheoremProver.js';
import type { Middleware } from './middleware/pipeline.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { VerificationService } from './services/VerificationService.js';
import { VerifierRegistry } from './services/VerifierRegistry.js';

export interface Container {
  registry: VerifierRegistry;
  verificationService: VerificationService;
  logProvider: ILogProvider;
  prover: ITheoremProver;
  logging: Middleware;
  errors: Middleware;
}

export function createContainer(deps: {
  logProvider: ILogProvider;
  prover: ITheoremProver;
}): Container {
  const registry = new VerifierRegistry({ prover: deps.prover, logger: deps.logProvider });
  const verificationService = new VerificationService(registry, deps.logProvider);

  return {
    registry,
    verificationService,
    logProvider: deps.logProvider,
    prover: deps.prover,
    logging: createLoggingMiddleware(deps.logProvider),
    errors: createErrorHandler(deps.logProvider),
  };
}
