/**
 * Library entry point.
 */

export { createContainer, type Container } from './container.js';
export { createRouter } from './api/router.js';
export { VerificationService } from './services/VerificationService.js';
export {
  VerifierRegistry,
  VERIFIER_DEFINITIONS,
  OPTION_CATALOG,
  type VerifierDefinition,
  type VerifierConfig,
} from './services/VerifierRegistry.js';
export { VerificationContext } from './verification/VerificationContext.js';
export { Handler } from './handlers/Handler.js';
export { CompositeHandler } from './handlers/CompositeHandler.js';
export { decodeInputs, decodeArgumentGraph, decodeAnnotationTree } from './artifacts/decode.js';
export { parseFormula } from './logic/parser.js';
export { formatFormula, type Formula } from './logic/formula.js';
export * from './providers/index.js';
export * from './errors.js';
export type * from './types/api.js';
export type * from './types/models.js';
export type * from './types/verification.js';
