/**
 * Verifier catalog endpoints.
 * GET /api/v1/health           — Liveness and verifier count
 * GET /api/v1/verifiers        — All verifiers, grouped by category
 * GET /api/v1/verifiers/:name  — One verifier's roles and options
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { HealthResponse } from '../types/api.js';
import { json, lastSegment } from './http.js';

export function createVerifierHandlers(container: Container) {
  const health: Handler = pipeline(
    container.logging,
    container.errors
  )(async () => {
    const body: HealthResponse = {
      status: 'ok',
      verifiers: container.verificationService.verifierCount,
    };
    return json(body);
  });

  const list: Handler = pipeline(
    container.logging,
    container.errors
  )(async () => json(container.verificationService.listVerifiers()));

  const get: Handler = pipeline(
    container.logging,
    container.errors
  )(async (req) => json(container.verificationService.getVerifier(lastSegment(req))));

  return { health, list, get };
}
