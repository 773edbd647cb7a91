/**
 * Verification endpoint.
 * POST /api/v1/verify/:name — Run a verifier over submitted artifacts
 */

import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { json, lastSegment, requireBody } from './http.js';

export const MAX_INPUTS = 50;

const verifySchema: BodySchema = {
  inputs: { type: 'array', required: true, maxItems: MAX_INPUTS },
  source: { type: 'string', required: false },
  config: { type: 'object', required: false },
};

export function createVerifyHandlers(container: Container) {
  const verify: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody(verifySchema)
  )(async (req, ctx) => {
    const result = await container.verificationService.verify(lastSegment(req), requireBody(ctx), ctx.requestId);
    return json(result);
  });

  return { verify };
}
