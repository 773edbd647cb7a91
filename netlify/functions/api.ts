/**
 * Netlify Function entry point.
 * One function serves every /api/v1/* route through the router.
 */

import { randomUUID } from 'node:crypto';
import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

// Built once per cold start, reused by warm invocations
const container = getProductionContainer();
const router = createRouter(container);

export default async (req: Request, _context: Context) => {
  const response = await router.handle(req, { requestId: randomUUID() });
  await container.logProvider.flush();
  return response;
};

export const config = {
  path: '/api/v1/*',
};
