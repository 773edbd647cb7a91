import { describe, it, expect, beforeEach } from 'vitest';
import { createRouter } from '../../src/api/router.js';
import { MAX_INPUTS } from '../../src/api/verify.js';
import { createContainer } from '../../src/container.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { HandlerContext } from '../../src/middleware/pipeline.js';
import { MockTheoremProver } from '../mocks/MockTheoremProver.js';
import { mapInput, reconstructionInput } from '../fixtures/requests.js';

describe('API Router', () => {
  let handle: (req: Request, ctx: HandlerContext) => Promise<Response>;
  let logProvider: ConsoleLogProvider;

  const ctx: HandlerContext = { requestId: 'req-1' };

  function get(path: string, method = 'GET'): Request {
    return new Request(`http://localhost${path}`, { method });
  }

  function post(path: string, body: unknown): Request {
    return new Request(`http://localhost${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
  }

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    const container = createContainer({ logProvider, prover: new MockTheoremProver() });
    handle = createRouter(container).handle;
  });

  describe('catalog', () => {
    it('should report health with the verifier count', async () => {
      const res = await handle(get('/api/v1/health'), ctx);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', verifiers: 10 });
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('should list verifiers by category', async () => {
      const res = await handle(get('/api/v1/verifiers'), ctx);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.core.map((v: { name: string }) => v.name)).toEqual(['arganno', 'argmap', 'infreco', 'logreco']);
      expect(body.coherence).toHaveLength(6);
    });

    it('should describe a verifier by name', async () => {
      const res = await handle(get('/api/v1/verifiers/arganno_argmap/'), ctx);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ name: 'arganno_argmap', roles: ['arganno', 'argmap'] });
    });

    it('should 404 on unknown verifiers with the available names', async () => {
      const res = await handle(get('/api/v1/verifiers/outline'), ctx);
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body.error.code).toBe('VERIFIER_NOT_FOUND');
      expect(body.error.message).toBe('Verifier "outline" not found');
      expect(body.error.details.available).toContain('logreco');
    });
  });

  describe('POST /api/v1/verify/:name', () => {
    it('should run the verifier and return its results', async () => {
      const res = await handle(post('/api/v1/verify/logreco', { inputs: [reconstructionInput()] }), ctx);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.verifier).toBe('logreco');
      expect(body.isValid).toBe(true);
      expect(body.summary['logreco.global-validity']).toEqual({ isValid: true, message: null });
      expect(body.results[0]).toEqual({
        checkId: 'logreco.has-artifact',
        artifactRefs: ['reco'],
        isValid: true,
        message: null,
        details: {},
      });
    });

    it('should serialize cached formalizations as formula text', async () => {
      const res = await handle(post('/api/v1/verify/logreco', { inputs: [reconstructionInput()] }), ctx);
      const body = await res.json();

      const flawed = body.results.find((r: { checkId: string }) => r.checkId === 'logreco.flawed-formalization');
      expect(flawed.details.formalizations).toEqual({
        expressions: { 'Animals suffer': 'p', 'Suffering matters': '(p -> q)', 'Less meat': 'q' },
        declarations: { p: 'Animals suffer.', q: 'We should eat less meat.' },
      });
    });

    it('should run coherence verifiers over several inputs', async () => {
      const res = await handle(
        post('/api/v1/verify/argmap_logreco', { inputs: [mapInput(), reconstructionInput()], config: { N: 1 } }),
        ctx
      );
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.summary['argmap_infreco.elements']).toEqual({ isValid: true, message: null });
      expect(body.summary['argmap_logreco.relations']).toEqual({
        isValid: false,
        message:
          "Dialectical support relation from node 'Suffering' to node 'Less meat' in the map is not matched by any relation in the reconstruction.",
      });
    });

    it('should reject bodies that are not valid JSON', async () => {
      const res = await handle(post('/api/v1/verify/argmap', '{inputs:'), ctx);

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe('Request body must be valid JSON');
    });

    it('should require inputs and cap their number', async () => {
      const missing = await handle(post('/api/v1/verify/argmap', { source: 'text' }), ctx);
      expect(missing.status).toBe(400);
      expect((await missing.json()).error.message).toBe('inputs is required');

      const inputs = Array.from({ length: MAX_INPUTS + 1 }, (_, i) => mapInput(`map-${i}`));
      const tooMany = await handle(post('/api/v1/verify/argmap', { inputs }), ctx);
      expect(tooMany.status).toBe(400);
      expect((await tooMany.json()).error.message).toBe('inputs must have at most 50 items');
    });

    it('should reject malformed artifacts with their path', async () => {
      const res = await handle(
        post('/api/v1/verify/argmap', { inputs: [{ kind: 'argument-graph', data: { propositions: [{}] } }] }),
        ctx
      );

      expect(res.status).toBe(400);
      expect((await res.json()).error).toEqual({
        code: 'INVALID_REQUEST',
        message: 'inputs[0].data.propositions[0].label must be a string',
      });
    });

    it('should answer configuration errors with 422', async () => {
      const res = await handle(post('/api/v1/verify/argmap', { inputs: [], config: { fromKey: 'from' } }), ctx);

      expect(res.status).toBe(422);
      expect((await res.json()).error).toEqual({
        code: 'INVALID_CONFIG',
        message: 'Unknown option "fromKey" for verifier "argmap"',
        details: { allowed: ['filters'] },
      });
    });
  });

  describe('routing', () => {
    it('should answer CORS preflight', async () => {
      const res = await handle(get('/api/v1/verify/logreco', 'OPTIONS'), ctx);

      expect(res.status).toBe(204);
      expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, OPTIONS');
    });

    it('should 405 with the allowed methods', async () => {
      const res = await handle(get('/api/v1/verify/logreco'), ctx);

      expect(res.status).toBe(405);
      expect(res.headers.get('Allow')).toBe('POST');
      expect((await res.json()).error.message).toBe('Method GET not allowed on /api/v1/verify/logreco');
    });

    it('should 404 unknown paths', async () => {
      const res = await handle(get('/api/v1/outlines'), ctx);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: 'NOT_FOUND', message: 'No route matches GET /api/v1/outlines' },
      });
    });

    it('should log each request with its id', async () => {
      await handle(get('/api/v1/health'), ctx);

      expect(logProvider.events.find((e) => 'path' in e)).toMatchObject({
        method: 'GET',
        path: '/api/v1/health',
        status: 200,
        requestId: 'req-1',
      });
    });
  });
});
