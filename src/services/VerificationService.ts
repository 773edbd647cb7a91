/**
 * Runs named verifiers against submitted artifacts.
 */

import { decodeInputs } from '../artifacts/decode.js';
import { ValidationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { VerifierInfo, VerifiersListResponse, VerifyResponse } from '../types/api.js';
import { VerificationContext } from '../verification/VerificationContext.js';
import type { VerifierRegistry } from './VerifierRegistry.js';

export class VerificationService {
  constructor(
    private readonly registry: VerifierRegistry,
    private readonly logger: ILogProvider
  ) {}

  get verifierCount(): number {
    return this.registry.names.length;
  }

  listVerifiers(): VerifiersListResponse {
    const all = this.registry.list();
    return {
      core: all.filter((v) => v.category === 'core'),
      coherence: all.filter((v) => v.category === 'coherence'),
    };
  }

  getVerifier(name: string): VerifierInfo {
    return this.registry.describe(name);
  }

  /**
   * Decode the request, build the verifier's chain and run it once.
   * Caller faults (unknown verifier, bad config, malformed artifacts) throw;
   * everything found in the artifacts is reported as results.
   */
  async verify(name: string, request: Record<string, unknown>, requestId?: string): Promise<VerifyResponse> {
    const start = performance.now();

    const chain = this.registry.build(name, this.readConfig(request.config));
    const records = decodeInputs(request.inputs);
    const ctx = new VerificationContext({ records, sources: this.readSource(request.source) });

    await chain.process(ctx);

    const processingTimeMs = Math.round(performance.now() - start);
    this.logger.info('Verification completed', {
      verifier: name,
      isValid: ctx.isValid,
      results: ctx.results.length,
      durationMs: processingTimeMs,
      ...(requestId && { requestId }),
    });

    return {
      verifier: name,
      isValid: ctx.isValid,
      results: ctx.results,
      summary: ctx.summary(),
      executedChecks: ctx.executedChecks,
      processingTimeMs,
    };
  }

  private readConfig(value: unknown): Record<string, unknown> {
    if (value === undefined || value === null) return {};
    if (typeof value !== 'object' || Array.isArray(value)) {
      throw new ValidationError('config must be an object');
    }
    return Object.fromEntries(Object.entries(value));
  }

  private readSource(value: unknown): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') throw new ValidationError('source must be a string');
    return value;
  }
}
