/**
 * Chain of responsibility over a verification context.
 *
 * `process` records the handler in the audit trail, runs `handle`, then
 * passes the context on. A fault inside `handle` becomes a failing result
 * tagged with the handler's name; it never escapes the chain.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { VerificationContext } from '../verification/VerificationContext.js';

export interface HandlerOptions {
  logger?: ILogProvider;
}

export abstract class Handler {
  private next: Handler | null = null;
  protected readonly logger: ILogProvider | null;

  constructor(
    readonly name: string,
    opts?: HandlerOptions
  ) {
    this.logger = opts?.logger ?? null;
  }

  /** Link the next handler; returns it so links can be chained. */
  setNext(handler: Handler): Handler {
    this.next = handler;
    return handler;
  }

  async process(ctx: VerificationContext): Promise<VerificationContext> {
    if (!ctx.continueProcessing) return ctx;

    ctx.executedChecks.push(this.name);
    try {
      await this.handle(ctx);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger?.error('Handler failed', { handler: this.name, error: message });
      ctx.addResult({
        checkId: this.name,
        artifactRefs: [],
        isValid: false,
        message: `Processing error: ${message}`,
        details: {},
      });
    }

    if (this.next && ctx.continueProcessing) {
      await this.next.process(ctx);
    }
    return ctx;
  }

  protected abstract handle(ctx: VerificationContext): Promise<void>;
}
