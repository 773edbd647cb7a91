/**
 * Runs an ordered list of handlers against the same context.
 */

import { Handler, type HandlerOptions } from './Handler.js';
import type { VerificationContext } from '../verification/VerificationContext.js';

export class CompositeHandler extends Handler {
  constructor(
    name: string,
    readonly children: readonly Handler[],
    opts?: HandlerOptions
  ) {
    super(name, opts);
  }

  protected async handle(ctx: VerificationContext): Promise<void> {
    for (const child of this.children) {
      await child.process(ctx);
      if (!ctx.continueProcessing) break;
    }
  }
}
