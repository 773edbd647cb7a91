/**
 * Fails a run that carries no artifact for a role.
 */

import { Handler } from './Handler.js';
import type { RecordHandlerOptions } from './RecordHandler.js';
import type { ArtifactRole } from '../types/verification.js';
import type { VerificationContext } from '../verification/VerificationContext.js';

const ROLE_NAMES: Record<ArtifactRole, string> = {
  arganno: 'annotated source text',
  argmap: 'argument map',
  infreco: 'informal argument reconstruction',
  logreco: 'logical argument reconstruction',
};

export class RequireArtifactHandler extends Handler {
  private readonly filter: RecordHandlerOptions['filter'];

  constructor(
    private readonly role: ArtifactRole,
    opts: RecordHandlerOptions
  ) {
    super(`${role}.has-artifact`, opts);
    this.filter = opts.filter;
  }

  protected async handle(ctx: VerificationContext): Promise<void> {
    const matches = ctx.records.filter((r) => r.parsedData !== null && this.filter(r));
    ctx.addResult({
      checkId: this.name,
      artifactRefs: matches.map((r) => r.id),
      isValid: matches.length > 0,
      message: matches.length > 0 ? null : `No ${ROLE_NAMES[this.role]} found.`,
      details: {},
    });
  }
}
