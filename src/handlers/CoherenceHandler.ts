/**
 * Handlers that compare two artifacts.
 *
 * Each side is chosen by its own filter; only the last record matching a
 * filter counts, so at most one pair is compared per run.
 */

import { Handler, type HandlerOptions } from './Handler.js';
import type { AnnotationTree, ArgumentGraph } from '../types/models.js';
import type { ArtifactFilter, ArtifactRecord } from '../types/verification.js';
import type { VerificationContext } from '../verification/VerificationContext.js';

export interface CoherenceHandlerOptions extends HandlerOptions {
  /** First and second side, in the order `compare` receives them. */
  filters: [ArtifactFilter, ArtifactFilter];
}

/** Extracts the parsed artifact a comparator works on, or null. */
export type Narrow<T> = (record: ArtifactRecord) => T | null;

export const asGraph: Narrow<ArgumentGraph> = (record) =>
  record.kind === 'argument-graph' ? record.parsedData : null;

export const asAnnotation: Narrow<AnnotationTree> = (record) =>
  record.kind === 'annotation-tree' ? record.parsedData : null;

export abstract class CoherenceHandler<A, B> extends Handler {
  private readonly filters: [ArtifactFilter, ArtifactFilter];

  constructor(
    name: string,
    private readonly narrow: [Narrow<A>, Narrow<B>],
    opts: CoherenceHandlerOptions
  ) {
    super(name, opts);
    this.filters = opts.filters;
  }

  protected async handle(ctx: VerificationContext): Promise<void> {
    const first = lastMatch(ctx.records, this.filters[0]);
    const second = lastMatch(ctx.records, this.filters[1]);
    if (!first || !second || first.id === second.id) return;

    const a = this.narrow[0](first);
    const b = this.narrow[1](second);
    if (a === null || b === null) return;

    const messages = this.compare(a, b);
    ctx.addResult({
      checkId: this.name,
      artifactRefs: [first.id, second.id],
      isValid: messages.length === 0,
      message: messages.length > 0 ? messages.join(' - ') : null,
      details: {},
    });
  }

  /** One message per incoherence found. */
  protected abstract compare(first: A, second: B): string[];
}

function lastMatch(records: ArtifactRecord[], filter: ArtifactFilter): ArtifactRecord | undefined {
  for (let i = records.length - 1; i >= 0; i--) {
    if (filter(records[i])) return records[i];
  }
  return undefined;
}
