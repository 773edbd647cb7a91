/**
 * Handlers that judge one artifact record at a time.
 * Records are picked by the handler's filter; unparsed records are skipped.
 */

import { Handler, type HandlerOptions } from './Handler.js';
import type { MaybePromise } from '../types/common.js';
import type { AnnotationTree, ArgumentGraph } from '../types/models.js';
import type {
  AnnotationRecord,
  ArtifactFilter,
  CheckResult,
  GraphRecord,
} from '../types/verification.js';
import type { VerificationContext } from '../verification/VerificationContext.js';

export interface RecordHandlerOptions extends HandlerOptions {
  filter: ArtifactFilter;
}

export abstract class GraphHandler extends Handler {
  protected readonly filter: ArtifactFilter;

  constructor(name: string, opts: RecordHandlerOptions) {
    super(name, opts);
    this.filter = opts.filter;
  }

  protected async handle(ctx: VerificationContext): Promise<void> {
    for (const record of ctx.records) {
      if (record.kind !== 'argument-graph' || !record.parsedData || !this.filter(record)) continue;
      const results = await this.evaluate(record, record.parsedData, ctx);
      results.forEach((result) => ctx.addResult(result));
    }
  }

  protected abstract evaluate(
    record: GraphRecord,
    graph: ArgumentGraph,
    ctx: VerificationContext
  ): MaybePromise<CheckResult[]>;
}

export abstract class AnnotationHandler extends Handler {
  protected readonly filter: ArtifactFilter;

  constructor(name: string, opts: RecordHandlerOptions) {
    super(name, opts);
    this.filter = opts.filter;
  }

  protected async handle(ctx: VerificationContext): Promise<void> {
    for (const record of ctx.records) {
      if (record.kind !== 'annotation-tree' || !record.parsedData || !this.filter(record)) continue;
      const results = await this.evaluate(record, record.parsedData, ctx);
      results.forEach((result) => ctx.addResult(result));
    }
  }

  protected abstract evaluate(
    record: AnnotationRecord,
    tree: AnnotationTree,
    ctx: VerificationContext
  ): MaybePromise<CheckResult[]>;
}
