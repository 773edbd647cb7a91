/**
 * Evaluates a dimension table against each selected argument graph.
 * One result per dimension and record, with id `<prefix>.<dimension>`.
 * Formalizations parsed along the way are shared with later handlers
 * through the context's side cache.
 */

import { GraphHandler, type RecordHandlerOptions } from '../handlers/RecordHandler.js';
import { formalizationArtifactKey, readFormalizationCache } from '../logic/formalizations.js';
import type { ArgumentGraph } from '../types/models.js';
import type { CheckOutcome, CheckResult, GraphRecord } from '../types/verification.js';
import type { VerificationContext } from '../verification/VerificationContext.js';
import { RULES, type Rule, type RuleSettings } from './argument-rules.js';
import type { Dimension, DimensionTable } from './dimensions.js';

export interface DimensionHandlerOptions extends RecordHandlerOptions {
  table: DimensionTable;
  settings: RuleSettings;
}

export class DimensionHandler extends GraphHandler {
  private readonly table: DimensionTable;
  private readonly settings: RuleSettings;

  constructor(
    private readonly prefix: string,
    opts: DimensionHandlerOptions
  ) {
    super(`${prefix}.dimensions`, opts);
    this.table = opts.table;
    this.settings = opts.settings;
  }

  protected evaluate(record: GraphRecord, graph: ArgumentGraph, ctx: VerificationContext): CheckResult[] {
    const results = this.table
      .map((dimension) => this.evaluateDimension(record, graph, dimension))
      .filter((result): result is CheckResult => result !== null);

    for (const result of results) {
      const cache = readFormalizationCache(result.details);
      if (cache) ctx.artifacts.set(formalizationArtifactKey(record.id), cache);
    }
    return results;
  }

  private evaluateDimension(
    record: GraphRecord,
    graph: ArgumentGraph,
    dimension: Dimension
  ): CheckResult | null {
    const outcomes = dimension.rules.flatMap((id) => runRule(RULES[id], graph, this.settings));
    if (outcomes.every((o) => o.status === 'not-applicable')) return null;

    const messages: string[] = [];
    const details: Record<string, unknown> = {};
    for (const outcome of outcomes) {
      if (outcome.status === 'not-applicable') continue;
      if (outcome.status === 'fail') messages.push(outcome.message);
      Object.assign(details, outcome.details);
    }

    return {
      checkId: `${this.prefix}.${dimension.id}`,
      artifactRefs: [record.id],
      isValid: messages.length === 0,
      message: messages.length > 0 ? messages.join(' ') : null,
      details,
    };
  }
}

function runRule(rule: Rule, graph: ArgumentGraph, settings: RuleSettings): CheckOutcome[] {
  if (rule.scope === 'snippet') return [rule.check(graph, settings)];
  return graph.arguments.map((argument, index) => rule.check(argument, settings, index));
}
