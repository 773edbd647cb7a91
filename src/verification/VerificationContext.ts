/**
 * Verification context.
 * Created once per run, threaded through the handler chain and mutated in
 * place. Results are only ever appended.
 */

import type { ArtifactRecord, CheckResult, ResultSummary } from '../types/verification.js';

export class VerificationContext {
  readonly sources: string[];
  readonly records: ArtifactRecord[];
  readonly results: CheckResult[] = [];
  /** Side cache shared between handlers of one run, e.g. parsed formalizations. */
  readonly artifacts = new Map<string, unknown>();
  readonly executedChecks: string[] = [];
  continueProcessing = true;

  constructor(opts: { records: ArtifactRecord[]; sources?: string | string[] }) {
    this.records = opts.records;
    const sources = opts.sources ?? [];
    this.sources = typeof sources === 'string' ? [sources] : sources;
  }

  /** All sources as one text, or null when the caller supplied none. */
  get source(): string | null {
    const text = this.sources.join('\n\n');
    return text.trim() ? text : null;
  }

  addResult(result: CheckResult): void {
    this.results.push(result);
  }

  get isValid(): boolean {
    return this.results.every((r) => r.isValid);
  }

  /** The most recent result for a check, optionally restricted to one record. */
  latestResult(checkId: string, recordId?: string): CheckResult | undefined {
    for (let i = this.results.length - 1; i >= 0; i--) {
      const result = this.results[i];
      if (result.checkId !== checkId) continue;
      if (recordId === undefined || result.artifactRefs.includes(recordId)) return result;
    }
    return undefined;
  }

  /** Check id to verdict. Repeated ids are merged: valid only if all are. */
  summary(): ResultSummary {
    const summary: ResultSummary = {};
    for (const result of this.results) {
      const seen = summary[result.checkId];
      if (!seen) {
        summary[result.checkId] = { isValid: result.isValid, message: result.message };
        continue;
      }
      const messages = [seen.message, result.message].filter((m): m is string => m !== null);
      summary[result.checkId] = {
        isValid: seen.isValid && result.isValid,
        message: messages.length > 0 ? messages.join('\n') : null,
      };
    }
    return summary;
  }
}
