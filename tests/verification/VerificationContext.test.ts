import { describe, it, expect, beforeEach } from 'vitest';
import { VerificationContext } from '../../src/verification/VerificationContext.js';
import type { CheckResult } from '../../src/types/verification.js';

function result(checkId: string, isValid: boolean, refs: string[] = [], message: string | null = null): CheckResult {
  return { checkId, artifactRefs: refs, isValid, message, details: {} };
}

describe('VerificationContext', () => {
  let ctx: VerificationContext;

  beforeEach(() => {
    ctx = new VerificationContext({ records: [] });
  });

  it('should be valid while no result fails', () => {
    expect(ctx.isValid).toBe(true);
    ctx.addResult(result('a', true));
    expect(ctx.isValid).toBe(true);
    ctx.addResult(result('b', false, [], 'broken'));
    expect(ctx.isValid).toBe(false);
  });

  it('should join several sources and treat blank ones as absent', () => {
    expect(new VerificationContext({ records: [], sources: ['First.', 'Second.'] }).source).toBe('First.\n\nSecond.');
    expect(new VerificationContext({ records: [], sources: 'Only.' }).sources).toEqual(['Only.']);
    expect(new VerificationContext({ records: [], sources: '  ' }).source).toBeNull();
    expect(ctx.source).toBeNull();
  });

  it('should find the latest result for a check and record', () => {
    const first = result('logreco.flawed-formalization', true, ['r1']);
    const second = result('logreco.flawed-formalization', false, ['r2'], 'bad');
    ctx.addResult(first);
    ctx.addResult(second);

    expect(ctx.latestResult('logreco.flawed-formalization')).toBe(second);
    expect(ctx.latestResult('logreco.flawed-formalization', 'r1')).toBe(first);
    expect(ctx.latestResult('logreco.flawed-formalization', 'r3')).toBeUndefined();
    expect(ctx.latestResult('other')).toBeUndefined();
  });

  it('should merge repeated check ids in the summary', () => {
    ctx.addResult(result('infreco.malformed-argument', true));
    ctx.addResult(result('infreco.malformed-argument', false, [], 'first problem'));
    ctx.addResult(result('infreco.malformed-argument', false, [], 'second problem'));
    ctx.addResult(result('infreco.missing-label-gist', true));

    expect(ctx.summary()).toEqual({
      'infreco.malformed-argument': { isValid: false, message: 'first problem\nsecond problem' },
      'infreco.missing-label-gist': { isValid: true, message: null },
    });
  });
});
