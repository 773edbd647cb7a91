/**
 * Constructors for check outcomes.
 */

import type { CheckOutcome, CheckResult } from '../types/verification.js';

export function pass(details?: Record<string, unknown>): CheckOutcome {
  return details ? { status: 'pass', details } : { status: 'pass' };
}

export function fail(message: string, details?: Record<string, unknown>): CheckOutcome {
  return details ? { status: 'fail', message, details } : { status: 'fail', message };
}

export function notApplicable(): CheckOutcome {
  return { status: 'not-applicable' };
}

/** Fail with the joined messages, or pass when there are none. */
export function fromMessages(messages: string[], separator = ' '): CheckOutcome {
  return messages.length > 0 ? fail(messages.join(separator)) : pass();
}

/** Turn an outcome into a result; not-applicable outcomes record nothing. */
export function toResult(
  checkId: string,
  artifactRefs: string[],
  outcome: CheckOutcome
): CheckResult | null {
  switch (outcome.status) {
    case 'not-applicable':
      return null;
    case 'pass':
      return { checkId, artifactRefs, isValid: true, message: null, details: outcome.details ?? {} };
    case 'fail':
      return {
        checkId,
        artifactRefs,
        isValid: false,
        message: outcome.message,
        details: outcome.details ?? {},
      };
  }
}
