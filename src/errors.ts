/**
 * Application errors.
 * Each carries an API error code and HTTP status so the error handler
 * middleware can map it to a response without inspecting messages.
 *
 * Only faults of the caller are thrown as AppErrors. Problems found in the
 * artifacts under verification are recorded as check results instead.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly statusCode: number,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', 400, message, details);
  }
}

export class VerifierNotFoundError extends AppError {
  constructor(name: string, available: string[]) {
    super('VERIFIER_NOT_FOUND', 404, `Verifier "${name}" not found`, { available });
  }
}

/** Malformed verifier configuration: unknown options, bad values, illegal filter roles. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CONFIG', 422, message, details);
  }
}
