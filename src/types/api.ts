/**
 * API types — shapes for request/response payloads.
 * Decoupled from the verification types so the API can evolve independently.
 */

import type { ArtifactKind, ArtifactRole, CheckResult, ResultSummary } from './verification.js';

// ── Requests ──

/** One parsed artifact as submitted by a client. */
export interface ArtifactInput {
  id?: string;
  kind: ArtifactKind;
  /** Argument graph or annotation tree JSON; decoded before verification. */
  data: unknown;
  snippet?: string;
  metadata?: Record<string, string>;
}

export interface VerifyRequest {
  inputs: ArtifactInput[];
  source?: string;
  config?: Record<string, unknown>;
}

// ── Responses ──

export interface VerifyResponse {
  verifier: string;
  isValid: boolean;
  results: CheckResult[];
  summary: ResultSummary;
  executedChecks: string[];
  processingTimeMs: number;
}

export type VerifierOptionType = 'string' | 'integer' | 'string-list' | 'role-filters';

export interface VerifierOptionInfo {
  name: string;
  type: VerifierOptionType;
  default: string | number | null;
  description: string;
}

export type VerifierCategory = 'core' | 'coherence';

export interface VerifierInfo {
  name: string;
  description: string;
  category: VerifierCategory;
  roles: ArtifactRole[];
  options: VerifierOptionInfo[];
}

export interface VerifiersListResponse {
  core: VerifierInfo[];
  coherence: VerifierInfo[];
}

export interface HealthResponse {
  status: 'ok';
  verifiers: number;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'VERIFIER_NOT_FOUND'
  | 'INVALID_CONFIG'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
