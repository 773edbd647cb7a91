/**
 * Verification types — records under check, check results and outcomes.
 */

import type { AnnotationTree, ArgumentGraph } from './models.js';

export type ArtifactKind = 'argument-graph' | 'annotation-tree';

interface ArtifactRecordBase {
  /** Unique within one verification run. */
  id: string;
  /** The snippet the record was parsed from, if the caller kept it. */
  rawSnippet: string;
  /** Snippet metadata, e.g. `{ filename: 'map.ad' }`. */
  frontMatter: Record<string, string>;
}

export interface GraphRecord extends ArtifactRecordBase {
  kind: 'argument-graph';
  parsedData: ArgumentGraph | null;
}

export interface AnnotationRecord extends ArtifactRecordBase {
  kind: 'annotation-tree';
  parsedData: AnnotationTree | null;
}

export type ArtifactRecord = GraphRecord | AnnotationRecord;

export interface CheckResult {
  checkId: string;
  /** Ids of the records this result judges. */
  artifactRefs: string[];
  isValid: boolean;
  /** Null iff valid. */
  message: string | null;
  /** Intermediate artifacts (parsed formulas, solver programs) for later checks. */
  details: Record<string, unknown>;
}

/** Outcome of a single rule or check before it becomes a CheckResult. */
export type CheckOutcome =
  | { status: 'pass'; details?: Record<string, unknown> }
  | { status: 'fail'; message: string; details?: Record<string, unknown> }
  | { status: 'not-applicable' };

export type ArtifactFilter = (record: ArtifactRecord) => boolean;

export type ArtifactRole = 'arganno' | 'argmap' | 'infreco' | 'logreco';

/** Matches a front matter entry, literally or as a regex anchored at the start. */
export interface FilterCriterion {
  key: string;
  value: string;
  regex?: boolean;
}

/** Result schema: check id to verdict. */
export type ResultSummary = Record<string, { isValid: boolean; message: string | null }>;
