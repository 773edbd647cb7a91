/**
 * Artifact filters.
 * A role fixes the artifact kind; criteria narrow it by front matter.
 */

import { ConfigurationError } from '../errors.js';
import type {
  ArtifactFilter,
  ArtifactKind,
  ArtifactRole,
  FilterCriterion,
} from '../types/verification.js';

export const ARTIFACT_ROLES: readonly ArtifactRole[] = ['arganno', 'argmap', 'infreco', 'logreco'];

export const ROLE_KINDS: Readonly<Record<ArtifactRole, ArtifactKind>> = Object.freeze({
  arganno: 'annotation-tree',
  argmap: 'argument-graph',
  infreco: 'argument-graph',
  logreco: 'argument-graph',
});

/** Filters used by coherence verifiers to tell maps from reconstructions. */
export const DEFAULT_COHERENCE_CRITERIA: Readonly<Record<ArtifactRole, readonly FilterCriterion[]>> =
  Object.freeze({
    arganno: [],
    argmap: [{ key: 'filename', value: 'map', regex: true }],
    infreco: [{ key: 'filename', value: 'reconstructions', regex: true }],
    logreco: [{ key: 'filename', value: 'reconstructions', regex: true }],
  });

export function isArtifactRole(value: string): value is ArtifactRole {
  return ARTIFACT_ROLES.some((role) => role === value);
}

export function roleFilter(role: ArtifactRole, criteria: readonly FilterCriterion[] = []): ArtifactFilter {
  const kind = ROLE_KINDS[role];
  const matchers = criteria.map(compileCriterion);
  return (record) => record.kind === kind && matchers.every((matches) => matches(record.frontMatter));
}

function compileCriterion(criterion: FilterCriterion): (frontMatter: Record<string, string>) => boolean {
  if (!criterion.regex) {
    return (frontMatter) => frontMatter[criterion.key] === criterion.value;
  }

  let pattern: RegExp;
  try {
    pattern = new RegExp(`^(?:${criterion.value})`);
  } catch (err) {
    throw new ConfigurationError(`Invalid filter pattern for "${criterion.key}": ${criterion.value}`, {
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return (frontMatter) => {
    const value = frontMatter[criterion.key];
    return value !== undefined && pattern.test(value);
  };
}
