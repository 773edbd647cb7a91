/**
 * Artifact decoding.
 * Turns request JSON into artifact records. Malformed input is a fault of
 * the caller and raises a ValidationError naming the offending path.
 */

import { ValidationError } from '../errors.js';
import type {
  AnnotationNode,
  Argument,
  ArgumentGraph,
  DialecticalRelation,
  DialecticalType,
  PcsItem,
  Proposition,
  Valence,
} from '../types/models.js';
import type { ArtifactRecord } from '../types/verification.js';

const VALENCES: readonly Valence[] = ['support', 'attack', 'contradict'];
const DIALECTICS: readonly DialecticalType[] = ['grounded', 'sketched', 'axiomatic'];
const MAX_TREE_DEPTH = 64;

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function object(value: unknown, path: string): Json {
  if (!isRecord(value)) throw new ValidationError(`${path} must be an object`);
  return value;
}

function array(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new ValidationError(`${path} must be an array`);
  return value;
}

function optionalArray(value: unknown, path: string): unknown[] {
  return value === undefined ? [] : array(value, path);
}

function string(value: unknown, path: string): string {
  if (typeof value !== 'string') throw new ValidationError(`${path} must be a string`);
  return value;
}

function optionalObject(value: unknown, path: string): Json {
  return value === undefined || value === null ? {} : object(value, path);
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], path: string): T {
  const found = allowed.find((a) => a === value);
  if (found === undefined) throw new ValidationError(`${path} must be one of: ${allowed.join(', ')}`);
  return found;
}

function stringMap(value: unknown, path: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(optionalObject(value, path))) {
    out[key] = string(entry, `${path}.${key}`);
  }
  return out;
}

export function decodeArgumentGraph(value: unknown, path = 'data'): ArgumentGraph {
  const raw = object(value, path);

  const args = optionalArray(raw.arguments, `${path}.arguments`).map((entry, i): Argument => {
    const at = `${path}.arguments[${i}]`;
    const arg = object(entry, at);
    return {
      label: arg.label === undefined || arg.label === null ? null : string(arg.label, `${at}.label`),
      gists: optionalArray(arg.gists, `${at}.gists`).map((g, j) => string(g, `${at}.gists[${j}]`)),
      pcs: optionalArray(arg.pcs, `${at}.pcs`).map((item, j) => decodePcsItem(item, `${at}.pcs[${j}]`)),
      data: optionalObject(arg.data, `${at}.data`),
    };
  });

  const propositions = optionalArray(raw.propositions, `${path}.propositions`).map(
    (entry, i): Proposition => {
      const at = `${path}.propositions[${i}]`;
      const prop = object(entry, at);
      return {
        label: string(prop.label, `${at}.label`),
        texts: optionalArray(prop.texts, `${at}.texts`).map((t, j) => string(t, `${at}.texts[${j}]`)),
        data: optionalObject(prop.data, `${at}.data`),
      };
    }
  );

  const relations = optionalArray(raw.relations, `${path}.relations`).map(
    (entry, i): DialecticalRelation => {
      const at = `${path}.relations[${i}]`;
      const rel = object(entry, at);
      return {
        source: string(rel.source, `${at}.source`),
        target: string(rel.target, `${at}.target`),
        valence: oneOf(rel.valence, VALENCES, `${at}.valence`),
        dialectics: optionalArray(rel.dialectics, `${at}.dialectics`).map((d, j) =>
          oneOf(d, DIALECTICS, `${at}.dialectics[${j}]`)
        ),
      };
    }
  );

  return { arguments: args, propositions, relations };
}

function decodePcsItem(value: unknown, path: string): PcsItem {
  const item = object(value, path);
  const kind = oneOf(item.kind, ['premise', 'conclusion'] as const, `${path}.kind`);
  const label = string(item.label, `${path}.label`);
  const propositionLabel = string(item.propositionLabel, `${path}.propositionLabel`);
  if (kind === 'premise') return { kind, label, propositionLabel };
  return {
    kind,
    label,
    propositionLabel,
    inferenceData: optionalObject(item.inferenceData, `${path}.inferenceData`),
  };
}

export function decodeAnnotationTree(value: unknown, path = 'data'): { nodes: AnnotationNode[] } {
  const raw = object(value, path);
  return { nodes: decodeNodes(raw.nodes, `${path}.nodes`, 0) };
}

function decodeNodes(value: unknown, path: string, depth: number): AnnotationNode[] {
  if (depth > MAX_TREE_DEPTH) throw new ValidationError(`${path} is nested too deeply`);
  return optionalArray(value, path).map((entry, i): AnnotationNode => {
    const at = `${path}[${i}]`;
    if (typeof entry === 'string') return entry;
    const element = object(entry, at);
    return {
      tag: string(element.tag, `${at}.tag`),
      attributes: stringMap(element.attributes, `${at}.attributes`),
      children: decodeNodes(element.children, `${at}.children`, depth + 1),
    };
  });
}

/** Decode request inputs into records, ids defaulting to their position. */
export function decodeInputs(value: unknown): ArtifactRecord[] {
  const seen = new Set<string>();

  return array(value, 'inputs').map((entry, i): ArtifactRecord => {
    const at = `inputs[${i}]`;
    const input = object(entry, at);
    const id = input.id === undefined ? `input-${i + 1}` : string(input.id, `${at}.id`);
    if (seen.has(id)) throw new ValidationError(`${at}.id "${id}" is used more than once`);
    seen.add(id);

    const base = {
      id,
      rawSnippet: input.snippet === undefined ? '' : string(input.snippet, `${at}.snippet`),
      frontMatter: stringMap(input.metadata, `${at}.metadata`),
    };
    const kind = oneOf(input.kind, ['argument-graph', 'annotation-tree'] as const, `${at}.kind`);
    return kind === 'argument-graph'
      ? { ...base, kind, parsedData: decodeArgumentGraph(input.data, `${at}.data`) }
      : { ...base, kind, parsedData: decodeAnnotationTree(input.data, `${at}.data`) };
  });
}
