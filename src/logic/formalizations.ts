/**
 * Formalization extraction.
 *
 * Reads formula strings and symbol declarations from the inline data of the
 * propositions an argument graph's arguments use, parses them, and reports
 * every way they fall short of a usable formalization.
 */

import type { ArgumentGraph, Proposition } from '../types/models.js';
import {
  collectSymbols,
  formatFormula,
  mergeSymbols,
  symbolNames,
  type Formula,
  type FormulaSymbols,
} from './formula.js';
import { parseFormula } from './parser.js';

export const FORMALIZATION_CACHE_KEY = 'formalizations';

export interface FormalizationKeys {
  formalizationKey: string;
  declarationsKey: string;
}

/** Parsed expressions keyed by proposition label, plus all symbol declarations. */
export class FormalizationCache {
  constructor(
    readonly expressions: ReadonlyMap<string, Formula>,
    readonly declarations: ReadonlyMap<string, string>
  ) {}

  get isEmpty(): boolean {
    return this.expressions.size === 0;
  }

  toJSON(): { expressions: Record<string, string>; declarations: Record<string, string> } {
    return {
      expressions: Object.fromEntries(
        [...this.expressions].map(([label, formula]) => [label, formatFormula(formula)])
      ),
      declarations: Object.fromEntries(this.declarations),
    };
  }
}

export interface FormalizationReport {
  cache: FormalizationCache;
  problems: string[];
}

export function readFormalizationCache(details: Record<string, unknown>): FormalizationCache | null {
  const value = details[FORMALIZATION_CACHE_KEY];
  return value instanceof FormalizationCache ? value : null;
}

/** Key of a record's formalizations in the run's side cache. */
export function formalizationArtifactKey(recordId: string): string {
  return `${FORMALIZATION_CACHE_KEY}:${recordId}`;
}

export function sharedFormalizations(
  artifacts: ReadonlyMap<string, unknown>,
  recordId: string
): FormalizationCache | null {
  const value = artifacts.get(formalizationArtifactKey(recordId));
  return value instanceof FormalizationCache ? value : null;
}

export function extractFormalizations(
  graph: ArgumentGraph,
  keys: FormalizationKeys
): FormalizationReport {
  const problems: string[] = [];
  const expressions = new Map<string, Formula>();
  const declarations = new Map<string, string>();
  /** Symbol to the item label it was declared with. */
  const declaredAt = new Map<string, string>();
  /** Proposition label to the item label used in messages. */
  const itemLabels = new Map<string, string>();
  const seen = new Set<string>();

  for (const argument of graph.arguments) {
    for (const item of argument.pcs) {
      if (seen.has(item.propositionLabel)) continue;
      seen.add(item.propositionLabel);
      itemLabels.set(item.propositionLabel, item.label);

      const proposition = graph.propositions.find((p) => p.label === item.propositionLabel);
      if (!proposition) {
        problems.push(`Item (${item.label}) refers to an unknown proposition '${item.propositionLabel}'.`);
        continue;
      }
      if (Object.keys(proposition.data).length === 0) {
        problems.push(`Proposition (${item.label}) lacks inline data with formalization info.`);
        continue;
      }

      readDeclarations(proposition, item.label, keys.declarationsKey, declarations, declaredAt, problems);

      const text = proposition.data[keys.formalizationKey];
      if (text === undefined || text === null) {
        problems.push(`Inline data of proposition (${item.label}) lacks a '${keys.formalizationKey}' entry.`);
        continue;
      }
      if (typeof text !== 'string') {
        problems.push(`'${keys.formalizationKey}' of proposition (${item.label}) is not a string.`);
        continue;
      }

      const parsed = parseFormula(text);
      if (!parsed.ok) {
        problems.push(
          `Formalization '${text}' of proposition (${item.label}) is not a well-formed first-order formula: ${parsed.error}.`
        );
        continue;
      }
      expressions.set(proposition.label, parsed.formula);
    }
  }

  const symbolsByProposition = new Map<string, FormulaSymbols>(
    [...expressions].map(([label, formula]) => [label, collectSymbols(formula)])
  );
  const used = mergeSymbols([...symbolsByProposition.values()]);
  const usedNames = symbolNames(used);

  for (const [symbol, itemLabel] of declaredAt) {
    if (!usedNames.has(symbol)) {
      problems.push(
        `Symbol '${symbol}' declared with proposition (${itemLabel}) is not used in any formalization.`
      );
    }
  }

  const reported = new Set<string>();
  for (const [label, symbols] of symbolsByProposition) {
    for (const symbol of symbolNames(symbols)) {
      if (declarations.has(symbol) || reported.has(symbol)) continue;
      reported.add(symbol);
      problems.push(
        `Symbol '${symbol}' in formalization of proposition (${itemLabels.get(label) ?? label}) is not declared anywhere.`
      );
    }
  }

  problems.push(...symbolConflicts(used));

  return { cache: new FormalizationCache(expressions, declarations), problems };
}

function readDeclarations(
  proposition: Proposition,
  itemLabel: string,
  declarationsKey: string,
  declarations: Map<string, string>,
  declaredAt: Map<string, string>,
  problems: string[]
): void {
  const raw = proposition.data[declarationsKey];
  if (raw === undefined || raw === null) return;

  if (typeof raw !== 'object' || Array.isArray(raw)) {
    problems.push(`'${declarationsKey}' of proposition (${itemLabel}) is not a map.`);
    return;
  }

  for (const [symbol, meaning] of Object.entries(raw)) {
    if (declarations.has(symbol)) {
      problems.push(
        `Duplicate declaration: symbol '${symbol}' in proposition (${itemLabel}) has been declared before.`
      );
      continue;
    }
    declarations.set(symbol, typeof meaning === 'string' ? meaning : JSON.stringify(meaning));
    declaredAt.set(symbol, itemLabel);
  }
}

function symbolConflicts(symbols: FormulaSymbols): string[] {
  const problems: string[] = [];

  for (const [name, arities] of symbols.predicates) {
    if (arities.size > 1) {
      const list = [...arities].sort((a, b) => a - b).join(', ');
      problems.push(`Predicate '${name}' is used with different arities (${list}).`);
    }
  }

  const roles = new Map<string, string[]>();
  const note = (name: string, role: string) => roles.set(name, [...(roles.get(name) ?? []), role]);
  symbols.propositions.forEach((p) => note(p, 'sentence letter'));
  symbols.constants.forEach((c) => note(c, 'individual constant'));
  symbols.predicates.forEach((_, name) => note(name, 'predicate'));

  for (const [name, list] of roles) {
    if (list.length > 1) {
      problems.push(`Symbol '${name}' is used both as ${list.join(' and as ')}.`);
    }
  }

  return problems;
}
