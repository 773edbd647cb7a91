/**
 * SMT-LIB rendering of validity queries.
 *
 * Individuals live in one uninterpreted sort. The generated program asserts
 * the negation of "premises imply conclusion"; `unsat` means the argument
 * is valid.
 */

import { collectSymbols, mergeSymbols, type Formula } from './formula.js';

export const UNIVERSAL_SORT = 'Universal';

export interface NamedFormula {
  /** Item or proposition label the formula belongs to. */
  name: string;
  formula: Formula;
}

export interface ValidityQuery {
  premises: NamedFormula[];
  conclusion: NamedFormula;
  /** Symbol to intended meaning; rendered as comments. */
  declarations: ReadonlyMap<string, string>;
}

const RESERVED = new Set([
  'and', 'or', 'not', 'xor', 'ite', 'distinct', 'true', 'false', 'let',
  'forall', 'exists', 'assert', 'par', 'as', 'Bool', 'argument', UNIVERSAL_SORT,
]);

export function smtSymbol(name: string): string {
  return RESERVED.has(name) ? `|${name}|` : name;
}

export function renderSmt(formula: Formula): string {
  switch (formula.type) {
    case 'atom':
      return smtSymbol(formula.name);
    case 'predicate':
      return `(${smtSymbol(formula.name)} ${formula.args.map(smtSymbol).join(' ')})`;
    case 'equals':
      return `(= ${smtSymbol(formula.left)} ${smtSymbol(formula.right)})`;
    case 'not':
      return `(not ${renderSmt(formula.operand)})`;
    case 'and':
      return `(and ${renderSmt(formula.left)} ${renderSmt(formula.right)})`;
    case 'or':
      return `(or ${renderSmt(formula.left)} ${renderSmt(formula.right)})`;
    case 'implies':
      return `(=> ${renderSmt(formula.left)} ${renderSmt(formula.right)})`;
    case 'iff':
      return `(= ${renderSmt(formula.left)} ${renderSmt(formula.right)})`;
    case 'all':
      return `(forall ((${smtSymbol(formula.variable)} ${UNIVERSAL_SORT})) ${renderSmt(formula.body)})`;
    case 'exists':
      return `(exists ((${smtSymbol(formula.variable)} ${UNIVERSAL_SORT})) ${renderSmt(formula.body)})`;
  }
}

/** Build the full program for "do the premises entail the conclusion?". */
export function buildValidityProgram(query: ValidityQuery): string {
  const formulas = [...query.premises, query.conclusion];
  const symbols = mergeSymbols(formulas.map((f) => collectSymbols(f.formula)));
  const lines: string[] = [`(declare-sort ${UNIVERSAL_SORT} 0)`];

  const comment = (name: string) => {
    const text = query.declarations.get(name);
    return text ? ` ;; ${text.replace(/\s+/g, ' ').trim()}` : '';
  };

  for (const p of symbols.propositions) {
    lines.push(`(declare-fun ${smtSymbol(p)} () Bool)${comment(p)}`);
  }
  for (const c of symbols.constants) {
    lines.push(`(declare-const ${smtSymbol(c)} ${UNIVERSAL_SORT})${comment(c)}`);
  }
  for (const [name, arities] of symbols.predicates) {
    const arity = Math.min(...arities);
    const domain = Array.from({ length: arity }, () => UNIVERSAL_SORT).join(' ');
    lines.push(`(declare-fun ${smtSymbol(name)} (${domain}) Bool)${comment(name)}`);
  }

  // Named by position; item labels go in comments.
  const label = (name: string) => ` ;; (${name.replace(/\s+/g, ' ').trim()})`;
  const premiseNames = query.premises.map((_, i) => `premise_${i}`);

  query.premises.forEach((p, i) => {
    lines.push(`(define-fun ${premiseNames[i]} () Bool ${renderSmt(p.formula)})${label(p.name)}`);
  });
  lines.push(`(define-fun conclusion () Bool ${renderSmt(query.conclusion.formula)})${label(query.conclusion.name)}`);

  const antecedent =
    premiseNames.length === 0
      ? 'true'
      : premiseNames.length === 1
        ? premiseNames[0]
        : `(and ${premiseNames.join(' ')})`;
  lines.push(`(define-fun argument () Bool (=> ${antecedent} conclusion))`);
  lines.push('(assert (not argument))');
  lines.push('(check-sat)');

  return lines.join('\n');
}
