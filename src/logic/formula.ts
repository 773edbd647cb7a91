/**
 * First-order formula trees.
 *
 * Terms are bare identifiers: constants, or variables when a quantifier
 * binds them. Formulas are built from propositional atoms, predicate
 * applications and term equality.
 */

export type BinaryConnective = 'and' | 'or' | 'implies' | 'iff';
export type Quantifier = 'all' | 'exists';

export type Formula =
  | { type: 'atom'; name: string }
  | { type: 'predicate'; name: string; args: string[] }
  | { type: 'equals'; left: string; right: string }
  | { type: 'not'; operand: Formula }
  | { type: BinaryConnective; left: Formula; right: Formula }
  | { type: Quantifier; variable: string; body: Formula };

/** Non-logical symbols a formula uses. Bound variables are not symbols. */
export interface FormulaSymbols {
  propositions: Set<string>;
  constants: Set<string>;
  /** Predicate name to every arity it is applied with. */
  predicates: Map<string, Set<number>>;
}

const CONNECTIVE_SIGNS: Record<BinaryConnective, string> = {
  and: '&',
  or: '|',
  implies: '->',
  iff: '<->',
};

export function negate(formula: Formula): Formula {
  return { type: 'not', operand: formula };
}

/** Render in the same textual syntax the parser reads. */
export function formatFormula(formula: Formula): string {
  switch (formula.type) {
    case 'atom':
      return formula.name;
    case 'predicate':
      return `${formula.name}(${formula.args.join(',')})`;
    case 'equals':
      return `${formula.left} = ${formula.right}`;
    case 'not':
      return `-${formatFormula(formula.operand)}`;
    case 'all':
    case 'exists':
      return `${formula.type} ${formula.variable}.${formatFormula(formula.body)}`;
    default:
      return `(${formatFormula(formula.left)} ${CONNECTIVE_SIGNS[formula.type]} ${formatFormula(formula.right)})`;
  }
}

export function collectSymbols(formula: Formula): FormulaSymbols {
  const symbols: FormulaSymbols = {
    propositions: new Set(),
    constants: new Set(),
    predicates: new Map(),
  };
  visit(formula, new Set(), symbols);
  return symbols;
}

/** Every symbol name a formula uses, regardless of its category. */
export function symbolNames(symbols: FormulaSymbols): Set<string> {
  return new Set([
    ...symbols.propositions,
    ...symbols.constants,
    ...symbols.predicates.keys(),
  ]);
}

export function mergeSymbols(all: FormulaSymbols[]): FormulaSymbols {
  const merged: FormulaSymbols = {
    propositions: new Set(),
    constants: new Set(),
    predicates: new Map(),
  };
  for (const s of all) {
    s.propositions.forEach((p) => merged.propositions.add(p));
    s.constants.forEach((c) => merged.constants.add(c));
    for (const [name, arities] of s.predicates) {
      const target = merged.predicates.get(name) ?? new Set<number>();
      arities.forEach((a) => target.add(a));
      merged.predicates.set(name, target);
    }
  }
  return merged;
}

function visit(formula: Formula, bound: Set<string>, out: FormulaSymbols): void {
  const term = (name: string) => {
    if (!bound.has(name)) out.constants.add(name);
  };

  switch (formula.type) {
    case 'atom':
      out.propositions.add(formula.name);
      return;
    case 'predicate': {
      const arities = out.predicates.get(formula.name) ?? new Set<number>();
      arities.add(formula.args.length);
      out.predicates.set(formula.name, arities);
      formula.args.forEach(term);
      return;
    }
    case 'equals':
      term(formula.left);
      term(formula.right);
      return;
    case 'not':
      visit(formula.operand, bound, out);
      return;
    case 'all':
    case 'exists':
      visit(formula.body, new Set([...bound, formula.variable]), out);
      return;
    default:
      visit(formula.left, bound, out);
      visit(formula.right, bound, out);
  }
}
