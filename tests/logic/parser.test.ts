import { describe, it, expect } from 'vitest';
import { parseFormula } from '../../src/logic/parser.js';
import { formatFormula, type Formula } from '../../src/logic/formula.js';

function parse(text: string): Formula {
  const result = parseFormula(text);
  if (!result.ok) throw new Error(`expected '${text}' to parse: ${result.error}`);
  return result.formula;
}

function errorOf(text: string): string {
  const result = parseFormula(text);
  if (result.ok) throw new Error(`expected '${text}' to be rejected`);
  return result.error;
}

describe('parseFormula', () => {
  it('should read atoms and predicate applications', () => {
    expect(parse('rain')).toEqual({ type: 'atom', name: 'rain' });
    expect(parse('Loves(a, b)')).toEqual({ type: 'predicate', name: 'Loves', args: ['a', 'b'] });
  });

  it('should bind negation tighter than conjunction', () => {
    expect(parse('-p & q')).toEqual({
      type: 'and',
      left: { type: 'not', operand: { type: 'atom', name: 'p' } },
      right: { type: 'atom', name: 'q' },
    });
  });

  it('should rank & over | over -> over <->', () => {
    expect(formatFormula(parse('p & q | r -> s <-> t'))).toBe('((((p & q) | r) -> s) <-> t)');
  });

  it('should associate implication to the right', () => {
    expect(formatFormula(parse('p -> q -> r'))).toBe('(p -> (q -> r))');
  });

  it('should accept keyword spellings of the connectives', () => {
    expect(parse('not p and q or r implies s iff t')).toEqual(parse('-p & q | r -> s <-> t'));
    expect(parse('!p => q <=> r')).toEqual(parse('-p -> q <-> r'));
  });

  it('should extend a quantifier body as far right as possible', () => {
    expect(parse('all x.F(x) -> G(x)')).toEqual({
      type: 'all',
      variable: 'x',
      body: {
        type: 'implies',
        left: { type: 'predicate', name: 'F', args: ['x'] },
        right: { type: 'predicate', name: 'G', args: ['x'] },
      },
    });
  });

  it('should bind several variables with one quantifier', () => {
    expect(formatFormula(parse('forall x y.R(x,y)'))).toBe('all x.all y.R(x,y)');
    expect(parse('some x.F(x)')).toEqual(parse('exists x.F(x)'));
  });

  it('should read equality and inequality of terms', () => {
    expect(parse('a = b')).toEqual({ type: 'equals', left: 'a', right: 'b' });
    expect(parse('a != b')).toEqual({ type: 'not', operand: { type: 'equals', left: 'a', right: 'b' } });
  });

  it('should reject an empty formula', () => {
    expect(errorOf('   ')).toBe('Empty formula');
  });

  it('should name the position of an unexpected character', () => {
    expect(errorOf('p $ q')).toBe("Unexpected character '$' at position 2");
  });

  it('should report a formula that ends too early', () => {
    expect(errorOf('p &')).toBe('Unexpected end of formula at position 3, expected a symbol');
    expect(errorOf('(p & q')).toBe("Unexpected end of formula at position 6, expected ')'");
  });

  it('should reject trailing tokens', () => {
    expect(errorOf('p q')).toBe("Unexpected 'q' at position 2");
  });

  it('should reject a quantifier without its dot', () => {
    expect(errorOf('all x F(x)')).toBe("Unexpected '(' at position 7, expected a symbol");
  });
});
