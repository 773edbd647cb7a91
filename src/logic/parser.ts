/**
 * Formula parser.
 *
 * Reads the textual first-order syntax used in formalizations:
 *
 *   -p            negation (also `!`, `not`)
 *   p & q         conjunction (also `and`)
 *   p | q         disjunction (also `or`)
 *   p -> q        implication (also `=>`, `implies`), right associative
 *   p <-> q       equivalence (also `<=>`, `iff`)
 *   a = b, a != b term (in)equality
 *   F(a,b)        predicate application
 *   all x.F(x)    universal (also `forall`), `all x y.` binds several
 *   exists x.F(x) existential (also `some`)
 *
 * Negation binds tightest, then &, |, ->, <->. A quantifier's body extends
 * as far right as possible.
 */

import type { Formula, Quantifier } from './formula.js';

export type ParseResult =
  | { ok: true; formula: Formula }
  | { ok: false; error: string };

type TokenKind =
  | 'ident'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'dot'
  | 'not'
  | 'and'
  | 'or'
  | 'implies'
  | 'iff'
  | 'eq'
  | 'neq'
  | 'quantifier';

interface Token {
  kind: TokenKind;
  text: string;
  pos: number;
}

// Longest first so '<->' wins over '->' and '!=' over '!'.
const SYMBOLS: Array<[string, TokenKind]> = [
  ['<->', 'iff'],
  ['<=>', 'iff'],
  ['->', 'implies'],
  ['=>', 'implies'],
  ['!=', 'neq'],
  ['==', 'eq'],
  ['=', 'eq'],
  ['-', 'not'],
  ['!', 'not'],
  ['&', 'and'],
  ['|', 'or'],
  ['(', 'lparen'],
  [')', 'rparen'],
  [',', 'comma'],
  ['.', 'dot'],
];

const KEYWORDS = new Map<string, TokenKind>([
  ['not', 'not'],
  ['and', 'and'],
  ['or', 'or'],
  ['implies', 'implies'],
  ['iff', 'iff'],
  ['all', 'quantifier'],
  ['forall', 'quantifier'],
  ['exists', 'quantifier'],
  ['some', 'quantifier'],
]);

const IDENT = /[A-Za-z_][A-Za-z0-9_]*/y;

class FormulaSyntaxError extends Error {}

export function parseFormula(text: string): ParseResult {
  try {
    const tokens = tokenize(text);
    const parser = new Parser(tokens, text.length);
    return { ok: true, formula: parser.parseAll() };
  } catch (err) {
    if (err instanceof FormulaSyntaxError) {
      return { ok: false, error: err.message };
    }
    throw err;
  }
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  outer: while (pos < text.length) {
    if (/\s/.test(text[pos])) {
      pos++;
      continue;
    }

    IDENT.lastIndex = pos;
    const ident = IDENT.exec(text);
    if (ident) {
      const word = ident[0];
      tokens.push({ kind: KEYWORDS.get(word) ?? 'ident', text: word, pos });
      pos += word.length;
      continue;
    }

    for (const [symbol, kind] of SYMBOLS) {
      if (text.startsWith(symbol, pos)) {
        tokens.push({ kind, text: symbol, pos });
        pos += symbol.length;
        continue outer;
      }
    }

    throw new FormulaSyntaxError(`Unexpected character '${text[pos]}' at position ${pos}`);
  }

  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly length: number
  ) {}

  parseAll(): Formula {
    if (this.tokens.length === 0) {
      throw new FormulaSyntaxError('Empty formula');
    }
    const formula = this.parseIff();
    const rest = this.peek();
    if (rest) {
      throw new FormulaSyntaxError(`Unexpected '${rest.text}' at position ${rest.pos}`);
    }
    return formula;
  }

  private parseIff(): Formula {
    let left = this.parseImplies();
    while (this.accept('iff')) {
      left = { type: 'iff', left, right: this.parseImplies() };
    }
    return left;
  }

  private parseImplies(): Formula {
    const left = this.parseOr();
    if (this.accept('implies')) {
      return { type: 'implies', left, right: this.parseImplies() };
    }
    return left;
  }

  private parseOr(): Formula {
    let left = this.parseAnd();
    while (this.accept('or')) {
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Formula {
    let left = this.parseUnary();
    while (this.accept('and')) {
      left = { type: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): Formula {
    if (this.accept('not')) {
      return { type: 'not', operand: this.parseUnary() };
    }

    const quantifier = this.accept('quantifier');
    if (quantifier) {
      const kind: Quantifier =
        quantifier.text === 'all' || quantifier.text === 'forall' ? 'all' : 'exists';
      const variables = [this.expect('ident').text];
      while (!this.accept('dot')) {
        variables.push(this.expect('ident').text);
      }
      const body = this.parseIff();
      return variables.reduceRight<Formula>(
        (inner, variable) => ({ type: kind, variable, body: inner }),
        body
      );
    }

    return this.parsePrimary();
  }

  private parsePrimary(): Formula {
    if (this.accept('lparen')) {
      const inner = this.parseIff();
      this.expect('rparen');
      return inner;
    }

    const name = this.expect('ident').text;

    if (this.accept('lparen')) {
      const args = [this.expect('ident').text];
      while (this.accept('comma')) {
        args.push(this.expect('ident').text);
      }
      this.expect('rparen');
      return { type: 'predicate', name, args };
    }

    if (this.accept('eq')) {
      return { type: 'equals', left: name, right: this.expect('ident').text };
    }
    if (this.accept('neq')) {
      return {
        type: 'not',
        operand: { type: 'equals', left: name, right: this.expect('ident').text },
      };
    }

    return { type: 'atom', name };
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private accept(kind: TokenKind): Token | null {
    const token = this.peek();
    if (token?.kind === kind) {
      this.index++;
      return token;
    }
    return null;
  }

  private expect(kind: TokenKind): Token {
    const token = this.accept(kind);
    if (token) return token;

    const found = this.peek();
    if (!found) {
      throw new FormulaSyntaxError(`Unexpected end of formula at position ${this.length}, expected ${describe(kind)}`);
    }
    throw new FormulaSyntaxError(
      `Unexpected '${found.text}' at position ${found.pos}, expected ${describe(kind)}`
    );
  }
}

function describe(kind: TokenKind): string {
  switch (kind) {
    case 'ident':
      return 'a symbol';
    case 'rparen':
      return "')'";
    case 'dot':
      return "'.'";
    default:
      return kind;
  }
}
