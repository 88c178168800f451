/**
 * Tag query parser.
 *
 * Grammar, loosest binding first:
 *
 *   or       := and ( "OR" and )*
 *   and      := not ( "AND" not )*
 *   not      := "NOT" not | primary
 *   primary  := "(" or ")" | literal
 *   literal  := WORD+
 *
 * Operators are the upper-case words AND, OR and NOT separated by
 * whitespace. Parentheses delimit only at word boundaries: leading `(` and
 * unbalanced trailing `)` are split off a word, so `fn:init()` stays one
 * word while `(fn:init())` is that word in a group. Consecutive non-operator
 * words form one literal spanning them in the original text, whitespace
 * included. A literal containing `*` is a wildcard pattern.
 */

import { invalidQuerySyntax } from '../errors/NexusError.js';

export type QueryExpression =
  | { kind: 'or'; operands: QueryExpression[] }
  | { kind: 'and'; operands: QueryExpression[] }
  | { kind: 'not'; operand: QueryExpression }
  | { kind: 'tag'; tag: string }
  | { kind: 'wildcard'; pattern: string };

type Token =
  | { type: 'lparen' }
  | { type: 'rparen' }
  | { type: 'and' }
  | { type: 'or' }
  | { type: 'not' }
  | { type: 'word'; text: string; start: number; end: number };

const OPERATORS = new Map<string, Token>([
  ['AND', { type: 'and' }],
  ['OR', { type: 'or' }],
  ['NOT', { type: 'not' }],
]);

function count(text: string, char: string): number {
  let n = 0;
  for (const c of text) {
    if (c === char) n++;
  }
  return n;
}

export function tokenize(query: string): Token[] {
  const tokens: Token[] = [];

  for (const match of query.matchAll(/\S+/g)) {
    const piece = match[0];
    let start = match.index ?? 0;
    let end = start + piece.length;

    while (start < end && query[start] === '(') {
      tokens.push({ type: 'lparen' });
      start++;
    }

    let word = query.slice(start, end);
    let closing = 0;
    while (word.endsWith(')') && count(word, ')') > count(word, '(')) {
      word = word.slice(0, -1);
      end--;
      closing++;
    }

    if (word.length > 0) {
      tokens.push(OPERATORS.get(word) ?? { type: 'word', text: word, start, end });
    }
    for (let i = 0; i < closing; i++) {
      tokens.push({ type: 'rparen' });
    }
  }
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly query: string,
  ) {}

  parse(): QueryExpression {
    const expression = this.parseOr();
    const next = this.peek();
    if (next !== undefined) {
      if (next.type === 'rparen') {
        throw this.fail("Unexpected ')' without a matching '('");
      }
      throw this.fail(`Unexpected ${describe(next)}`);
    }
    return expression;
  }

  private parseOr(): QueryExpression {
    const operands = [this.parseAnd()];
    while (this.peek()?.type === 'or') {
      this.pos++;
      operands.push(this.parseAnd('OR'));
    }
    return operands.length === 1 && operands[0] ? operands[0] : { kind: 'or', operands };
  }

  private parseAnd(after?: string): QueryExpression {
    const operands = [this.parseNot(after)];
    while (this.peek()?.type === 'and') {
      this.pos++;
      operands.push(this.parseNot('AND'));
    }
    return operands.length === 1 && operands[0] ? operands[0] : { kind: 'and', operands };
  }

  private parseNot(after?: string): QueryExpression {
    if (this.peek()?.type === 'not') {
      this.pos++;
      return { kind: 'not', operand: this.parseNot('NOT') };
    }
    return this.parsePrimary(after);
  }

  private parsePrimary(after?: string): QueryExpression {
    const token = this.peek();

    if (token === undefined) {
      throw this.fail(after ? `Expected a tag after ${after}` : 'Expected a tag');
    }

    if (token.type === 'lparen') {
      this.pos++;
      if (this.peek()?.type === 'rparen') {
        throw this.fail('Empty parentheses');
      }
      const inner = this.parseOr();
      if (this.peek()?.type !== 'rparen') {
        throw this.fail("Missing closing ')'");
      }
      this.pos++;
      return inner;
    }

    if (token.type !== 'word') {
      throw this.fail(after ? `Expected a tag after ${after}, found ${describe(token)}` : `Unexpected ${describe(token)}`);
    }

    let last = token;
    this.pos++;
    let current = this.peek();
    while (current?.type === 'word') {
      last = current;
      this.pos++;
      current = this.peek();
    }

    const literal = this.query.slice(token.start, last.end);
    return literal.includes('*') ? { kind: 'wildcard', pattern: literal } : { kind: 'tag', tag: literal };
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private fail(message: string) {
    return invalidQuerySyntax(message, this.query);
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case 'lparen':
      return "'('";
    case 'rparen':
      return "')'";
    case 'and':
      return 'AND';
    case 'or':
      return 'OR';
    case 'not':
      return 'NOT';
    case 'word':
      return `'${token.text}'`;
  }
}

/**
 * Parse a tag query. Returns null for a blank query.
 */
export function parseQuery(query: string): QueryExpression | null {
  const tokens = tokenize(query);
  if (tokens.length === 0) {
    return null;
  }
  return new Parser(tokens, query).parse();
}
