import { BinaryOperator, Expr, ExpressionError } from './ast';
import { Token, tokenize } from './lexer';

export interface ParseOptions {
  /** Maximum nesting of sub-expressions (parentheses, unary chains, arguments) */
  maxDepth: number;
}

const RELATIONAL: Record<string, BinaryOperator> = {
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
  in: 'in',
  contains: 'contains',
  startsWith: 'startsWith',
  endsWith: 'endsWith',
};

const KEYWORDS = new Set(['true', 'false', 'and', 'or', 'not', 'in', 'contains', 'startsWith', 'endsWith']);

/**
 * Recursive-descent parser. Precedence, lowest first:
 * `?:`, `||`/`or`, `&&`/`and`, `==` `!=`, relational, `+` `-`, `*` `/` `%`, unary, postfix.
 */
class Parser {
  private pos = 0;
  private depth = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly options: ParseOptions
  ) {}

  parse(): Expr {
    const expr = this.parseExpression();
    const next = this.peek();
    if (next.kind !== 'eof') {
      throw new ExpressionError('parse', `unexpected token ${JSON.stringify(next.text)}`, next.position);
    }
    return expr;
  }

  private parseExpression(): Expr {
    this.enter();
    try {
      return this.parseConditional();
    } finally {
      this.depth--;
    }
  }

  private parseConditional(): Expr {
    const test = this.parseOr();
    const question = this.peek();
    if (!this.matchOperator('?')) return test;

    const consequent = this.parseExpression();
    this.expectOperator(':');
    const alternate = this.parseExpression();
    return { kind: 'conditional', test, consequent, alternate, position: question.position };
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    for (;;) {
      const token = this.peek();
      if (!this.matchOperator('||') && !this.matchWord('or')) return left;
      left = { kind: 'binary', op: '||', left, right: this.parseAnd(), position: token.position };
    }
  }

  private parseAnd(): Expr {
    let left = this.parseEquality();
    for (;;) {
      const token = this.peek();
      if (!this.matchOperator('&&') && !this.matchWord('and')) return left;
      left = { kind: 'binary', op: '&&', left, right: this.parseEquality(), position: token.position };
    }
  }

  private parseEquality(): Expr {
    let left = this.parseRelational();
    for (;;) {
      const token = this.peek();
      if (token.kind !== 'operator' || (token.text !== '==' && token.text !== '!=')) return left;
      this.pos++;
      const op = token.text === '==' ? '==' : '!=';
      left = { kind: 'binary', op, left, right: this.parseRelational(), position: token.position };
    }
  }

  private parseRelational(): Expr {
    let left = this.parseAdditive();
    for (;;) {
      const token = this.peek();
      const isCandidate =
        (token.kind === 'operator' || token.kind === 'identifier') && Object.hasOwn(RELATIONAL, token.text);
      if (!isCandidate) return left;
      this.pos++;
      left = {
        kind: 'binary',
        op: RELATIONAL[token.text],
        left,
        right: this.parseAdditive(),
        position: token.position,
      };
    }
  }

  private parseAdditive(): Expr {
    let left = this.parseMultiplicative();
    for (;;) {
      const token = this.peek();
      if (token.kind !== 'operator' || (token.text !== '+' && token.text !== '-')) return left;
      this.pos++;
      const op = token.text === '+' ? '+' : '-';
      left = { kind: 'binary', op, left, right: this.parseMultiplicative(), position: token.position };
    }
  }

  private parseMultiplicative(): Expr {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (token.kind !== 'operator') return left;
      let op: BinaryOperator;
      if (token.text === '*') op = '*';
      else if (token.text === '/') op = '/';
      else if (token.text === '%') op = '%';
      else return left;
      this.pos++;
      left = { kind: 'binary', op, left, right: this.parseUnary(), position: token.position };
    }
  }

  private parseUnary(): Expr {
    const token = this.peek();
    const isNot = this.matchOperator('!') || this.matchWord('not');
    const isNegate = !isNot && this.matchOperator('-');
    if (!isNot && !isNegate) return this.parsePostfix();

    this.enter();
    try {
      const operand = this.parseUnary();
      return { kind: 'unary', op: isNot ? '!' : '-', operand, position: token.position };
    } finally {
      this.depth--;
    }
  }

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();
    for (;;) {
      const token = this.peek();
      if (this.matchOperator('.')) {
        const property = this.advance();
        if (property.kind !== 'identifier') {
          throw new ExpressionError('parse', 'expected field name after "."', property.position);
        }
        expr = { kind: 'member', object: expr, property: property.text, position: token.position };
      } else if (this.matchOperator('[')) {
        const index = this.parseExpression();
        this.expectOperator(']');
        expr = { kind: 'index', object: expr, index, position: token.position };
      } else if (token.kind === 'operator' && token.text === '(') {
        throw new ExpressionError('parse', 'only built-in functions can be called', token.position);
      } else {
        return expr;
      }
    }
  }

  private parsePrimary(): Expr {
    const token = this.advance();

    switch (token.kind) {
      case 'number':
      case 'string':
        if (token.value === undefined) {
          throw new ExpressionError('parse', 'literal without a value', token.position);
        }
        return { kind: 'literal', value: token.value, position: token.position };

      case 'identifier':
        if (token.text === 'true' || token.text === 'false') {
          return { kind: 'literal', value: token.text === 'true', position: token.position };
        }
        if (KEYWORDS.has(token.text)) {
          throw new ExpressionError('parse', `unexpected keyword ${JSON.stringify(token.text)}`, token.position);
        }
        if (this.matchOperator('(')) {
          return { kind: 'call', callee: token.text, args: this.parseList(')'), position: token.position };
        }
        return { kind: 'identifier', name: token.text, position: token.position };

      case 'operator':
        if (token.text === '(') {
          const inner = this.parseExpression();
          this.expectOperator(')');
          return inner;
        }
        if (token.text === '[') {
          return { kind: 'array', elements: this.parseList(']'), position: token.position };
        }
        throw new ExpressionError('parse', `unexpected token ${JSON.stringify(token.text)}`, token.position);

      case 'eof':
        throw new ExpressionError('parse', 'unexpected end of expression', token.position);
    }
  }

  /**
   * Comma-separated expressions up to (and consuming) `close`
   */
  private parseList(close: ')' | ']'): Expr[] {
    const items: Expr[] = [];
    if (this.matchOperator(close)) return items;

    for (;;) {
      items.push(this.parseExpression());
      if (this.matchOperator(close)) return items;
      this.expectOperator(',');
    }
  }

  private enter(): void {
    this.depth++;
    if (this.depth > this.options.maxDepth) {
      throw new ExpressionError('parse', `expression nests deeper than ${this.options.maxDepth} levels`);
    }
  }

  private peek(): Token {
    return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.pos++;
    return token;
  }

  private matchOperator(text: string): boolean {
    const token = this.peek();
    if (token.kind === 'operator' && token.text === text) {
      this.pos++;
      return true;
    }
    return false;
  }

  private matchWord(word: string): boolean {
    const token = this.peek();
    if (token.kind === 'identifier' && token.text === word) {
      this.pos++;
      return true;
    }
    return false;
  }

  private expectOperator(text: string): void {
    const token = this.peek();
    if (!this.matchOperator(text)) {
      const found = token.kind === 'eof' ? 'end of expression' : JSON.stringify(token.text);
      throw new ExpressionError('parse', `expected "${text}" but found ${found}`, token.position);
    }
  }
}

export function parse(source: string, options: ParseOptions): Expr {
  return new Parser(tokenize(source), options).parse();
}
