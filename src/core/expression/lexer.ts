import { ExpressionError } from './ast';

export type TokenKind = 'number' | 'string' | 'identifier' | 'operator' | 'eof';

export interface Token {
  kind: TokenKind;
  text: string;
  position: number;
  /** Decoded value of number and string literals */
  value?: number | string;
}

// Longest first, so `<=` wins over `<`
const OPERATORS = [
  '==', '!=', '<=', '>=', '&&', '||',
  '<', '>', '!', '+', '-', '*', '/', '%',
  '(', ')', '[', ']', ',', '.', '?', ':',
];

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

const NUMBER_PATTERN = /^\d+(\.\d+)?([eE][+-]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const char = source[pos];

    if (/\s/.test(char)) {
      pos++;
      continue;
    }

    const rest = source.slice(pos);

    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ kind: 'number', text: number[0], value: Number(number[0]), position: pos });
      pos += number[0].length;
      continue;
    }

    const identifier = IDENTIFIER_PATTERN.exec(rest);
    if (identifier) {
      tokens.push({ kind: 'identifier', text: identifier[0], position: pos });
      pos += identifier[0].length;
      continue;
    }

    if (char === '"' || char === "'") {
      const { value, end } = readString(source, pos);
      tokens.push({ kind: 'string', text: source.slice(pos, end), value, position: pos });
      pos = end;
      continue;
    }

    const operator = OPERATORS.find((op) => source.startsWith(op, pos));
    if (operator) {
      tokens.push({ kind: 'operator', text: operator, position: pos });
      pos += operator.length;
      continue;
    }

    throw new ExpressionError('lex', `unexpected character ${JSON.stringify(char)}`, pos);
  }

  tokens.push({ kind: 'eof', text: '', position: source.length });
  return tokens;
}

function readString(source: string, start: number): { value: string; end: number } {
  const quote = source[start];
  let value = '';
  let pos = start + 1;

  while (pos < source.length) {
    const char = source[pos];
    if (char === quote) {
      return { value, end: pos + 1 };
    }
    if (char === '\\') {
      const next = source[pos + 1];
      const escaped = next !== undefined && Object.hasOwn(ESCAPES, next) ? ESCAPES[next] : undefined;
      if (escaped === undefined) {
        throw new ExpressionError('lex', 'invalid escape sequence in string literal', pos);
      }
      value += escaped;
      pos += 2;
      continue;
    }
    value += char;
    pos++;
  }

  throw new ExpressionError('lex', 'unterminated string literal', start);
}
