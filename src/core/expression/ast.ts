/**
 * Syntax tree and type model of the rule expression language.
 *
 * The grammar is closed and loop-free: literals, member/index access, calls to a
 * fixed set of built-ins, unary/binary operators and the conditional operator.
 */

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '<'
  | '<='
  | '>'
  | '>='
  | '=='
  | '!='
  | '&&'
  | '||'
  | 'in'
  | 'contains'
  | 'startsWith'
  | 'endsWith';

export type UnaryOperator = '!' | '-';

export type Expr =
  | { kind: 'literal'; value: number | string | boolean; position: number }
  | { kind: 'array'; elements: Expr[]; position: number }
  | { kind: 'identifier'; name: string; position: number }
  | { kind: 'member'; object: Expr; property: string; position: number }
  | { kind: 'index'; object: Expr; index: Expr; position: number }
  | { kind: 'call'; callee: string; args: Expr[]; position: number }
  | { kind: 'unary'; op: UnaryOperator; operand: Expr; position: number }
  | { kind: 'binary'; op: BinaryOperator; left: Expr; right: Expr; position: number }
  | { kind: 'conditional'; test: Expr; consequent: Expr; alternate: Expr; position: number };

/**
 * Static types. `map` is a string-keyed dictionary (e.g. labels); `object` has a
 * fixed set of fields.
 */
export type ExprType =
  | { kind: 'number' }
  | { kind: 'string' }
  | { kind: 'boolean' }
  | { kind: 'list'; element: ExprType }
  | { kind: 'map'; value: ExprType }
  | { kind: 'object'; fields: Readonly<Record<string, ExprType>> };

/**
 * Runtime values
 */
export type Value = number | string | boolean | Value[] | ValueRecord;

export interface ValueRecord {
  [key: string]: Value;
}

export const NUMBER: ExprType = { kind: 'number' };
export const STRING: ExprType = { kind: 'string' };
export const BOOLEAN: ExprType = { kind: 'boolean' };

export function listOf(element: ExprType): ExprType {
  return { kind: 'list', element };
}

export function mapOf(value: ExprType): ExprType {
  return { kind: 'map', value };
}

export function objectOf(fields: Record<string, ExprType>): ExprType {
  return { kind: 'object', fields };
}

export function typeEquals(a: ExprType, b: ExprType): boolean {
  switch (a.kind) {
    case 'number':
    case 'string':
    case 'boolean':
      return a.kind === b.kind;
    case 'list':
      return b.kind === 'list' && typeEquals(a.element, b.element);
    case 'map':
      return b.kind === 'map' && typeEquals(a.value, b.value);
    case 'object': {
      if (b.kind !== 'object') return false;
      const left = a.fields;
      const right = b.fields;
      const keys = Object.keys(left);
      if (keys.length !== Object.keys(right).length) return false;
      return keys.every((key) => {
        const other = Object.hasOwn(right, key) ? right[key] : undefined;
        return other !== undefined && typeEquals(left[key], other);
      });
    }
  }
}

export function describeType(type: ExprType): string {
  switch (type.kind) {
    case 'number':
    case 'string':
    case 'boolean':
      return type.kind;
    case 'list':
      return `list<${describeType(type.element)}>`;
    case 'map':
      return `map<${describeType(type.value)}>`;
    case 'object':
      return `{${Object.keys(type.fields).join(', ')}}`;
  }
}

export function describeValue(value: Value): string {
  if (Array.isArray(value)) return 'list';
  return typeof value === 'object' ? 'object' : typeof value;
}

/**
 * Raised by every phase of the language: lexing, parsing, checking, evaluation
 */
export class ExpressionError extends Error {
  readonly phase: 'lex' | 'parse' | 'check' | 'eval';
  readonly position?: number;

  constructor(phase: ExpressionError['phase'], message: string, position?: number) {
    super(position === undefined ? message : `${message} (at position ${position})`);
    this.name = 'ExpressionError';
    this.phase = phase;
    this.position = position;
  }
}
