import {
  BOOLEAN,
  Expr,
  ExprType,
  ExpressionError,
  NUMBER,
  STRING,
  describeType,
  listOf,
  typeEquals,
} from './ast';
import { Environment } from './environment';

/**
 * Built-in functions; nothing else is callable
 */
export const BUILTINS = ['len', 'abs', 'min', 'max', 'lower', 'upper'] as const;

export type Builtin = (typeof BUILTINS)[number];

export function isBuiltin(name: string): name is Builtin {
  return BUILTINS.some((builtin) => builtin === name);
}

/**
 * Infer the static type of `expr`, rejecting anything the environment does not describe
 */
export function typeOf(expr: Expr, env: Environment): ExprType {
  switch (expr.kind) {
    case 'literal':
      return typeof expr.value === 'number' ? NUMBER : typeof expr.value === 'string' ? STRING : BOOLEAN;

    case 'array': {
      const [first, ...rest] = expr.elements;
      if (first === undefined) {
        throw new ExpressionError('check', 'empty list literals have no type', expr.position);
      }
      const element = typeOf(first, env);
      for (const item of rest) {
        const type = typeOf(item, env);
        if (!typeEquals(element, type)) {
          throw mismatch(`list elements must share one type, got ${describeType(element)} and ${describeType(type)}`, item);
        }
      }
      return listOf(element);
    }

    case 'identifier': {
      const type = Object.hasOwn(env, expr.name) ? env[expr.name] : undefined;
      if (type === undefined) {
        throw new ExpressionError('check', `undefined name ${JSON.stringify(expr.name)}`, expr.position);
      }
      return type;
    }

    case 'member':
      return fieldType(typeOf(expr.object, env), expr.property, expr);

    case 'index': {
      const target = typeOf(expr.object, env);
      const index = typeOf(expr.index, env);
      if (target.kind === 'list' && index.kind === 'number') return target.element;
      if (target.kind === 'map' && index.kind === 'string') return target.value;
      if (target.kind === 'object' && expr.index.kind === 'literal' && typeof expr.index.value === 'string') {
        return fieldType(target, expr.index.value, expr);
      }
      throw mismatch(`cannot index ${describeType(target)} with ${describeType(index)}`, expr);
    }

    case 'call':
      return callType(expr.callee, expr.args.map((arg) => typeOf(arg, env)), expr);

    case 'unary': {
      const operand = typeOf(expr.operand, env);
      const expected = expr.op === '!' ? BOOLEAN : NUMBER;
      if (!typeEquals(operand, expected)) {
        throw mismatch(`operator ${expr.op} needs ${describeType(expected)}, got ${describeType(operand)}`, expr);
      }
      return expected;
    }

    case 'binary':
      return binaryType(expr, typeOf(expr.left, env), typeOf(expr.right, env));

    case 'conditional': {
      const test = typeOf(expr.test, env);
      if (test.kind !== 'boolean') {
        throw mismatch(`condition of ?: must be boolean, got ${describeType(test)}`, expr);
      }
      const consequent = typeOf(expr.consequent, env);
      const alternate = typeOf(expr.alternate, env);
      if (!typeEquals(consequent, alternate)) {
        throw mismatch(
          `branches of ?: differ: ${describeType(consequent)} and ${describeType(alternate)}`,
          expr
        );
      }
      return consequent;
    }
  }
}

function fieldType(target: ExprType, field: string, at: Expr): ExprType {
  if (target.kind === 'object') {
    const type = Object.hasOwn(target.fields, field) ? target.fields[field] : undefined;
    if (type === undefined) {
      throw new ExpressionError('check', `unknown field ${JSON.stringify(field)}`, at.position);
    }
    return type;
  }
  if (target.kind === 'map') return target.value;
  throw mismatch(`${describeType(target)} has no field ${JSON.stringify(field)}`, at);
}

function callType(callee: string, args: ExprType[], at: Expr): ExprType {
  if (!isBuiltin(callee)) {
    throw new ExpressionError('check', `unknown function ${JSON.stringify(callee)}`, at.position);
  }

  switch (callee) {
    case 'len': {
      const [arg] = args;
      if (args.length !== 1 || arg === undefined || !['string', 'list', 'map'].includes(arg.kind)) {
        throw mismatch('len takes one string, list or map', at);
      }
      return NUMBER;
    }
    case 'abs':
      if (args.length !== 1 || !args.every((arg) => arg.kind === 'number')) {
        throw mismatch('abs takes one number', at);
      }
      return NUMBER;
    case 'min':
    case 'max':
      if (args.length < 2 || !args.every((arg) => arg.kind === 'number')) {
        throw mismatch(`${callee} takes two or more numbers`, at);
      }
      return NUMBER;
    case 'lower':
    case 'upper':
      if (args.length !== 1 || !args.every((arg) => arg.kind === 'string')) {
        throw mismatch(`${callee} takes one string`, at);
      }
      return STRING;
  }
}

function binaryType(expr: Extract<Expr, { kind: 'binary' }>, left: ExprType, right: ExprType): ExprType {
  const both = (kind: ExprType['kind']): boolean => left.kind === kind && right.kind === kind;

  switch (expr.op) {
    case '+':
      if (both('number')) return NUMBER;
      if (both('string')) return STRING;
      break;
    case '-':
    case '*':
    case '/':
    case '%':
      if (both('number')) return NUMBER;
      break;
    case '<':
    case '<=':
    case '>':
    case '>=':
      if (both('number') || both('string')) return BOOLEAN;
      break;
    case '==':
    case '!=':
      if (typeEquals(left, right)) return BOOLEAN;
      break;
    case '&&':
    case '||':
      if (both('boolean')) return BOOLEAN;
      break;
    case 'in':
      if (right.kind === 'list' && typeEquals(left, right.element)) return BOOLEAN;
      if (right.kind === 'map' && left.kind === 'string') return BOOLEAN;
      if (both('string')) return BOOLEAN;
      break;
    case 'contains':
      if (left.kind === 'list' && typeEquals(left.element, right)) return BOOLEAN;
      if (left.kind === 'map' && right.kind === 'string') return BOOLEAN;
      if (both('string')) return BOOLEAN;
      break;
    case 'startsWith':
    case 'endsWith':
      if (both('string')) return BOOLEAN;
      break;
  }

  throw mismatch(
    `operator ${expr.op} cannot combine ${describeType(left)} and ${describeType(right)}`,
    expr
  );
}

function mismatch(message: string, at: Expr): ExpressionError {
  return new ExpressionError('check', message, at.position);
}
