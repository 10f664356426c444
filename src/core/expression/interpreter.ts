import { BinaryOperator, Expr, ExpressionError, Value, ValueRecord, describeValue } from './ast';

export interface EvaluateOptions {
  /** Maximum number of nodes visited before evaluation is abandoned */
  stepBudget: number;
}

/**
 * Tree-walking interpreter. The grammar has no loops, so every evaluation visits
 * each node at most once; the step budget still bounds pathological inputs.
 */
export class Interpreter {
  private steps = 0;

  constructor(
    private readonly values: ValueRecord,
    private readonly options: EvaluateOptions
  ) {}

  run(expr: Expr): Value {
    this.steps = 0;
    return this.visit(expr);
  }

  private visit(expr: Expr): Value {
    if (++this.steps > this.options.stepBudget) {
      throw new ExpressionError('eval', `step budget of ${this.options.stepBudget} exceeded`, expr.position);
    }

    switch (expr.kind) {
      case 'literal':
        return expr.value;

      case 'array':
        return expr.elements.map((element) => this.visit(element));

      case 'identifier': {
        const value = Object.hasOwn(this.values, expr.name) ? this.values[expr.name] : undefined;
        if (value === undefined) {
          throw new ExpressionError('eval', `no value bound to ${JSON.stringify(expr.name)}`, expr.position);
        }
        return value;
      }

      case 'member':
        return field(this.visit(expr.object), expr.property, expr);

      case 'index': {
        const target = this.visit(expr.object);
        const index = this.visit(expr.index);
        if (Array.isArray(target)) {
          const i = asNumber(index, expr);
          const item = Number.isInteger(i) ? target[i] : undefined;
          if (item === undefined) {
            throw new ExpressionError('eval', `index ${i} out of range`, expr.position);
          }
          return item;
        }
        return field(target, asString(index, expr), expr);
      }

      case 'call':
        return this.call(expr.callee, expr.args.map((arg) => this.visit(arg)), expr);

      case 'unary': {
        const operand = this.visit(expr.operand);
        return expr.op === '!' ? !asBoolean(operand, expr) : -asNumber(operand, expr);
      }

      case 'binary':
        return this.binary(expr);

      case 'conditional':
        return asBoolean(this.visit(expr.test), expr) ? this.visit(expr.consequent) : this.visit(expr.alternate);
    }
  }

  private binary(expr: Extract<Expr, { kind: 'binary' }>): Value {
    switch (expr.op) {
      // Short-circuit before touching the right operand
      case '&&':
        return asBoolean(this.visit(expr.left), expr) && asBoolean(this.visit(expr.right), expr);
      case '||':
        return asBoolean(this.visit(expr.left), expr) || asBoolean(this.visit(expr.right), expr);
      default:
        return apply(expr.op, this.visit(expr.left), this.visit(expr.right), expr);
    }
  }

  private call(callee: string, args: Value[], at: Expr): Value {
    switch (callee) {
      case 'len': {
        const [arg] = args;
        if (typeof arg === 'string' || Array.isArray(arg)) return arg.length;
        if (arg !== undefined && typeof arg === 'object') return Object.keys(arg).length;
        throw new ExpressionError('eval', 'len needs a string, list or map', at.position);
      }
      case 'abs':
        return Math.abs(asNumber(args[0], at));
      case 'min':
        return Math.min(...args.map((arg) => asNumber(arg, at)));
      case 'max':
        return Math.max(...args.map((arg) => asNumber(arg, at)));
      case 'lower':
        return asString(args[0], at).toLowerCase();
      case 'upper':
        return asString(args[0], at).toUpperCase();
      default:
        throw new ExpressionError('eval', `unknown function ${JSON.stringify(callee)}`, at.position);
    }
  }
}

/**
 * Evaluate a parsed expression against concrete root values
 */
export function evaluate(expr: Expr, values: ValueRecord, options: EvaluateOptions): Value {
  return new Interpreter(values, options).run(expr);
}

function apply(op: Exclude<BinaryOperator, '&&' | '||'>, left: Value, right: Value, at: Expr): Value {
  switch (op) {
    case '+':
      if (typeof left === 'string' && typeof right === 'string') return left + right;
      return asNumber(left, at) + asNumber(right, at);
    case '-':
      return asNumber(left, at) - asNumber(right, at);
    case '*':
      return asNumber(left, at) * asNumber(right, at);
    case '/':
      return asNumber(left, at) / asNumber(right, at);
    case '%':
      return asNumber(left, at) % nonZero(asNumber(right, at), at);
    case '<':
      return compare(left, right, at) < 0;
    case '<=':
      return compare(left, right, at) <= 0;
    case '>':
      return compare(left, right, at) > 0;
    case '>=':
      return compare(left, right, at) >= 0;
    case '==':
      return valueEquals(left, right);
    case '!=':
      return !valueEquals(left, right);
    case 'in':
      return contains(right, left, at);
    case 'contains':
      return contains(left, right, at);
    case 'startsWith':
      return asString(left, at).startsWith(asString(right, at));
    case 'endsWith':
      return asString(left, at).endsWith(asString(right, at));
  }
}

function isRecord(value: Value | undefined): value is ValueRecord {
  return typeof value === 'object' && !Array.isArray(value);
}

function field(target: Value, name: string, at: Expr): Value {
  const value = isRecord(target) && Object.hasOwn(target, name) ? target[name] : undefined;
  if (value === undefined) {
    throw new ExpressionError('eval', `missing value for ${JSON.stringify(name)}`, at.position);
  }
  return value;
}

function contains(container: Value, item: Value, at: Expr): boolean {
  if (typeof container === 'string') return container.includes(asString(item, at));
  if (Array.isArray(container)) return container.some((element) => valueEquals(element, item));
  if (isRecord(container)) return Object.hasOwn(container, asString(item, at));
  throw unexpected('string, list or map', container, at);
}

/**
 * Negative, zero or positive as `left` sorts before, with or after `right`
 */
function compare(left: Value, right: Value, at: Expr): number {
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  return asNumber(left, at) - asNumber(right, at);
}

export function valueEquals(a: Value, b: Value): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    const other = b;
    return a.every((item, i) => valueEquals(item, other[i]));
  }
  if (isRecord(a) || isRecord(b)) {
    if (!isRecord(a) || !isRecord(b)) return false;
    const left = a;
    const right = b;
    const keys = Object.keys(left);
    return (
      keys.length === Object.keys(right).length &&
      keys.every((key) => Object.hasOwn(right, key) && valueEquals(left[key], right[key]))
    );
  }
  return a === b;
}

// Division follows IEEE rules (x / 0 is Infinity); modulo by zero is an error
function nonZero(divisor: number, at: Expr): number {
  if (divisor === 0) {
    throw new ExpressionError('eval', 'modulo by zero', at.position);
  }
  return divisor;
}

function asNumber(value: Value | undefined, at: Expr): number {
  if (typeof value !== 'number') throw unexpected('number', value, at);
  return value;
}

function asString(value: Value | undefined, at: Expr): string {
  if (typeof value !== 'string') throw unexpected('string', value, at);
  return value;
}

function asBoolean(value: Value | undefined, at: Expr): boolean {
  if (typeof value !== 'boolean') throw unexpected('boolean', value, at);
  return value;
}

function unexpected(expected: string, value: Value | undefined, at: Expr): ExpressionError {
  const found = value === undefined ? 'nothing' : describeValue(value);
  return new ExpressionError('eval', `expected ${expected} but found ${found}`, at.position);
}
