import { Expr, ExprType, Value, ValueRecord } from './ast';
import { typeOf } from './checker';
import { Environment } from './environment';
import { evaluate } from './interpreter';
import { parse } from './parser';

export * from './ast';
export * from './environment';
export { tokenize } from './lexer';
export { parse } from './parser';
export { typeOf, BUILTINS, isBuiltin } from './checker';
export { evaluate, valueEquals } from './interpreter';

export interface CompileLimits {
  maxDepth: number;
}

/**
 * A type-checked expression, ready to run
 */
export interface CompiledExpression {
  source: string;
  ast: Expr;
  type: ExprType;
}

export function compile(source: string, env: Environment, limits: CompileLimits): CompiledExpression {
  const ast = parse(source, { maxDepth: limits.maxDepth });
  return { source, ast, type: typeOf(ast, env) };
}

export function run(compiled: CompiledExpression, values: ValueRecord, stepBudget: number): Value {
  return evaluate(compiled.ast, values, { stepBudget });
}
