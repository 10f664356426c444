import { AdmissionConfig, AutomationRule, Rule } from '../types';
import { ValidationError, withContext } from './errors';
import {
  CONDITION_ENVIRONMENT,
  CompiledExpression,
  Environment,
  ExpressionError,
  FULL_ENVIRONMENT,
  ROOT_BINDINGS,
  Value,
  ValueRecord,
  compile,
  conditionSampleValues,
  describeValue,
  run,
} from './expression';

export type AnalyzerOptions = AdmissionConfig['expression'];

/**
 * Action vocabulary; an action is accepted if it contains one of these
 */
export const ACTION_VOCABULARY = [
  'scale-up',
  'scale-down',
  'scale-workload',
  'reduce-cpu',
  'reduce-memory',
  'reduce-storage',
  'optimize-storage',
  'resource-adjustment',
  'notification',
  'alert',
  'log',
  'enable',
  'disable',
  'suspend',
] as const;

/**
 * Operator-defined actions carry this marker
 */
export const CUSTOM_ACTION_MARKER = 'custom-';

export const TRIGGER_VOCABULARY = [
  'event-based',
  'time-based',
  'threshold-based',
  'schedule-based',
  'condition-based',
  'metric-based',
  'cpu-usage',
  'memory-usage',
  'workload-created',
  'workload-updated',
  'workload-deleted',
  'policy-violation',
] as const;

/**
 * Textual tripwire; the closed environment is what actually keeps expressions contained
 */
const DANGEROUS_PATTERNS: RegExp[] = [
  /\.(exec|system|eval|import|__)/,
  /\b(exec|system|eval|import|__)\s*\(/,
  /\b(os|sys|runtime)\s*\./,
  /\b(panic|recover|defer)\s*\(/,
];

const GROUNDING_PATTERN = new RegExp(`\\b(${ROOT_BINDINGS.join('|')})\\b`);

/**
 * Decides whether rule expressions, conditions, actions and triggers are safe to admit.
 *
 * Expressions are checked in two tiers: a content policy over the raw text
 * (denylist, grounding, delimiter balance), then compilation against a closed, typed
 * environment. Conditions are additionally run against sample values and must
 * produce a boolean.
 */
export class ExpressionAnalyzer {
  constructor(private readonly options: AnalyzerOptions) {}

  validateExpression(text: string): CompiledExpression {
    if (text.trim() === '') {
      throw new ValidationError('EMPTY_INPUT', 'expression cannot be empty');
    }
    if (text.length > this.options.maxLength) {
      throw new ValidationError(
        'EXPRESSION_SYNTAX',
        `expression is longer than ${this.options.maxLength} characters`
      );
    }

    for (const pattern of DANGEROUS_PATTERNS) {
      const match = pattern.exec(text);
      if (match) {
        throw new ValidationError(
          'DANGEROUS_EXPRESSION',
          `expression contains potentially dangerous pattern: ${match[0]}`
        );
      }
    }

    if (!GROUNDING_PATTERN.test(text)) {
      throw new ValidationError(
        'UNGROUNDED_EXPRESSION',
        `expression must reference at least one of: ${ROOT_BINDINGS.join(', ')}`
      );
    }

    if (!isBalanced(text, '(', ')')) {
      throw new ValidationError('UNBALANCED_PARENTHESES', 'expression has unbalanced parentheses');
    }
    if (!isBalanced(text, '[', ']')) {
      throw new ValidationError('UNBALANCED_BRACKETS', 'expression has unbalanced brackets');
    }

    return this.compileIn(text, FULL_ENVIRONMENT, 'EXPRESSION_SYNTAX', 'invalid expression syntax');
  }

  /**
   * Validate a gating predicate: a safe expression that compiles against the condition
   * environment and evaluates to a boolean for the configured sample
   */
  validateCondition(text: string): void {
    if (text === '') {
      throw new ValidationError('EMPTY_INPUT', 'condition cannot be empty');
    }

    try {
      this.validateExpression(text);
    } catch (error) {
      throw withContext(error, 'condition validation failed');
    }

    const compiled = this.compileIn(
      text,
      CONDITION_ENVIRONMENT,
      'CONDITION_COMPILE',
      'failed to compile condition'
    );

    let result: Value;
    try {
      result = run(compiled, conditionSampleValues(this.options.conditionSample), this.options.stepBudget);
    } catch (error) {
      throw new ValidationError('CONDITION_EVAL', `failed to evaluate condition: ${messageOf(error)}`, {
        cause: error,
      });
    }

    if (typeof result !== 'boolean') {
      throw new ValidationError(
        'CONDITION_NOT_BOOLEAN',
        `condition must evaluate to a boolean value, got ${describeValue(result)}`
      );
    }
  }

  validateAction(text: string): void {
    const lower = text.toLowerCase();
    if (ACTION_VOCABULARY.some((action) => lower.includes(action))) return;
    if (text.includes(CUSTOM_ACTION_MARKER)) return;

    throw new ValidationError('UNKNOWN_ACTION', `invalid action: ${text}`);
  }

  validateTrigger(text: string): void {
    if (text === '') {
      throw new ValidationError('EMPTY_INPUT', 'trigger cannot be empty');
    }

    const lower = text.toLowerCase();
    if (!TRIGGER_VOCABULARY.some((trigger) => lower.includes(trigger))) {
      throw new ValidationError('UNKNOWN_TRIGGER', `invalid trigger type: ${text}`);
    }
  }

  validateRule(rule: Rule | null | undefined): void {
    if (!rule) {
      throw new ValidationError('NIL_DOCUMENT', 'rule cannot be nil');
    }
    if (!rule.name) {
      throw new ValidationError('EMPTY_INPUT', 'rule name cannot be empty');
    }
    if (!rule.condition) {
      throw new ValidationError('EMPTY_INPUT', 'rule condition cannot be empty');
    }
    if (!rule.action) {
      throw new ValidationError('EMPTY_INPUT', 'rule action cannot be empty');
    }

    try {
      this.validateCondition(rule.condition);
    } catch (error) {
      throw withContext(error, 'rule condition validation failed');
    }

    try {
      this.validateAction(rule.action);
    } catch (error) {
      throw withContext(error, 'rule action validation failed');
    }
  }

  validateAutomationRule(rule: AutomationRule | null | undefined): void {
    if (!rule) {
      throw new ValidationError('NIL_DOCUMENT', 'automation rule cannot be nil');
    }

    if (!rule.trigger) {
      throw new ValidationError('EMPTY_INPUT', 'automation rule trigger cannot be empty');
    }
    try {
      this.validateTrigger(rule.trigger);
    } catch (error) {
      throw withContext(error, 'trigger validation failed');
    }

    if (!rule.action) {
      throw new ValidationError('EMPTY_INPUT', 'automation rule action cannot be empty');
    }
    try {
      this.validateAction(rule.action);
    } catch (error) {
      throw withContext(error, 'action validation failed');
    }

    (rule.conditions ?? []).forEach((condition, index) => {
      try {
        this.validateCondition(condition);
      } catch (error) {
        throw withContext(error, `condition ${index} validation failed`);
      }
    });
  }

  /**
   * Compile an expression against the full environment without the content policy
   */
  compile(text: string, env: Environment = FULL_ENVIRONMENT): CompiledExpression {
    return this.compileIn(text, env, 'EXPRESSION_SYNTAX', 'invalid expression syntax');
  }

  /**
   * Run a compiled expression against concrete root values
   */
  evaluate(compiled: CompiledExpression, values: ValueRecord): Value {
    try {
      return run(compiled, values, this.options.stepBudget);
    } catch (error) {
      throw new ValidationError('CONDITION_EVAL', `failed to evaluate expression: ${messageOf(error)}`, {
        cause: error,
      });
    }
  }

  private compileIn(
    text: string,
    env: Environment,
    code: 'EXPRESSION_SYNTAX' | 'CONDITION_COMPILE',
    context: string
  ): CompiledExpression {
    try {
      return compile(text, env, { maxDepth: this.options.maxDepth });
    } catch (error) {
      if (error instanceof ExpressionError) {
        throw new ValidationError(code, `${context}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}

/**
 * Running-counter scan; the counter may never go negative
 */
export function isBalanced(text: string, open: string, close: string): boolean {
  let depth = 0;
  for (const char of text) {
    if (char === open) depth++;
    else if (char === close && --depth < 0) return false;
  }
  return depth === 0;
}


function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
