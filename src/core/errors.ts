import { SchemaViolation, ValidationStage } from '../types';

/**
 * Error codes raised by the validators
 */
export type ErrorCode =
  | 'EMPTY_INPUT'
  | 'NIL_DOCUMENT'
  | 'INVALID_FIELD'
  | 'SCHEMA_COMPILE'
  | 'SCHEMA_NOT_LOADED'
  | 'PAYLOAD_PARSE'
  | 'SCHEMA_VIOLATION'
  | 'EXPRESSION_SYNTAX'
  | 'DANGEROUS_EXPRESSION'
  | 'UNGROUNDED_EXPRESSION'
  | 'UNBALANCED_PARENTHESES'
  | 'UNBALANCED_BRACKETS'
  | 'CONDITION_COMPILE'
  | 'CONDITION_EVAL'
  | 'CONDITION_NOT_BOOLEAN'
  | 'UNKNOWN_ACTION'
  | 'UNKNOWN_TRIGGER'
  | 'NOT_INITIALIZED'
  | 'INITIALIZATION';

export class ValidationError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ValidationError';
    this.code = code;
  }
}

/**
 * Carries every violation found in one schema pass
 */
export class SchemaViolationError extends ValidationError {
  readonly schemaName: string;
  readonly violations: SchemaViolation[];

  constructor(schemaName: string, violations: SchemaViolation[]) {
    super(
      'SCHEMA_VIOLATION',
      `${schemaName} schema violated: ${violations.map((v) => `${v.path} ${v.message}`).join('; ')}`
    );
    this.name = 'SchemaViolationError';
    this.schemaName = schemaName;
    this.violations = violations;
  }
}

/**
 * Tags a failure with the engine stage that produced it.
 * `code` is the code of the underlying failure.
 */
export class ValidationStageError extends ValidationError {
  readonly stage: ValidationStage;

  constructor(stage: ValidationStage, cause: ValidationError) {
    super(cause.code, `${stage} validation failed: ${cause.message}`, { cause });
    this.name = 'ValidationStageError';
    this.stage = stage;
  }
}

/**
 * Prefix a validation failure with context, keeping its code and the original as cause
 */
export function wrapError(error: ValidationError, context: string): ValidationError {
  return new ValidationError(error.code, `${context}: ${error.message}`, { cause: error });
}

/**
 * `wrapError` for validation failures; anything else is passed through untouched
 */
export function withContext(error: unknown, context: string): unknown {
  return error instanceof ValidationError ? wrapError(error, context) : error;
}

/**
 * Collect schema violations from anywhere in a cause chain
 */
export function findViolations(error: unknown): SchemaViolation[] | undefined {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof SchemaViolationError) {
      return current.violations;
    }
    current = current.cause;
  }
  return undefined;
}
