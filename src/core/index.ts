export { ValidationEngine, createValidationEngine } from './validation-engine';
export { SchemaStore, toViolation } from './schema-store';
export { ExpressionAnalyzer, ACTION_VOCABULARY, TRIGGER_VOCABULARY, isBalanced } from './expression-analyzer';
export { StructuralValidator, PolicyValidator } from './structural-validator';
export { MetricsRecorder, Clock, systemClock } from './metrics';
export {
  ValidationError,
  SchemaViolationError,
  ValidationStageError,
  ErrorCode,
  wrapError,
  withContext,
  findViolations,
} from './errors';
export { Logger, ConsoleLogger, defaultLogger } from './logger';
export { BUILTIN_SCHEMAS, PolicySchema, WorkloadSchema } from './schemas';
