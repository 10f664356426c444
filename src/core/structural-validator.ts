import { AutomationRule, MAX_PRIORITY, MIN_PRIORITY, Policy, Workload } from '../types';
import { ValidationError, withContext } from './errors';
import { decodeAutomationRule, decodePolicy, decodeWorkload } from './documents';

/**
 * Field-level checks (presence, formats, enum membership) independent of JSON-Schema.
 * Each method decodes untrusted input and returns the typed document on success.
 */
export interface PolicyValidator {
  validatePolicy(input: unknown): Policy;
  validateWorkload(input: unknown): Workload;
  validateAutomationRule(input: unknown): AutomationRule;
  validateExpression(text: string): void;
  validatePercentage(value: string): void;
  validateTimeRange(start: Date | undefined, end: Date | undefined): void;
}

const DNS_LABEL = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
const QUALIFIED_KEY = /^([a-zA-Z0-9]([a-zA-Z0-9\-_.]*[a-zA-Z0-9])?\/)?[a-zA-Z0-9]([a-zA-Z0-9\-_.]*[a-zA-Z0-9])?$/;
const LABEL_VALUE = /^[a-zA-Z0-9]([a-zA-Z0-9\-_.]*[a-zA-Z0-9])?$/;
const PERCENTAGE_NUMBER = /^\d+(\.\d+)?$/;
const DURATION = /^\d+(ms|s|m|h)$/;
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/;

const MAX_NAME_LENGTH = 253;
const MAX_NAMESPACE_LENGTH = 63;
const MAX_KEY_LENGTH = 253;
const MAX_LABEL_VALUE_LENGTH = 63;
const MAX_ANNOTATION_VALUE_LENGTH = 262144;

export interface StructuralValidatorOptions {
  /** Longest expression accepted, in characters */
  maxExpressionLength: number;
}

export class StructuralValidator implements PolicyValidator {
  constructor(private readonly options: StructuralValidatorOptions) {}

  validatePolicy(input: unknown): Policy {
    const policy = decodePolicy(input);
    const { metadata, spec } = policy;

    try {
      this.validateName(metadata.name);
      if (metadata.namespace !== undefined && metadata.namespace !== '') {
        this.validateNamespace(metadata.namespace);
      }
      this.validateLabels(metadata.labels);
      this.validateAnnotations(metadata.annotations);
    } catch (error) {
      throw withContext(error, 'metadata validation failed');
    }

    if (metadata.priority === undefined) {
      throw new ValidationError('EMPTY_INPUT', 'policy priority must be greater than 0');
    }
    if (metadata.priority <= 0) {
      throw new ValidationError('INVALID_FIELD', 'policy priority must be greater than 0');
    }
    if (!Number.isInteger(metadata.priority) || metadata.priority < MIN_PRIORITY || metadata.priority > MAX_PRIORITY) {
      throw new ValidationError(
        'INVALID_FIELD',
        `policy priority must be an integer between ${MIN_PRIORITY} and ${MAX_PRIORITY}`
      );
    }

    if (metadata.status === undefined) {
      throw new ValidationError('EMPTY_INPUT', 'policy status cannot be empty');
    }

    spec.objectives.forEach((objective, index) => {
      if (objective.target.endsWith('%')) {
        this.checkPercentage(objective.target, `spec.objectives[${index}].target`);
      }
    });
    spec.constraints.forEach((constraint, index) => {
      if (constraint.value.endsWith('%')) {
        this.checkPercentage(constraint.value, `spec.constraints[${index}].value`);
      }
    });

    return policy;
  }

  validateWorkload(input: unknown): Workload {
    const workload = decodeWorkload(input);

    try {
      this.validateLabels(workload.labels);
    } catch (error) {
      throw withContext(error, 'workload labels validation failed');
    }
    try {
      this.validateAnnotations(workload.annotations);
    } catch (error) {
      throw withContext(error, 'workload annotations validation failed');
    }

    return workload;
  }

  validateAutomationRule(input: unknown): AutomationRule {
    const rule = decodeAutomationRule(input);

    if (rule.delay !== undefined && !DURATION.test(rule.delay)) {
      throw new ValidationError(
        'INVALID_FIELD',
        `delay must be a duration such as 250ms, 30s, 5m or 1h (got ${rule.delay})`
      );
    }

    return rule;
  }

  validateExpression(text: string): void {
    if (text.trim() === '') {
      throw new ValidationError('EMPTY_INPUT', 'expression cannot be empty');
    }
    if (text.length > this.options.maxExpressionLength) {
      throw new ValidationError(
        'INVALID_FIELD',
        `expression cannot exceed ${this.options.maxExpressionLength} characters`
      );
    }
    if (CONTROL_CHARACTERS.test(text)) {
      throw new ValidationError('INVALID_FIELD', 'expression cannot contain control characters');
    }
  }

  /**
   * Accepts values such as "20%" or "12.5%"
   */
  validatePercentage(value: string): void {
    if (value === '') {
      throw new ValidationError('EMPTY_INPUT', 'percentage value cannot be empty');
    }
    if (!value.endsWith('%')) {
      throw new ValidationError('INVALID_FIELD', 'percentage value must end with %');
    }

    const numeric = value.slice(0, -1);
    if (numeric === '') {
      throw new ValidationError('INVALID_FIELD', 'percentage value must contain a numeric part');
    }
    if (!PERCENTAGE_NUMBER.test(numeric)) {
      throw new ValidationError('INVALID_FIELD', 'percentage value must be a valid number');
    }
  }

  validateTimeRange(start: Date | undefined, end: Date | undefined): void {
    if (start === undefined) {
      throw new ValidationError('EMPTY_INPUT', 'start time cannot be empty');
    }
    if (end === undefined) {
      throw new ValidationError('EMPTY_INPUT', 'end time cannot be empty');
    }
    if (Number.isNaN(start.getTime())) {
      throw new ValidationError('INVALID_FIELD', 'start time must be a valid date');
    }
    if (Number.isNaN(end.getTime())) {
      throw new ValidationError('INVALID_FIELD', 'end time must be a valid date');
    }
    if (start.getTime() > end.getTime()) {
      throw new ValidationError('INVALID_FIELD', 'start time cannot be after end time');
    }
  }

  private checkPercentage(value: string, path: string): void {
    try {
      this.validatePercentage(value);
    } catch (error) {
      throw withContext(error, path);
    }
  }

  private validateName(name: string): void {
    if (name.length > MAX_NAME_LENGTH) {
      throw new ValidationError('INVALID_FIELD', `invalid name: name cannot exceed ${MAX_NAME_LENGTH} characters`);
    }
    if (!DNS_LABEL.test(name)) {
      throw new ValidationError(
        'INVALID_FIELD',
        'invalid name: name must be a valid DNS subdomain name (lowercase alphanumeric and hyphens only)'
      );
    }
  }

  private validateNamespace(namespace: string): void {
    if (namespace.length > MAX_NAMESPACE_LENGTH) {
      throw new ValidationError(
        'INVALID_FIELD',
        `invalid namespace: namespace cannot exceed ${MAX_NAMESPACE_LENGTH} characters`
      );
    }
    if (!DNS_LABEL.test(namespace)) {
      throw new ValidationError('INVALID_FIELD', 'invalid namespace: namespace must be a valid DNS label name');
    }
  }

  private validateLabels(labels: Record<string, string> | undefined): void {
    for (const [key, value] of Object.entries(labels ?? {})) {
      this.validateKey(key, 'label');
      if (value.length > MAX_LABEL_VALUE_LENGTH) {
        throw new ValidationError(
          'INVALID_FIELD',
          `invalid label value for key ${key}: label value cannot exceed ${MAX_LABEL_VALUE_LENGTH} characters`
        );
      }
      // Empty values are allowed
      if (value !== '' && !LABEL_VALUE.test(value)) {
        throw new ValidationError(
          'INVALID_FIELD',
          `invalid label value for key ${key}: label value must be a valid label value format`
        );
      }
    }
  }

  private validateAnnotations(annotations: Record<string, string> | undefined): void {
    for (const [key, value] of Object.entries(annotations ?? {})) {
      this.validateKey(key, 'annotation');
      if (value.length > MAX_ANNOTATION_VALUE_LENGTH) {
        throw new ValidationError(
          'INVALID_FIELD',
          `invalid annotation value for key ${key}: annotation value cannot exceed ${MAX_ANNOTATION_VALUE_LENGTH} characters`
        );
      }
    }
  }

  private validateKey(key: string, kind: 'label' | 'annotation'): void {
    if (key === '') {
      throw new ValidationError('EMPTY_INPUT', `${kind} key cannot be empty`);
    }
    if (key.length > MAX_KEY_LENGTH) {
      throw new ValidationError(
        'INVALID_FIELD',
        `invalid ${kind} key ${key}: ${kind} key cannot exceed ${MAX_KEY_LENGTH} characters`
      );
    }
    if (!QUALIFIED_KEY.test(key)) {
      throw new ValidationError(
        'INVALID_FIELD',
        `invalid ${kind} key ${key}: ${kind} key must be a valid ${kind} key format`
      );
    }
  }
}
