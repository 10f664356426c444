import Ajv, { SchemaObject, ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import * as yaml from 'yaml';
import { SchemaValidationResult, SchemaViolation } from '../types';
import { SchemaViolationError, ValidationError } from './errors';
import { BUILTIN_SCHEMAS } from './schemas';
import { Logger, defaultLogger } from './logger';

/**
 * Compiles and caches named JSON-Schema documents.
 *
 * The compiled map is replaced wholesale by `loadSchemas()`; single `load()` calls
 * replace one entry. Compiled validators are never mutated once stored.
 */
export class SchemaStore {
  private readonly ajv: Ajv;
  private schemas: Map<string, ValidateFunction> = new Map();
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
    this.ajv = new Ajv({
      allErrors: true,
      // Schemas are keyed by our own names; keeping `$id`s out of the ajv registry
      // lets a schema with an `$id` be reloaded under the same name.
      addUsedSchema: false,
    });
    addFormats(this.ajv);
  }

  /**
   * Compile a schema (JSON text or parsed object) and register it under `name`
   */
  load(name: string, schemaDocument: string | SchemaObject): void {
    const compiled = this.compile(name, schemaDocument);
    this.schemas.set(name, compiled);
    this.logger.debug('Schema loaded', { schema: name });
  }

  /**
   * Compile the built-in schemas plus `extra`, then replace the whole map.
   * If any schema fails to compile the current map is left untouched.
   */
  loadSchemas(extra: Record<string, string | SchemaObject> = {}): void {
    const next = new Map<string, ValidateFunction>();
    const sources: Record<string, string | SchemaObject> = { ...BUILTIN_SCHEMAS, ...extra };

    for (const [name, document] of Object.entries(sources)) {
      next.set(name, this.compile(name, document));
    }

    this.schemas = next;
    this.logger.debug('Schemas loaded', { schemas: [...next.keys()].sort() });
  }

  /**
   * Validate a JSON payload against a named schema
   */
  validate(name: string, payload: string): SchemaValidationResult {
    const validator = this.getValidator(name);

    let data: unknown;
    try {
      data = JSON.parse(payload);
    } catch (error) {
      throw new ValidationError('PAYLOAD_PARSE', `payload is not valid JSON: ${messageOf(error)}`, {
        cause: error,
      });
    }

    return this.run(validator, data);
  }

  /**
   * Validate a YAML payload against a named schema.
   * The YAML is re-encoded as JSON first; numbers and booleans keep their types.
   */
  validateYAML(name: string, yamlPayload: string): SchemaValidationResult {
    // Fail on unknown schemas before spending time on the payload
    this.getValidator(name);

    let data: unknown;
    try {
      data = yaml.parse(yamlPayload);
    } catch (error) {
      throw new ValidationError('PAYLOAD_PARSE', `payload is not valid YAML: ${messageOf(error)}`, {
        cause: error,
      });
    }

    // undefined (an empty document) has no JSON encoding
    return this.validate(name, JSON.stringify(data ?? null));
  }

  /**
   * Validate an already decoded value against a named schema
   */
  validateValue(name: string, value: unknown): SchemaValidationResult {
    return this.run(this.getValidator(name), value);
  }

  /**
   * Like `validateValue`, but throws a SchemaViolationError listing every violation
   */
  assertValid(name: string, value: unknown): void {
    const result = this.validateValue(name, value);
    if (!result.valid) {
      throw new SchemaViolationError(name, result.violations);
    }
  }

  hasSchema(name: string): boolean {
    return this.schemas.has(name);
  }

  /**
   * Names of the loaded schemas, sorted
   */
  listSchemas(): string[] {
    return [...this.schemas.keys()].sort();
  }

  private getValidator(name: string): ValidateFunction {
    const validator = this.schemas.get(name);
    if (!validator) {
      throw new ValidationError('SCHEMA_NOT_LOADED', `schema ${name} not loaded`);
    }
    return validator;
  }

  private compile(name: string, schemaDocument: string | SchemaObject): ValidateFunction {
    const schema = typeof schemaDocument === 'string' ? parseSchema(name, schemaDocument) : schemaDocument;
    try {
      return this.ajv.compile(schema);
    } catch (error) {
      throw new ValidationError('SCHEMA_COMPILE', `failed to load ${name} schema: ${messageOf(error)}`, {
        cause: error,
      });
    }
  }

  private run(validator: ValidateFunction, data: unknown): SchemaValidationResult {
    if (validator(data)) {
      return { valid: true };
    }
    return { valid: false, violations: (validator.errors ?? []).map(toViolation) };
  }
}

/**
 * Map an ajv error to a violation; `required` errors point at the missing property
 */
export function toViolation(error: ErrorObject): SchemaViolation {
  let path = error.instancePath;
  if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
    path = `${path}/${error.params.missingProperty}`;
  }
  return {
    path: path || '/',
    message: error.message ?? `failed ${error.keyword} check`,
  };
}

function parseSchema(name: string, text: string): SchemaObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ValidationError('SCHEMA_COMPILE', `failed to load ${name} schema: ${messageOf(error)}`, {
      cause: error,
    });
  }
  if (!isSchemaObject(parsed)) {
    throw new ValidationError(
      'SCHEMA_COMPILE',
      `failed to load ${name} schema: schema must be a JSON object without $async`
    );
  }
  return parsed;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return !('$async' in value) || value.$async !== true;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
