import * as fs from 'fs';
import * as path from 'path';
import {
  AdmissionConfig,
  AutomationRule,
  EngineState,
  Policy,
  ValidationMetricsSnapshot,
  ValidationStage,
  Workload,
} from '../types';
import { loadConfig } from '../config';
import { ValidationError, ValidationStageError, withContext } from './errors';
import { ExpressionAnalyzer } from './expression-analyzer';
import { ConsoleLogger, Logger, defaultLogger } from './logger';
import { Clock, MetricsRecorder, systemClock } from './metrics';
import { SchemaStore } from './schema-store';
import { PolicyValidator, StructuralValidator } from './structural-validator';

interface Components {
  structural: PolicyValidator;
  schemas: SchemaStore;
  analyzer: ExpressionAnalyzer;
}

/**
 * Runs every applicable admission check for a document and keeps outcome metrics.
 *
 * Lifecycle: `uninitialized -> initialized -> operating`. Until `initialize()` has
 * completed, every validation fails fast with NOT_INITIALIZED and leaves the
 * metrics untouched.
 */
export class ValidationEngine {
  private readonly config: AdmissionConfig;
  private readonly logger: Logger;
  private readonly recorder: MetricsRecorder;
  private state: EngineState = 'uninitialized';
  private structural?: PolicyValidator;
  private schemas?: SchemaStore;
  private analyzer?: ExpressionAnalyzer;

  constructor(config?: AdmissionConfig, logger: Logger = defaultLogger, clock: Clock = systemClock) {
    this.config = config || loadConfig();
    this.logger = logger;
    this.recorder = new MetricsRecorder(clock);
  }

  /**
   * Build the sub-validators and load the built-in and configured schemas.
   * Any failure leaves the engine uninitialized.
   */
  async initialize(signal?: AbortSignal): Promise<void> {
    let loaded: string[];
    try {
      signal?.throwIfAborted();

      const structural = new StructuralValidator({ maxExpressionLength: this.config.expression.maxLength });
      const schemas = new SchemaStore(this.logger);
      schemas.loadSchemas(await this.readExtraSchemas());
      const analyzer = new ExpressionAnalyzer(this.config.expression);

      signal?.throwIfAborted();

      this.structural = structural;
      this.schemas = schemas;
      this.analyzer = analyzer;
      this.state = 'initialized';
      loaded = schemas.listSchemas();
    } catch (error) {
      this.structural = undefined;
      this.schemas = undefined;
      this.analyzer = undefined;
      this.state = 'uninitialized';
      throw new ValidationError('INITIALIZATION', `failed to initialize validation engine: ${messageOf(error)}`, {
        cause: error,
      });
    }

    this.logger.info('Validation engine initialized successfully', { schemas: loaded });
    this.state = 'operating';
  }

  async validatePolicy(input: unknown): Promise<Policy> {
    return this.measure(async ({ structural, schemas, analyzer }) => {
      const policy = await stage('structural', () => structural.validatePolicy(input));
      await stage('schema', () => schemas.assertValid('policy', input));
      await stage('expression', () => {
        policy.spec.rules.forEach((rule, index) => {
          try {
            analyzer.validateRule(rule);
          } catch (error) {
            throw withContext(error, `rule[${index}] ${JSON.stringify(rule.name)}`);
          }
        });
      });

      this.logger.info('Policy validated successfully', { policy_name: policy.metadata.name });
      return policy;
    });
  }

  async validateWorkload(input: unknown): Promise<Workload> {
    return this.measure(async ({ structural, schemas }) => {
      const workload = await stage('structural', () => structural.validateWorkload(input));
      await stage('schema', () => schemas.assertValid('workload', input));

      this.logger.info('Workload validated successfully', { workload_id: workload.id });
      return workload;
    });
  }

  async validateAutomationRule(input: unknown): Promise<AutomationRule> {
    return this.measure(async ({ structural, analyzer }) => {
      const rule = await stage('structural', () => structural.validateAutomationRule(input));
      await stage('expression', () => analyzer.validateAutomationRule(rule));

      this.logger.info('Automation rule validated successfully', { rule_trigger: rule.trigger });
      return rule;
    });
  }

  async validateExpression(text: string): Promise<void> {
    return this.measure(async ({ structural, analyzer }) => {
      await stage('structural', () => structural.validateExpression(text));
      await stage('expression', () => analyzer.validateExpression(text));

      this.logger.info('Expression validated successfully', { expression_length: text.length });
    });
  }

  /**
   * Liveness probe; does not run any validation
   */
  async health(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    if (!this.structural) {
      throw new ValidationError('NOT_INITIALIZED', 'policy validator not initialized');
    }
    if (!this.schemas) {
      throw new ValidationError('NOT_INITIALIZED', 'schema store not initialized');
    }
    if (!this.analyzer) {
      throw new ValidationError('NOT_INITIALIZED', 'expression analyzer not initialized');
    }
  }

  async metrics(signal?: AbortSignal): Promise<ValidationMetricsSnapshot> {
    signal?.throwIfAborted();
    return this.recorder.snapshot();
  }

  /**
   * Zero all counters; loaded schemas are not affected
   */
  resetMetrics(): void {
    this.recorder.reset();
  }

  /**
   * Recompile the built-in and configured schemas and swap them in as a whole
   */
  async reloadSchemas(): Promise<void> {
    const { schemas } = this.requireOperating();
    schemas.loadSchemas(await this.readExtraSchemas());
    this.logger.info('Schemas reloaded', { schemas: schemas.listSchemas() });
  }

  getPolicyValidator(): PolicyValidator {
    return this.requireOperating().structural;
  }

  getSchemaStore(): SchemaStore {
    return this.requireOperating().schemas;
  }

  getExpressionAnalyzer(): ExpressionAnalyzer {
    return this.requireOperating().analyzer;
  }

  getState(): EngineState {
    return this.state;
  }

  /**
   * Count the call, run `work`, and account its outcome and duration exactly once
   */
  private async measure<T>(work: (components: Components) => Promise<T>): Promise<T> {
    const components = this.requireOperating();
    const start = this.recorder.begin();

    try {
      const result = await work(components);
      this.recorder.recordSuccess();
      return result;
    } catch (error) {
      this.recorder.recordFailure();
      throw error;
    } finally {
      this.recorder.finish(start);
    }
  }

  private requireOperating(): Components {
    const { structural, schemas, analyzer } = this;
    if (this.state !== 'operating' || !structural || !schemas || !analyzer) {
      throw new ValidationError('NOT_INITIALIZED', 'validation engine is not initialized');
    }
    return { structural, schemas, analyzer };
  }

  /**
   * `*.json` files of the configured schema directory, keyed by base name
   */
  private async readExtraSchemas(): Promise<Record<string, string>> {
    const directory = this.config.schemas.directory;
    if (!directory) return {};

    const files = (await fs.promises.readdir(directory)).filter((file) => file.endsWith('.json')).sort();
    const extra: Record<string, string> = {};
    for (const file of files) {
      extra[path.basename(file, '.json')] = await fs.promises.readFile(path.join(directory, file), 'utf-8');
    }
    return extra;
  }
}

/**
 * Run one stage after yielding to the event loop, tagging validation failures with the stage
 */
async function stage<T>(name: ValidationStage, check: () => T): Promise<T> {
  await new Promise<void>((resolve) => setImmediate(resolve));
  try {
    return check();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ValidationStageError(name, error);
    }
    throw error;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Without an explicit logger, logs to the console at the configured level
 */
export function createValidationEngine(config?: AdmissionConfig, logger?: Logger): ValidationEngine {
  const resolved = config || loadConfig();
  return new ValidationEngine(resolved, logger ?? new ConsoleLogger(resolved.logLevel));
}
