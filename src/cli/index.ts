#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Argument, Command } from 'commander';
import * as yaml from 'yaml';
import { ValidationEngine, createValidationEngine } from '../core';
import { isRecord } from '../core/documents';
import { ValidationError, ValidationStageError, findViolations } from '../core/errors';
import { loadConfig } from '../config';
import { startServer } from '../api';
import { AdmissionConfig, ValidationMetricsSnapshot } from '../types';

export const DOCUMENT_KINDS = ['policy', 'workload', 'automation-rule'] as const;

export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

/**
 * Where command output goes; replaced in tests
 */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function isYamlFile(file: string): boolean {
  return ['.yml', '.yaml'].includes(path.extname(file).toLowerCase());
}

/**
 * Read a JSON or YAML document, chosen by file extension
 */
export function readDocument(file: string): unknown {
  const text = fs.readFileSync(file, 'utf-8');
  if (isYamlFile(file)) {
    try {
      return yaml.parse(text);
    } catch (error) {
      throw new ValidationError('PAYLOAD_PARSE', `${file} is not valid YAML: ${messageOf(error)}`, { cause: error });
    }
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ValidationError('PAYLOAD_PARSE', `${file} is not valid JSON: ${messageOf(error)}`, { cause: error });
  }
}

export function formatMetrics(snapshot: ValidationMetricsSnapshot): string[] {
  return [
    '=== Validation Metrics ===',
    `Total:            ${snapshot.total}`,
    `Successful:       ${snapshot.successful}`,
    `Failed:           ${snapshot.failed}`,
    `Success Rate:     ${snapshot.successRate.toFixed(1)}%`,
    `Average Duration: ${snapshot.averageDurationMs.toFixed(3)}ms`,
    `Last Validation:  ${snapshot.lastValidationTime ? snapshot.lastValidationTime.toISOString() : 'never'}`,
  ];
}

/**
 * Build the command tree. `config` defaults to the configuration found from the working directory.
 */
export function createProgram(io: CliIO = consoleIO, config?: AdmissionConfig): Command {
  const program = new Command();
  const effectiveConfig = (): AdmissionConfig => config ?? loadConfig();

  async function engine(): Promise<ValidationEngine> {
    const instance = createValidationEngine(effectiveConfig());
    await instance.initialize();
    return instance;
  }

  function reportFailure(error: unknown): void {
    if (error instanceof ValidationError) {
      const stage = error instanceof ValidationStageError ? ` [${error.stage}]` : '';
      io.err(`❌ ${error.message}`);
      io.err(`   code: ${error.code}${stage}`);
      (findViolations(error) ?? []).forEach((violation) => io.err(`   - ${violation.path} ${violation.message}`));
    } else {
      io.err(`❌ ${messageOf(error)}`);
    }
    io.setExitCode(1);
  }

  program
    .name('policy-admission')
    .description('Admission-time validation for policies, workloads and automation rules')
    .version('1.0.0');

  /**
   * Validate command
   */
  program
    .command('validate')
    .description('Run every admission stage for a document file (JSON or YAML)')
    .addArgument(new Argument('<kind>', 'document kind').choices(DOCUMENT_KINDS))
    .argument('<file>', 'path to the document')
    .action(async (kind: DocumentKind, file: string) => {
      try {
        const input = readDocument(file);
        const instance = await engine();
        switch (kind) {
          case 'policy': {
            const policy = await instance.validatePolicy(input);
            io.out(`✅ policy ${policy.metadata.name} is valid (${policy.spec.rules.length} rule(s) checked)`);
            break;
          }
          case 'workload': {
            const workload = await instance.validateWorkload(input);
            io.out(`✅ workload ${workload.id} is valid`);
            break;
          }
          case 'automation-rule': {
            const rule = await instance.validateAutomationRule(input);
            io.out(`✅ automation rule on ${rule.trigger} is valid`);
            break;
          }
        }
      } catch (error) {
        reportFailure(error);
      }
    });

  /**
   * Schema command
   */
  program
    .command('schema')
    .description('Check a JSON or YAML file against a named schema')
    .argument('<name>', 'schema name')
    .argument('<file>', 'path to the payload')
    .action(async (name: string, file: string) => {
      try {
        const payload = fs.readFileSync(file, 'utf-8');
        const store = (await engine()).getSchemaStore();
        const result = isYamlFile(file) ? store.validateYAML(name, payload) : store.validate(name, payload);
        if (result.valid) {
          io.out(`✅ ${file} conforms to schema ${name}`);
          return;
        }
        io.err(`❌ ${file} violates schema ${name}:`);
        result.violations.forEach((violation) => io.err(`   - ${violation.path} ${violation.message}`));
        io.setExitCode(1);
      } catch (error) {
        reportFailure(error);
      }
    });

  /**
   * Expression command
   */
  program
    .command('expression')
    .description('Check that a rule expression is safe and compiles')
    .argument('<text>', 'expression text')
    .action(async (text: string) => {
      try {
        await (await engine()).validateExpression(text);
        io.out('✅ expression is valid');
      } catch (error) {
        reportFailure(error);
      }
    });

  /**
   * Condition command
   */
  program
    .command('condition')
    .description('Check that a condition compiles and evaluates to a boolean')
    .argument('<text>', 'condition text')
    .action(async (text: string) => {
      try {
        (await engine()).getExpressionAnalyzer().validateCondition(text);
        io.out('✅ condition is valid');
      } catch (error) {
        reportFailure(error);
      }
    });

  /**
   * Schemas command
   */
  program
    .command('schemas')
    .description('List the loaded schemas')
    .action(async () => {
      try {
        const schemas = (await engine()).getSchemaStore().listSchemas();
        io.out('=== Schemas ===');
        schemas.forEach((name) => io.out(`  • ${name}`));
      } catch (error) {
        reportFailure(error);
      }
    });

  /**
   * Metrics command
   */
  program
    .command('metrics')
    .description('Show validation metrics of a running server')
    .option('-u, --url <url>', 'server base URL', 'http://localhost:8080')
    .action(async (options: { url: string }) => {
      try {
        const response = await fetch(new URL('/admission/metrics', options.url));
        if (!response.ok) {
          throw new Error(`server answered ${response.status} ${response.statusText}`);
        }
        const body: unknown = await response.json();
        toSnapshotLines(body).forEach((line) => io.out(line));
      } catch (error) {
        reportFailure(error);
      }
    });

  /**
   * Server command
   */
  program
    .command('serve')
    .description('Start the admission HTTP server')
    .option('-p, --port <port>', 'Port to listen on')
    .action(async (options: { port?: string }) => {
      const resolved = effectiveConfig();
      const port = options.port === undefined ? resolved.server.port : parseInt(options.port, 10);
      io.out('🚀 Starting admission server...');
      await startServer(port, createValidationEngine(resolved));
    });

  return program;
}

function toSnapshotLines(body: unknown): string[] {
  if (!isRecord(body)) {
    throw new Error('server returned no metrics');
  }
  const read = (key: string): number => {
    const value = body[key];
    return typeof value === 'number' ? value : 0;
  };
  const last = body.lastValidationTime;
  return formatMetrics({
    total: read('total'),
    successful: read('successful'),
    failed: read('failed'),
    successRate: read('successRate'),
    averageDurationMs: read('averageDurationMs'),
    lastValidationTime: typeof last === 'string' ? new Date(last) : undefined,
  });
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

if (require.main === module) {
  createProgram()
    .parseAsync()
    .catch((error: unknown) => {
      console.error(`❌ ${messageOf(error)}`);
      process.exitCode = 1;
    });
}
