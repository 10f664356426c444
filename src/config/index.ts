import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { AdmissionConfig, LogLevel } from '../types';

/**
 * Default configuration for the admission validator
 */
const DEFAULT_CONFIG: AdmissionConfig = {
  logLevel: 'info',
  server: {
    port: 8080,
  },
  expression: {
    maxLength: 4096,
    maxDepth: 64,
    stepBudget: 1000,
    conditionSample: {
      cpuUsage: 0.5,
      memoryUsage: 0.6,
    },
  },
  schemas: {},
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.policy-admission/config.yml',
  '.policy-admission/config.yaml',
  'policy-admission.yml',
  'policy-admission.yaml',
];

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Partial configuration as it may appear in a config file
 */
export interface ConfigOverride {
  logLevel?: LogLevel;
  server?: Partial<AdmissionConfig['server']>;
  expression?: Partial<Omit<AdmissionConfig['expression'], 'conditionSample'>> & {
    conditionSample?: Partial<AdmissionConfig['expression']['conditionSample']>;
  };
  schemas?: Partial<AdmissionConfig['schemas']>;
}

/**
 * Load configuration from file or use defaults
 */
export function loadConfig(basePath?: string): AdmissionConfig {
  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(basePath || process.cwd(), p));

  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        const parsed: unknown = yaml.parse(content);
        const config = mergeConfig(getDefaultConfig(), toOverride(parsed));
        // Relative schema directories resolve against the config file location
        if (config.schemas.directory && !path.isAbsolute(config.schemas.directory)) {
          config.schemas.directory = path.resolve(path.dirname(configPath), config.schemas.directory);
        }
        return config;
      } catch (error) {
        console.warn(`Warning: Failed to parse config at ${configPath}:`, error);
      }
    }
  }

  return getDefaultConfig();
}

/**
 * Deep merge configuration with defaults
 */
export function mergeConfig(defaults: AdmissionConfig, override: ConfigOverride): AdmissionConfig {
  const expression = override.expression ?? {};
  return {
    logLevel: override.logLevel !== undefined ? override.logLevel : defaults.logLevel,
    server: { ...defaults.server, ...override.server },
    expression: {
      maxLength: expression.maxLength ?? defaults.expression.maxLength,
      maxDepth: expression.maxDepth ?? defaults.expression.maxDepth,
      stepBudget: expression.stepBudget ?? defaults.expression.stepBudget,
      conditionSample: {
        ...defaults.expression.conditionSample,
        ...expression.conditionSample,
      },
    },
    schemas: { ...defaults.schemas, ...override.schemas },
  };
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): AdmissionConfig {
  return {
    logLevel: DEFAULT_CONFIG.logLevel,
    server: { ...DEFAULT_CONFIG.server },
    expression: {
      ...DEFAULT_CONFIG.expression,
      conditionSample: { ...DEFAULT_CONFIG.expression.conditionSample },
    },
    schemas: { ...DEFAULT_CONFIG.schemas },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AdmissionConfig): string[] {
  const errors: string[] = [];

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push(`Invalid log level: ${config.logLevel}. Must be one of ${LOG_LEVELS.join(', ')}.`);
  }

  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push(`Invalid server port: ${config.server.port}. Must be between 0 and 65535.`);
  }

  const { maxLength, maxDepth, stepBudget, conditionSample } = config.expression;
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    errors.push('expression.maxLength must be a positive integer.');
  }
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    errors.push('expression.maxDepth must be a positive integer.');
  }
  if (!Number.isInteger(stepBudget) || stepBudget < 1) {
    errors.push('expression.stepBudget must be a positive integer.');
  }
  if (typeof conditionSample.cpuUsage !== 'number' || typeof conditionSample.memoryUsage !== 'number') {
    errors.push('expression.conditionSample values must be numbers.');
  }

  return errors;
}

/**
 * Pick the recognized settings out of a parsed config file
 */
export function toOverride(parsed: unknown): ConfigOverride {
  if (!isRecord(parsed)) return {};
  const override: ConfigOverride = {};

  const logLevel = parsed.logLevel;
  if (typeof logLevel === 'string') {
    const level = LOG_LEVELS.find((l) => l === logLevel);
    if (level) override.logLevel = level;
  }

  if (isRecord(parsed.server) && typeof parsed.server.port === 'number') {
    override.server = { port: parsed.server.port };
  }

  if (isRecord(parsed.expression)) {
    const source = parsed.expression;
    const expression: NonNullable<ConfigOverride['expression']> = {};
    if (typeof source.maxLength === 'number') expression.maxLength = source.maxLength;
    if (typeof source.maxDepth === 'number') expression.maxDepth = source.maxDepth;
    if (typeof source.stepBudget === 'number') expression.stepBudget = source.stepBudget;
    if (isRecord(source.conditionSample)) {
      const sample = source.conditionSample;
      expression.conditionSample = {};
      if (typeof sample.cpuUsage === 'number') expression.conditionSample.cpuUsage = sample.cpuUsage;
      if (typeof sample.memoryUsage === 'number') expression.conditionSample.memoryUsage = sample.memoryUsage;
    }
    override.expression = expression;
  }

  if (isRecord(parsed.schemas) && typeof parsed.schemas.directory === 'string') {
    override.schemas = { directory: parsed.schemas.directory };
  }

  return override;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
