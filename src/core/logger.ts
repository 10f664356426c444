import { LogLevel } from '../types';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Render fields as `key=value` pairs; strings containing spaces are quoted
 */
export function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  return Object.entries(fields)
    .map(([key, value]) => {
      const rendered =
        value instanceof Date
          ? value.toISOString()
          : typeof value === 'string'
            ? value
            : JSON.stringify(value);
      return /\s/.test(rendered) ? `${key}="${rendered}"` : `${key}=${rendered}`;
    })
    .join(' ');
}

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly prefix: string = '[admission]'
  ) {}

  debug(message: string, fields?: LogFields): void {
    if (this.enabled('debug')) console.debug(this.format(message, fields));
  }

  info(message: string, fields?: LogFields): void {
    if (this.enabled('info')) console.info(this.format(message, fields));
  }

  warn(message: string, fields?: LogFields): void {
    if (this.enabled('warn')) console.warn(this.format(message, fields));
  }

  error(message: string, fields?: LogFields): void {
    if (this.enabled('error')) console.error(this.format(message, fields));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(message: string, fields?: LogFields): string {
    const rendered = formatFields(fields);
    return rendered ? `${this.prefix} ${message} ${rendered}` : `${this.prefix} ${message}`;
  }
}

export const defaultLogger = new ConsoleLogger();
