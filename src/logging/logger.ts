/**
 * Logging for the kernel and the CLI.
 *
 * Entries name the plugin, the pipeline (a filter or an action) and the
 * context they are about as fields of their own, next to the component of
 * the logger that wrote them. ConsoleTransport prints one line per entry on
 * stderr; stdout belongs to command output.
 */

import chalk from 'chalk';
import { errorMessage } from '../errors.js';

export type LogLevel = 'debug' | 'warn' | 'error';

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
  error: 2,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(SEVERITY, value);
}

export interface LogFields {
  plugin?: string;
  /** Filter or action name */
  pipeline?: string;
  callback?: string;
  context?: string;
  /** File, directory or package an entry was read from */
  source?: string;
  error?: unknown;
}

export interface LoggedError {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

export interface LogEntry extends Omit<LogFields, 'error'> {
  level: LogLevel;
  message: string;
  /** ISO 8601 */
  timestamp: string;
  /** Dotted path of the logger, e.g. `kernel.plugins` */
  component?: string;
  error?: LoggedError;
}

export interface Transport {
  write(entry: LogEntry): void;
}

// Printed in this order after the message.
const FIELD_NAMES = ['plugin', 'pipeline', 'callback', 'context', 'source'] as const;

const LEVEL_LABEL: Record<LogLevel, (text: string) => string> = {
  debug: (text) => chalk.gray(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

export class ConsoleTransport implements Transport {
  constructor(private readonly stream: NodeJS.WritableStream = process.stderr) {}

  write(entry: LogEntry): void {
    const label = LEVEL_LABEL[entry.level](entry.level.toUpperCase().padStart(5));
    const component = entry.component ? chalk.blue(` [${entry.component}]`) : '';
    let line = `${chalk.dim(entry.timestamp)} ${label}${component} ${entry.message}`;

    const fields = FIELD_NAMES.flatMap((field) => {
      const value = entry[field];
      return value === undefined ? [] : [`${field}=${value}`];
    });
    if (fields.length > 0) line += ' ' + chalk.dim(fields.join(' '));

    if (entry.error) {
      line += chalk.red(` | ${entry.error.name}: ${entry.error.message}`);
      if (entry.level === 'debug' && entry.error.stack) line += '\n' + chalk.dim(entry.error.stack);
    }
    this.stream.write(line + '\n');
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  transports?: readonly Transport[];
  component?: string;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly transports: readonly Transport[];
  private readonly component?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.component = options.component;
  }

  /** Same level and transports, tagged with `component` below this logger's own. */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      transports: this.transports,
      component: this.component ? `${this.component}.${component}` : component,
    });
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  private log(level: LogLevel, message: string, fields: LogFields = {}): void {
    if (SEVERITY[level] < SEVERITY[this.level]) return;

    const { error, ...about } = fields;
    const entry: LogEntry = {
      ...about,
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
    };
    if (error !== undefined) entry.error = describeError(error);

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        process.stderr.write(`Log transport failed: ${errorMessage(err)}\n`);
      }
    }
  }
}

function describeError(value: unknown): LoggedError {
  if (!(value instanceof Error)) return { name: typeof value, message: String(value) };
  const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
  return { name: value.name, message: value.message, code, stack: value.stack };
}

const envLevel = process.env['LOG_LEVEL'];

/** Root logger; components log through `logger.child(name)`. */
export const logger = new Logger({ level: isLogLevel(envLevel) ? envLevel : 'warn' });
