/**
 * deckhand: extension kernel of a deployment-configuration CLI.
 */

export * from './errors.js';
export * from './env.js';
export { ConsoleTransport, Logger, logger, isLogLevel } from './logging/logger.js';
export type { LogEntry, LogFields, LogLevel, LoggedError, LoggerOptions, Transport } from './logging/logger.js';

export * from './kernel/contexts.js';
export * from './kernel/filters.js';
export * from './kernel/actions.js';
export * from './kernel/catalog.js';
export * from './kernel/kernel.js';

export * from './config/types.js';
export * from './config/composer.js';
export * from './config/loader.js';

export * from './plugins/index.js';

export { createProgram, run, VERSION } from './cli/program.js';
export type { CliContext } from './cli/context.js';
