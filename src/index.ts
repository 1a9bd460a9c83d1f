// probe-preflight public API

export * from './models/index.js';
export * from './services/index.js';
export * from './core/errors.js';
export * from './core/version.js';
export { Logger, LogLevel, logger, parseLogLevel } from './core/logger.js';
export type { LogLevelName, LoggerConfig } from './core/logger.js';
export { renderReport, renderMessage } from './cli/utils/report-renderer.js';
export { runValidation } from './cli/commands/validate.js';
export type { ValidationOptions } from './cli/commands/validate.js';
