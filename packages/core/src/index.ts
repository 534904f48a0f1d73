/**
 * @simbatch/core
 *
 * Identifiers, logging and configuration shared by every simbatch package.
 */

// Identifiers
export type { JobId } from './identifiers';
export { jobId, isJobId, slugify } from './identifiers';

// Logging
export type { Logger, LogLevel, LogMeta, LoggerConfig } from './logger';
export { createLogger, getLoggerConfig, isLogLevel } from './logger';

// Configuration
export type { BatchConfig, BatchConfigFile, ServiceOptions } from './config/config.types';
export { DEFAULT_SERVICE_OPTIONS } from './config/config.types';
export { ConfigurationError } from './config/configuration-error';
export { validateBatchConfig, formatErrors, type ValidationResult } from './config/config-validator';
export { parseBatchConfig, resolveBatchConfig, loadBatchConfig, type ConfigOverrides } from './config/config-loader';
