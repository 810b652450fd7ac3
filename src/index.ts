/**
 * pgvector-wire
 *
 * Binary wire codecs for the PostgreSQL vector extension types
 * `vector`, `halfvec` and `sparsevec`.
 *
 * @packageDocumentation
 */

// Codecs
export * from './codec/index.js';

// Client hooks
export * from './adapter/index.js';
export * from './pg/index.js';

// Configuration
export * from './config/index.js';

// Utils
export * from './utils/errors.js';
export { createLogger, setLogLevel, getLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel, LogEntry } from './utils/logger.js';
