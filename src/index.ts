/**
 * Quantum backend contract
 *
 * Vendor-neutral interface for submitting circuits to quantum hardware or
 * simulators, plus the value types, error taxonomy and polling helpers
 * every backend shares.
 */

export * from './models/index.js';
export * from './core/index.js';
export * from './backends/index.js';
export { loadConfig, waitOptionsFromConfig, retryOptionsFromConfig, type Config, type LoadConfigOptions } from './config/index.js';
export { createLogger, type LogLevel, type Logger } from './utils/logger.js';
export { abortReason, throwIfAborted, sleep, type Sleep } from './utils/abort.js';
export { generateJobId, stableHash } from './utils/hash.js';
