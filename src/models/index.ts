/**
 * Centralized exports for all models
 */

// Branded types
export * from './brands.js';

// State machine
export * from './states.js';

// Result type
export * from './result.js';

// Error taxonomy
export * from './errors.js';

// Zod schemas and inferred types
export * from './schemas.js';

// Value types
export * from './gate-set.js';
export * from './topology.js';
export * from './capabilities.js';
export * from './availability.js';
export * from './validation.js';
export * from './counts.js';
export * from './execution-result.js';
