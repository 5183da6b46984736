export * from './backend.js';
export * from './wait.js';
export * from './preflight.js';
export * from './retry.js';
