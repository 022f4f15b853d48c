/**
 * Environment loading, logging and typed configuration
 */

export * from './env.js';
export * from './logger.js';
export * from './pipeline.js';
