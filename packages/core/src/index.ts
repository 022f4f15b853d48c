/**
 * Wearable ingestion domain: types, quality policy, decoding and record expansion
 */

export * from './types.js';
export * from './errors.js';
export * from './ids.js';
export * from './quality.js';
export * from './locator.js';
export * from './decoder.js';
export * from './records.js';
export * from './summary.js';
