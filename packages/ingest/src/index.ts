/**
 * Subject-session ingestion pipeline
 *
 * Sequential: one subject-session is decoded, uploaded and summarized before the next starts.
 */

export * from './types.js';
export * from './uploader.js';
export * from './session-loader.js';
export * from './batch.js';
