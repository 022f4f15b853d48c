/**
 * Analytical store: contract, Supabase and in-memory implementations
 */

export * from './types.js';
export * from './rows.js';
export * from './supabase-store.js';
export * from './memory-store.js';
export * from './signal-types.js';
