/**
 * Environment diagnostics script
 *
 * Usage: npm run env:diag
 *
 * Prints environment loading diagnostics without running the loader
 */

import { getEnvDiagnostics, initEnv } from '@wearable/config';

const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();

console.log('🔍 Environment Diagnostics');
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local file: ${envLocalFilePath}`);
console.log(`   .env.local exists: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded from .env: ${keysLoaded.length}`);

if (keysLoaded.length > 0) {
  console.log(`   Loaded keys: ${keysLoaded.slice(0, 20).join(', ')}${keysLoaded.length > 20 ? '...' : ''}`);
}

const diagnostics = getEnvDiagnostics([
  'SUPABASE_URL',
  'SUPABASE_SERVICE_ROLE_KEY',
  'DATASET_BASE_DIR',
  'UPLOAD_CHUNK_SIZE',
  'KNOWN_ISSUES_FILE',
  'MEASUREMENTS_TABLE',
  'SESSIONS_TABLE',
  'SIGNAL_TYPES_TABLE',
  'LOG_LEVEL',
  'LOG_PRETTY',
]);

console.log('\n📋 Environment Variables Status:');
for (const key of diagnostics.keys) {
  const status = key.present ? '✅' : '❌';
  const length = key.length ? ` (length: ${key.length})` : '';
  const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${length}${masked}${source}`);
}

// Machine-readable copy
const structuredOutput = {
  event: 'env.diagnostics',
  envFilePath,
  envFileExists: loaded,
  envLocalFilePath,
  envLocalFileExists: localLoaded,
  keysLoadedCount: keysLoaded.length,
  variables: diagnostics.keys,
  warnings: diagnostics.warnings,
};

console.log('\n📊 Structured Output (JSON):');
console.log(JSON.stringify(structuredOutput, null, 2));

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}
