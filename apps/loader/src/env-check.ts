/**
 * Loader environment diagnostics
 * Run with: npm run loader:env
 */

import { getEnvDiagnostics, initEnv, validateRequiredEnv } from '@wearable/config';

const requiredEnvVars = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'] as const;
const optionalEnvVars = [
  'DATASET_BASE_DIR',
  'UPLOAD_CHUNK_SIZE',
  'KNOWN_ISSUES_FILE',
  'MEASUREMENTS_TABLE',
  'SESSIONS_TABLE',
  'SIGNAL_TYPES_TABLE',
  'LOG_LEVEL',
] as const;

const { repoRoot, envFilePath, loaded } = initEnv();

console.log('🔍 Loader: Environment Diagnostics\n');
console.log(`   Node version: ${process.version}`);
console.log(`   Environment: ${process.env.NODE_ENV || 'development'}`);
console.log(`   CWD: ${process.cwd()}`);
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env loaded: ${loaded ? '✅' : '❌'}\n`);

const required = getEnvDiagnostics(requiredEnvVars);
console.log('   Required keys:');
for (const key of required.keys) {
  const status = key.present ? '✅' : '❌';
  const value = key.maskedValue ? ` (${key.maskedValue})` : '';
  console.log(`     ${status} ${key.key}${value}`);
}

const optional = getEnvDiagnostics(optionalEnvVars);
console.log('\n   Optional keys:');
for (const key of optional.keys) {
  console.log(`     ${key.present ? '✅' : '⚪'} ${key.key}`);
}

const warnings = [...new Set([...required.warnings, ...optional.warnings])];
if (warnings.length > 0) {
  console.log('\n   ⚠️  Warnings:');
  for (const warning of warnings) {
    console.log(`     - ${warning}`);
  }
}

const validation = validateRequiredEnv(requiredEnvVars);
if (!validation.valid) {
  console.log('\n❌ Missing required environment variables:');
  for (const envVar of validation.missing) {
    console.log(`   - ${envVar}`);
  }
  console.log('\nUse --dry-run to load without a store, or set these in .env.');
  process.exit(1);
}

console.log('\n✅ All required environment variables are present');
