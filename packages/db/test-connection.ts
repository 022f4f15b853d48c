/**
 * Simple script to test the store connection
 * Run with: npm run db:test-connection
 */
import { initEnv, loadPipelineConfig, loadStoreConfig } from '@wearable/config';
import { checkStoreConnection, createSupabaseClient } from './src/index.js';

initEnv();

async function main(): Promise<void> {
  try {
    const storeConfig = loadStoreConfig();
    const { tables } = loadPipelineConfig();
    await checkStoreConnection(createSupabaseClient(storeConfig), storeConfig, tables);
    process.exit(0);
  } catch (error) {
    console.error('Connection test failed:', error);
    process.exit(1);
  }
}

void main();
