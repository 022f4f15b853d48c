/**
 * Seed the signal-type dimension table
 *
 * Run with: npm run db:seed:signal-types
 */

import { initEnv, loadPipelineConfig, loadStoreConfig } from '@wearable/config';
import { createSupabaseClient, createSupabaseStore } from './supabase-store.js';
import { seedSignalTypes } from './signal-types.js';

initEnv();

async function main(): Promise<void> {
  console.log('🌱 Seeding signal type definitions...');

  const pipelineConfig = loadPipelineConfig();
  const storeConfig = loadStoreConfig();
  const store = createSupabaseStore(createSupabaseClient(storeConfig), pipelineConfig.tables);

  const count = await seedSignalTypes(store);

  console.log(`\n✨ Seeding complete!`);
  console.log(`   Table: ${pipelineConfig.tables.signalTypes}`);
  console.log(`   Signal types upserted: ${count}`);
}

main().catch((error: unknown) => {
  console.error('❌ Error seeding signal types:', error);
  process.exit(1);
});
