/**
 * Supabase (Postgres) implementation of the analytical store
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { createLogger, type Logger, type StoreConfig, type TableNames } from '@wearable/config';
import type { MeasurementRecord, SessionMetadataRecord } from '@wearable/core';
import { toMeasurementRow, toSessionRow, toSignalTypeRow } from './rows.js';
import type { AnalyticsStore, SignalTypeDefinition } from './types.js';

export class StoreWriteError extends Error {
  readonly table: string;
  readonly rowCount: number;
  readonly code?: string;

  constructor(table: string, rowCount: number, message: string, code?: string) {
    super(`Write to ${table} failed (${rowCount} rows): ${message}${code ? ` (code: ${code})` : ''}`);
    this.name = 'StoreWriteError';
    this.table = table;
    this.rowCount = rowCount;
    this.code = code;
  }
}

interface PostgrestFailure {
  message: string;
  code?: string;
}

/**
 * Extract host from the project URL for logging (no credentials)
 */
function extractHost(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'unknown';
  }
}

/**
 * Service-role client without session persistence (server-side batch use)
 */
export function createSupabaseClient(config: StoreConfig): SupabaseClient {
  return createClient(config.url, config.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export function createSupabaseStore(
  client: SupabaseClient,
  tables: TableNames,
  logger: Logger = createLogger('store')
): AnalyticsStore {
  function fail(table: string, rowCount: number, error: PostgrestFailure): never {
    logger.error(
      { event: 'store.write.failed', table, rowCount, error: error.message, code: error.code },
      `❌ Write to ${table} failed`
    );
    throw new StoreWriteError(table, rowCount, error.message, error.code);
  }

  return {
    async insertMeasurements(records: readonly MeasurementRecord[]): Promise<void> {
      const startTime = Date.now();
      const { error } = await client.from(tables.measurements).insert(records.map(toMeasurementRow));
      if (error) fail(tables.measurements, records.length, error);

      logger.debug(
        {
          event: 'store.measurements.inserted',
          table: tables.measurements,
          rowCount: records.length,
          durationMs: Date.now() - startTime,
        },
        'Measurements inserted'
      );
    },

    async insertSessionMetadata(record: SessionMetadataRecord): Promise<void> {
      const { error } = await client.from(tables.sessions).insert(toSessionRow(record));
      if (error) fail(tables.sessions, 1, error);

      logger.debug(
        { event: 'store.session.inserted', table: tables.sessions, sessionId: record.sessionId },
        'Session metadata inserted'
      );
    },

    async upsertSignalTypes(definitions: readonly SignalTypeDefinition[]): Promise<void> {
      const { error } = await client
        .from(tables.signalTypes)
        .upsert(definitions.map(toSignalTypeRow), { onConflict: 'signal_type' });
      if (error) fail(tables.signalTypes, definitions.length, error);
    },
  };
}

/**
 * Check store connectivity with a head-only count on the sessions table
 * @throws Error if the query fails
 */
export async function checkStoreConnection(
  client: SupabaseClient,
  config: StoreConfig,
  tables: TableNames,
  logger: Logger = createLogger('store')
): Promise<number> {
  logger.info('🔍 Checking store connection...');
  logger.info(`   Store host: ${extractHost(config.url)}`);

  const startTime = Date.now();
  const { count, error } = await client.from(tables.sessions).select('session_id', { count: 'exact', head: true });

  if (error) {
    logger.error({ error: error.message, code: error.code }, '❌ Store connection failed');
    throw new Error(`Store connection check failed: ${error.message}${error.code ? ` (code: ${error.code})` : ''}`);
  }

  logger.info(`✅ Store connection successful (${Date.now() - startTime}ms, ${count ?? 0} sessions)`);
  return count ?? 0;
}
