/**
 * In-process store used for dry runs
 */

import type { MeasurementRecord, SessionMetadataRecord, SignalType } from '@wearable/core';
import { toMeasurementRow, toSessionRow, toSignalTypeRow } from './rows.js';
import type { AnalyticsStore, MeasurementRow, SessionRow, SignalTypeDefinition, SignalTypeRow } from './types.js';

export interface MemoryStore extends AnalyticsStore {
  readonly measurements: MeasurementRow[];
  readonly sessions: SessionRow[];
  readonly signalTypes: Map<SignalType, SignalTypeRow>;
  /** Number of insertMeasurements calls that completed */
  readonly measurementWrites: number;
}

export function createMemoryStore(): MemoryStore {
  const measurements: MeasurementRow[] = [];
  const sessions: SessionRow[] = [];
  const signalTypes = new Map<SignalType, SignalTypeRow>();
  let measurementWrites = 0;

  return {
    measurements,
    sessions,
    signalTypes,
    get measurementWrites() {
      return measurementWrites;
    },

    async insertMeasurements(records: readonly MeasurementRecord[]): Promise<void> {
      // All or nothing: a row that fails to convert leaves the store unchanged
      const rows = records.map(toMeasurementRow);
      for (const row of rows) {
        measurements.push(row);
      }
      measurementWrites++;
    },

    async insertSessionMetadata(record: SessionMetadataRecord): Promise<void> {
      sessions.push(toSessionRow(record));
    },

    async upsertSignalTypes(definitions: readonly SignalTypeDefinition[]): Promise<void> {
      for (const definition of definitions) {
        signalTypes.set(definition.signalType, toSignalTypeRow(definition));
      }
    },
  };
}
