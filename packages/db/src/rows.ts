/**
 * Domain record -> table row mapping
 */

import type { MeasurementRecord, SessionMetadataRecord } from '@wearable/core';
import type { MeasurementRow, SessionRow, SignalTypeDefinition, SignalTypeRow } from './types.js';

/**
 * ISO-8601 UTC with microsecond precision (Postgres timestamptz resolution)
 */
export function formatTimestamp(epochMs: number): string {
  const micros = Math.round(epochMs * 1000);
  const wholeSeconds = Math.floor(micros / 1_000_000);
  const fraction = micros - wholeSeconds * 1_000_000;
  const base = new Date(wholeSeconds * 1000).toISOString().slice(0, 19);
  return `${base}.${String(fraction).padStart(6, '0')}Z`;
}

export function toMeasurementRow(record: MeasurementRecord): MeasurementRow {
  return {
    measurement_id: record.measurementId,
    subject_id: record.subjectId,
    session_id: record.sessionId,
    measurement_timestamp: formatTimestamp(record.timestampMs),
    signal_type: record.signalType,
    value: record.value,
    session_type: record.sessionType,
    data_quality_flag: record.qualityFlag,
  };
}

export function toSessionRow(record: SessionMetadataRecord): SessionRow {
  return {
    session_id: record.sessionId,
    subject_id: record.subjectId,
    session_type: record.sessionType,
    protocol_version: record.protocolVersion,
    session_date: record.sessionDate,
    session_start_time: formatTimestamp(record.sessionStartMs),
    session_end_time: formatTimestamp(record.sessionEndMs),
    duration_minutes: record.durationMinutes,
    data_quality_notes: record.dataQualityNotes,
  };
}

export function toSignalTypeRow(definition: SignalTypeDefinition): SignalTypeRow {
  return {
    signal_type: definition.signalType,
    signal_name: definition.signalName,
    unit: definition.unit,
    sample_rate_hz: definition.sampleRateHz,
    normal_range_min: definition.normalRangeMin,
    normal_range_max: definition.normalRangeMax,
    description: definition.description,
  };
}
