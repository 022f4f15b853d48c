/**
 * Analytical store contract and table row shapes
 */

import type {
  DataQualityFlag,
  MeasurementRecord,
  ProtocolVersion,
  SessionMetadataRecord,
  SessionType,
  SignalType,
} from '@wearable/core';

/**
 * Append-only writes for measurements and session metadata.
 * Re-running a session appends again; nothing is deduplicated.
 */
export interface AnalyticsStore {
  insertMeasurements(records: readonly MeasurementRecord[]): Promise<void>;
  insertSessionMetadata(record: SessionMetadataRecord): Promise<void>;
  upsertSignalTypes(definitions: readonly SignalTypeDefinition[]): Promise<void>;
}

/** fact_physiological_measurements */
export interface MeasurementRow {
  measurement_id: string;
  subject_id: string;
  session_id: string;
  measurement_timestamp: string;
  signal_type: SignalType;
  value: number;
  session_type: SessionType;
  data_quality_flag: DataQualityFlag;
}

/** dim_sessions */
export interface SessionRow {
  session_id: string;
  subject_id: string;
  session_type: SessionType;
  protocol_version: ProtocolVersion;
  session_date: string;
  session_start_time: string;
  session_end_time: string;
  duration_minutes: number;
  data_quality_notes: string | null;
}

export interface SignalTypeDefinition {
  signalType: SignalType;
  signalName: string;
  unit: string;
  sampleRateHz: number | null;
  normalRangeMin: number | null;
  normalRangeMax: number | null;
  description: string;
}

/** dim_signal_types */
export interface SignalTypeRow {
  signal_type: SignalType;
  signal_name: string;
  unit: string;
  sample_rate_hz: number | null;
  normal_range_min: number | null;
  normal_range_max: number | null;
  description: string;
}

/**
 * dim_subjects, written by the demographics preparation tool.
 * Not produced by the ingestion pipeline.
 */
export interface SubjectDimensionRow {
  subject_id: string;
  cohort: ProtocolVersion;
  age: number;
  weight_kg: number;
  height_cm: number;
  bmi: number | null;
  gender: string | null;
  enrollment_date: string;
}
