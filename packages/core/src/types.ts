/**
 * Domain types for wearable recording ingestion
 */

export const SESSION_TYPES = ['STRESS', 'AEROBIC', 'ANAEROBIC'] as const;
export type SessionType = (typeof SESSION_TYPES)[number];

export const SIGNAL_TYPES = ['BVP', 'EDA', 'TEMP', 'ACC_X', 'ACC_Y', 'ACC_Z', 'HR', 'IBI'] as const;
export type SignalType = (typeof SIGNAL_TYPES)[number];

/**
 * Raw file stems in a subject directory, in processing order.
 * ACC expands to three signal types; every other source is its own signal type.
 */
export const SIGNAL_SOURCES = ['BVP', 'EDA', 'TEMP', 'ACC', 'HR', 'IBI'] as const;
export type SignalSource = (typeof SIGNAL_SOURCES)[number];

export const QUALITY_ISSUES = [
  'test_not_performed',
  'invalid_signals_no_cover_removed',
  'incomplete_procedure',
  'duplicated_data',
  'split_data',
] as const;
export type QualityIssue = (typeof QUALITY_ISSUES)[number];

export type ProtocolVersion = 'V1' | 'V2';

// Only VALID is emitted today; the others exist in the table schema.
export type DataQualityFlag = 'VALID' | 'ARTIFACT' | 'MISSING';

export interface SessionIdentity {
  subjectId: string;
  sessionId: string;
  sessionType: SessionType;
}

export interface MeasurementRecord extends SessionIdentity {
  measurementId: string;
  /** Epoch milliseconds (UTC), fractional to keep sub-millisecond sample spacing */
  timestampMs: number;
  signalType: SignalType;
  value: number;
  qualityFlag: DataQualityFlag;
}

export interface SessionMetadataRecord extends SessionIdentity {
  protocolVersion: ProtocolVersion;
  /** YYYY-MM-DD, UTC calendar date of the session start */
  sessionDate: string;
  sessionStartMs: number;
  sessionEndMs: number;
  durationMinutes: number;
  dataQualityNotes: string | null;
}

export interface DecodedSignal {
  startMs: number;
  /** Hz; null when the header row holds no number */
  sampleRate: number | null;
  samples: number[][];
}

export function isSessionType(value: string): value is SessionType {
  return (SESSION_TYPES as readonly string[]).includes(value);
}
