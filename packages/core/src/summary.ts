/**
 * Session metadata derived from a session's records
 */

import { protocolVersionFor } from './ids.js';
import type { MeasurementRecord, SessionIdentity, SessionMetadataRecord } from './types.js';

export interface TimeSpan {
  startMs: number;
  endMs: number;
}

/**
 * Min/max timestamp; null for an empty set.
 * Record sets can exceed the argument limit of Math.min, so this iterates.
 */
export function timeSpanOf(records: readonly MeasurementRecord[]): TimeSpan | null {
  if (records.length === 0) return null;

  let startMs = Infinity;
  let endMs = -Infinity;
  for (const { timestampMs } of records) {
    if (timestampMs < startMs) startMs = timestampMs;
    if (timestampMs > endMs) endMs = timestampMs;
  }
  return { startMs, endMs };
}

export function summarizeSession(
  records: readonly MeasurementRecord[],
  identity: SessionIdentity,
  qualityNote: string | null
): SessionMetadataRecord | null {
  const span = timeSpanOf(records);
  if (!span) return null;

  return {
    sessionId: identity.sessionId,
    subjectId: identity.subjectId,
    sessionType: identity.sessionType,
    protocolVersion: protocolVersionFor(identity.subjectId),
    sessionDate: new Date(Math.floor(span.startMs)).toISOString().slice(0, 10),
    sessionStartMs: span.startMs,
    sessionEndMs: span.endMs,
    durationMinutes: (span.endMs - span.startMs) / 60_000,
    dataQualityNotes: qualityNote,
  };
}
