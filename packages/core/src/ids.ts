/**
 * Identifier derivation shared by records, sessions and the store
 */

import type { ProtocolVersion, SessionType, SignalType } from './types.js';

/**
 * Build a session ID
 * Format: ${subjectId}_${sessionType}
 */
export function buildSessionId(subjectId: string, sessionType: SessionType): string {
  return `${subjectId}_${sessionType}`;
}

/**
 * Build a measurement ID from the sample's ordinal within its source file.
 * Format: ${sessionId}_${signalType}_${index}
 * Stable across re-runs; the store is append-only so this is not a dedup key.
 */
export function buildMeasurementId(sessionId: string, signalType: SignalType, index: number): string {
  return `${sessionId}_${signalType}_${index}`;
}

/**
 * V1 for subjects recruited in the first batch (ids prefixed "S"), V2 otherwise
 */
export function protocolVersionFor(subjectId: string): ProtocolVersion {
  return subjectId.startsWith('S') ? 'V1' : 'V2';
}

export const cohortFor = protocolVersionFor;
