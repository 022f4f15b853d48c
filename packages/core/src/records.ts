/**
 * Expansion of decoded signals into canonical measurement records
 */

import { isRepresentableEpochMs } from './decoder.js';
import { DataQualityError } from './errors.js';
import { buildMeasurementId } from './ids.js';
import type {
  DecodedSignal,
  MeasurementRecord,
  SessionIdentity,
  SignalSource,
  SignalType,
} from './types.js';

/** Accelerometer device units per g */
export const ACC_UNITS_PER_G = 64.0;

const ACC_AXES: ReadonlyArray<readonly [SignalType, number]> = [
  ['ACC_X', 0],
  ['ACC_Y', 1],
  ['ACC_Z', 2],
];

function requireSampleRate(source: SignalSource, decoded: DecodedSignal): number {
  const rate = decoded.sampleRate;
  if (rate === null || !Number.isFinite(rate) || rate <= 0) {
    throw new DataQualityError(`${source}: invalid sample rate ${String(rate)}`);
  }
  return rate;
}

function cell(source: SignalSource, row: number[], rowIndex: number, column: number): number {
  const value = row[column];
  if (value === undefined || Number.isNaN(value)) {
    throw new DataQualityError(`${source}: row ${rowIndex} has no value in column ${column}`);
  }
  return value;
}

function record(
  identity: SessionIdentity,
  signalType: SignalType,
  index: number,
  timestampMs: number,
  value: number
): MeasurementRecord {
  if (!isRepresentableEpochMs(timestampMs)) {
    throw new DataQualityError(`${signalType}: row ${index} timestamp is out of range`);
  }
  return {
    measurementId: buildMeasurementId(identity.sessionId, signalType, index),
    subjectId: identity.subjectId,
    sessionId: identity.sessionId,
    sessionType: identity.sessionType,
    timestampMs,
    signalType,
    value,
    qualityFlag: 'VALID',
  };
}

function buildTriaxial(decoded: DecodedSignal, identity: SessionIdentity): MeasurementRecord[] {
  const rate = requireSampleRate('ACC', decoded);
  const records: MeasurementRecord[] = [];

  decoded.samples.forEach((row, i) => {
    const timestampMs = decoded.startMs + (i / rate) * 1000;
    for (const [axis, column] of ACC_AXES) {
      records.push(record(identity, axis, i, timestampMs, cell('ACC', row, i, column) / ACC_UNITS_PER_G));
    }
  });

  return records;
}

// IBI rows carry their own offset (seconds from start); the sample rate is ignored
function buildInterval(decoded: DecodedSignal, identity: SessionIdentity): MeasurementRecord[] {
  return decoded.samples.map((row, i) => {
    const offsetSeconds = cell('IBI', row, i, 0);
    const duration = cell('IBI', row, i, 1);
    return record(identity, 'IBI', i, decoded.startMs + offsetSeconds * 1000, duration);
  });
}

function buildUniform(
  source: Exclude<SignalSource, 'ACC' | 'IBI'>,
  decoded: DecodedSignal,
  identity: SessionIdentity
): MeasurementRecord[] {
  const rate = requireSampleRate(source, decoded);
  return decoded.samples.map((row, i) =>
    record(identity, source, i, decoded.startMs + (i / rate) * 1000, cell(source, row, i, 0))
  );
}

/**
 * Produce the records for one source file
 */
export function buildRecords(
  source: SignalSource,
  decoded: DecodedSignal,
  identity: SessionIdentity
): MeasurementRecord[] {
  switch (source) {
    case 'ACC':
      return buildTriaxial(decoded, identity);
    case 'IBI':
      return buildInterval(decoded, identity);
    default:
      return buildUniform(source, decoded, identity);
  }
}
