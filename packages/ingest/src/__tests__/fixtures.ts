import { mkdirSync, mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { MeasurementRecord, SessionMetadataRecord, SessionType, SignalSource } from '@wearable/core';
import type { AnalyticsStore, SignalTypeDefinition } from '@wearable/db';

export const START_EPOCH = '1361382919.0';
export const START_MS = Date.UTC(2013, 1, 20, 17, 55, 19);

export function makeDatasetRoot(): string {
  const root = mkdtempSync(join(tmpdir(), 'wearable-ingest-'));
  mkdirSync(join(root, 'STRESS'));
  return root;
}

export function writeSignalFile(dir: string, source: SignalSource, header: [string, string], rows: number[][]): void {
  const lines = [header[0], header[1], ...rows.map((row) => row.join(','))];
  writeFileSync(join(dir, `${source}.csv`), `${lines.join('\n')}\n`);
}

const range = (n: number): number[] => Array.from({ length: n }, (_, i) => i);

/**
 * Ten samples per file: 4 Hz single-column signals, 32 Hz ACC, IBI offsets 0.25 s apart
 */
export function writeSubject(
  root: string,
  sessionType: SessionType,
  subjectId: string,
  options: { omit?: SignalSource[]; start?: string } = {}
): string {
  const dir = join(root, sessionType, subjectId);
  mkdirSync(dir, { recursive: true });
  const start = options.start ?? START_EPOCH;
  const omit = new Set(options.omit ?? []);

  const files: Array<[SignalSource, [string, string], number[][]]> = [
    ['BVP', [start, '4.0'], range(10).map((i) => [i * 1.5])],
    ['EDA', [start, '4.0'], range(10).map((i) => [0.1 + i / 100])],
    ['TEMP', [start, '4.0'], range(10).map(() => [33.5])],
    ['ACC', [`${start},${start},${start}`, '32.0,32.0,32.0'], range(10).map((i) => [i, -64, 64])],
    ['HR', [start, '4.0'], range(10).map((i) => [70 + i])],
    ['IBI', [`${start},IBI`, '1.0'], range(10).map((i) => [i * 0.25, 0.8])],
  ];

  for (const [source, header, rows] of files) {
    if (!omit.has(source)) writeSignalFile(dir, source, header, rows);
  }
  return dir;
}

/**
 * Store fake that can fail a given measurement write (1-based)
 */
export class RecordingStore implements AnalyticsStore {
  readonly chunks: MeasurementRecord[][] = [];
  readonly sessions: SessionMetadataRecord[] = [];
  readonly signalTypes: SignalTypeDefinition[] = [];
  private calls = 0;

  constructor(private readonly failOnWrite?: number) {}

  async insertMeasurements(records: readonly MeasurementRecord[]): Promise<void> {
    this.calls++;
    if (this.calls === this.failOnWrite) {
      throw new Error('store unavailable');
    }
    this.chunks.push([...records]);
  }

  async insertSessionMetadata(record: SessionMetadataRecord): Promise<void> {
    this.sessions.push(record);
  }

  async upsertSignalTypes(definitions: readonly SignalTypeDefinition[]): Promise<void> {
    this.signalTypes.push(...definitions);
  }

  get measurementCount(): number {
    return this.chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  }
}
