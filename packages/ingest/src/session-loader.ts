/**
 * Load one subject's session: classify, decode each signal file, upload, summarize
 */

import { existsSync, statSync } from 'fs';
import { join } from 'path';
import {
  SIGNAL_SOURCES,
  buildRecords,
  buildSessionId,
  decodeSignalFile,
  summarizeSession,
  type MeasurementRecord,
  type SessionIdentity,
  type SessionType,
} from '@wearable/core';
import type { IngestDeps, SessionOutcome, SignalFileStatus } from './types.js';
import { uploadInChunks } from './uploader.js';

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * Decode every signal file present. A file that fails is logged and skipped.
 */
function collectRecords(
  subjectPath: string,
  identity: SessionIdentity,
  logger: IngestDeps['logger']
): { records: MeasurementRecord[]; signals: SignalFileStatus[] } {
  const records: MeasurementRecord[] = [];
  const signals: SignalFileStatus[] = [];

  for (const source of SIGNAL_SOURCES) {
    const fileName = `${source}.csv`;
    const filePath = join(subjectPath, fileName);

    if (!existsSync(filePath)) {
      logger.warn(
        { event: 'ingest.signal.missing', sessionId: identity.sessionId, signal: source, file: fileName },
        `  ⚠️  Missing: ${fileName}`
      );
      signals.push({ source, status: 'missing' });
      continue;
    }

    try {
      const signalRecords = buildRecords(source, decodeSignalFile(filePath), identity);
      for (const record of signalRecords) {
        records.push(record);
      }
      signals.push({ source, status: 'loaded', records: signalRecords.length });
      logger.info(
        { event: 'ingest.signal.decoded', sessionId: identity.sessionId, signal: source, records: signalRecords.length },
        `  ✓ ${source}: ${signalRecords.length.toLocaleString()} measurements`
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(
        { event: 'ingest.signal.failed', sessionId: identity.sessionId, signal: source, error: message },
        `  ✗ Error processing ${source}: ${message}`
      );
      signals.push({ source, status: 'error', error: message });
    }
  }

  return { records, signals };
}

/**
 * Upload failures and metadata write failures propagate to the caller.
 */
export async function loadSubjectSession(
  subjectId: string,
  sessionType: SessionType,
  deps: IngestDeps
): Promise<SessionOutcome> {
  const { datasetRoot, classifier, store, chunkSize, includeProblematic, logger } = deps;
  const sessionId = buildSessionId(subjectId, sessionType);
  const identity: SessionIdentity = { subjectId, sessionId, sessionType };

  const decision = classifier.classify(subjectId, sessionType, includeProblematic);
  if (decision.skip) {
    const reason =
      decision.severity === 'hard'
        ? `Excluded: ${decision.note}`
        : `Skipped (use --include-problematic to load): ${decision.note}`;
    logger.info(
      { event: 'ingest.session.skipped', subjectId, sessionType, issue: decision.note, severity: decision.severity },
      `⏭️  Skipping ${subjectId} (${sessionType}): ${reason}`
    );
    return { status: 'skipped', subjectId, sessionId, sessionType, reason: 'excluded', note: decision.note, signals: [] };
  }

  const subjectPath = join(datasetRoot, sessionType, subjectId);
  if (!isDirectory(subjectPath)) {
    logger.warn({ event: 'ingest.session.path_missing', subjectId, sessionType, path: subjectPath }, `⚠️  Path not found: ${subjectPath}`);
    return {
      status: 'skipped',
      subjectId,
      sessionId,
      sessionType,
      reason: 'missing_directory',
      note: decision.note,
      signals: [],
    };
  }

  logger.info(
    { event: 'ingest.session.start', subjectId, sessionId, sessionType, note: decision.note },
    `📊 Processing: ${subjectId} - ${sessionType}${decision.note ? ` (note: ${decision.note})` : ''}`
  );

  const { records, signals } = collectRecords(subjectPath, identity, logger);

  if (records.length === 0) {
    logger.warn({ event: 'ingest.session.no_data', subjectId, sessionId }, '  ✗ No data successfully processed');
    return { status: 'skipped', subjectId, sessionId, sessionType, reason: 'no_data', note: decision.note, signals };
  }

  logger.info(
    { event: 'ingest.session.records', sessionId, recordCount: records.length },
    `  📦 Total measurements: ${records.length.toLocaleString()}`
  );

  const upload = await uploadInChunks(records, store, { sessionId, chunkSize, logger });

  const metadata = summarizeSession(records, identity, decision.note);
  if (metadata) {
    await store.insertSessionMetadata(metadata);
    logger.info(
      { event: 'ingest.session.metadata', sessionId, durationMinutes: metadata.durationMinutes },
      '  ✓ Session metadata created'
    );
  }

  return {
    status: 'loaded',
    subjectId,
    sessionId,
    sessionType,
    recordCount: records.length,
    chunkCount: upload.chunkCount,
    signals,
    note: decision.note,
  };
}
