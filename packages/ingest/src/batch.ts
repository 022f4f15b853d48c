/**
 * Batch driver: every subject of a session type, one at a time
 */

import { buildSessionId, type SessionType } from '@wearable/core';
import { loadSubjectSession } from './session-loader.js';
import type { BatchReport, IngestDeps, SubjectOutcome } from './types.js';

/**
 * A subject that throws is recorded as failed and the run moves on.
 */
export async function runSessionBatch(
  subjectIds: readonly string[],
  sessionType: SessionType,
  deps: IngestDeps
): Promise<BatchReport> {
  const { logger } = deps;
  const startTime = Date.now();
  const outcomes: SubjectOutcome[] = [];

  logger.info(
    { event: 'ingest.batch.start', sessionType, subjectCount: subjectIds.length },
    `📊 Found ${subjectIds.length} subjects for ${sessionType}`
  );

  for (const subjectId of subjectIds) {
    try {
      outcomes.push(await loadSubjectSession(subjectId, sessionType, deps));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(
        { event: 'ingest.session.failed', subjectId, sessionType, error: message },
        `❌ ${subjectId} (${sessionType}) failed: ${message}`
      );
      outcomes.push({
        status: 'failed',
        subjectId,
        sessionId: buildSessionId(subjectId, sessionType),
        sessionType,
        error: message,
      });
    }
  }

  const report: BatchReport = {
    sessionType,
    outcomes,
    loaded: outcomes.filter((o) => o.status === 'loaded').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    durationMs: Date.now() - startTime,
  };

  logger.info(
    {
      event: 'ingest.batch.complete',
      sessionType,
      loaded: report.loaded,
      skipped: report.skipped,
      failed: report.failed,
      durationMs: report.durationMs,
    },
    '✅ Loading complete!'
  );

  return report;
}
