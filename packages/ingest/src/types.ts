/**
 * Types for subject-session ingestion
 */

import type { Logger } from '@wearable/config';
import type { QualityClassifier, QualityIssue, SessionType, SignalSource } from '@wearable/core';
import type { AnalyticsStore } from '@wearable/db';

export interface IngestDeps {
  datasetRoot: string;
  classifier: QualityClassifier;
  store: AnalyticsStore;
  chunkSize: number;
  includeProblematic: boolean;
  logger: Logger;
}

export type SkipReason = 'excluded' | 'missing_directory' | 'no_data';

export type SignalFileStatus =
  | { source: SignalSource; status: 'loaded'; records: number }
  | { source: SignalSource; status: 'missing' }
  | { source: SignalSource; status: 'error'; error: string };

export type SessionOutcome =
  | {
      status: 'loaded';
      subjectId: string;
      sessionId: string;
      sessionType: SessionType;
      recordCount: number;
      chunkCount: number;
      signals: SignalFileStatus[];
      note: QualityIssue | null;
    }
  | {
      status: 'skipped';
      subjectId: string;
      sessionId: string;
      sessionType: SessionType;
      reason: SkipReason;
      note: QualityIssue | null;
      signals: SignalFileStatus[];
    };

export type SubjectOutcome =
  | SessionOutcome
  | {
      status: 'failed';
      subjectId: string;
      sessionId: string;
      sessionType: SessionType;
      error: string;
    };

export interface BatchReport {
  sessionType: SessionType;
  outcomes: SubjectOutcome[];
  loaded: number;
  skipped: number;
  failed: number;
  durationMs: number;
}

export interface UploadResult {
  chunkCount: number;
  rowsWritten: number;
}
