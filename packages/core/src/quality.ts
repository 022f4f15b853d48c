/**
 * Known data-quality defects and the skip/include policy applied to them
 */

import { z } from 'zod';
import { QUALITY_ISSUES, SESSION_TYPES, type QualityIssue, type SessionType } from './types.js';

export type KnownIssueTable = Readonly<
  Partial<Record<SessionType, Readonly<Record<string, QualityIssue>>>>
>;

export type IssueSeverity = 'hard' | 'soft';

export interface QualityDecision {
  skip: boolean;
  note: QualityIssue | null;
  severity: IssueSeverity | null;
}

export interface QualityClassifier {
  classify(subjectId: string, sessionType: SessionType, includeProblematic?: boolean): QualityDecision;
  issueFor(subjectId: string, sessionType: SessionType): QualityIssue | null;
}

/**
 * Issues that mean the data is absent or unusable. Never loaded.
 */
export const HARD_EXCLUDE_ISSUES: ReadonlySet<QualityIssue> = new Set<QualityIssue>([
  'test_not_performed',
  'invalid_signals_no_cover_removed',
]);

function freezeTable(table: Partial<Record<SessionType, Record<string, QualityIssue>>>): KnownIssueTable {
  for (const entries of Object.values(table)) {
    if (entries) Object.freeze(entries);
  }
  return Object.freeze(table);
}

export const DEFAULT_KNOWN_ISSUES: KnownIssueTable = freezeTable({
  STRESS: {
    S02: 'duplicated_data',
    f07: 'invalid_signals_no_cover_removed',
    f14: 'split_data',
  },
  AEROBIC: {
    S03: 'incomplete_procedure',
    S07: 'incomplete_procedure',
    S11: 'split_data',
    S12: 'test_not_performed',
  },
  ANAEROBIC: {
    S06: 'incomplete_procedure',
    S16: 'split_data',
  },
});

const IssueEntriesSchema = z.record(z.string().min(1), z.enum(QUALITY_ISSUES));

const KnownIssueTableSchema = z
  .object({
    STRESS: IssueEntriesSchema.optional(),
    AEROBIC: IssueEntriesSchema.optional(),
    ANAEROBIC: IssueEntriesSchema.optional(),
  })
  .strict();

/**
 * Validate an externally supplied issue table (e.g. parsed from KNOWN_ISSUES_FILE)
 */
export function parseKnownIssueTable(raw: unknown): KnownIssueTable {
  const result = KnownIssueTableSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid known-issue table: ${details}`);
  }

  const table: Partial<Record<SessionType, Record<string, QualityIssue>>> = {};
  for (const sessionType of SESSION_TYPES) {
    const entries = result.data[sessionType];
    if (entries) table[sessionType] = { ...entries };
  }
  return freezeTable(table);
}

/**
 * Create a classifier over an immutable issue table
 */
export function createQualityClassifier(table: KnownIssueTable = DEFAULT_KNOWN_ISSUES): QualityClassifier {
  function issueFor(subjectId: string, sessionType: SessionType): QualityIssue | null {
    const entries = table[sessionType];
    if (!entries || !Object.prototype.hasOwnProperty.call(entries, subjectId)) {
      return null;
    }
    return entries[subjectId] ?? null;
  }

  function classify(subjectId: string, sessionType: SessionType, includeProblematic = false): QualityDecision {
    const issue = issueFor(subjectId, sessionType);

    if (!issue) {
      return { skip: false, note: null, severity: null };
    }

    if (HARD_EXCLUDE_ISSUES.has(issue)) {
      return { skip: true, note: issue, severity: 'hard' };
    }

    // Usable data; loaded only on request and carries the caveat forward
    return { skip: !includeProblematic, note: issue, severity: 'soft' };
  }

  return { classify, issueFor };
}
