/**
 * Dataset root discovery
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { DatasetNotFoundError } from './errors.js';
import { SESSION_TYPES, type SessionType } from './types.js';

export const DEFAULT_DATASET_CANDIDATES: readonly string[] = [
  'wearable-exam-stress-1.0.1',
  'physionet.org/files/wearable-exam-stress/1.0.1',
  '.',
];

// The first session type's folder marks a valid root
export const DATASET_MARKER: SessionType = SESSION_TYPES[0];

export type RootPredicate = (candidatePath: string) => boolean;

export type LocateResult =
  | { found: true; root: string }
  | { found: false; tried: string[] };

/**
 * Return the first candidate (in order) accepted by the predicate
 */
export function findDatasetRoot(
  baseDir: string,
  candidates: readonly string[],
  isValidRoot: RootPredicate
): LocateResult {
  const tried: string[] = [];

  for (const candidate of candidates) {
    const candidatePath = resolve(baseDir, candidate);
    tried.push(candidatePath);
    if (isValidRoot(candidatePath)) {
      return { found: true, root: candidatePath };
    }
  }

  return { found: false, tried };
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Predicate: candidate exists and contains the marker sub-directory
 */
export function hasMarkerDirectory(marker: string = DATASET_MARKER): RootPredicate {
  return (candidatePath) => existsSync(candidatePath) && isDirectory(join(candidatePath, marker));
}

/**
 * Resolve the dataset root or throw DatasetNotFoundError
 */
export function locateDatasetRoot(
  baseDir: string,
  candidates: readonly string[] = DEFAULT_DATASET_CANDIDATES,
  isValidRoot: RootPredicate = hasMarkerDirectory()
): string {
  const result = findDatasetRoot(baseDir, candidates, isValidRoot);
  if (!result.found) {
    throw new DatasetNotFoundError(resolve(baseDir), result.tried);
  }
  return result.root;
}

/**
 * Subject directory names under a session-type folder, sorted
 */
export function listSubjects(datasetRoot: string, sessionType: SessionType): string[] {
  const sessionPath = join(datasetRoot, sessionType);
  if (!isDirectory(sessionPath)) {
    return [];
  }

  return readdirSync(sessionPath, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}
