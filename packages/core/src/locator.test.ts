import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import {
  DEFAULT_DATASET_CANDIDATES,
  findDatasetRoot,
  hasMarkerDirectory,
  listSubjects,
  locateDatasetRoot,
} from './locator.js';
import { DatasetNotFoundError } from './errors.js';

describe('findDatasetRoot', () => {
  it('returns the first candidate accepted by the predicate', () => {
    const accepted = new Set([resolve('/data/b'), resolve('/data/c')]);
    const result = findDatasetRoot('/data', ['a', 'b', 'c'], (path) => accepted.has(path));
    expect(result).toEqual({ found: true, root: resolve('/data/b') });
  });

  it('reports every candidate tried when none qualifies', () => {
    const result = findDatasetRoot('/data', ['a', '.'], () => false);
    expect(result).toEqual({ found: false, tried: [resolve('/data/a'), resolve('/data')] });
  });
});

describe('filesystem probing', () => {
  let baseDir: string;

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), 'wearable-locator-'));
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
  });

  it('prefers the versioned dataset folder', () => {
    mkdirSync(join(baseDir, 'wearable-exam-stress-1.0.1', 'STRESS'), { recursive: true });
    mkdirSync(join(baseDir, 'STRESS'));
    expect(locateDatasetRoot(baseDir)).toBe(join(baseDir, 'wearable-exam-stress-1.0.1'));
  });

  it('falls back to the mirrored download path', () => {
    mkdirSync(join(baseDir, 'physionet.org/files/wearable-exam-stress/1.0.1/STRESS'), { recursive: true });
    expect(locateDatasetRoot(baseDir)).toBe(join(baseDir, 'physionet.org/files/wearable-exam-stress/1.0.1'));
  });

  it('accepts the base directory itself', () => {
    mkdirSync(join(baseDir, 'STRESS'));
    expect(locateDatasetRoot(baseDir)).toBe(resolve(baseDir));
  });

  it('ignores a candidate without the marker directory', () => {
    mkdirSync(join(baseDir, 'wearable-exam-stress-1.0.1', 'AEROBIC'), { recursive: true });
    expect(hasMarkerDirectory()(join(baseDir, 'wearable-exam-stress-1.0.1'))).toBe(false);
  });

  it('does not accept a marker that is a file', () => {
    writeFileSync(join(baseDir, 'STRESS'), '');
    expect(hasMarkerDirectory()(baseDir)).toBe(false);
  });

  it('throws DatasetNotFoundError listing the candidates', () => {
    expect(() => locateDatasetRoot(baseDir)).toThrow(DatasetNotFoundError);
    try {
      locateDatasetRoot(baseDir);
    } catch (error) {
      expect(error).toBeInstanceOf(DatasetNotFoundError);
      if (error instanceof DatasetNotFoundError) {
        expect(error.tried).toHaveLength(DEFAULT_DATASET_CANDIDATES.length);
      }
    }
  });

  it('lists subject directories in sorted order', () => {
    for (const subject of ['S10', 'S02', 'f01']) {
      mkdirSync(join(baseDir, 'STRESS', subject), { recursive: true });
    }
    writeFileSync(join(baseDir, 'STRESS', 'README.txt'), 'notes');
    expect(listSubjects(baseDir, 'STRESS')).toEqual(['S02', 'S10', 'f01']);
    expect(listSubjects(baseDir, 'AEROBIC')).toEqual([]);
  });
});
