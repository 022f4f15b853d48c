import { describe, it, expect } from 'vitest';
import { parseLoaderArgs } from '../cli-args.js';

describe('parseLoaderArgs', () => {
  it('parses a single-subject run', () => {
    expect(parseLoaderArgs(['--session-type', 'STRESS', '--subject', 'S05'])).toEqual({
      ok: true,
      options: {
        sessionType: 'STRESS',
        target: { kind: 'subject', subjectId: 'S05' },
        includeProblematic: false,
        dryRun: false,
        dataDir: undefined,
        chunkSize: undefined,
      },
    });
  });

  it('parses a load-all run with every option', () => {
    const parsed = parseLoaderArgs([
      '--session-type=AEROBIC',
      '--load-all',
      '--include-problematic',
      '--dry-run',
      '--data-dir',
      'data/raw',
      '--chunk-size',
      '1000',
    ]);
    expect(parsed).toEqual({
      ok: true,
      options: {
        sessionType: 'AEROBIC',
        target: { kind: 'all' },
        includeProblematic: true,
        dryRun: true,
        dataDir: 'data/raw',
        chunkSize: 1000,
      },
    });
  });

  it('requires a session type', () => {
    expect(parseLoaderArgs(['--subject', 'S05'])).toEqual({
      ok: false,
      help: false,
      error: '--session-type is required',
    });
  });

  it('rejects an unknown session type', () => {
    expect(parseLoaderArgs(['--session-type', 'REST', '--load-all'])).toEqual({
      ok: false,
      help: false,
      error: '--session-type must be one of STRESS, AEROBIC, ANAEROBIC',
    });
  });

  it('requires exactly one of --subject and --load-all', () => {
    const expected = { ok: false, help: false, error: 'Specify exactly one of --subject or --load-all' };
    expect(parseLoaderArgs(['--session-type', 'STRESS'])).toEqual(expected);
    expect(parseLoaderArgs(['--session-type', 'STRESS', '--subject', 'S05', '--load-all'])).toEqual(expected);
  });

  it('rejects a non-positive chunk size', () => {
    expect(parseLoaderArgs(['--session-type', 'STRESS', '--load-all', '--chunk-size', '0'])).toEqual({
      ok: false,
      help: false,
      error: '--chunk-size must be positive',
    });
  });

  it('reports a flag without its value', () => {
    expect(parseLoaderArgs(['--session-type', 'STRESS', '--subject'])).toEqual({
      ok: false,
      help: false,
      error: 'Missing value for --subject',
    });
  });

  it('rejects unknown options and stray arguments', () => {
    expect(parseLoaderArgs(['--verbose'])).toEqual({ ok: false, help: false, error: 'Unknown option: --verbose' });
    expect(parseLoaderArgs(['STRESS'])).toEqual({ ok: false, help: false, error: 'Unexpected argument: STRESS' });
  });

  it('returns help without validating the rest', () => {
    expect(parseLoaderArgs(['--help'])).toEqual({ ok: false, help: true });
  });
});
