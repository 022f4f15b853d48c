import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { findRepoRoot, getEnvDiagnostics, maskValue, validateRequiredEnv } from './env.js';

describe('findRepoRoot', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'wearable-env-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('stops at the package.json declaring workspaces', () => {
    writeFileSync(join(root, 'package.json'), JSON.stringify({ name: 'x', workspaces: ['packages/*'] }));
    const nested = join(root, 'packages', 'core', 'src');
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(root, 'packages', 'core', 'package.json'), JSON.stringify({ name: 'core' }));
    expect(findRepoRoot(nested)).toBe(root);
  });

  it('stops at a .git folder', () => {
    mkdirSync(join(root, '.git'));
    const nested = join(root, 'apps', 'loader');
    mkdirSync(nested, { recursive: true });
    expect(findRepoRoot(nested)).toBe(root);
  });
});

describe('maskValue', () => {
  it('masks short values entirely', () => {
    expect(maskValue('abc')).toBe('***');
  });

  it('keeps four characters at each end of long values', () => {
    expect(maskValue('test-secret-value')).toBe('test...alue');
  });
});

describe('getEnvDiagnostics', () => {
  it('reports presence and masks secret-like keys', () => {
    const env = { SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_ROLE_KEY: 'test-secret-value' };
    const diagnostics = getEnvDiagnostics(['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'LOG_LEVEL'], env);
    expect(diagnostics.keys).toEqual([
      { key: 'SUPABASE_URL', present: true, length: 22, maskedValue: undefined, source: undefined },
      { key: 'SUPABASE_SERVICE_ROLE_KEY', present: true, length: 17, maskedValue: 'test...alue', source: undefined },
      { key: 'LOG_LEVEL', present: false },
    ]);
  });

  it('warns about quoted secrets and carriage returns', () => {
    const env = { SUPABASE_SERVICE_ROLE_KEY: '"test-secret"', LOG_LEVEL: 'info\r' };
    const { warnings } = getEnvDiagnostics(['SUPABASE_SERVICE_ROLE_KEY', 'LOG_LEVEL'], env);
    expect(warnings).toContain(
      'SUPABASE_SERVICE_ROLE_KEY contains quotes or leading/trailing whitespace (may cause issues)'
    );
    expect(warnings).toContain('LOG_LEVEL contains unprintable characters (possible CRLF/encoding issue)');
  });
});

describe('validateRequiredEnv', () => {
  it('lists missing and blank keys', () => {
    expect(validateRequiredEnv(['A', 'B', 'C'], { A: 'x', B: '  ' })).toEqual({ valid: false, missing: ['B', 'C'] });
    expect(validateRequiredEnv(['A'], { A: 'x' })).toEqual({ valid: true, missing: [] });
  });
});
