import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_UPLOAD_CHUNK_SIZE, loadPipelineConfig, loadStoreConfig } from './pipeline.js';

describe('loadPipelineConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadPipelineConfig({})).toEqual({
      datasetBaseDir: 'data/raw',
      chunkSize: DEFAULT_UPLOAD_CHUNK_SIZE,
      knownIssuesFile: undefined,
      tables: {
        measurements: 'fact_physiological_measurements',
        sessions: 'dim_sessions',
        signalTypes: 'dim_signal_types',
      },
    });
  });

  it('treats blank values as unset', () => {
    const config = loadPipelineConfig({ DATASET_BASE_DIR: '  ', UPLOAD_CHUNK_SIZE: '' });
    expect(config.datasetBaseDir).toBe('data/raw');
    expect(config.chunkSize).toBe(50000);
  });

  it('reads overrides', () => {
    const config = loadPipelineConfig({
      DATASET_BASE_DIR: '/mnt/wearables',
      UPLOAD_CHUNK_SIZE: '1000',
      KNOWN_ISSUES_FILE: 'config/issues.json',
      SESSIONS_TABLE: 'sessions_v2',
    });
    expect(config.datasetBaseDir).toBe('/mnt/wearables');
    expect(config.chunkSize).toBe(1000);
    expect(config.knownIssuesFile).toBe('config/issues.json');
    expect(config.tables.sessions).toBe('sessions_v2');
    expect(config.tables.measurements).toBe('fact_physiological_measurements');
  });

  it('rejects a non-positive chunk size', () => {
    expect(() => loadPipelineConfig({ UPLOAD_CHUNK_SIZE: '0' })).toThrow(ConfigError);
    expect(() => loadPipelineConfig({ UPLOAD_CHUNK_SIZE: 'lots' })).toThrow(/UPLOAD_CHUNK_SIZE/);
  });
});

describe('loadStoreConfig', () => {
  it('returns credentials when present', () => {
    expect(
      loadStoreConfig({ SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' })
    ).toEqual({ url: 'http://localhost:54321', serviceRoleKey: 'test-secret' });
  });

  it('names the missing keys', () => {
    try {
      loadStoreConfig({ SUPABASE_URL: 'not a url' });
      expect.unreachable('loadStoreConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.keys).toEqual(['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY']);
      }
    }
  });
});
