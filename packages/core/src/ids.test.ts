import { describe, it, expect } from 'vitest';
import { buildMeasurementId, buildSessionId, cohortFor, protocolVersionFor } from './ids.js';

describe('buildSessionId', () => {
  it('joins subject and session type', () => {
    expect(buildSessionId('S05', 'STRESS')).toBe('S05_STRESS');
    expect(buildSessionId('f07', 'ANAEROBIC')).toBe('f07_ANAEROBIC');
  });
});

describe('buildMeasurementId', () => {
  it('is stable for the same inputs', () => {
    expect(buildMeasurementId('S05_STRESS', 'EDA', 3)).toBe(buildMeasurementId('S05_STRESS', 'EDA', 3));
  });

  it('includes signal type and ordinal', () => {
    expect(buildMeasurementId('S05_STRESS', 'ACC_Y', 12)).toBe('S05_STRESS_ACC_Y_12');
  });

  it('differs across signal types at the same index', () => {
    expect(buildMeasurementId('S05_STRESS', 'ACC_X', 0)).not.toBe(buildMeasurementId('S05_STRESS', 'ACC_Z', 0));
  });
});

describe('protocolVersionFor', () => {
  it('maps S-prefixed subjects to V1 and others to V2', () => {
    expect(protocolVersionFor('S01')).toBe('V1');
    expect(protocolVersionFor('f07')).toBe('V2');
    expect(protocolVersionFor('s01')).toBe('V2');
  });

  it('uses the same rule for cohort', () => {
    expect(cohortFor('S16')).toBe(protocolVersionFor('S16'));
    expect(cohortFor('f14')).toBe('V2');
  });
});
