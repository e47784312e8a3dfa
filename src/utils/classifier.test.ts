import { describe, it, expect } from 'vitest';
import { classify, getScoringPolicy, READINESS_POLICY, RISK_POLICY } from './classifier';

describe('classify', () => {
  describe('risk mode', () => {
    it.each([
      [0, 'LOW'],
      [25, 'LOW'],
      [25.01, 'MEDIUM'],
      [60, 'MEDIUM'],
      [60.01, 'HIGH'],
      [100, 'HIGH']
    ])('%s%% -> %s', (percentage, level) => {
      expect(classify(percentage, 'risk')).toBe(level);
    });
  });

  describe('readiness mode', () => {
    it.each([
      [100, 'ADVANCED'],
      [75, 'ADVANCED'],
      [74.99, 'DEVELOPING'],
      [50, 'DEVELOPING'],
      [49.99, 'BASIC'],
      [0, 'BASIC']
    ])('%s%% -> %s', (percentage, level) => {
      expect(classify(percentage, 'readiness')).toBe(level);
    });
  });

  it('maps levels onto severity buckets', () => {
    expect(RISK_POLICY.classify(10)).toEqual({ level: 'LOW', severity: 'best' });
    expect(RISK_POLICY.classify(40)).toEqual({ level: 'MEDIUM', severity: 'middle' });
    expect(RISK_POLICY.classify(90)).toEqual({ level: 'HIGH', severity: 'worst' });
    expect(READINESS_POLICY.classify(90)).toEqual({ level: 'ADVANCED', severity: 'best' });
    expect(READINESS_POLICY.classify(60)).toEqual({ level: 'DEVELOPING', severity: 'middle' });
    expect(READINESS_POLICY.classify(10)).toEqual({ level: 'BASIC', severity: 'worst' });
  });

  it('uses wider medium band for risk categories than for the overall score', () => {
    // Category average 1.5 of 2 -> 75%
    expect(RISK_POLICY.classifyCategory(75).level).toBe('MEDIUM');
    expect(RISK_POLICY.classify(75).level).toBe('HIGH');
    expect(RISK_POLICY.classifyCategory(75.01).level).toBe('HIGH');
    expect(RISK_POLICY.classifyCategory(25).level).toBe('LOW');
  });

  it('uses the same thresholds for readiness categories', () => {
    expect(READINESS_POLICY.classifyCategory(75).level).toBe('ADVANCED');
    expect(READINESS_POLICY.classifyCategory(50).level).toBe('DEVELOPING');
    expect(READINESS_POLICY.classifyCategory(25).level).toBe('BASIC');
  });

  it('selects policies by mode', () => {
    expect(getScoringPolicy('risk')).toBe(RISK_POLICY);
    expect(getScoringPolicy('readiness')).toBe(READINESS_POLICY);
    expect(getScoringPolicy('readiness').scoreLabel).toBe('Readiness Score');
  });
});
