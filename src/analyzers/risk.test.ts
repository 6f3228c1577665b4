import { describe, it, expect } from 'vitest';
import { createRiskScorer, defaultRiskScorer, riskBand } from './risk.js';

describe('defaultRiskScorer', () => {
  it('should invert the normalised score', () => {
    expect(defaultRiskScorer({ score_normalised: 0.8 })).toBeCloseTo(0.2);
    expect(defaultRiskScorer({ score_normalised: '0.5' })).toBe(0.5);
  });

  it('should prefer the normalised score over the raw score', () => {
    expect(defaultRiskScorer({ score_normalised: 1, score: 0 })).toBe(0);
  });

  it('should invert the raw score on a 0..100 scale', () => {
    expect(defaultRiskScorer({ score: 25 })).toBe(0.75);
  });

  it('should clamp out-of-range raw scores', () => {
    expect(defaultRiskScorer({ score: 250 })).toBe(0);
    expect(defaultRiskScorer({ score: -50 })).toBe(1);
  });

  it('should treat rugged tokens as maximum risk when no score is present', () => {
    expect(defaultRiskScorer({ rugged: true })).toBe(1);
  });

  it('should fall back to the number of risks', () => {
    expect(defaultRiskScorer({ risks: [{}, {}, {}] })).toBe(0.3);
    expect(defaultRiskScorer({ risks: new Array(15).fill({}) })).toBe(1);
  });

  it('should return the fallback score for empty reports', () => {
    expect(defaultRiskScorer({})).toBe(0.5);
    expect(defaultRiskScorer({ score: 'n/a' })).toBe(0.5);
  });
});

describe('createRiskScorer', () => {
  it('should use a custom raw scale', () => {
    const scorer = createRiskScorer({ rawScale: 3000 });
    const score = scorer({ score: 3000 });

    expect(score).toBe(0);
    expect(riskBand(score).level).toBe('low');
  });

  it('should use a custom fallback', () => {
    expect(createRiskScorer({ fallbackScore: 0.9 })({})).toBe(0.9);
  });
});

describe('riskBand', () => {
  it('should map scores to bands inclusive at the top', () => {
    expect(riskBand(0).level).toBe('low');
    expect(riskBand(0.2).level).toBe('low');
    expect(riskBand(0.2000001).level).toBe('medium');
    expect(riskBand(0.5).level).toBe('medium');
    expect(riskBand(0.51).level).toBe('high');
    expect(riskBand(1)).toEqual({ level: 'high', label: 'High Risk', icon: '🚨' });
  });

  it('should put NaN in the high band', () => {
    expect(riskBand(Number.NaN).level).toBe('high');
  });
});
