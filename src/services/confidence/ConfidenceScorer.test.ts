import { describe, expect, it } from 'vitest';
import { ConfidenceScorer, clampUnit } from './ConfidenceScorer';

describe('ConfidenceScorer', () => {
  const scorer = new ConfidenceScorer();

  it('blends the top-k retrieval average with the self-rating', () => {
    // top three: (0.9 + 0.8 + 0.7) / 3 = 0.8; 0.6 * 0.8 + 0.4 * 0.5 = 0.68
    expect(scorer.score({ relevanceScores: [0.1, 0.9, 0.7, 0.8], selfRating: 0.5 })).toBeCloseTo(0.68, 3);
  });

  it('uses the retrieval signal alone when the model gave no rating', () => {
    expect(scorer.score({ relevanceScores: [0.6], selfRating: null })).toBeCloseTo(0.6, 3);
  });

  it('caps ungrounded answers at the ceiling', () => {
    expect(scorer.score({ relevanceScores: [], selfRating: 0.95 })).toBe(0.5);
    expect(scorer.score({ relevanceScores: [], selfRating: 0.3 })).toBeCloseTo(0.3, 3);
  });

  it('falls back to a neutral score when there is no signal at all', () => {
    expect(scorer.score({ relevanceScores: [], selfRating: null })).toBe(0.5);
  });

  it('honours configured weights and ceiling', () => {
    const custom = new ConfidenceScorer({ retrievalWeight: 1, selfWeight: 1, topK: 1, ungroundedCeiling: 0.2 });
    expect(custom.score({ relevanceScores: [0.4, 1], selfRating: 0 })).toBeCloseTo(0.5, 3);
    expect(custom.score({ relevanceScores: [], selfRating: 0.9 })).toBeCloseTo(0.2, 3);
  });

  it('always stays within [0, 1]', () => {
    const inputs = [
      { relevanceScores: [1.7, -3], selfRating: 4 },
      { relevanceScores: [Number.NaN], selfRating: -1 },
      { relevanceScores: [0, 0, 0], selfRating: 0 },
      { relevanceScores: [1, 1, 1], selfRating: 1 },
    ];
    for (const input of inputs) {
      const score = scorer.score(input);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });
});

describe('clampUnit', () => {
  it('clamps and rejects non-finite values', () => {
    expect(clampUnit(1.5)).toBe(1);
    expect(clampUnit(-0.2)).toBe(0);
    expect(clampUnit(Number.POSITIVE_INFINITY)).toBe(0);
    expect(clampUnit(0.42)).toBe(0.42);
  });
});
