import { describe, expect, it } from 'vitest';
import { parseSelfRating } from './self-rating';

describe('parseSelfRating', () => {
  it('strips a trailing decimal rating', () => {
    expect(parseSelfRating('Isolate the host first.\nConfidence: 0.82')).toEqual({
      answer: 'Isolate the host first.',
      rating: 0.82,
    });
  });

  it('normalizes percentages and out-of-ten ratings', () => {
    expect(parseSelfRating('Answer.\nConfidence: 85%').rating).toBeCloseTo(0.85, 5);
    expect(parseSelfRating('Answer.\nConfidence: 8/10').rating).toBeCloseTo(0.8, 5);
    expect(parseSelfRating('Answer.\nconfidence = 7').rating).toBeCloseTo(0.7, 5);
  });

  it('uses the last rating line', () => {
    const parsed = parseSelfRating('Confidence: 0.2\nMore detail.\nConfidence: 0.9');
    expect(parsed.rating).toBe(0.9);
    expect(parsed.answer).toBe('Confidence: 0.2\nMore detail.');
  });

  it('leaves text without a rating untouched', () => {
    expect(parseSelfRating('  Enable MFA everywhere.  ')).toEqual({ answer: 'Enable MFA everywhere.', rating: null });
  });
});
