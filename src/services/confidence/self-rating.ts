// src/services/confidence/self-rating.ts

export const SELF_RATING_INSTRUCTION =
  'After your answer, add a final line of the form "Confidence: <number between 0 and 1>" ' +
  'rating how well the provided context supports your answer.';

const RATING_LINE = /^[ \t>*_]*confidence[ \t*_]*[:=][ \t]*([0-9]*\.?[0-9]+)[ \t]*(%|\/[ \t]*10|\/[ \t]*100)?[ \t*_.]*$/gim;

export interface ParsedAnswer {
  answer: string;
  rating: number | null;
}

function normalize(value: number, unit: string | undefined): number {
  const compactUnit = unit?.replace(/\s/g, '');
  if (compactUnit === '%' || compactUnit === '/100') return value / 100;
  if (compactUnit === '/10') return value / 10;
  if (value > 10) return value / 100;
  if (value > 1) return value / 10;
  return value;
}

/**
 * Extracts the trailing self-rating line the model was asked for and removes
 * it from the answer text. The last rating line wins.
 */
export function parseSelfRating(text: string): ParsedAnswer {
  const matches = [...text.matchAll(RATING_LINE)];
  const last = matches[matches.length - 1];
  if (!last || last.index === undefined) {
    return { answer: text.trim(), rating: null };
  }

  const value = Number(last[1]);
  const answer = (text.slice(0, last.index) + text.slice(last.index + last[0].length)).trim();
  if (!Number.isFinite(value)) {
    return { answer, rating: null };
  }
  return { answer, rating: Math.min(1, Math.max(0, normalize(value, last[2]))) };
}
