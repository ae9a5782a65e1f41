// src/utils/text.ts

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Whole-word (or whole-phrase) match, case-insensitive. */
export function matchesWord(text: string, word: string): boolean {
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(word.toLowerCase())}($|[^a-z0-9])`).test(text.toLowerCase());
}

/** Match of a word beginning with `stem`, case-insensitive. */
export function matchesStem(text: string, stem: string): boolean {
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(stem.toLowerCase())}`).test(text.toLowerCase());
}

export function wordCount(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}
