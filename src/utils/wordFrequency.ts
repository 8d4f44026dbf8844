/**
 * Word tokenization and frequency counting for post content
 */

import { WordFrequency } from '../database/models';

// Maximal runs of letters, digits and underscore
const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Splits text into lowercase word tokens, in order of appearance.
 */
export function tokenize(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

/**
 * Counts each lowercase word token in the text. Empty or missing text yields `{}`.
 */
export function calculateWordFrequency(
  text: string | null | undefined,
): WordFrequency {
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  // fromEntries defines own properties, so tokens like "__proto__" stay ordinary keys
  return Object.fromEntries(counts);
}
