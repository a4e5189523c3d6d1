/**
 * Text helpers for matching bank descriptions.
 */

import { COMMON_BANKING_WORDS } from '../../shared/constants/categories';

/**
 * Lowercase, accents removed, runs of non-alphanumerics collapsed to one space.
 */
export function normalizeText(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/**
 * Distinctive words: at least 3 letters, not purely numeric, not a common banking word.
 */
export function significantWords(value: string): string[] {
  const seen = new Set<string>();
  for (const word of normalizeText(value).split(' ')) {
    if (word.length >= 3 && !/^\d+$/.test(word) && !COMMON_BANKING_WORDS.has(word)) {
      seen.add(word);
    }
  }
  return [...seen];
}

/**
 * Up to three significant words of a description, in order of appearance.
 */
export function extractKeywords(description: string, max = 3): string[] {
  return significantWords(description).slice(0, max);
}
