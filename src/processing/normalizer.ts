/**
 * Text Normalizer
 *
 * Canonical token form used for matching paragraph text against keywords.
 */

import type { LexicalResource } from '../lexicon/resource.js';

const NON_MATCHABLE = /[^a-z0-9\s]/g;

/**
 * Lowercase, strip everything but ASCII letters, digits and whitespace,
 * then tokenize.
 */
export function normalizeText(text: string, lexicon: LexicalResource): string[] {
  if (!text) return [];
  const cleaned = text.toLowerCase().replace(NON_MATCHABLE, '');
  return lexicon.tokenize(cleaned);
}
