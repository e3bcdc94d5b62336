/**
 * Keyword Extractor
 *
 * Derives the significant terms of a free-text description.
 */

import type { KeywordSet } from '../types.js';
import type { LexicalResource } from '../lexicon/resource.js';

const ALPHANUMERIC = /^[\p{L}\p{N}]+$/u;

export function extractKeywords(description: string, lexicon: LexicalResource): KeywordSet {
  const keywords = new Set<string>();
  if (!description) return keywords;

  for (const token of lexicon.tokenize(description.toLowerCase())) {
    if (!ALPHANUMERIC.test(token)) continue;
    if (lexicon.stopWords.has(token)) continue;
    keywords.add(token);
  }

  return keywords;
}

/**
 * Union of the persona and job keywords. Each description is tokenized on
 * its own so words never merge across the two.
 */
export function buildKeywordSet(persona: string, job: string, lexicon: LexicalResource): KeywordSet {
  return new Set([
    ...extractKeywords(persona, lexicon),
    ...extractKeywords(job, lexicon),
  ]);
}
