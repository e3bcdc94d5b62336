/**
 * Relevance Scorer
 *
 * Keyword density: distinct matched keywords over total token count.
 * Repeating a keyword grows the denominator only.
 */

import type { ContentUnit, KeywordSet, ScoredUnit } from '../types.js';
import type { LexicalResource } from '../lexicon/resource.js';
import { normalizeText } from './normalizer.js';

export function scoreText(text: string, keywords: KeywordSet, lexicon: LexicalResource): number {
  if (!text || keywords.size === 0) return 0;

  const tokens = normalizeText(text, lexicon);
  if (tokens.length === 0) return 0;

  const matched = new Set<string>();
  for (const token of tokens) {
    if (keywords.has(token)) matched.add(token);
  }

  return matched.size / tokens.length;
}

export function scoreUnits(
  units: readonly ContentUnit[],
  keywords: KeywordSet,
  lexicon: LexicalResource
): ScoredUnit[] {
  return units.map(unit => ({
    ...unit,
    score: scoreText(unit.text, keywords, lexicon),
  }));
}
