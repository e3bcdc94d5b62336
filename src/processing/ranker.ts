/**
 * Ranker & Selector
 *
 * Orders scored units by descending score and keeps the top N, titling
 * each one from its first line.
 */

import type { RankOptions, RankedUnit, ScoredUnit } from '../types.js';

export const DEFAULT_TOP_N = 10;
export const DEFAULT_TITLE_MAX_LENGTH = 100;

export const UNTITLED_SECTION = 'Untitled Section';
export const FALLBACK_SECTION_TITLE = 'Relevant Content';

const ELLIPSIS = '...';

export function deriveSectionTitle(text: string, maxLength = DEFAULT_TITLE_MAX_LENGTH): string {
  if (!text.trim()) return UNTITLED_SECTION;

  const firstLine = (text.split('\n')[0] ?? '').trim();
  if (!firstLine) return FALLBACK_SECTION_TITLE;

  // Lengths count code points so surrogate pairs are never split
  const chars = Array.from(firstLine);
  if (chars.length <= maxLength) return firstLine;

  const head = chars.slice(0, maxLength).join('');
  const lastSpace = lastWhitespaceIndex(head);
  const cut = lastSpace === -1 ? head : head.slice(0, lastSpace);
  return cut + ELLIPSIS;
}

function lastWhitespaceIndex(text: string): number {
  for (let i = text.length - 1; i >= 0; i--) {
    if (/\s/.test(text.charAt(i))) return i;
  }
  return -1;
}

/**
 * Units scoring 0 never reach the output. Array.prototype.sort is stable,
 * so equal scores keep segmentation order.
 */
export function rankUnits(
  scored: readonly ScoredUnit[],
  options: Partial<RankOptions> = {}
): RankedUnit[] {
  const topN = options.top_n ?? DEFAULT_TOP_N;
  const titleMaxLength = options.title_max_length ?? DEFAULT_TITLE_MAX_LENGTH;

  return scored
    .filter(unit => unit.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, topN)
    .map((unit, index) => ({
      ...unit,
      section_title: deriveSectionTitle(unit.text, titleMaxLength),
      importance_rank: index + 1,
    }));
}
