import { describe, it, expect } from 'vitest';
import {
  deriveSectionTitle,
  rankUnits,
  FALLBACK_SECTION_TITLE,
  UNTITLED_SECTION,
} from '../../src/processing/ranker.js';
import type { ScoredUnit } from '../../src/types.js';

function unit(page: number, index: number, score: number, text = `p${page} #${index}`): ScoredUnit {
  return { document: 'doc.pdf', page_number: page, text, paragraph_index: index, score };
}

describe('deriveSectionTitle', () => {
  it('returns a short first line verbatim', () => {
    expect(deriveSectionTitle('Short title\nBody text')).toBe('Short title');
  });

  it('trims the first line', () => {
    expect(deriveSectionTitle('  Padded  \nrest')).toBe('Padded');
  });

  it('returns a line of exactly the maximum length unchanged', () => {
    expect(deriveSectionTitle('abcdefghij', 10)).toBe('abcdefghij');
  });

  it('truncates at the last whitespace and appends an ellipsis', () => {
    expect(deriveSectionTitle('The quick brown fox jumps over the lazy dog', 18)).toBe('The quick brown...');
  });

  it('keeps the hard cut when there is no whitespace', () => {
    expect(deriveSectionTitle('abcdefghijklmnop', 10)).toBe('abcdefghij...');
  });

  it('falls back when the first line is blank', () => {
    expect(deriveSectionTitle('   \nBody')).toBe(FALLBACK_SECTION_TITLE);
  });

  it('uses the untitled placeholder for blank text', () => {
    expect(deriveSectionTitle('')).toBe(UNTITLED_SECTION);
    expect(deriveSectionTitle(' \n ')).toBe(UNTITLED_SECTION);
  });
});

describe('rankUnits', () => {
  const scored = [
    unit(1, 0, 0.2),
    unit(1, 1, 0),
    unit(2, 0, 0.5),
    unit(2, 1, 0.2),
    unit(3, 0, 0.5),
  ];

  it('orders by score and keeps segmentation order for ties', () => {
    const ranked = rankUnits(scored);

    expect(ranked.map(r => [r.page_number, r.paragraph_index])).toEqual([
      [2, 0],
      [3, 0],
      [1, 0],
      [2, 1],
    ]);
  });

  it('assigns contiguous ranks starting at 1', () => {
    expect(rankUnits(scored).map(r => r.importance_rank)).toEqual([1, 2, 3, 4]);
  });

  it('never ranks zero-score units', () => {
    expect(rankUnits(scored).every(r => r.score > 0)).toBe(true);
    expect(rankUnits([unit(1, 0, 0)])).toEqual([]);
  });

  it('keeps at most top_n units', () => {
    const ranked = rankUnits(scored, { top_n: 2 });
    expect(ranked.map(r => r.importance_rank)).toEqual([1, 2]);
    expect(ranked.map(r => r.page_number)).toEqual([2, 3]);
  });

  it('defaults to ten sections', () => {
    const many = Array.from({ length: 15 }, (_, i) => unit(1, i, 0.1));
    expect(rankUnits(many)).toHaveLength(10);
  });

  it('titles each unit from its first line', () => {
    const ranked = rankUnits([unit(1, 0, 0.3, 'Heading line\nBody')], { title_max_length: 50 });
    expect(ranked[0]?.section_title).toBe('Heading line');
  });

  it('does not reorder its input', () => {
    const input = [unit(1, 0, 0.1), unit(1, 1, 0.9)];
    rankUnits(input);
    expect(input.map(u => u.paragraph_index)).toEqual([0, 1]);
  });
});
