import { describe, it, expect } from 'vitest';
import { scoreText, scoreUnits } from '../../src/processing/scorer.js';
import { createTestLexicon } from '../helpers/fixtures.js';

describe('scoreText', () => {
  const lexicon = createTestLexicon();
  const keywords = new Set(['climate', 'risk']);

  it('is the share of tokens that are distinct keyword matches', () => {
    expect(scoreText('Climate risk.', keywords, lexicon)).toBe(1);
    expect(scoreText('Climate is a risk to climate', keywords, lexicon)).toBeCloseTo(2 / 6);
  });

  it('is 0 when no keyword appears', () => {
    expect(scoreText('Unrelated filler text about cooking.', keywords, lexicon)).toBe(0);
  });

  it('is 0 for an empty keyword set', () => {
    expect(scoreText('Climate risk.', new Set(), lexicon)).toBe(0);
  });

  it('is 0 for text without tokens', () => {
    expect(scoreText('', keywords, lexicon)).toBe(0);
    expect(scoreText('?!', keywords, lexicon)).toBe(0);
  });

  it('does not increase when a matched word is repeated', () => {
    const single = new Set(['climate']);
    const once = scoreText('climate risk', single, lexicon);
    const twice = scoreText('climate climate risk', single, lexicon);

    expect(once).toBe(1 / 2);
    expect(twice).toBe(1 / 3);
    expect(twice).toBeLessThan(once);
  });

  it('matches after punctuation is stripped', () => {
    expect(scoreText('Risk-adjusted', new Set(['riskadjusted']), lexicon)).toBe(1);
  });
});

describe('scoreUnits', () => {
  it('attaches a score to each unit without changing it', () => {
    const lexicon = createTestLexicon();
    const units = [
      { document: 'd.pdf', page_number: 1, text: 'climate risk', paragraph_index: 0 },
      { document: 'd.pdf', page_number: 1, text: 'cooking tips', paragraph_index: 1 },
    ];

    const scored = scoreUnits(units, new Set(['risk']), lexicon);

    expect(scored).toEqual([
      { document: 'd.pdf', page_number: 1, text: 'climate risk', paragraph_index: 0, score: 0.5 },
      { document: 'd.pdf', page_number: 1, text: 'cooking tips', paragraph_index: 1, score: 0 },
    ]);
    expect(units[0]).not.toHaveProperty('score');
  });
});
