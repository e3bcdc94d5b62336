import { describe, it, expect } from 'vitest';
import { buildKeywordSet, extractKeywords } from '../../src/processing/keywords.js';
import { createTestLexicon } from '../helpers/fixtures.js';

describe('extractKeywords', () => {
  const lexicon = createTestLexicon();

  it('removes stop words and punctuation', () => {
    const keywords = extractKeywords('Assess the risk of climate change.', lexicon);
    expect([...keywords].sort()).toEqual(['assess', 'change', 'climate', 'risk']);
  });

  it('drops tokens that are not purely alphanumeric', () => {
    const keywords = extractKeywords("I'm a state-of-the-art planner", lexicon);
    expect([...keywords]).toEqual(['planner']);
  });

  it('collapses duplicates regardless of case', () => {
    const keywords = extractKeywords('risk Risk RISK', lexicon);
    expect([...keywords]).toEqual(['risk']);
  });

  it('keeps numbers and alphanumeric codes', () => {
    const keywords = extractKeywords('Q3 2024 report', lexicon);
    expect([...keywords].sort()).toEqual(['2024', 'q3', 'report']);
  });

  it('returns an empty set for an empty description', () => {
    expect(extractKeywords('', lexicon).size).toBe(0);
  });

  it('returns an empty set when every word is a stop word', () => {
    expect(extractKeywords('The and of a', lexicon).size).toBe(0);
  });
});

describe('buildKeywordSet', () => {
  const lexicon = createTestLexicon();

  it('unions persona and job keywords', () => {
    const keywords = buildKeywordSet('climate scientist', 'assess risk', lexicon);
    expect([...keywords].sort()).toEqual(['assess', 'climate', 'risk', 'scientist']);
  });

  it('is empty when both descriptions are empty', () => {
    expect(buildKeywordSet('', '', lexicon).size).toBe(0);
  });
});
