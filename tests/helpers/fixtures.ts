import type { Config } from '../../src/types.js';
import { createLexicalResource, type LexicalResource } from '../../src/lexicon/resource.js';

export const SMALL_STOP_WORDS = ['a', 'an', 'the', 'and', 'to', 'of', 'for', 'in', 'is', 'i', 'about'];

export function createTestLexicon(): LexicalResource {
  return createLexicalResource('test', SMALL_STOP_WORDS);
}

export function createTestConfig(overrides: Partial<Config> = {}): Config {
  return {
    inputDir: './input',
    outputDir: './output',
    personaDescription: 'climate scientist',
    jobToBeDone: 'assess risk',
    topN: 10,
    titleMaxLength: 100,
    stopwordsLanguage: 'english',
    lexiconDir: undefined,
    inputExtensions: ['.pdf', '.txt', '.md'],
    maxBytes: 10 * 1024 * 1024,
    pdfEnabled: true,
    resultTtlS: 3600,
    ...overrides,
  };
}
