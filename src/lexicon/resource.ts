/**
 * Lexical resource
 *
 * Stop words and tokenizer for one language. Loaded once at startup and
 * passed explicitly to the normalizer, keyword extractor and scorer; the
 * loaded resource is frozen and shared read-only across documents.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { AnalysisError } from '../errors.js';
import { tokenizeWords, type Tokenizer } from './tokenizer.js';

export interface LexicalResource {
  readonly language: string;
  readonly stopWords: ReadonlySet<string>;
  tokenize(text: string): string[];
}

export interface LoadLexiconOptions {
  language: string;
  /** Directory holding `<language>.json` stop-word arrays */
  dataDir?: string;
}

export const DEFAULT_LEXICON_DIR = fileURLToPath(new URL('../../data/stopwords/', import.meta.url));

export function createLexicalResource(
  language: string,
  stopWords: Iterable<string>,
  tokenizer: Tokenizer = tokenizeWords
): LexicalResource {
  const words = new Set<string>();
  for (const word of stopWords) {
    words.add(word.toLowerCase());
  }

  return Object.freeze({
    language,
    stopWords: words,
    tokenize: (text: string) => tokenizer(text),
  });
}

export async function loadLexicalResource(options: LoadLexiconOptions): Promise<LexicalResource> {
  const dataDir = options.dataDir ?? DEFAULT_LEXICON_DIR;
  const filePath = path.join(dataDir, `${options.language}.json`);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new AnalysisError(
      'LEXICON_UNAVAILABLE',
      `Stop-word list for "${options.language}" not found at ${filePath}`,
      undefined,
      { cause: err }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new AnalysisError(
      'LEXICON_UNAVAILABLE',
      `Stop-word list at ${filePath} is not valid JSON`,
      undefined,
      { cause: err }
    );
  }

  if (!Array.isArray(parsed) || !parsed.every((word): word is string => typeof word === 'string')) {
    throw new AnalysisError(
      'LEXICON_UNAVAILABLE',
      `Stop-word list at ${filePath} must be a JSON array of strings`
    );
  }

  return createLexicalResource(options.language, parsed);
}
