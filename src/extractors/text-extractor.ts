/**
 * Plain Text Page Extractor
 *
 * Text and markdown files, paged on form feed characters.
 */

import * as path from 'node:path';

import type { ExtractedDocument, PageText } from '../types.js';
import { AnalysisError } from '../errors.js';
import type { DocumentTextProvider } from './provider.js';

const TEXT_EXTENSIONS: ReadonlySet<string> = new Set(['.txt', '.text', '.md', '.markdown']);
const PAGE_BREAK = '\f';

export function createTextExtractor(): DocumentTextProvider {
  return {
    kind: 'text',
    canHandle: (name) => TEXT_EXTENSIONS.has(path.extname(name).toLowerCase()),
    extractPages: async (bytes, name) => extractTextPages(bytes, name),
  };
}

export function extractTextPages(buffer: Buffer, name: string): ExtractedDocument {
  if (buffer.includes(0)) {
    throw new AnalysisError('EXTRACTION_FAILED', 'File looks binary, not text', name);
  }

  const decoded = normalizeLineEndings(buffer.toString('utf-8').replace(/^\uFEFF/, ''));
  const rawPages = decoded.split(PAGE_BREAK);

  const pages: PageText[] = [];
  rawPages.forEach((text, idx) => {
    if (text.trim().length > 0) {
      pages.push({ page_number: idx + 1, text });
    }
  });

  return {
    name,
    kind: 'text',
    pages,
    page_count: rawPages.length,
    warnings: [],
  };
}

function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}
