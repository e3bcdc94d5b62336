/**
 * Segmenter
 *
 * Splits per-page text into paragraph content units. Only blank lines
 * separate paragraphs; text that uses single newlines between paragraphs
 * stays one unit per page.
 */

import type { ContentUnit, PageText } from '../types.js';

const PARAGRAPH_BREAK = '\n\n';

export function splitParagraphs(pageText: string): string[] {
  const paragraphs = pageText
    .split(PARAGRAPH_BREAK)
    .map(p => p.trim())
    .filter(p => p.length > 0);

  if (paragraphs.length === 0) {
    const whole = pageText.trim();
    return whole ? [whole] : [];
  }

  return paragraphs;
}

export function segmentDocument(document: string, pages: readonly PageText[]): ContentUnit[] {
  const units: ContentUnit[] = [];

  for (const page of pages) {
    splitParagraphs(page.text).forEach((text, paragraphIndex) => {
      units.push({
        document,
        page_number: page.page_number,
        text,
        paragraph_index: paragraphIndex,
      });
    });
  }

  return units;
}
