import type { Config } from '../types.js';
import { createPdfExtractor } from './pdf-extractor.js';
import { createTextExtractor } from './text-extractor.js';
import type { DocumentTextProvider } from './provider.js';

export { extractDocument, type DocumentTextProvider } from './provider.js';

/**
 * PDF first: a PDF stays a PDF whatever its file name says
 */
export function createDefaultProviders(config: Pick<Config, 'pdfEnabled'>): DocumentTextProvider[] {
  return [
    createPdfExtractor({ enabled: config.pdfEnabled }),
    createTextExtractor(),
  ];
}
