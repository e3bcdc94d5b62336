/**
 * Document text providers
 *
 * Turn raw document bytes into per-page text. The first provider that
 * accepts a document handles it.
 */

import type { Config, DocumentKind, ExtractedDocument } from '../types.js';
import { AnalysisError } from '../errors.js';

export interface DocumentTextProvider {
  readonly kind: DocumentKind;
  canHandle(name: string, bytes: Buffer): boolean;
  extractPages(bytes: Buffer, name: string): Promise<ExtractedDocument>;
}

export async function extractDocument(
  name: string,
  bytes: Buffer,
  providers: readonly DocumentTextProvider[],
  config: Pick<Config, 'maxBytes'>
): Promise<ExtractedDocument> {
  if (bytes.length > config.maxBytes) {
    throw new AnalysisError(
      'DOCUMENT_TOO_LARGE',
      `Document is ${bytes.length} bytes, limit is ${config.maxBytes}`,
      name
    );
  }

  const provider = providers.find(p => p.canHandle(name, bytes));
  if (!provider) {
    throw new AnalysisError('UNSUPPORTED_DOCUMENT', 'No text provider accepts this document type', name);
  }

  return provider.extractPages(bytes, name);
}
