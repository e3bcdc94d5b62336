/**
 * PDF Page Text Extractor
 *
 * Extracts per-page text from PDF files using pdf.js.
 * Does NOT perform OCR - only extracts embedded text.
 */

import * as path from 'node:path';

import type { ExtractedDocument, PageText } from '../types.js';
import { AnalysisError } from '../errors.js';
import type { DocumentTextProvider } from './provider.js';

/** Positioned text run, the subset of a pdf.js TextItem used here */
export interface PositionedText {
  str: string;
  hasEOL: boolean;
  transform: number[];
  height: number;
}

interface PdfLine {
  text: string;
  y: number;
  height: number;
}

// Baseline gap, in line heights, above which two lines are separate paragraphs
const PARAGRAPH_GAP_RATIO = 1.5;

export interface PdfExtractorOptions {
  enabled: boolean;
}

export function createPdfExtractor(options: PdfExtractorOptions): DocumentTextProvider {
  return {
    kind: 'pdf',
    canHandle: (name, bytes) => isPdfBuffer(bytes) || path.extname(name).toLowerCase() === '.pdf',
    extractPages: (bytes, name) => extractPdfPages(bytes, name, options),
  };
}

/**
 * Extract text from PDF buffer, one entry per page that yields text
 */
export async function extractPdfPages(
  buffer: Buffer,
  name: string,
  options: PdfExtractorOptions
): Promise<ExtractedDocument> {
  if (!options.enabled) {
    throw new AnalysisError('EXTRACTION_FAILED', 'PDF extraction is disabled', name);
  }

  const warnings: string[] = [];

  const pdfDoc = await openPdf(buffer, name);
  const pageCount = pdfDoc.numPages;

  const pages: PageText[] = [];
  let totalChars = 0;

  try {
    for (let pageNum = 1; pageNum <= pageCount; pageNum++) {
      let text: string;
      try {
        const page = await pdfDoc.getPage(pageNum);
        const textContent = await page.getTextContent();
        const items = textContent.items.flatMap(item => ('str' in item ? [item] : []));
        text = joinPageLines(collectLines(items));
      } catch (err) {
        const message = err instanceof Error ? err.message : 'Unknown error';
        warnings.push(`Page ${pageNum} skipped: ${message}`);
        continue;
      }

      if (text.trim().length === 0) continue;
      totalChars += text.length;
      pages.push({ page_number: pageNum, text });
    }
  } finally {
    await pdfDoc.destroy();
  }

  const avgCharsPerPage = pageCount > 0 ? totalChars / pageCount : 0;
  const emptyPages = pageCount - pages.length;

  // Very little text per page usually means scanned images
  if (pageCount > 0 && (avgCharsPerPage < 100 || emptyPages / pageCount > 0.5)) {
    warnings.push(
      'Low text extraction confidence - PDF may be scanned images. ' +
      `Average ${Math.round(avgCharsPerPage)} chars/page, ${emptyPages}/${pageCount} pages without text.`
    );
  }

  return {
    name,
    kind: 'pdf',
    pages,
    page_count: pageCount,
    warnings,
  };
}

async function openPdf(buffer: Buffer, name: string) {
  // Dynamic import to avoid loading if not needed
  const pdfjsLib = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(buffer),
    useSystemFonts: true,
    disableFontFace: true,
  });

  try {
    return await loadingTask.promise;
  } catch (err) {
    // A rejected load still holds its worker
    await loadingTask.destroy();
    throw new AnalysisError('EXTRACTION_FAILED', describePdfError(err), name, { cause: err });
  }
}

/**
 * Group text runs into lines, using pdf.js end-of-line markers
 */
export function collectLines(items: readonly PositionedText[]): PdfLine[] {
  const lines: PdfLine[] = [];
  let current: PdfLine | null = null;

  for (const item of items) {
    if (!current) {
      current = { text: '', y: item.transform[5] ?? 0, height: item.height };
    }
    current.text += item.str;
    current.height = Math.max(current.height, item.height);

    if (item.hasEOL) {
      lines.push(current);
      current = null;
    }
  }

  if (current) {
    lines.push(current);
  }

  return lines
    .map(line => ({ ...line, text: line.text.replace(/[ \t]+/g, ' ').trim() }))
    .filter(line => line.text.length > 0);
}

/**
 * Join lines with "\n", or with a blank line where the vertical gap
 * to the previous line marks a new paragraph
 */
export function joinPageLines(lines: readonly PdfLine[]): string {
  let text = '';
  let previous: PdfLine | null = null;

  for (const line of lines) {
    if (previous) {
      const gap = previous.y - line.y;
      const lineHeight = Math.max(previous.height, line.height, 1);
      text += gap > lineHeight * PARAGRAPH_GAP_RATIO ? '\n\n' : '\n';
    }
    text += line.text;
    previous = line;
  }

  return text;
}

function describePdfError(err: unknown): string {
  const message = err instanceof Error ? err.message : 'Unknown error';

  if (message.includes('Invalid PDF')) {
    return 'Invalid or corrupted PDF file';
  }
  if (message.toLowerCase().includes('password')) {
    return 'PDF is password protected';
  }
  return `PDF extraction failed: ${message}`;
}

/**
 * Quick check if buffer looks like a PDF
 */
export function isPdfBuffer(buffer: Buffer): boolean {
  // PDF files start with %PDF-
  return buffer.length >= 5 && buffer.toString('ascii', 0, 5) === '%PDF-';
}
