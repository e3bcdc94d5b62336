import { describe, it, expect } from 'vitest';
import {
  collectLines,
  createPdfExtractor,
  isPdfBuffer,
  joinPageLines,
  type PositionedText,
} from '../../src/extractors/pdf-extractor.js';
import { createTextExtractor, extractTextPages } from '../../src/extractors/text-extractor.js';
import { createDefaultProviders, extractDocument } from '../../src/extractors/index.js';
import { AnalysisError } from '../../src/errors.js';

function run(y: number, str: string, hasEOL = true): PositionedText {
  return { str, hasEOL, transform: [1, 0, 0, 1, 72, y], height: 12 };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('Text extractor', () => {
  it('splits pages on form feeds and skips blank pages', () => {
    const doc = extractTextPages(
      Buffer.from('Page one\fPage two\r\n\r\nMore\f   \fLast', 'utf-8'),
      'notes.txt'
    );

    expect(doc.kind).toBe('text');
    expect(doc.page_count).toBe(4);
    expect(doc.pages).toEqual([
      { page_number: 1, text: 'Page one' },
      { page_number: 2, text: 'Page two\n\nMore' },
      { page_number: 4, text: 'Last' },
    ]);
  });

  it('strips a UTF-8 byte order mark', () => {
    const doc = extractTextPages(Buffer.from('\uFEFFHello', 'utf-8'), 'bom.txt');
    expect(doc.pages).toEqual([{ page_number: 1, text: 'Hello' }]);
  });

  it('returns no pages for an empty file', () => {
    const doc = extractTextPages(Buffer.alloc(0), 'empty.txt');
    expect(doc.pages).toEqual([]);
  });

  it('rejects binary content', () => {
    const err = catchError(() => extractTextPages(Buffer.from([0x48, 0x00, 0x49]), 'blob.txt'));

    expect(err).toBeInstanceOf(AnalysisError);
    expect(err).toMatchObject({ code: 'EXTRACTION_FAILED', document: 'blob.txt' });
  });

  it('accepts text and markdown file names', () => {
    const extractor = createTextExtractor();
    expect(extractor.canHandle('a.TXT', Buffer.alloc(0))).toBe(true);
    expect(extractor.canHandle('b.md', Buffer.alloc(0))).toBe(true);
    expect(extractor.canHandle('c.docx', Buffer.alloc(0))).toBe(false);
  });
});

describe('PDF line assembly', () => {
  it('joins runs into lines on end-of-line markers', () => {
    const lines = collectLines([
      run(700, 'Climate', false),
      run(700, ' risk.'),
      run(686, 'Second line'),
    ]);

    expect(lines.map(l => l.text)).toEqual(['Climate risk.', 'Second line']);
  });

  it('drops empty lines and collapses spaces', () => {
    const lines = collectLines([run(700, ''), run(686, 'a   b  ')]);
    expect(lines.map(l => l.text)).toEqual(['a b']);
  });

  it('inserts a blank line where the vertical gap marks a new paragraph', () => {
    const text = joinPageLines(collectLines([
      run(700, 'Climate risk.'),
      run(686, 'Second line'),
      run(650, 'New para'),
    ]));

    expect(text).toBe('Climate risk.\nSecond line\n\nNew para');
  });

  it('recognises PDF magic bytes', () => {
    expect(isPdfBuffer(Buffer.from('%PDF-1.7\n'))).toBe(true);
    expect(isPdfBuffer(Buffer.from('%PD'))).toBe(false);
    expect(isPdfBuffer(Buffer.from('hello world'))).toBe(false);
  });

  it('refuses to extract when PDF support is disabled', async () => {
    const extractor = createPdfExtractor({ enabled: false });

    await expect(extractor.extractPages(Buffer.from('%PDF-1.4'), 'a.pdf')).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      message: 'PDF extraction is disabled',
    });
  });
});

describe('extractDocument', () => {
  const providers = createDefaultProviders({ pdfEnabled: false });

  it('dispatches text files to the text extractor', async () => {
    const doc = await extractDocument('notes.md', Buffer.from('Hello'), providers, { maxBytes: 1024 });
    expect(doc.kind).toBe('text');
    expect(doc.pages).toEqual([{ page_number: 1, text: 'Hello' }]);
  });

  it('routes PDF bytes to the PDF extractor whatever the name', async () => {
    await expect(
      extractDocument('misnamed.txt', Buffer.from('%PDF-1.4 ...'), providers, { maxBytes: 1024 })
    ).rejects.toMatchObject({ code: 'EXTRACTION_FAILED', message: 'PDF extraction is disabled' });
  });

  it('rejects documents over the size limit', async () => {
    await expect(
      extractDocument('big.txt', Buffer.from('hello'), providers, { maxBytes: 4 })
    ).rejects.toMatchObject({ code: 'DOCUMENT_TOO_LARGE', document: 'big.txt' });
  });

  it('rejects documents no provider accepts', async () => {
    await expect(
      extractDocument('image.png', Buffer.from('not a pdf'), providers, { maxBytes: 1024 })
    ).rejects.toMatchObject({ code: 'UNSUPPORTED_DOCUMENT' });
  });
});
