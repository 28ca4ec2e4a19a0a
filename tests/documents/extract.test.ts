/**
 * @file extract.test.ts
 * @description Unit tests for text extraction and whitespace normalisation
 * @depends vitest, mammoth, src/documents/extract
 */

import { describe, expect, it } from 'vitest';
import { extractText, isSupportedDocument, normalizeExtractedText } from '../../src/documents/extract.js';
import { ExtractionError } from '../../src/errors.js';

describe('normalizeExtractedText', () => {
  it('normalises line endings, inner whitespace and blank runs', () => {
    expect(normalizeExtractedText('  Title \r\n\r\n\r\n\r\nBody\ttext  ')).toBe('Title\n\nBody text');
  });

  it('drops NUL characters left by some PDF producers', () => {
    expect(normalizeExtractedText('se\u0000ction')).toBe('section');
  });
});

describe('isSupportedDocument', () => {
  it('matches extensions case-insensitively', () => {
    expect(isSupportedDocument('Paper.PDF')).toBe(true);
    expect(isSupportedDocument('notes.md')).toBe(true);
    expect(isSupportedDocument('slides.pptx')).toBe(false);
  });
});

describe('extractText', () => {
  it('reads plain text and markdown as UTF-8', async () => {
    await expect(extractText({ fileName: 'notes.txt', data: Buffer.from('  Hello   world \n') })).resolves.toBe(
      'Hello world',
    );
    await expect(extractText({ fileName: 'notes.md', data: Buffer.from('# Über\n\nText') })).resolves.toBe(
      '# Über\n\nText',
    );
  });

  it('falls back to the MIME type when the name has no extension', async () => {
    await expect(
      extractText({ fileName: 'upload', data: Buffer.from('Plain body'), mimeType: 'text/plain' }),
    ).resolves.toBe('Plain body');
  });

  it('rejects unsupported formats', async () => {
    await expect(extractText({ fileName: 'slides.pptx', data: Buffer.from('x') })).rejects.toThrow(
      'Unsupported file type ".pptx". Supported: .pdf, .docx, .txt, .md',
    );
    await expect(extractText({ fileName: 'README', data: Buffer.from('x') })).rejects.toThrow(
      'Unsupported file type "README". Supported: .pdf, .docx, .txt, .md',
    );
  });

  it('rejects documents without text', async () => {
    await expect(extractText({ fileName: 'empty.txt', data: Buffer.from('  \n \t ') })).rejects.toThrow(
      'empty.txt contains no extractable text. Scanned documents need OCR before analysis.',
    );
  });

  it('wraps parser failures in ExtractionError', async () => {
    const attempt = extractText({ fileName: 'broken.docx', data: Buffer.from('not a zip archive') });

    await expect(attempt).rejects.toBeInstanceOf(ExtractionError);
    await expect(attempt).rejects.toThrow(/^Could not read broken\.docx: /);
  });
});
