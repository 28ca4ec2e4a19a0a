import { createRequire } from 'node:module';
import { extname } from 'node:path';
import mammoth from 'mammoth';
import type PdfParse from 'pdf-parse';
import { ExtractionError, toErrorMessage } from '../errors.js';

const require = createRequire(import.meta.url);

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.txt', '.md'] as const;

export interface SourceDocument {
  fileName: string;
  data: Buffer;
  mimeType?: string;
}

const MIME_EXTENSIONS: Readonly<Record<string, string>> = {
  'application/pdf': '.pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': '.docx',
  'text/plain': '.txt',
  'text/markdown': '.md',
};

// pdf-parse's entry point reads a bundled sample file when it is loaded without a parent module,
// which is what an ESM import looks like to it.
function loadPdfParse(): typeof PdfParse {
  return require('pdf-parse');
}

export function isSupportedDocument(fileName: string): boolean {
  const extension = extname(fileName).toLowerCase();
  return (SUPPORTED_EXTENSIONS as readonly string[]).includes(extension);
}

export function normalizeExtractedText(raw: string): string {
  return raw
    .replace(/\r\n?/g, '\n')
    .replace(/\u0000/g, '')
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v ]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

async function readRawText(document: SourceDocument, extension: string): Promise<string> {
  switch (extension) {
    case '.pdf': {
      const parsed = await loadPdfParse()(document.data);
      return parsed.text;
    }
    case '.docx': {
      const result = await mammoth.extractRawText({ buffer: document.data });
      return result.value;
    }
    case '.txt':
    case '.md':
      return document.data.toString('utf-8');
    default:
      throw new ExtractionError(
        `Unsupported file type "${extension || document.fileName}". Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      );
  }
}

function resolveExtension(document: SourceDocument): string {
  const fromName = extname(document.fileName).toLowerCase();
  if (fromName) return fromName;
  return (document.mimeType && MIME_EXTENSIONS[document.mimeType]) || '';
}

export async function extractText(document: SourceDocument): Promise<string> {
  const extension = resolveExtension(document);

  let raw: string;
  try {
    raw = await readRawText(document, extension);
  } catch (error) {
    if (error instanceof ExtractionError) throw error;
    throw new ExtractionError(`Could not read ${document.fileName}: ${toErrorMessage(error)}`, { cause: error });
  }

  const text = normalizeExtractedText(raw);
  if (!text) {
    throw new ExtractionError(
      `${document.fileName} contains no extractable text. Scanned documents need OCR before analysis.`,
    );
  }
  return text;
}
