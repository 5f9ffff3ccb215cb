/**
 * PDF Text Extraction
 *
 * Extracts per-page text from (optionally password-protected) PDF files
 * using pdf-parse. The library is loaded on first use so that commands
 * which never open a PDF do not pay for it.
 */

import fs from 'fs';
import {
  logger,
  PdfDecryptionError,
  PdfExtractionError,
  type PageText,
} from '@cas-extractor/shared';

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
}

/**
 * The subset of a pdf-parse document the extractor relies on
 */
export interface PdfTextSource {
  getText(): Promise<{ pages: Array<{ text: string }> }>;
  destroy(): Promise<void>;
}

export type OpenPdf = (data: Uint8Array, password?: string) => Promise<PdfTextSource>;

/**
 * pdf.js password response for a wrong password; anything else means none was given
 */
const INCORRECT_PASSWORD = 2;

const openWithPdfParse: OpenPdf = async (data, password) => {
  const { PDFParse } = await import('pdf-parse');
  return new PDFParse({ data, password });
};

function isPasswordException(error: unknown): error is Error & { code?: unknown } {
  return error instanceof Error && error.name === 'PasswordException';
}

function toExtractionError(error: unknown, filePath: string): Error {
  if (isPasswordException(error)) {
    const reason = error.code === INCORRECT_PASSWORD ? 'incorrect password' : 'password required';
    return new PdfDecryptionError(`Cannot decrypt ${filePath}: ${reason}`);
  }
  return new PdfExtractionError(
    `Cannot open ${filePath}: ${error instanceof Error ? error.message : String(error)}`
  );
}

/**
 * Normalize one page of extracted text into visual lines.
 * Table cells come back tab-separated; statement rows need them space-joined.
 */
export function toVisualLines(pageText: string): string[] {
  return pageText
    .split(/\r?\n/)
    .map(line => line.replace(/[ \t]+/g, ' ').trim())
    .filter(line => line !== '');
}

/**
 * Extract text from a PDF file, one entry per page with line structure kept.
 */
export async function extractTextFromPdf(
  filePath: string,
  password?: string,
  openPdf: OpenPdf = openWithPdfParse
): Promise<PdfTextResult> {
  logger.info('Extracting text from PDF', { filePath, password: password ? 'provided' : 'none' });

  const data = new Uint8Array(fs.readFileSync(filePath));

  let source: PdfTextSource;
  try {
    source = await openPdf(data, password);
  } catch (error) {
    throw toExtractionError(error, filePath);
  }

  const pages: PageText[] = [];

  try {
    const result = await source.getText();

    result.pages.forEach((page, index) => {
      pages.push({
        pageNumber: index + 1,
        text: toVisualLines(page.text).join('\n'),
      });
    });
  } catch (error) {
    throw toExtractionError(error, filePath);
  } finally {
    await source.destroy();
  }

  logger.info('PDF text extraction complete', {
    filePath,
    totalPages: pages.length,
    totalChars: pages.reduce((sum, page) => sum + page.text.length, 0),
  });

  return {
    pages,
    totalPages: pages.length,
  };
}
