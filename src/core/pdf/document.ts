/**
 * Opening input PDFs for splitting.
 *
 * Encryption is read from the trailer's /Encrypt entry. Encrypted inputs are
 * decrypted with an empty password before they are split; anything that
 * still cannot be opened is rejected here, before any split work starts.
 */

import { readFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { decryptWithEmptyPassword } from './decrypt.js';
import { PdfOpenError } from './errors.js';
import type { PdfDocumentHandle } from './types.js';

/**
 * Read the raw bytes of an input file.
 * @throws PdfOpenError if the file is missing or unreadable.
 */
export function readPdfBytes(filePath: string): Buffer {
  try {
    return readFileSync(filePath);
  } catch (err) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      throw new PdfOpenError(`File not found: ${filePath}`);
    }
    const msg = err instanceof Error ? err.message : String(err);
    throw new PdfOpenError(`Failed to open PDF file: ${msg}`);
  }
}

/**
 * Parse PDF bytes without decrypting anything. Strings and streams of an
 * encrypted file stay unreadable, but its structure and trailer are there.
 *
 * @throws PdfOpenError if the bytes are not a parseable PDF.
 */
async function parsePdf(bytes: Uint8Array): Promise<PDFDocument> {
  try {
    return await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new PdfOpenError(`Failed to open PDF file: ${msg}`);
  }
}

/**
 * Whether the PDF's trailer carries an /Encrypt dictionary.
 *
 * @throws PdfOpenError if the bytes are not a parseable PDF.
 */
export async function isPdfEncrypted(bytes: Uint8Array): Promise<boolean> {
  return (await parsePdf(bytes)).isEncrypted;
}

/**
 * Open a PDF for splitting.
 *
 * @throws PdfOpenError on a missing, unreadable or corrupt file.
 * @throws PdfEncryptionError on an encrypted file that an empty password does not open.
 */
export async function openPdfDocument(filePath: string): Promise<PdfDocumentHandle> {
  const path = resolve(filePath);
  const parsed = await parsePdf(readPdfBytes(path));
  const isEncrypted = parsed.isEncrypted;
  const pdf = isEncrypted ? await parsePdf(decryptWithEmptyPassword(path)) : parsed;

  return {
    path,
    fileName: basename(path),
    pageCount: pdf.getPageCount(),
    isEncrypted,
    pdf,
  };
}
