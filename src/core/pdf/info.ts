/**
 * Document details for `info`: page count, encryption status, info dictionary.
 *
 * Uses pdfjs-dist (pure JS, no canvas), which transparently tries the empty
 * user password on encrypted files. Display only; nothing here decides
 * whether a split can run.
 */

// pdfjs-dist legacy build for Node.js (no canvas requirement)
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { basename, resolve } from 'node:path';
import { isPdfEncrypted, readPdfBytes } from './document.js';
import { PdfOpenError } from './errors.js';
import type { PdfInfo, PdfMetadataValue } from './types.js';

/** Error name pdfjs uses when the (empty) password does not open the file. */
const PASSWORD_EXCEPTION = 'PasswordException';

/** Entries pdfjs derives from the file itself rather than from the info dictionary. */
const DERIVED_KEYS = new Set([
  'Language',
  'EncryptFilterName',
  'IsLinearized',
  'IsAcroFormPresent',
  'IsXFAPresent',
  'IsCollectionPresent',
  'IsSignaturesPresent',
]);

function isMetadataValue(value: unknown): value is PdfMetadataValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Info dictionary entries plus the PDF header version, as pdfjs reports them.
 * Non-standard keys (pdfjs nests them under `Custom`) are flattened in.
 */
export function documentMetadata(info: object): Record<string, PdfMetadataValue> | null {
  const entries: Array<[string, PdfMetadataValue]> = [];
  for (const [key, value] of Object.entries(info)) {
    if (DERIVED_KEYS.has(key)) continue;
    if (isMetadataValue(value)) {
      entries.push([key, value]);
    } else if (key === 'Custom' && typeof value === 'object' && value !== null) {
      for (const [customKey, customValue] of Object.entries(value)) {
        if (isMetadataValue(customValue)) entries.push([customKey, customValue]);
      }
    }
  }
  return entries.length > 0 ? Object.fromEntries(entries) : null;
}

/**
 * Inspect a PDF file.
 *
 * @throws PdfOpenError if the file is missing, unreadable or not a PDF.
 */
export async function getPdfInfo(filePath: string): Promise<PdfInfo> {
  const path = resolve(filePath);
  const bytes = readPdfBytes(path);
  const isEncrypted = await isPdfEncrypted(bytes);

  const base = { fileName: basename(path), path, isEncrypted };

  const task = getDocument({
    data: new Uint8Array(bytes),  // pdfjs rejects Buffer and takes ownership of the array
    isEvalSupported: false,
    verbosity: 0,
  });

  try {
    const doc = await task.promise;
    const { info } = await doc.getMetadata();
    return {
      ...base,
      pageCount: doc.numPages,
      canBeDecrypted: isEncrypted,
      metadata: documentMetadata(info),
    };
  } catch (err) {
    if (err instanceof Error && err.name === PASSWORD_EXCEPTION) {
      return { ...base, pageCount: null, canBeDecrypted: false, metadata: null };
    }
    const msg = err instanceof Error ? err.message : String(err);
    throw new PdfOpenError(`Failed to get PDF information: ${msg}`);
  } finally {
    await task.destroy();
  }
}
