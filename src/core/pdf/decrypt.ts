/**
 * Empty-password decryption of encrypted inputs through the `qpdf` binary.
 *
 * qpdf is an optional system dependency: only encrypted PDFs need it.
 */

import { execFileSync } from 'node:child_process';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PdfEncryptionError } from './errors.js';

/** qpdf exit status for "succeeded with warnings". */
const QPDF_EXIT_WARNINGS = 3;

const QPDF_INSTALL_HINT = 'install: brew install qpdf (macOS) or sudo apt install qpdf (Linux)';

function runQpdf(args: string[]): void {
  try {
    execFileSync('qpdf', args, { stdio: 'pipe' });
  } catch (err) {
    const status = typeof err === 'object' && err !== null && 'status' in err ? err.status : undefined;
    if (status === QPDF_EXIT_WARNINGS) return;
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      throw new PdfEncryptionError(`Cannot process encrypted PDF: qpdf is required to decrypt it — ${QPDF_INSTALL_HINT}`);
    }
    const msg = err instanceof Error ? err.message : String(err);
    if (msg.includes('invalid password')) {
      throw new PdfEncryptionError('Cannot process encrypted PDF: it does not open with an empty password');
    }
    throw new PdfEncryptionError(`Cannot process encrypted PDF: ${msg}`);
  }
}

/**
 * Decrypt an encrypted PDF with the empty user password and return the
 * decrypted bytes. The temp copy qpdf writes is removed before returning.
 *
 * @throws PdfEncryptionError if qpdf is missing or the empty password is rejected.
 */
export function decryptWithEmptyPassword(inputPath: string): Buffer {
  const tempDir = mkdtempSync(join(tmpdir(), 'pdf-splitter-'));
  const outputPath = join(tempDir, 'decrypted.pdf');

  try {
    runQpdf(['--decrypt', '--password=', inputPath, outputPath]);
    try {
      return readFileSync(outputPath);
    } catch {
      throw new PdfEncryptionError('Cannot process encrypted PDF: qpdf wrote no decrypted copy');
    }
  } finally {
    rmSync(tempDir, { recursive: true, force: true });
  }
}
