/**
 * Page-range extraction via pdf-lib.
 *
 * Writes one PDF per plan entry into the output directory, in plan order.
 * A failure aborts the run; files written before it stay on disk.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import type { PageProgressCallback, PdfDocumentHandle, SplitFile, SplitPlan } from './types.js';

/**
 * Copy each planned page range into its own PDF and write it to `outputDir`
 * (created if absent). `onPage` fires once per copied page, ascending.
 */
export async function writeSplitPlan(
  doc: PdfDocumentHandle,
  plan: SplitPlan,
  outputDir: string,
  onPage?: PageProgressCallback,
): Promise<SplitFile[]> {
  const dir = resolve(outputDir);
  mkdirSync(dir, { recursive: true });

  const files: SplitFile[] = [];

  for (const entry of plan) {
    const out = await PDFDocument.create();
    // pdf-lib page indices are 0-based
    const indices = Array.from({ length: entry.pageCount }, (_, i) => entry.start - 1 + i);
    const copied = await out.copyPages(doc.pdf, indices);

    copied.forEach((page, i) => {
      out.addPage(page);
      onPage?.(entry.start + i);
    });

    const path = join(dir, entry.fileName);
    writeFileSync(path, await out.save());
    files.push({ ...entry, path });
  }

  return files;
}
