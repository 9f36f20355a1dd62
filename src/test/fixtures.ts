import { createHash } from 'node:crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFDocument, PDFName, PDFString } from 'pdf-lib';

/** Page n (1-based) is `100 + n` points wide, so copied pages can be told apart. */
export const pageWidth = (pageNumber: number): number => 100 + pageNumber;

export async function makePdf(pageCount: number, title?: string): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  for (let n = 1; n <= pageCount; n++) {
    pdf.addPage([pageWidth(n), 200]);
  }
  if (title) pdf.setTitle(title);
  return pdf.save();
}

/** An unencrypted PDF whose catalog has a string that reads "/Encrypt". */
export async function makePdfMentioningEncrypt(pageCount: number): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  for (let n = 1; n <= pageCount; n++) {
    pdf.addPage([pageWidth(n), 200]);
  }
  pdf.catalog.set(PDFName.of('Note'), PDFString.of('see /Encrypt docs'));
  return pdf.save({ useObjectStreams: false });
}

const PASSWORD_PAD = Buffer.from('28bf4e5e4e758a4164004e56fffa01082e2e00b6d0683e802f0ca9fe6453697a', 'hex');

function md5(...parts: Buffer[]): Buffer {
  const hash = createHash('md5');
  for (const part of parts) hash.update(part);
  return hash.digest();
}

function rc4(key: Buffer, data: Buffer): Buffer {
  const s = Array.from({ length: 256 }, (_, i) => i);
  for (let i = 0, j = 0; i < 256; i++) {
    j = (j + s[i] + key[i % key.length]) & 0xff;
    [s[i], s[j]] = [s[j], s[i]];
  }
  const out = Buffer.alloc(data.length);
  for (let n = 0, i = 0, j = 0; n < data.length; n++) {
    i = (i + 1) & 0xff;
    j = (j + s[i]) & 0xff;
    [s[i], s[j]] = [s[j], s[i]];
    out[n] = data[n] ^ s[(s[i] + s[j]) & 0xff];
  }
  return out;
}

/**
 * A 40-bit RC4 (standard security handler, revision 2) encrypted PDF.
 * It holds no strings or streams, so only the /Encrypt entries need computing.
 * With `emptyPasswordOpens: false` the /U entry matches no user password.
 */
export function makeEncryptedPdf(pageCount: number, { emptyPasswordOpens }: { emptyPasswordOpens: boolean }): Buffer {
  const permissions = -44;
  const fileId = Buffer.from('0123456789abcdef0123456789abcdef', 'hex');
  const owner = rc4(md5(PASSWORD_PAD).subarray(0, 5), PASSWORD_PAD);
  const p = Buffer.alloc(4);
  p.writeInt32LE(permissions);
  const key = md5(PASSWORD_PAD, owner, p, fileId).subarray(0, 5);
  const user = emptyPasswordOpens ? rc4(key, PASSWORD_PAD) : Buffer.alloc(32);

  const pageIds = Array.from({ length: pageCount }, (_, i) => i + 3);
  const encryptId = pageCount + 3;
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(' ')}] /Count ${pageCount} >>`,
    ...pageIds.map((_, i) => `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 ${pageWidth(i + 1)} 200] >>`),
    `<< /Filter /Standard /V 1 /R 2 /Length 40 /P ${permissions} /O <${owner.toString('hex')}> /U <${user.toString('hex')}> >>`,
  ];

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });
  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  const id = fileId.toString('hex');
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R /Encrypt ${encryptId} 0 R /ID [<${id}> <${id}>] >>\n`;
  body += `startxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(body, 'latin1');
}

/** Widths of every page of a PDF, in order. */
export async function pageWidths(bytes: Uint8Array): Promise<number[]> {
  const pdf = await PDFDocument.load(bytes);
  return pdf.getPages().map((p) => p.getWidth());
}

export interface TempDir {
  path: string;
  file(name: string, contents: Uint8Array | string): string;
  remove(): void;
}

export function makeTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), 'pdf-splitter-test-'));
  return {
    path,
    file(name, contents) {
      const filePath = join(path, name);
      writeFileSync(filePath, contents);
      return filePath;
    },
    remove() {
      rmSync(path, { recursive: true, force: true });
    },
  };
}
