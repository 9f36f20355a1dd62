import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { panel, plural } from './format.js';
import { createProgress, renderProgress, type ProgressStream } from './progress.js';
import { formatPdfInfo } from './info.js';

beforeAll(() => {
  chalk.level = 0;
});

const identity = (s: string): string => s;

describe('panel', () => {
  it('sizes the box to the widest line', () => {
    expect(panel('Info', ['ab', 'longer line'], identity)).toBe([
      '╭─ Info ──────╮',
      '│ ab          │',
      '│ longer line │',
      '╰─────────────╯',
    ].join('\n'));
  });

  it('is at least wide enough for the title', () => {
    expect(panel('Info', ['ab'], identity)).toBe([
      '╭─ Info ─╮',
      '│ ab     │',
      '╰────────╯',
    ].join('\n'));
  });

  it('ignores color codes when measuring', () => {
    const colored = '\u001b[1mab\u001b[22m';
    expect(panel('Info', [colored], identity).split('\n')[1]).toBe(`│ ${colored}     │`);
  });
});

describe('plural', () => {
  it('adds an s except for one', () => {
    expect(plural(1, 'file')).toBe('1 file');
    expect(plural(3, 'file')).toBe('3 files');
  });
});

describe('progress', () => {
  function fakeStream(isTTY: boolean): ProgressStream & { chunks: string[] } {
    const chunks: string[] = [];
    return {
      isTTY,
      chunks,
      write(chunk: string) {
        chunks.push(chunk);
        return true;
      },
    };
  }

  it('renders a bar and a percentage', () => {
    expect(renderProgress('Splitting PDF...', 1, 4)).toBe(`Splitting PDF... ${'█'.repeat(5)}${'░'.repeat(15)}  25%`);
    expect(renderProgress('Splitting PDF...', 0, 0)).toBe(`Splitting PDF... ${'█'.repeat(20)} 100%`);
  });

  it('writes a single line when not attached to a terminal', () => {
    const stream = fakeStream(false);
    const progress = createProgress('Splitting PDF...', 2, stream);
    progress.tick();
    progress.tick();
    progress.done();
    expect(stream.chunks).toEqual([`Splitting PDF... ${'█'.repeat(20)} 100%\n`]);
  });

  it('redraws the line on every tick on a terminal', () => {
    const stream = fakeStream(true);
    const progress = createProgress('Copy', 2, stream);
    progress.tick();
    progress.tick();
    progress.done();
    expect(stream.chunks).toEqual([
      `\rCopy ${'█'.repeat(10)}${'░'.repeat(10)}  50%`,
      `\rCopy ${'█'.repeat(20)} 100%`,
      '\n',
    ]);
  });
});

describe('formatPdfInfo', () => {
  it('lists file details and metadata', () => {
    expect(formatPdfInfo({
      fileName: 'a.pdf',
      path: '/docs/a.pdf',
      pageCount: 12,
      isEncrypted: true,
      canBeDecrypted: true,
      metadata: { Title: 'Minutes', PDFFormatVersion: '1.7' },
    })).toEqual([
      'Filename: a.pdf',
      'Path: /docs/a.pdf',
      'Pages: 12',
      'Encrypted: true (can be decrypted)',
      'Title: Minutes',
      'PDFFormatVersion: 1.7',
    ]);
  });

  it('shows unknown pages for a file that cannot be opened', () => {
    expect(formatPdfInfo({
      fileName: 'b.pdf',
      path: '/docs/b.pdf',
      pageCount: null,
      isEncrypted: true,
      canBeDecrypted: false,
      metadata: null,
    })).toEqual([
      'Filename: b.pdf',
      'Path: /docs/b.pdf',
      'Pages: unknown',
      'Encrypted: true',
    ]);
  });
});
