/**
 * CLI output formatting shared by the split and info commands.
 */

import chalk from 'chalk';
import { stripVTControlCharacters } from 'node:util';
import type { SplitFile, SplitPlan } from '../core/pdf/types.js';

type Colorize = (text: string) => string;

const visibleLength = (s: string): number => stripVTControlCharacters(s).length;

/**
 * Draw a titled box around lines of text.
 *
 *   ╭─ Title ───╮
 *   │ line      │
 *   ╰───────────╯
 */
export function panel(title: string, lines: string[], border: Colorize): string {
  const titleWidth = visibleLength(title);
  const width = Math.max(titleWidth + 2, ...lines.map(visibleLength));

  const top = border('╭─ ') + title + border(` ${'─'.repeat(width - titleWidth - 1)}╮`);
  const rows = lines.map((l) => border('│ ') + l + ' '.repeat(width - visibleLength(l)) + border(' │'));
  const bottom = border(`╰${'─'.repeat(width + 2)}╯`);

  return [top, ...rows, bottom].join('\n');
}

/** "1 file" / "3 files". */
export function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/** Print the files a dry run would create. */
export function printPlan(plan: SplitPlan, outputDir: string): void {
  console.log(chalk.bold(`Dry run — ${plural(plan.length, 'file')} would be created in ${outputDir}:`));
  for (const entry of plan) {
    console.log(`  - ${entry.fileName}  ${chalk.dim(`(pages ${entry.start}-${entry.end})`)}`);
  }
}

/** Print the files a split created. */
export function printSplitFiles(files: SplitFile[]): void {
  console.log(chalk.green(`Successfully created ${files.length} file(s):`));
  for (const file of files) {
    console.log(`  - ${file.path}`);
  }
}
