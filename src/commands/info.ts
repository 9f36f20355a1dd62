import chalk from 'chalk';
import { Command } from 'commander';
import { getPdfInfo } from '../core/pdf/info.js';
import type { PdfInfo } from '../core/pdf/types.js';
import { cliAction, type CommonOptions } from './action.js';
import { panel } from './format.js';

/** Lines of the "PDF Information" panel. */
export function formatPdfInfo(info: PdfInfo): string[] {
  const encrypted = info.isEncrypted ? chalk.red('true') : chalk.green('false');
  const decryptable = info.isEncrypted && info.canBeDecrypted ? ' (can be decrypted)' : '';

  const lines = [
    `Filename: ${chalk.bold(info.fileName)}`,
    `Path: ${info.path}`,
    `Pages: ${chalk.bold(info.pageCount === null ? 'unknown' : String(info.pageCount))}`,
    `Encrypted: ${encrypted}${decryptable}`,
  ];

  if (info.metadata) {
    for (const [key, value] of Object.entries(info.metadata)) {
      lines.push(`${key}: ${chalk.dim(String(value))}`);
    }
  }
  return lines;
}

export function registerInfoCommand(program: Command): void {
  // ── pdf-splitter info ──────────────────────────────────────────
  program
    .command('info')
    .description('Display information about a PDF file')
    .argument('<input>', 'PDF file to inspect')
    .option('--json', 'Output as JSON')
    .addHelpText('after', '\nExample:\n  pdf-splitter info document.pdf')
    .action(cliAction(async (input: string, opts: CommonOptions) => {
      if (!opts.json) console.log(`Reading PDF: ${chalk.bold(input)}`);
      const info = await getPdfInfo(input);

      if (opts.json) {
        console.log(JSON.stringify(info, null, 2));
        return;
      }
      console.log(panel('PDF Information', formatPdfInfo(info), chalk.blue));
    }));
}
