import chalk from 'chalk';
import { Command } from 'commander';
import { dirname, join, resolve } from 'node:path';
import { DEFAULT_OUTPUT_DIR_NAME } from '../core/pdf/constants.js';
import { openPdfDocument } from '../core/pdf/document.js';
import { assertPagesPerFile, countPlannedPages, planByCount, planByRanges } from '../core/pdf/plan.js';
import { formatInterval, parsePageRanges } from '../core/pdf/ranges.js';
import { writeSplitPlan } from '../core/pdf/split.js';
import type { PdfDocumentHandle, SplitPlan } from '../core/pdf/types.js';
import { cliAction, type CommonOptions } from './action.js';
import { printPlan, printSplitFiles } from './format.js';
import { createProgress } from './progress.js';

interface SplitOptions extends CommonOptions {
  outputDir?: string;
  dryRun?: boolean;
}

interface SplitByRangeOptions extends SplitOptions {
  ranges?: string;
}

interface SplitByCountOptions extends SplitOptions {
  pagesPerFile: string;
}

/** `{input_dir}/split_output` unless --output-dir is given. */
export function resolveOutputDir(inputPath: string, outputDir?: string): string {
  return outputDir ? resolve(outputDir) : join(dirname(resolve(inputPath)), DEFAULT_OUTPUT_DIR_NAME);
}

async function readDocument(input: string, opts: CommonOptions): Promise<PdfDocumentHandle> {
  if (!opts.json) console.log(`Reading PDF: ${chalk.bold(input)}`);
  const doc = await openPdfDocument(input);
  if (!opts.json) {
    console.log(`Total pages: ${chalk.bold(String(doc.pageCount))}`);
    if (doc.isEncrypted) console.log(chalk.yellow('PDF is encrypted but can be processed'));
  }
  return doc;
}

async function runPlan(
  doc: PdfDocumentHandle,
  plan: SplitPlan,
  outputDir: string,
  opts: SplitOptions,
): Promise<void> {
  if (opts.dryRun) {
    if (opts.json) {
      console.log(JSON.stringify({ file: doc.fileName, pageCount: doc.pageCount, outputDir, dryRun: true, files: plan }, null, 2));
    } else {
      printPlan(plan, outputDir);
    }
    return;
  }

  const progress = opts.json ? null : createProgress('Splitting PDF...', countPlannedPages(plan));
  const files = await writeSplitPlan(doc, plan, outputDir, () => progress?.tick());
  progress?.done();

  if (opts.json) {
    console.log(JSON.stringify({ file: doc.fileName, pageCount: doc.pageCount, outputDir, dryRun: false, files }, null, 2));
  } else {
    printSplitFiles(files);
  }
}

export function registerSplitCommands(program: Command): void {
  // ── pdf-splitter split-by-range ────────────────────────────────
  program
    .command('split-by-range')
    .description('Split a PDF file based on specified page ranges')
    .argument('<input>', 'PDF file to split')
    .option('-o, --output-dir <dir>', `Directory for the split PDFs (default: <input dir>/${DEFAULT_OUTPUT_DIR_NAME})`)
    .option('-r, --ranges <ranges>', 'Page ranges to extract, e.g. "1-5,7,9-end" (default: all pages)')
    .option('--dry-run', 'Print the files that would be created without writing them')
    .option('--json', 'Output as JSON')
    .addHelpText('after', [
      '',
      'Examples:',
      '  pdf-splitter split-by-range document.pdf --ranges 1-5,7,9-end',
      '  pdf-splitter split-by-range document.pdf --ranges 1-5 --output-dir ./output',
    ].join('\n'))
    .action(cliAction(async (input: string, opts: SplitByRangeOptions) => {
      const outputDir = resolveOutputDir(input, opts.outputDir);
      const doc = await readDocument(input, opts);

      const intervals = parsePageRanges(opts.ranges, doc.pageCount);
      const plan = planByRanges(doc.fileName, intervals, doc.pageCount);

      if (!opts.json) {
        console.log(`Processing ranges: ${chalk.bold(intervals.map(formatInterval).join(', '))}`);
        console.log(`Output directory: ${chalk.bold(outputDir)}`);
      }
      await runPlan(doc, plan, outputDir, opts);
    }));

  // ── pdf-splitter split-by-count ────────────────────────────────
  program
    .command('split-by-count')
    .description('Split a PDF file into files with a fixed number of pages each')
    .argument('<input>', 'PDF file to split')
    .requiredOption('-n, --pages-per-file <n>', 'Number of pages per output file')
    .option('-o, --output-dir <dir>', `Directory for the split PDFs (default: <input dir>/${DEFAULT_OUTPUT_DIR_NAME})`)
    .option('--dry-run', 'Print the files that would be created without writing them')
    .option('--json', 'Output as JSON')
    .addHelpText('after', [
      '',
      'Examples:',
      '  pdf-splitter split-by-count document.pdf --pages-per-file 5',
      '  pdf-splitter split-by-count document.pdf -n 10 --output-dir ./output',
    ].join('\n'))
    .action(cliAction(async (input: string, opts: SplitByCountOptions) => {
      // Checked before the PDF is opened
      const pagesPerFile = assertPagesPerFile(opts.pagesPerFile);
      const outputDir = resolveOutputDir(input, opts.outputDir);
      const doc = await readDocument(input, opts);

      const plan = planByCount(doc.fileName, doc.pageCount, pagesPerFile);

      if (!opts.json) {
        console.log(`Pages per file: ${chalk.bold(String(pagesPerFile))}`);
        console.log(`Expected output files: ${chalk.bold(String(plan.length))}`);
        console.log(`Output directory: ${chalk.bold(outputDir)}`);
      }
      await runPlan(doc, plan, outputDir, opts);
    }));
}
