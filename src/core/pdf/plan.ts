/**
 * Split planning — maps page intervals or fixed-size chunks to output files.
 *
 * Plans are computed in full before anything is written, so a bad interval
 * fails the command before the first file exists.
 */

import { basename, extname } from 'node:path';
import { PAGES_INFIX } from './constants.js';
import { InvalidArgumentError } from './errors.js';
import { resolveInterval } from './ranges.js';
import type { PageInterval, SplitPlan, SplitPlanEntry } from './types.js';

/** Output file name: `{stem}_pages_{start}-{end}{suffix}`. */
export function splitFileName(sourceFile: string, start: number, end: number): string {
  const name = basename(sourceFile);
  const suffix = extname(name);
  const stem = suffix ? name.slice(0, -suffix.length) : name;
  return `${stem}${PAGES_INFIX}${start}-${end}${suffix}`;
}

function planEntry(sourceFile: string, index: number, start: number, end: number): SplitPlanEntry {
  return {
    index,
    fileName: splitFileName(sourceFile, start, end),
    start,
    end,
    pageCount: end - start + 1,
  };
}

/**
 * One output file per interval, in input order.
 *
 * @throws RangeBoundsError on the first interval outside the document.
 */
export function planByRanges(sourceFile: string, intervals: PageInterval[], totalPages: number): SplitPlan {
  return intervals.map((interval, i) => {
    const { start, end } = resolveInterval(interval, totalPages);
    return planEntry(sourceFile, i, start, end);
  });
}

/**
 * Validate a pages-per-file value (number or numeric string).
 *
 * @throws InvalidArgumentError unless the value is an integer >= 1.
 */
export function assertPagesPerFile(value: unknown): number {
  const n = typeof value === 'string' && /^\s*\d+\s*$/.test(value) ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Pages per file must be a positive integer (got ${String(value)})`);
  }
  return n;
}

/**
 * Fixed-size chunks: ceil(totalPages / pagesPerFile) files, the last one
 * possibly shorter.
 */
export function planByCount(sourceFile: string, totalPages: number, pagesPerFile: number): SplitPlan {
  const size = assertPagesPerFile(pagesPerFile);
  const fileCount = Math.ceil(totalPages / size);
  const plan: SplitPlan = [];

  for (let k = 0; k < fileCount; k++) {
    const start = k * size + 1;
    const end = Math.min((k + 1) * size, totalPages);
    plan.push(planEntry(sourceFile, k, start, end));
  }
  return plan;
}

/** Total pages copied by a plan (overlapping entries count twice). */
export function countPlannedPages(plan: SplitPlan): number {
  return plan.reduce((sum, entry) => sum + entry.pageCount, 0);
}
