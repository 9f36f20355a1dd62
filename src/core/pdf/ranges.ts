/**
 * Page-range expressions: "1-5,7,9-end".
 *
 * Parsing is purely syntactic. Bounds are checked later by `resolveInterval`,
 * once the document's page count is known. Tokens keep their input order;
 * overlaps and duplicates pass through unchanged (one output file each).
 */

import { END_KEYWORD } from './constants.js';
import { RangeBoundsError, RangeSyntaxError } from './errors.js';
import type { PageInterval, ResolvedInterval } from './types.js';

const SINGLE_PAGE = /^(\d+)$/;
const PAGE_RANGE = new RegExp(`^(\\d+)\\s*-\\s*(\\d+|${END_KEYWORD})$`, 'i');

/**
 * Parse a page-range expression into intervals.
 *
 * An empty (or whitespace-only) expression selects the whole document.
 *
 * @throws RangeSyntaxError on a token that is not `N`, `N-M` or `N-end`.
 */
export function parsePageRanges(expression: string | undefined, totalPages: number): PageInterval[] {
  if (!expression || expression.trim() === '') {
    return [{ start: 1, end: { kind: 'page', page: totalPages } }];
  }

  return expression.split(',').map((raw) => parseToken(raw.trim()));
}

function parseToken(token: string): PageInterval {
  if (token === '') {
    throw new RangeSyntaxError('Empty page range — use format "1-3", "7" or "9-end"');
  }

  const single = token.match(SINGLE_PAGE);
  if (single) {
    const page = parseInt(single[1], 10);
    return { start: page, end: { kind: 'page', page } };
  }

  const range = token.match(PAGE_RANGE);
  if (!range) {
    throw new RangeSyntaxError(`Invalid page range "${token}" — use format "1-3", "7" or "9-end"`);
  }

  const start = parseInt(range[1], 10);
  if (range[2].toLowerCase() === END_KEYWORD) {
    return { start, end: { kind: 'last' } };
  }
  return { start, end: { kind: 'page', page: parseInt(range[2], 10) } };
}

/**
 * Resolve an interval against a document and check its bounds.
 *
 * @throws RangeBoundsError if start < 1, end > totalPages or start > end.
 */
export function resolveInterval(interval: PageInterval, totalPages: number): ResolvedInterval {
  const start = interval.start;
  const end = interval.end.kind === 'last' ? totalPages : interval.end.page;

  if (start < 1 || end > totalPages || start > end) {
    throw new RangeBoundsError(
      `Invalid page range ${start}-${interval.end.kind === 'last' ? END_KEYWORD : end} ` +
      `for a PDF with ${totalPages} page${totalPages === 1 ? '' : 's'}`,
    );
  }
  return { start, end };
}

/** Display form: "7", "1-3" or "9-end". */
export function formatInterval(interval: PageInterval): string {
  if (interval.end.kind === 'last') return `${interval.start}-${END_KEYWORD}`;
  if (interval.end.page === interval.start) return `${interval.start}`;
  return `${interval.start}-${interval.end.page}`;
}
