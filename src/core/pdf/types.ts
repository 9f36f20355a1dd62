/**
 * Types for page-range parsing, split planning and PDF inspection.
 */

import type { PDFDocument } from 'pdf-lib';

// ── Page intervals ───────────────────────────────────────────

/** End of an interval: a concrete page, or the last page of the document. */
export type PageEnd =
  | { kind: 'page'; page: number }
  | { kind: 'last' };      // "N-end" — resolved once the page count is known

/** A 1-based, inclusive page interval as typed by the user. */
export interface PageInterval {
  start: number;
  end: PageEnd;
}

/** An interval whose end has been resolved and checked against a document. */
export interface ResolvedInterval {
  start: number;
  end: number;
}

// ── Split plan ───────────────────────────────────────────────

/** One output file of a split. */
export interface SplitPlanEntry {
  /** Zero-based position in the plan (file creation order). */
  index: number;
  /** Output file name, e.g. "report_pages_1-5.pdf". */
  fileName: string;
  /** 1-based page range (inclusive). */
  start: number;
  end: number;
  pageCount: number;
}

export type SplitPlan = SplitPlanEntry[];

/** A split file written to disk. */
export interface SplitFile extends SplitPlanEntry {
  /** Absolute path of the written file. */
  path: string;
}

/** Called once per copied page with its 1-based page number. */
export type PageProgressCallback = (pageNumber: number) => void;

// ── Documents ────────────────────────────────────────────────

/** An opened (and, where needed, decrypted) PDF. Immutable for one command run. */
export interface PdfDocumentHandle {
  /** Absolute path of the input file. */
  path: string;
  fileName: string;
  pageCount: number;
  isEncrypted: boolean;
  pdf: PDFDocument;
}

export type PdfMetadataValue = string | number | boolean;

/** Display-only information about a PDF file. */
export interface PdfInfo {
  fileName: string;
  /** Absolute path of the file. */
  path: string;
  /** Null when the document cannot be opened with an empty password. */
  pageCount: number | null;
  isEncrypted: boolean;
  /** Empty-password open succeeded (always false for unencrypted files). */
  canBeDecrypted: boolean;
  /** Document info dictionary entries (Title, Author, Producer, ...). */
  metadata: Record<string, PdfMetadataValue> | null;
}
