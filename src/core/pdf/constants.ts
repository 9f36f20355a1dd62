/** Output directory created next to the input file when --output-dir is omitted. */
export const DEFAULT_OUTPUT_DIR_NAME = 'split_output';

/** Infix between the input stem and the page range in output file names. */
export const PAGES_INFIX = '_pages_';

/** Keyword for an open-ended range ("9-end"), matched case-insensitively. */
export const END_KEYWORD = 'end';
