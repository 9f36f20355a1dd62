/**
 * Per-page progress line for split commands, written to stderr.
 *
 * On a TTY the line is redrawn on every tick; otherwise a single line is
 * written when the run finishes.
 */

import chalk from 'chalk';

const BAR_WIDTH = 20;

/** The part of a writable stream the progress line needs. */
export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export interface ProgressReporter {
  tick(): void;
  done(): void;
}

export function renderProgress(label: string, completed: number, total: number): string {
  const ratio = total === 0 ? 1 : completed / total;
  const filled = Math.round(ratio * BAR_WIDTH);
  const bar = chalk.green('█'.repeat(filled)) + chalk.dim('░'.repeat(BAR_WIDTH - filled));
  const pct = `${Math.floor(ratio * 100)}`.padStart(3);
  return `${chalk.green(label)} ${bar} ${pct}%`;
}

export function createProgress(
  label: string,
  total: number,
  stream: ProgressStream = process.stderr,
): ProgressReporter {
  let completed = 0;
  const interactive = stream.isTTY === true;

  return {
    tick() {
      completed++;
      if (interactive) stream.write(`\r${renderProgress(label, completed, total)}`);
    },
    done() {
      stream.write(interactive ? '\n' : `${renderProgress(label, completed, total)}\n`);
    },
  };
}
