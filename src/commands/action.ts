import chalk from 'chalk';
import { panel } from './format.js';

/** Options every command accepts. */
export interface CommonOptions {
  json?: boolean;
}

/** Print an error as a red panel (or JSON with --json). */
export function reportError(err: unknown, json: boolean): void {
  const type = err instanceof Error ? err.name : 'Error';
  const message = err instanceof Error ? err.message : String(err);

  if (json) {
    console.log(JSON.stringify({ error: { type, message } }, null, 2));
    return;
  }
  console.error(panel(chalk.red('Error'), message.split('\n'), chalk.red));
}

/**
 * Wrap a `<input> [options]` command handler: any thrown error is reported
 * and the process exits with code 1.
 */
export function cliAction<O extends CommonOptions>(
  fn: (input: string, opts: O) => Promise<void>,
): (input: string, opts: O) => Promise<void> {
  return async (input, opts) => {
    try {
      await fn(input, opts);
    } catch (err) {
      reportError(err, opts.json === true);
      process.exit(1);
    }
  };
}
