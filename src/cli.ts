import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { registerInfoCommand } from './commands/info.js';
import { registerSplitCommands } from './commands/split.js';

function packageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pdf-splitter')
    .description('PDF Splitter - A command-line utility for splitting PDF files')
    .version(packageVersion());

  registerSplitCommands(program);
  registerInfoCommand(program);

  return program;
}
