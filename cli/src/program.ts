import { Command } from 'commander';
import { registerExtractCommand } from './commands/extract.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('page-extractor')
    .description('Split a PDF into per-range PDFs, each paired with an empty Markdown note')
    .version(VERSION);

  registerExtractCommand(program);
  return program;
}
