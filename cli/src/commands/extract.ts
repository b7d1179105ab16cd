import chalk from 'chalk';
import { resolve } from 'node:path';
import { Command } from 'commander';
import {
  ExtractConfigError,
  extractPages,
  extractSampleJson,
  loadExtractJob,
  parseRangeSpec,
  printExtractSummary,
  printRangeOutcome,
} from '../core/pdf/index.js';
import type { ExtractJob } from '../core/pdf/index.js';
import { collectValues, parseInteger } from './parsers.js';

interface ExtractCommandOptions {
  config?: string;
  file?: string;
  range: string[];
  offset?: number;
  dryRun?: boolean;
  json?: boolean;
  sample?: boolean;
}

const USAGE = 'Usage: page-extractor extract --config job.json  |  --file book.pdf --range "1-50=Chapter 1"';

/**
 * Merge the job file (if any) with CLI overrides.
 * --file replaces the source, --range replaces all ranges, --offset replaces the offset.
 */
function resolveJob(opts: ExtractCommandOptions): ExtractJob {
  const job = opts.config ? loadExtractJob(opts.config) : undefined;

  const source = opts.file ? resolve(opts.file) : job?.source;
  if (!source) {
    throw new ExtractConfigError('A source PDF is required — pass --file or --config');
  }

  const ranges = opts.range.length > 0 ? opts.range.map((spec) => parseRangeSpec(spec)) : job?.ranges;
  if (!ranges) {
    throw new ExtractConfigError('No page ranges given — pass --range or --config');
  }

  return { source, offset: opts.offset ?? job?.offset ?? 0, ranges };
}

export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description(
      'Extract page ranges from a PDF into separate PDFs, each with an empty Markdown note.\n' +
      'Outputs land next to the source PDF and overwrite existing files of the same name.',
    )
    .option('--config <path>', 'JSON job file with source, offset and ranges (see --sample)')
    .option('--file <path>', 'Source PDF (overrides the job file source)')
    .option('--range <spec>', 'Page range "START-END=NAME" or "PAGE=NAME" (repeatable; replaces job file ranges)', collectValues, [])
    .option('--offset <n>', 'Offset added to every page number (overrides the job file)', parseInteger)
    .option('--dry-run', 'Validate ranges only — write nothing')
    .option('--sample', 'Print a sample job file and exit')
    .option('--json', 'Output as JSON')
    .action(async (opts: ExtractCommandOptions) => {
      try {
        if (opts.sample) {
          process.stdout.write(extractSampleJson());
          return;
        }

        const job = resolveJob(opts);

        if (!opts.json) {
          console.log(chalk.bold(`Source: ${job.source}`));
          if (job.offset !== 0) console.log(chalk.dim(`  Offset: ${job.offset}`));
        }

        const result = await extractPages(job.source, job.ranges, job.offset, {
          dryRun: opts.dryRun,
          onSource: opts.json ? undefined : ({ totalPages }) => {
            console.log(chalk.dim(`  ${totalPages} page${totalPages !== 1 ? 's' : ''}`));
            console.log('');
          },
          onRange: opts.json ? undefined : (outcome) => printRangeOutcome(outcome, job.ranges.length),
        });

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }
        printExtractSummary(result);
      } catch (err) {
        const name = err instanceof Error ? err.name : 'Error';
        const message = err instanceof Error ? err.message : String(err);
        if (opts.json) {
          console.log(JSON.stringify({ error: name, message }));
        } else {
          console.error(chalk.red(`Error: ${message}`));
          if (err instanceof ExtractConfigError) console.error(chalk.dim(USAGE));
        }
        process.exit(1);
      }
    });
}
