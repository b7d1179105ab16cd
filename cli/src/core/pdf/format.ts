/**
 * CLI output formatting for extraction runs.
 */

import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ExtractResult, RangeOutcome } from './types.js';

/** Human-readable line(s) for one processed range. */
export function formatRangeOutcome(outcome: RangeOutcome, total: number): string[] {
  const tag = `[${outcome.index + 1}/${total}]`;
  const pages = `pages ${outcome.effectiveStart}-${outcome.effectiveEnd}`;

  switch (outcome.status) {
    case 'extracted': {
      const lines = [chalk.green(`  ✓ ${tag} ${pages} → ${outcome.documentPath}`)];
      if (outcome.companionError) {
        lines.push(chalk.red(`      Could not create note ${outcome.companionPath}: ${outcome.companionError}`));
      } else {
        lines.push(chalk.dim(`      note: ${outcome.companionPath}`));
      }
      return lines;
    }
    case 'planned':
      return [chalk.cyan(`  • ${tag} ${pages} → ${outcome.documentPath} (dry run)`)];
    case 'skipped':
      return [chalk.yellow(`  ! ${tag} skipped "${outcome.name}": ${outcome.message}`)];
    case 'failed':
      return [chalk.red(`  ✗ ${tag} "${outcome.name}" — write failed: ${outcome.error}`)];
    default: {
      const _exhaustive: never = outcome;
      throw new Error(`Unknown range outcome: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/** Print one processed range as it completes. */
export function printRangeOutcome(outcome: RangeOutcome, total: number): void {
  for (const line of formatRangeOutcome(outcome, total)) console.log(line);
}

/** Completion line, e.g. "Extracted 1 of 3 ranges (2 skipped)". */
export function formatSummary(result: ExtractResult): string {
  const { summary } = result;
  const noun = summary.total === 1 ? 'range' : 'ranges';
  const head = result.dryRun
    ? `Dry run: ${summary.extracted} of ${summary.total} ${noun} would be extracted`
    : `Extracted ${summary.extracted} of ${summary.total} ${noun}`;

  const details: string[] = [];
  if (summary.skipped > 0) details.push(`${summary.skipped} skipped`);
  if (summary.failed > 0) details.push(`${summary.failed} failed`);
  if (summary.companionFailures > 0) details.push(`${summary.companionFailures} note(s) not created`);

  return details.length > 0 ? `${head} (${details.join(', ')})` : head;
}

/** Print the end-of-run summary. */
export function printExtractSummary(result: ExtractResult): void {
  const clean = result.summary.skipped === 0 && result.summary.failed === 0
    && result.summary.companionFailures === 0;
  console.log();
  console.log(clean ? chalk.bold.green(formatSummary(result)) : chalk.bold.yellow(formatSummary(result)));
}

// ── Sample job file ──────────────────────────────────────────────

/** Return the bundled sample job file (shown with --sample). */
export function extractSampleJson(): string {
  return readFileSync(resolveSamplePath(), 'utf-8');
}

function resolveSamplePath(): string {
  const __file = fileURLToPath(import.meta.url);
  const __dir = dirname(__file);
  const candidates = [
    // Development (from cli/src/core/pdf/)
    join(__dir, '..', '..', '..', 'samples', 'chapters.json'),
    // Built output (from dist/core/pdf/)
    join(__dir, '..', '..', '..', 'cli', 'samples', 'chapters.json'),
  ];

  for (const p of candidates) {
    try {
      readFileSync(p, 'utf-8');
      return p;
    } catch {
      // try next
    }
  }

  throw new Error('Sample job file not found. Reinstall the package.');
}
