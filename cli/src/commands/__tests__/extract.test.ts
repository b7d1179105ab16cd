import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { existsSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createProgram } from '../../program.js';
import {
  makeTempDir,
  readPageWidths,
  widthsFor,
  writeFixturePdf,
} from '../../core/pdf/__tests__/fixtures.js';

function captureOutput() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`process.exit(${code})`);
  });
  const lines = () => log.mock.calls.map((args) => args.join(' '));
  const errors = () => error.mock.calls.map((args) => args.join(' '));
  return { log, error, exit, lines, errors };
}

async function run(args: string[]): Promise<void> {
  await createProgram().parseAsync(['node', 'page-extractor', 'extract', ...args]);
}

describe('page-extractor extract', () => {
  let dir: string;
  let source: string;

  beforeEach(async () => {
    chalk.level = 0;
    dir = makeTempDir();
    source = join(dir, 'book.pdf');
    await writeFixturePdf(source, 10);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('extracts --range flags and reports skips', async () => {
    const out = captureOutput();

    await run(['--file', source, '--range', '1-2=A', '--range', '9-12=B']);

    expect(await readPageWidths(join(dir, 'A.pdf'))).toEqual(widthsFor(1, 2));
    expect(statSync(join(dir, 'A.md')).size).toBe(0);
    expect(existsSync(join(dir, 'B.pdf'))).toBe(false);
    expect(out.lines()).toEqual([
      `Source: ${source}`,
      '  10 pages',
      '',
      `  ✓ [1/2] pages 1-2 → ${join(dir, 'A.pdf')}`,
      `      note: ${join(dir, 'A.md')}`,
      '  ! [2/2] skipped "B": Range 9-12 with offset 0 exceeds the page count of 10 (effective 9-12)',
      '',
      'Extracted 1 of 2 ranges (1 skipped)',
    ]);
    expect(out.exit).not.toHaveBeenCalled();
  });

  it('runs a job file and lets --offset override it', async () => {
    const out = captureOutput();
    const job = join(dir, 'job.json');
    writeFileSync(job, JSON.stringify({
      source: 'book.pdf',
      offset: 0,
      ranges: [{ start: 1, end: 3, name: 'Intro' }],
    }));

    await run(['--config', job, '--offset', '2']);

    expect(await readPageWidths(join(dir, 'Intro.pdf'))).toEqual(widthsFor(3, 5));
    expect(out.lines()).toContain('  Offset: 2');
  });

  it('accepts a negative --offset', async () => {
    captureOutput();
    await run(['--file', source, '--range', '3-4=Shifted', '--offset', '-2']);
    expect(await readPageWidths(join(dir, 'Shifted.pdf'))).toEqual(widthsFor(1, 2));
  });

  it('prints the result as JSON', async () => {
    const out = captureOutput();

    await run(['--file', source, '--range', '2-3=A', '--range', '5-4=B', '--json']);

    expect(out.log).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(out.lines()[0]);
    expect(parsed.totalPages).toBe(10);
    expect(parsed.summary).toEqual({ total: 2, extracted: 1, skipped: 1, failed: 0, companionFailures: 0 });
    expect(parsed.ranges[1].reason).toBe('inverted');
  });

  it('writes nothing with --dry-run', async () => {
    const out = captureOutput();

    await run(['--file', source, '--range', '1-2=A', '--dry-run']);

    expect(readdirSync(dir)).toEqual(['book.pdf']);
    expect(out.lines()).toContain('Dry run: 1 of 1 range would be extracted');
  });

  it('exits 1 when the source is missing', async () => {
    const out = captureOutput();
    const missing = join(dir, 'missing.pdf');

    await expect(run(['--file', missing, '--range', '1-2=A'])).rejects.toThrow('process.exit(1)');

    expect(out.errors()).toEqual([`Error: Source PDF not found: ${missing}`]);
    expect(readdirSync(dir)).toEqual(['book.pdf']);
  });

  it('exits 1 when the source is not a PDF', async () => {
    const out = captureOutput();
    const bogus = join(dir, 'bogus.pdf');
    writeFileSync(bogus, 'plain text');

    await expect(run(['--file', bogus, '--range', '1-2=A'])).rejects.toThrow('process.exit(1)');
    expect(out.errors()[0].startsWith(`Error: Failed to read source PDF ${bogus}: `)).toBe(true);
  });

  it('exits 1 with usage when no ranges are given', async () => {
    const out = captureOutput();

    await expect(run(['--file', source])).rejects.toThrow('process.exit(1)');

    expect(out.errors()).toEqual([
      'Error: No page ranges given — pass --range or --config',
      'Usage: page-extractor extract --config job.json  |  --file book.pdf --range "1-50=Chapter 1"',
    ]);
  });

  it('exits 1 on a malformed --range', async () => {
    const out = captureOutput();

    await expect(run(['--file', source, '--range', 'x-3=A'])).rejects.toThrow('process.exit(1)');
    expect(out.errors()[0]).toBe('Error: Invalid range "x-3=A" — use "START-END=NAME" or "PAGE=NAME"');
  });

  it('prints the sample job file', async () => {
    captureOutput();
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await run(['--sample']);

    const printed = write.mock.calls.map((args) => String(args[0])).join('');
    expect(JSON.parse(printed).ranges).toHaveLength(12);
  });
});
