/**
 * Page-range extraction via pdf-lib.
 *
 * Loads the source once, then copies each requested range into its own PDF
 * next to the source, plus an empty Markdown note with the same base name.
 * Continues on per-range problems (never aborts mid-batch); only a missing
 * or unreadable source is fatal.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { SourceNotFoundError, SourceReadError } from './errors.js';
import { documentExtension, outputFileNames, resolveRange } from './ranges.js';
import type {
  ExtractOptions,
  ExtractResult,
  ExtractSummary,
  PageRangeDescriptor,
  RangeOutcome,
} from './types.js';

/**
 * Load and parse a source PDF.
 * @throws SourceNotFoundError before any parsing if the path does not exist.
 * @throws SourceReadError if the file is not a readable, unencrypted PDF.
 */
async function loadSourcePdf(sourcePath: string): Promise<PDFDocument> {
  if (!existsSync(sourcePath)) {
    throw new SourceNotFoundError(sourcePath);
  }

  try {
    const bytes = readFileSync(sourcePath);
    return await PDFDocument.load(bytes, { updateMetadata: false });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new SourceReadError(sourcePath, msg);
  }
}

/**
 * Build a new PDF holding source pages `effectiveStart..effectiveEnd` (1-based, inclusive).
 * Metadata stamping is off so identical input always produces identical bytes.
 */
async function copyPageRange(
  source: PDFDocument,
  effectiveStart: number,
  effectiveEnd: number,
): Promise<Uint8Array> {
  const output = await PDFDocument.create({ updateMetadata: false });
  const indices: number[] = [];
  for (let i = effectiveStart - 1; i < effectiveEnd; i++) indices.push(i);

  const pages = await output.copyPages(source, indices);
  for (const page of pages) output.addPage(page);
  return output.save();
}

/**
 * Extract every descriptor's page range from `sourcePath`.
 *
 * For each valid range two files land in the source's directory:
 * `<name>[.pdf]` with the copied pages and an empty `<name>.md`.
 * Existing files are overwritten. Ranges are processed strictly in order.
 */
export async function extractPages(
  sourcePath: string,
  descriptors: PageRangeDescriptor[],
  offset = 0,
  options: ExtractOptions = {},
): Promise<ExtractResult> {
  const source = await loadSourcePdf(sourcePath);
  const totalPages = source.getPageCount();
  const outputDir = dirname(sourcePath);
  const extension = documentExtension(sourcePath);
  const dryRun = options.dryRun ?? false;
  const ranges: RangeOutcome[] = [];
  options.onSource?.({ totalPages, outputDir });

  for (let index = 0; index < descriptors.length; index++) {
    const descriptor = descriptors[index];
    const outcome = await processRange(source, descriptor, index, {
      offset, totalPages, outputDir, extension, dryRun,
    });
    ranges.push(outcome);
    options.onRange?.(outcome);
  }

  return {
    sourcePath,
    outputDir,
    totalPages,
    offset,
    dryRun,
    ranges,
    summary: summarize(ranges),
  };
}

interface RangeContext {
  offset: number;
  totalPages: number;
  outputDir: string;
  extension: string;
  dryRun: boolean;
}

async function processRange(
  source: PDFDocument,
  descriptor: PageRangeDescriptor,
  index: number,
  ctx: RangeContext,
): Promise<RangeOutcome> {
  const { start, end, name } = descriptor;
  const resolved = resolveRange(descriptor, ctx.offset, ctx.totalPages);
  const base = {
    index, start, end, name,
    effectiveStart: resolved.effectiveStart,
    effectiveEnd: resolved.effectiveEnd,
  };

  if (!resolved.ok) {
    return { ...base, status: 'skipped', reason: resolved.reason, message: resolved.message };
  }

  const fileNames = outputFileNames(name, ctx.extension);
  const documentPath = join(ctx.outputDir, fileNames.document);
  const companionPath = join(ctx.outputDir, fileNames.companion);
  const pageCount = resolved.effectiveEnd - resolved.effectiveStart + 1;

  if (ctx.dryRun) {
    return { ...base, status: 'planned', documentPath, companionPath, pageCount };
  }

  try {
    const bytes = await copyPageRange(source, resolved.effectiveStart, resolved.effectiveEnd);
    writeFileSync(documentPath, bytes);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ...base, status: 'failed', documentPath, error: msg };
  }

  // The document stands even if its note cannot be written
  try {
    writeFileSync(companionPath, '', 'utf-8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ...base, status: 'extracted', documentPath, companionPath, pageCount, companionError: msg };
  }

  return { ...base, status: 'extracted', documentPath, companionPath, pageCount };
}

function summarize(ranges: RangeOutcome[]): ExtractSummary {
  const summary: ExtractSummary = {
    total: ranges.length,
    extracted: 0,
    skipped: 0,
    failed: 0,
    companionFailures: 0,
  };

  for (const r of ranges) {
    switch (r.status) {
      case 'extracted':
        summary.extracted++;
        if (r.companionError) summary.companionFailures++;
        break;
      case 'planned':  summary.extracted++; break;
      case 'skipped':  summary.skipped++; break;
      case 'failed':   summary.failed++; break;
      default: {
        const _exhaustive: never = r;
        throw new Error(`Unknown range outcome: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  return summary;
}
