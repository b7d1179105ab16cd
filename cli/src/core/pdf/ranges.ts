/**
 * Page-range rules: effective-range validation, output filenames and CLI range specs.
 */

import { extname } from 'node:path';
import { ExtractConfigError } from './errors.js';
import type { OutputFileNames, PageRangeDescriptor, ResolvedRange } from './types.js';

/** Extension used when the source path has none. */
const DEFAULT_EXTENSION = '.pdf';

/** Companion note extension — always appended to the raw descriptor name. */
const COMPANION_EXTENSION = '.md';

/**
 * Apply the offset and check the effective range against the source.
 *
 * Checks run in a fixed order: non-positive bounds, then bounds past the
 * last page, then an inverted range. The first violation wins.
 */
export function resolveRange(
  descriptor: PageRangeDescriptor,
  offset: number,
  totalPages: number,
): ResolvedRange {
  const effectiveStart = descriptor.start + offset;
  const effectiveEnd = descriptor.end + offset;
  const requested = `Range ${descriptor.start}-${descriptor.end} with offset ${offset}`;
  const effective = `effective ${effectiveStart}-${effectiveEnd}`;

  if (effectiveStart < 1 || effectiveEnd < 1) {
    return {
      ok: false, effectiveStart, effectiveEnd, reason: 'not-positive',
      message: `${requested} is invalid: pages are numbered from 1 (${effective})`,
    };
  }
  if (effectiveStart > totalPages || effectiveEnd > totalPages) {
    return {
      ok: false, effectiveStart, effectiveEnd, reason: 'beyond-last-page',
      message: `${requested} exceeds the page count of ${totalPages} (${effective})`,
    };
  }
  if (effectiveStart > effectiveEnd) {
    return {
      ok: false, effectiveStart, effectiveEnd, reason: 'inverted',
      message: `${requested} starts after it ends (${effective})`,
    };
  }
  return { ok: true, effectiveStart, effectiveEnd };
}

/** Document extension for outputs: the source's own, or `.pdf` when it has none. */
export function documentExtension(sourcePath: string): string {
  return extname(sourcePath) || DEFAULT_EXTENSION;
}

/**
 * Derive output filenames from a descriptor name.
 *
 *   "Chapter 1"     → Chapter 1.pdf      + Chapter 1.md
 *   "Chapter 1.pdf" → Chapter 1.pdf      + Chapter 1.pdf.md
 */
export function outputFileNames(name: string, extension: string): OutputFileNames {
  const hasExtension = name.toLowerCase().endsWith(extension.toLowerCase());
  return {
    document: hasExtension ? name : `${name}${extension}`,
    companion: `${name}${COMPANION_EXTENSION}`,
  };
}

// ── CLI range specs ──────────────────────────────────────────

const RANGE_SPEC_PATTERN = /^\s*(-?\d+)(?:\s*-\s*(-?\d+))?\s*=(.*)$/;

/**
 * Parse a --range value into a descriptor.
 *
 * Format: "START-END=NAME" or "PAGE=NAME" (1-based, inclusive). The name
 * is everything after the first "=", kept verbatim apart from outer whitespace.
 * Bounds are not checked here — out-of-range specs become skips at extraction time.
 *
 * @throws ExtractConfigError on malformed specs.
 */
export function parseRangeSpec(spec: string): PageRangeDescriptor {
  const match = spec.match(RANGE_SPEC_PATTERN);
  if (!match) {
    throw new ExtractConfigError(`Invalid range "${spec}" — use "START-END=NAME" or "PAGE=NAME"`);
  }

  const start = parseInt(match[1], 10);
  const end = match[2] !== undefined ? parseInt(match[2], 10) : start;
  const name = match[3].trim();
  if (!name) {
    throw new ExtractConfigError(`Range "${spec}" is missing an output name after "="`);
  }

  return { start, end, name };
}
