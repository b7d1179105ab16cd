/**
 * JSON job files for page-extractor.
 *
 *   { "source": "Compilers.pdf", "offset": 0,
 *     "ranges": [{ "start": 46, "end": 98, "name": "Chapter 1. Introduction" }] }
 *
 * A relative `source` resolves against the job file's directory.
 * Throws ExtractConfigError with user-friendly messages.
 */

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { ExtractConfigError } from './errors.js';
import type { ExtractJob, PageRangeDescriptor } from './types.js';

// ── Primitive validators ─────────────────────────────────────────

function requireString(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ExtractConfigError(`${name} is required and must be a non-empty string`);
  }
  return value;
}

function requireInteger(value: unknown, name: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ExtractConfigError(`${name} must be an integer (got ${JSON.stringify(value)})`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Structural validation ────────────────────────────────────────

function validateRange(raw: unknown, i: number): PageRangeDescriptor {
  const label = `ranges[${i}]`;
  if (!isRecord(raw)) {
    throw new ExtractConfigError(`${label} must be an object with start, end and name`);
  }
  return {
    start: requireInteger(raw.start, `${label}.start`),
    end: requireInteger(raw.end, `${label}.end`),
    name: requireString(raw.name, `${label}.name`),
  };
}

/**
 * Validate raw parsed JSON into an ExtractJob.
 * Page bounds are not checked — the extractor skips out-of-range entries.
 */
export function validateRawJob(raw: unknown, baseDir: string): ExtractJob {
  if (!isRecord(raw)) {
    throw new ExtractConfigError('Job file must contain a JSON object');
  }

  const source = requireString(raw.source, 'source');
  const offset = raw.offset === undefined ? 0 : requireInteger(raw.offset, 'offset');

  if (!Array.isArray(raw.ranges)) {
    throw new ExtractConfigError('Missing "ranges" array');
  }
  const ranges = raw.ranges.map((r: unknown, i: number) => validateRange(r, i));

  return { source: resolve(baseDir, source), offset, ranges };
}

/** Read and validate a job file. */
export function loadExtractJob(configPath: string): ExtractJob {
  const path = resolve(configPath);

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ExtractConfigError(`Cannot read job file ${path}: ${msg}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ExtractConfigError(`Job file ${path} is not valid JSON: ${msg}`);
  }

  return validateRawJob(raw, dirname(path));
}
