/**
 * Page-range extraction: split one source PDF into per-range PDFs with empty Markdown notes.
 *
 * Usage:
 *   import { extractPages, loadExtractJob, parseRangeSpec } from '../core/pdf/index.js';
 */

export { extractPages } from './extract.js';
export { loadExtractJob, validateRawJob } from './config.js';
export {
  documentExtension,
  outputFileNames,
  parseRangeSpec,
  resolveRange,
} from './ranges.js';
export {
  extractSampleJson,
  formatRangeOutcome,
  formatSummary,
  printExtractSummary,
  printRangeOutcome,
} from './format.js';
export { ExtractConfigError, SourceNotFoundError, SourceReadError } from './errors.js';
export type {
  ExtractJob,
  ExtractOptions,
  ExtractResult,
  ExtractSummary,
  ExtractedRange,
  FailedRange,
  OutputFileNames,
  PageRangeDescriptor,
  PlannedRange,
  RangeOutcome,
  ResolvedRange,
  SkipReason,
  SkippedRange,
} from './types.js';
