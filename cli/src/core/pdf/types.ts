/**
 * Types for page-range extraction from a single source PDF.
 */

// ── Requests ─────────────────────────────────────────────────

/** One extraction request: an inclusive 1-based page interval plus the base output name. */
export interface PageRangeDescriptor {
  start: number;
  end: number;
  /** Base name for the output document and its companion note. */
  name: string;
}

/** A full extraction job, as loaded from a JSON job file. */
export interface ExtractJob {
  /** Absolute path to the source PDF. */
  source: string;
  offset: number;
  ranges: PageRangeDescriptor[];
}

// ── Range validation ─────────────────────────────────────────

export type SkipReason =
  | 'not-positive'      // Effective start or end below page 1
  | 'beyond-last-page'  // Effective start or end past the last page
  | 'inverted';         // Effective start after effective end

export type ResolvedRange =
  | { ok: true; effectiveStart: number; effectiveEnd: number }
  | { ok: false; effectiveStart: number; effectiveEnd: number; reason: SkipReason; message: string };

/** Filenames derived from a descriptor name. */
export interface OutputFileNames {
  document: string;
  companion: string;
}

// ── Per-range outcome ────────────────────────────────────────

interface RangeOutcomeBase {
  /** Zero-based position in the descriptor list. */
  index: number;
  start: number;
  end: number;
  name: string;
  effectiveStart: number;
  effectiveEnd: number;
}

export interface ExtractedRange extends RangeOutcomeBase {
  status: 'extracted';
  documentPath: string;
  companionPath: string;
  /** Pages in the written document. */
  pageCount: number;
  /** Set when the empty companion note could not be written. */
  companionError?: string;
}

export interface PlannedRange extends RangeOutcomeBase {
  status: 'planned';
  documentPath: string;
  companionPath: string;
  pageCount: number;
}

export interface SkippedRange extends RangeOutcomeBase {
  status: 'skipped';
  reason: SkipReason;
  message: string;
}

export interface FailedRange extends RangeOutcomeBase {
  status: 'failed';
  documentPath: string;
  error: string;
}

export type RangeOutcome = ExtractedRange | PlannedRange | SkippedRange | FailedRange;

// ── Run result ───────────────────────────────────────────────

export interface ExtractSummary {
  total: number;
  /** Written documents (or, in a dry run, ranges that would be written). */
  extracted: number;
  skipped: number;
  failed: number;
  companionFailures: number;
}

export interface ExtractResult {
  sourcePath: string;
  /** Directory every output lands in (the source's own directory). */
  outputDir: string;
  totalPages: number;
  offset: number;
  dryRun: boolean;
  ranges: RangeOutcome[];
  summary: ExtractSummary;
}

export interface ExtractOptions {
  /** Validate and plan only — write nothing. */
  dryRun?: boolean;
  /** Called once after the source is parsed, before any range is processed. */
  onSource?: (info: { totalPages: number; outputDir: string }) => void;
  /** Called once per descriptor, in list order, as soon as it is processed. */
  onRange?: (outcome: RangeOutcome) => void;
}
