/**
 * Extractor Types
 *
 * Type definitions for the ASN.1 region extraction pass.
 */

/** Substring that opens a capture region */
export const START_MARKER = '-- ASN1START';

/** Substring that closes a capture region */
export const STOP_MARKER = '-- ASN1STOP';

/**
 * Scanner state.
 * - idle: outside any region, looking for a start marker
 * - capturing: inside a region, collecting lines until a stop marker
 */
export type ScanState = 'idle' | 'capturing';

/**
 * One start/stop pair found during a scan.
 */
export interface CaptureRegion {
  /** Line number of the start marker (1-indexed) */
  startLine: number;

  /** Line number of the stop marker (1-indexed), null if input ended first */
  endLine: number | null;

  /** Last non-blank line before the start marker, trimmed */
  header: string | null;

  /** Lines strictly between the markers, unmodified */
  lines: string[];

  /** Whether a stop marker closed this region */
  terminated: boolean;
}

/**
 * Result of one extraction pass over a document.
 */
export interface ScanResult {
  /** Every captured line in document order (all regions concatenated) */
  lines: string[];

  /** Regions in document order */
  regions: CaptureRegion[];

  /** Number of input lines scanned */
  totalLines: number;

  /** State when input ended; 'capturing' means the last region is unterminated */
  state: ScanState;
}

/**
 * How the output path is derived from the input path.
 * - first-dot: truncate at the first '.' anywhere in the path
 * - last-dot: truncate at the last '.' of the file name
 */
export type NamingStrategy = 'first-dot' | 'last-dot';

/** Encodings accepted for reading and writing documents */
export type TextEncoding = 'utf-8' | 'latin1';
