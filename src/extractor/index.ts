/**
 * Extractor Module
 *
 * ASN.1 region extraction: the line scanner, output naming, section
 * files, and the file-level passes built on them.
 */

export {
  START_MARKER,
  STOP_MARKER,
  type ScanState,
  type CaptureRegion,
  type ScanResult,
  type NamingStrategy,
  type TextEncoding,
} from './types.js';

export { splitLines, scanLines, extractLines, renderLines } from './scanner.js';

export { deriveOutputPath, DEFAULT_OUTPUT_EXTENSION } from './output-path.js';

export {
  sanitizeHeader,
  renderSection,
  buildSectionFiles,
  DEFAULT_SECTIONS_DIR,
  DEFAULT_SECTION_EXTENSION,
  type SectionFile,
} from './sections.js';

export {
  scanFile,
  extractFile,
  splitFile,
  type ExtractFileOptions,
  type SplitFileOptions,
  type ExtractionSummary,
  type SplitSummary,
} from './extract-file.js';
