/**
 * asn1-extract - Library Entry Point
 *
 * The CLI (`asn1x`) covers most uses:
 * ```bash
 * asn1x 36331-j00.txt               # writes 36331-j00.asn
 * asn1x extract spec.txt --split    # one file per ASN.1 block
 * asn1x regions spec.txt            # list blocks without writing
 * ```
 *
 * The same extraction is available programmatically.
 *
 * @example In-memory extraction
 * ```typescript
 * import { extractLines, splitLines, renderLines } from 'asn1-extract';
 *
 * const asn = renderLines(extractLines(splitLines(text)));
 * ```
 *
 * @example File extraction
 * ```typescript
 * import { extractFile } from 'asn1-extract';
 *
 * const { outputPath, linesWritten } = extractFile({ inputPath: 'spec.txt' });
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export {
  START_MARKER,
  STOP_MARKER,
  splitLines,
  scanLines,
  extractLines,
  renderLines,
  deriveOutputPath,
  sanitizeHeader,
  buildSectionFiles,
  scanFile,
  extractFile,
  splitFile,
} from './extractor/index.js';

export type {
  ScanState,
  CaptureRegion,
  ScanResult,
  NamingStrategy,
  TextEncoding,
  SectionFile,
  ExtractFileOptions,
  SplitFileOptions,
  ExtractionSummary,
  SplitSummary,
} from './extractor/index.js';

export {
  CLIError,
  InputOpenError,
  OutputCreateError,
  NoRegionsError,
  ConfigError,
} from './errors/index.js';

export { loadConfig, DEFAULT_CONFIG, type Config } from './config/index.js';

export { consoleLogger, silentLogger, formatTable, type Logger } from './utils/index.js';
