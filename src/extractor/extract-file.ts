/**
 * File-level extraction
 *
 * Reads a document, scans it, and writes the captured lines either to a
 * single output file or to one file per region. All I/O is synchronous.
 */

import { closeSync, mkdirSync, openSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { InputOpenError, NoRegionsError, OutputCreateError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_OUTPUT_EXTENSION, deriveOutputPath } from './output-path.js';
import { renderLines, scanLines, splitLines } from './scanner.js';
import { buildSectionFiles, DEFAULT_SECTION_EXTENSION, DEFAULT_SECTIONS_DIR } from './sections.js';
import type { NamingStrategy, ScanResult, TextEncoding } from './types.js';

/**
 * Options shared by both output modes.
 */
interface ReadOptions {
  /** Document to read */
  inputPath: string;
  /** Receives warnings and debug messages */
  logger?: Logger;
}

/**
 * Decoding that maps every byte to one code point and back, so captured
 * lines reach the output exactly as they were read. The markers are ASCII.
 */
const BYTE_ENCODING = 'latin1';

export interface ExtractFileOptions extends ReadOptions {
  /** Explicit output path; derived from inputPath when omitted */
  outputPath?: string;
  /** Strategy used to derive the output path */
  naming?: NamingStrategy;
  /** Extension appended to the derived output path */
  extension?: string;
}

export interface SplitFileOptions extends ReadOptions {
  /** Encoding for headers, file names and section content (default 'utf-8') */
  encoding?: TextEncoding;
  /** Directory receiving one file per region */
  outDir?: string;
  /** Extension of each section file */
  extension?: string;
}

/**
 * What an extraction pass produced.
 */
export interface ExtractionSummary {
  inputPath: string;
  outputPath: string;
  totalLines: number;
  linesWritten: number;
  regionCount: number;
  unterminated: boolean;
}

export interface SplitSummary {
  inputPath: string;
  outDir: string;
  totalLines: number;
  files: string[];
  skipped: number;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read and scan a document.
 *
 * @throws InputOpenError if the file cannot be opened or read
 */
export function scanFile(inputPath: string, encoding: TextEncoding = 'utf-8'): ScanResult {
  let fd: number;
  try {
    fd = openSync(inputPath, 'r');
  } catch (error) {
    throw new InputOpenError(inputPath, toError(error));
  }

  let text: string;
  try {
    text = readFileSync(fd, { encoding });
  } catch (error) {
    throw new InputOpenError(inputPath, toError(error));
  } finally {
    closeSync(fd);
  }

  return scanLines(splitLines(text));
}

function warnUnterminated(scan: ScanResult, logger: Logger): void {
  const last = scan.regions[scan.regions.length - 1];
  if (scan.state === 'capturing' && last) {
    logger.warn(
      `Region starting at line ${last.startLine} has no -- ASN1STOP; kept ${last.lines.length} line(s) up to end of input`
    );
  }
}

/**
 * Extract every capture region of a document into one output file.
 *
 * The output is created (or truncated) even when nothing is captured.
 * Captured lines are copied byte for byte, whatever their encoding.
 *
 * @throws InputOpenError if the input cannot be read
 * @throws OutputCreateError if the output cannot be created or written
 *
 * @example
 * ```ts
 * const summary = extractFile({ inputPath: 'docs/36331.txt' });
 * // summary.outputPath === 'docs/36331.asn'
 * ```
 */
export function extractFile(options: ExtractFileOptions): ExtractionSummary {
  const {
    inputPath,
    naming = 'first-dot',
    extension = DEFAULT_OUTPUT_EXTENSION,
    logger = silentLogger,
  } = options;
  const outputPath = options.outputPath ?? deriveOutputPath(inputPath, naming, extension);

  const scan = scanFile(inputPath, BYTE_ENCODING);
  logger.debug?.(`Scanned ${scan.totalLines} line(s), found ${scan.regions.length} region(s)`);

  if (resolve(outputPath) === resolve(inputPath)) {
    logger.warn(`Output path ${outputPath} is the input file; it will be overwritten`);
  }

  let fd: number;
  try {
    fd = openSync(outputPath, 'w');
  } catch (error) {
    throw new OutputCreateError(outputPath, toError(error));
  }

  try {
    writeFileSync(fd, renderLines(scan.lines), { encoding: BYTE_ENCODING });
  } catch (error) {
    throw new OutputCreateError(outputPath, toError(error));
  } finally {
    closeSync(fd);
  }

  warnUnterminated(scan, logger);
  logger.debug?.(`Wrote ${scan.lines.length} line(s) to ${outputPath}`);

  return {
    inputPath,
    outputPath,
    totalLines: scan.totalLines,
    linesWritten: scan.lines.length,
    regionCount: scan.regions.length,
    unterminated: scan.state === 'capturing',
  };
}

/**
 * Write each closed region of a document to its own file.
 *
 * @throws InputOpenError if the input cannot be read
 * @throws NoRegionsError if no region is closed by a stop marker
 * @throws OutputCreateError if the directory or a file cannot be written
 */
export function splitFile(options: SplitFileOptions): SplitSummary {
  const {
    inputPath,
    outDir = DEFAULT_SECTIONS_DIR,
    extension = DEFAULT_SECTION_EXTENSION,
    encoding = 'utf-8',
    logger = silentLogger,
  } = options;

  const scan = scanFile(inputPath, encoding);
  const sections = buildSectionFiles(scan.regions, extension);
  const skipped = scan.regions.length - sections.length;

  for (const region of scan.regions) {
    if (!region.terminated) {
      logger.warn(
        `-- ASN1STOP missing for region starting at line ${region.startLine}` +
          `${region.header ? ` ('${region.header}')` : ''}, skipping`
      );
    }
  }

  if (sections.length === 0) {
    throw new NoRegionsError(inputPath);
  }

  try {
    mkdirSync(outDir, { recursive: true });
  } catch (error) {
    throw new OutputCreateError(outDir, toError(error));
  }

  const files: string[] = [];
  for (const section of sections) {
    const filePath = join(outDir, section.fileName);
    try {
      writeFileSync(filePath, section.content, { encoding });
    } catch (error) {
      throw new OutputCreateError(filePath, toError(error));
    }
    logger.debug?.(`Wrote ${section.region.lines.length} line(s) to ${filePath}`);
    files.push(filePath);
  }

  return {
    inputPath,
    outDir,
    totalLines: scan.totalLines,
    files,
    skipped,
  };
}
