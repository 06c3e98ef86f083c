/**
 * Section Files
 *
 * Turns each closed capture region into a standalone file named after the
 * heading line above its start marker, e.g. a region following
 * "TDD-Config information element" becomes
 * "TDD-Config information element.txt".
 */

import type { CaptureRegion } from './types.js';

/** Default directory for split output */
export const DEFAULT_SECTIONS_DIR = 'asn1_sections';

/** Default extension for split output files */
export const DEFAULT_SECTION_EXTENSION = '.txt';

/**
 * A file to be written for one region.
 */
export interface SectionFile {
  /** File name within the sections directory */
  fileName: string;

  /** Full file content */
  content: string;

  /** The region this file was built from */
  region: CaptureRegion;
}

/**
 * Characters that are not allowed in file names on common platforms.
 */
const RESERVED_CHARS = /[\\/:*?"<>|]/g;

/**
 * Make a header safe to use as a file name.
 *
 * Whitespace runs collapse to a single space, anything outside printable
 * ASCII and any reserved character becomes '_'.
 */
export function sanitizeHeader(header: string): string {
  const collapsed = header.replace(/\s+/g, ' ').trim();
  const ascii = Array.from(collapsed, (ch) => {
    const code = ch.codePointAt(0) ?? 0;
    return code >= 32 && code < 127 ? ch : '_';
  }).join('');
  const cleaned = ascii.replace(RESERVED_CHARS, '_');
  return cleaned || 'section';
}

/**
 * Base name for a region: its sanitized header, or `section_<n>` where n
 * is the 0-based index of the start marker line.
 */
function baseName(region: CaptureRegion): string {
  if (region.header === null) {
    return `section_${region.startLine - 1}`;
  }
  return sanitizeHeader(region.header);
}

/**
 * File content for a region: its lines joined, trailing whitespace
 * dropped, one newline at the end.
 */
export function renderSection(region: CaptureRegion): string {
  return `${region.lines.join('\n').trimEnd()}\n`;
}

/**
 * Build section files for every terminated region.
 *
 * Repeated names get `_1`, `_2`, ... in document order. Unterminated
 * regions are left out.
 */
export function buildSectionFiles(
  regions: readonly CaptureRegion[],
  extension: string = DEFAULT_SECTION_EXTENSION
): SectionFile[] {
  const seen = new Map<string, number>();
  const files: SectionFile[] = [];

  for (const region of regions) {
    if (!region.terminated) {
      continue;
    }

    const name = baseName(region);
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);

    files.push({
      fileName: `${count > 0 ? `${name}_${count}` : name}${extension}`,
      content: renderSection(region),
      region,
    });
  }

  return files;
}
