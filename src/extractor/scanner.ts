/**
 * Region Scanner
 *
 * Single pass over a document's lines with a two-state machine:
 * idle -> capturing on a line containing START_MARKER, capturing -> idle
 * on a line containing STOP_MARKER. Marker lines are never captured.
 */

import {
  START_MARKER,
  STOP_MARKER,
  type CaptureRegion,
  type ScanResult,
  type ScanState,
} from './types.js';

/**
 * Split text into lines the way a line-oriented reader does.
 *
 * Lines are separated by '\n'. A trailing '\n' does not start another
 * line, and empty text has no lines. '\r' is left in place.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }

  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Find the last non-blank line before `index`, trimmed.
 */
function findHeader(lines: readonly string[], index: number): string | null {
  for (let i = index - 1; i >= 0; i--) {
    const candidate = lines[i]?.trim();
    if (candidate) {
      return candidate;
    }
  }
  return null;
}

/**
 * Scan lines for capture regions.
 *
 * A start marker inside a region is captured like any other line; a stop
 * marker outside a region is ignored. Input that ends inside a region
 * leaves that region unterminated, with its lines still captured.
 *
 * @example
 * ```ts
 * const result = scanLines(['intro', '-- ASN1START', 'A ::= INTEGER', '-- ASN1STOP']);
 * result.lines;           // ['A ::= INTEGER']
 * result.regions[0].header; // 'intro'
 * ```
 */
export function scanLines(lines: readonly string[]): ScanResult {
  const captured: string[] = [];
  const regions: CaptureRegion[] = [];
  let state: ScanState = 'idle';
  let current: CaptureRegion | null = null;

  for (const [index, line] of lines.entries()) {
    if (state === 'idle') {
      if (line.includes(START_MARKER)) {
        state = 'capturing';
        current = {
          startLine: index + 1,
          endLine: null,
          header: findHeader(lines, index),
          lines: [],
          terminated: false,
        };
        regions.push(current);
      }
      continue;
    }

    if (line.includes(STOP_MARKER)) {
      state = 'idle';
      if (current) {
        current.endLine = index + 1;
        current.terminated = true;
      }
      current = null;
      continue;
    }

    captured.push(line);
    current?.lines.push(line);
  }

  return {
    lines: captured,
    regions,
    totalLines: lines.length,
    state,
  };
}

/**
 * Captured lines only, in document order.
 */
export function extractLines(lines: readonly string[]): string[] {
  return scanLines(lines).lines;
}

/**
 * Render lines as file content, each followed by '\n'.
 */
export function renderLines(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}
