/**
 * Output path derivation.
 */

import type { NamingStrategy } from './types.js';

/** Extension given to the extracted ASN.1 file */
export const DEFAULT_OUTPUT_EXTENSION = '.asn';

/**
 * Derive the output path from the input path.
 *
 * `first-dot` truncates at the first '.' in the whole path, so a dot in a
 * directory name shortens the result ("./docs/a.txt" -> ".asn").
 * `last-dot` only looks at the final path segment and ignores a leading
 * dot there (".hidden" -> ".hidden.asn").
 *
 * @example
 * ```ts
 * deriveOutputPath('a.b.txt');              // 'a.asn'
 * deriveOutputPath('noext');                // 'noext.asn'
 * deriveOutputPath('v1.2/spec.txt', 'last-dot'); // 'v1.2/spec.asn'
 * ```
 */
export function deriveOutputPath(
  inputPath: string,
  naming: NamingStrategy = 'first-dot',
  extension: string = DEFAULT_OUTPUT_EXTENSION
): string {
  const cut = naming === 'first-dot' ? inputPath.indexOf('.') : lastExtensionDot(inputPath);

  if (cut === -1) {
    return inputPath + extension;
  }
  return inputPath.slice(0, cut) + extension;
}

/**
 * Index of the last '.' in the final path segment, -1 when there is none
 * or when the only dot starts the segment.
 */
function lastExtensionDot(path: string): number {
  const segmentStart = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\')) + 1;
  const dot = path.lastIndexOf('.');
  if (dot <= segmentStart) {
    return -1;
  }
  return dot;
}
