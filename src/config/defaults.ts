/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and for fields a config.toml leaves out.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  input: {
    encoding: 'utf-8',
  },
  output: {
    extension: '.asn',
    naming: 'first-dot',
  },
  split: {
    out_dir: 'asn1_sections',
    extension: '.txt',
  },
};

/**
 * Commented config.toml printed by `asn1x config template`
 */
export const CONFIG_TEMPLATE = `# asn1x configuration
# Location: ~/.asn1x/config.toml (or $ASN1X_CONFIG)

[input]
# "utf-8" or "latin1": decodes region headers and --split files.
# The single .asn output is always a byte-for-byte copy.
encoding = "${DEFAULT_CONFIG.input.encoding}"

[output]
extension = "${DEFAULT_CONFIG.output.extension}"
# "first-dot": cut the input path at its first "." (a.b.txt -> a.asn)
# "last-dot":  cut at the file name's own extension (a.b.txt -> a.b.asn)
naming = "${DEFAULT_CONFIG.output.naming}"

[split]
out_dir = "${DEFAULT_CONFIG.split.out_dir}"
extension = "${DEFAULT_CONFIG.split.extension}"
`;
