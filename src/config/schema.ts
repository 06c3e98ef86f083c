/**
 * Configuration Schema
 *
 * Shape of config.toml, defined with Zod for both the TypeScript types
 * and runtime validation.
 */

import { z } from 'zod';

/**
 * File extension such as ".asn": a dot followed by at least one character
 * that is neither a dot nor a path separator.
 */
const ExtensionSchema = z
  .string()
  .regex(/^\.[^./\\]+$/, 'Extension must look like ".asn"');

export const InputConfigSchema = z.object({
  encoding: z
    .enum(['utf-8', 'latin1'])
    .describe('Text encoding for headers and --split files; .asn output is always copied byte for byte'),
});

export const OutputConfigSchema = z.object({
  extension: ExtensionSchema.describe('Extension given to the extracted file'),
  naming: z
    .enum(['first-dot', 'last-dot'])
    .describe('Truncate the input path at its first dot, or at the file name extension'),
});

export const SplitConfigSchema = z.object({
  out_dir: z.string().min(1).describe('Directory for --split output'),
  extension: ExtensionSchema.describe('Extension of each section file'),
});

/**
 * Root configuration schema
 */
export const ConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  split: SplitConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Every field optional, for sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
