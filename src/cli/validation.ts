/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments, then Zod checks values Commander leaves
 * as free-form strings (naming strategy, paths).
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// EXTRACT COMMAND SCHEMA
// ============================================================================

export const NamingOptionSchema = z.enum(['first-dot', 'last-dot'], {
  errorMap: () => ({ message: 'Naming must be "first-dot" or "last-dot"' }),
});

export const ExtractArgsSchema = z.object({
  input: z.string().min(1, 'Input path is required'),
});

export const ExtractOptionsSchema = z.object({
  output: z.string().min(1, 'Output path cannot be empty').optional(),
  naming: NamingOptionSchema.optional(),
  split: z.boolean().optional(),
  splitDir: z.string().min(1, 'Split directory cannot be empty').optional(),
}).refine(
  (options) => options.output === undefined || (options.split !== true && options.splitDir === undefined),
  { message: '--output cannot be combined with --split' }
);

export type ExtractOptions = z.output<typeof ExtractOptionsSchema>;

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema, throwing a ValidationError listing
 * every issue when it fails.
 *
 * @example
 * ```typescript
 * const options = parseInput(ExtractOptionsSchema, rawOptions);
 * ```
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  throw new ValidationError('Invalid arguments', issues);
}
