/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments, then we validate with Zod for defaults,
 * custom rules and readable error messages.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// GLOBAL OPTIONS SCHEMA
// ============================================================================

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

// ============================================================================
// EXPLAIN COMMAND SCHEMA
// ============================================================================

export const ExplainArgsSchema = z.object({
  message: z
    .array(z.string())
    .transform((parts) => parts.join(' ').trim())
    .pipe(
      z
        .string()
        .min(1, 'Error message cannot be empty')
        .max(10000, 'Error message too long (max 10000 chars)')
    ),
});

export const ExplainOptionsSchema = z.object({
  invalidValue: z.string().optional(),
  plain: z.boolean().default(false),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema, throwing a ValidationError listing
 * every issue when it fails.
 *
 * @example
 * ```typescript
 * const { message } = parseInput(ExplainArgsSchema, { message: parts });
 * ```
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): z.output<T> {
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
