/**
 * Configuration Schema
 *
 * Defines the shape of ~/.errlens/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * How rewritten messages are rendered
 */
export const StyleSchema = z
  .enum(['ansi', 'plain'])
  .describe('ansi for a bold red label, plain for bare text');

/**
 * What ends a scan over the error kinds
 */
export const DispatchSchema = z
  .enum(['first-rewrite', 'first-match'])
  .describe('first-rewrite skips kinds whose handler has nothing to say');

/**
 * Extra internal-name -> CLI flag mappings for suggested corrections,
 * e.g. storage_account_name = "--account-name"
 */
export const ParameterAliasesSchema = z.record(
  z.string().min(1),
  z
    .string()
    .regex(/^--?[A-Za-z][\w-]*$/, 'Flag must look like --name or -n')
);

export const ConfigSchema = z.object({
  style: StyleSchema,
  dispatch: DispatchSchema,
  parameter_aliases: ParameterAliasesSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Every field optional, for validating a user's config.toml before it is
 * merged over the defaults.
 */
export const PartialConfigSchema = ConfigSchema.partial().strict();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
