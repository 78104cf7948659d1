/**
 * Configuration schema for git-readout
 *
 * Validates configuration using Zod and provides TypeScript types.
 */

import { z } from 'zod';

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  file: z.string().optional(),
  pretty: z.boolean().default(false),
});

/**
 * Status decoding configuration
 */
export const StatusConfigSchema = z.object({
  /** Porcelain output above this size is rejected before decoding (20MB) */
  maxOutputBytes: z.number().int().min(1).default(20_000_000),
  /** Value passed to --untracked-files when git status is run for the caller */
  untrackedFiles: z.enum(['all', 'normal', 'no']).default('all'),
});

/**
 * Progress decoding configuration
 */
export const ProgressConfigSchema = z.object({
  /** Interleave LFS transfer progress with regular git progress */
  trackLfs: z.boolean().default(true),
});

/**
 * Complete git-readout configuration schema
 */
export const ReadoutConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  status: StatusConfigSchema.default({}),
  progress: ProgressConfigSchema.default({}),
});

/**
 * TypeScript types derived from schemas
 */
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type StatusConfig = z.infer<typeof StatusConfigSchema>;
export type ProgressConfig = z.infer<typeof ProgressConfigSchema>;
export type ReadoutConfig = z.infer<typeof ReadoutConfigSchema>;

/**
 * Default configuration (all defaults applied)
 */
export const DEFAULT_CONFIG: ReadoutConfig = ReadoutConfigSchema.parse({});

/**
 * Validate and parse configuration object
 * @param config - Raw configuration object
 * @returns Validated and typed configuration
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): ReadoutConfig {
  return ReadoutConfigSchema.parse(config);
}

