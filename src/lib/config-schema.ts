/**
 * Configuration Schema Validation
 *
 * Zod schemas for chunker thresholds, shredder options, pipeline settings and
 * the CLI configuration file. Invalid chunker settings are rejected before any
 * article is processed.
 */

import { z } from 'zod';
import { ConfigInvalidError } from './errors.js';
import {
  DEFAULT_ABSTRACT_MAX_LENGTH,
  DEFAULT_CONCURRENCY,
  DEFAULT_LABEL_MAX_LENGTH,
  DEFAULT_MAX_CHUNK_SIZE,
  DEFAULT_MIN_CHUNK_SIZE,
  DEFAULT_MIN_TABLE_ROWS,
  DEFAULT_OVERLAP_SIZE,
  DEFAULT_TARGET_CHUNK_SIZE,
  DEFAULT_TOC_MAX_LEVEL,
  MAX_CONCURRENCY,
} from './constants.js';

const ChunkerFieldsSchema = z.object({
  /** Sections smaller than this are merged with siblings */
  minChunkSize: z.number().int().nonnegative().default(DEFAULT_MIN_CHUNK_SIZE),

  /** Size a split window aims for */
  targetChunkSize: z.number().int().positive().default(DEFAULT_TARGET_CHUNK_SIZE),

  /** Upper bound for a chunk */
  maxChunkSize: z.number().int().positive().default(DEFAULT_MAX_CHUNK_SIZE),

  /** Trailing context repeated at the head of the next window */
  overlapSize: z.number().int().nonnegative().default(DEFAULT_OVERLAP_SIZE),
});

/**
 * Chunker thresholds
 *
 * Requires `minChunkSize <= targetChunkSize <= maxChunkSize` and
 * `overlapSize < targetChunkSize`.
 */
export const ChunkerConfigSchema = ChunkerFieldsSchema.superRefine((config, ctx) => {
  if (config.minChunkSize > config.targetChunkSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['minChunkSize'],
      message: `must be <= targetChunkSize (${config.targetChunkSize})`,
    });
  }
  if (config.targetChunkSize > config.maxChunkSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['targetChunkSize'],
      message: `must be <= maxChunkSize (${config.maxChunkSize})`,
    });
  }
  if (config.overlapSize >= config.targetChunkSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['overlapSize'],
      message: `must be < targetChunkSize (${config.targetChunkSize})`,
    });
  }
});

/** Validated chunker thresholds */
export type ChunkerConfig = z.output<typeof ChunkerConfigSchema>;

/** Chunker thresholds as accepted from callers (every field optional) */
export type ChunkerConfigInput = z.input<typeof ChunkerConfigSchema>;

/**
 * Shredder options
 */
export const ShredderConfigSchema = z.object({
  /** Tables with fewer data rows are rendered inline as Markdown (0 = always extract) */
  minTableRows: z.number().int().nonnegative().default(DEFAULT_MIN_TABLE_ROWS),

  /** Deepest header level listed in the table of contents */
  tocMaxLevel: z.number().int().min(2).max(6).default(DEFAULT_TOC_MAX_LEVEL),

  /** Maximum abstract length in characters */
  abstractMaxLength: z.number().int().positive().default(DEFAULT_ABSTRACT_MAX_LENGTH),

  /** Maximum placeholder label length */
  labelMaxLength: z.number().int().min(8).default(DEFAULT_LABEL_MAX_LENGTH),
});

export type ShredderConfig = z.output<typeof ShredderConfigSchema>;
export type ShredderConfigInput = z.input<typeof ShredderConfigSchema>;

/**
 * Complete per-article processing configuration
 */
export const PipelineConfigSchema = z.object({
  chunker: ChunkerConfigSchema.default({}),
  shredder: ShredderConfigSchema.default({}),

  /** Articles read from the archive at the same time */
  concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(DEFAULT_CONCURRENCY),

  /** Process every article twice and compare the results */
  verifyDeterminism: z.boolean().default(false),
});

export type PipelineConfig = z.output<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/**
 * CLI Configuration Schema
 *
 * Validates configuration from .wikishredrc files and environment variables.
 */
export const CliConfigSchema = z.object({
  /** Output directory for shredded articles */
  dataDir: z.string().optional(),

  /** Directory holding the extracted archive articles */
  archiveDir: z.string().optional(),

  /** Articles read concurrently */
  concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).optional(),

  /** Chunker threshold overrides */
  chunker: ChunkerFieldsSchema.partial().optional(),

  /** Shredder option overrides */
  shredder: ShredderConfigSchema.partial().optional(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Format Zod validation errors for user display
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigInvalidError(`Invalid ${what}:\n${formatValidationError(result.error)}`);
  }
  return result.data;
}

/**
 * Validate chunker thresholds, filling in defaults
 *
 * @throws {ConfigInvalidError} If a threshold is missing its ordering
 */
export function validateChunkerConfig(config: unknown = {}): ChunkerConfig {
  return parseOrThrow(ChunkerConfigSchema, config, 'chunker configuration');
}

/**
 * Validate shredder options, filling in defaults
 *
 * @throws {ConfigInvalidError}
 */
export function validateShredderConfig(config: unknown = {}): ShredderConfig {
  return parseOrThrow(ShredderConfigSchema, config, 'shredder configuration');
}

/**
 * Validate the complete pipeline configuration
 *
 * @throws {ConfigInvalidError}
 */
export function validatePipelineConfig(config: unknown = {}): PipelineConfig {
  return parseOrThrow(PipelineConfigSchema, config, 'pipeline configuration');
}

/**
 * Safely validate CLI configuration without throwing
 */
export function safeValidateCliConfig(
  config: unknown
): z.SafeParseReturnType<unknown, CliConfig> {
  return CliConfigSchema.safeParse(config);
}
