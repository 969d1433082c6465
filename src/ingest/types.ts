/**
 * Type definitions for the ingestion pipeline
 */

import type { Chunk } from '../chunk/types.js';
import type { ChunkerConfigInput, ShredderConfigInput } from '../lib/config-schema.js';
import type { ErrorKind, WarningKind } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ArticleSource, ShreddedDocument, ShredWarning } from '../shred/types.js';

/** Source of article HTML */
export interface ArchiveReader {
  /** Resolves to undefined when the archive has no such article */
  getArticle(id: string): Promise<ArticleSource | undefined>;
  /** Article ids in archive order */
  listArticleIds(): AsyncIterable<string>;
}

/** Everything produced for one article */
export interface ProcessedArticle {
  readonly articleId: string;
  readonly document: ShreddedDocument;
  readonly chunks: readonly Chunk[];
}

/** An article that could not be processed */
export interface ArticleFailure {
  readonly articleId: string;
  readonly kind: ErrorKind | 'UNKNOWN';
  readonly message: string;
}

/** One pipeline result: the processed article or why it failed */
export type ArticleOutcome =
  | { readonly ok: true; readonly result: ProcessedArticle }
  | { readonly ok: false; readonly failure: ArticleFailure };

/** Progress information for a running batch */
export interface IngestionProgress {
  articlesProcessed: number;
  articlesFailed: number;
  chunksProduced: number;
  /** Unix timestamp when processing started */
  startTime: number;
  articlesPerSecond: number;
}

export interface IngestionOptions {
  chunker?: ChunkerConfigInput;
  shredder?: ShredderConfigInput;
  /** Articles read from the archive at the same time */
  concurrency?: number;
  /** Process every article twice and compare the results */
  verifyDeterminism?: boolean;
  /** Stop after this many articles */
  limit?: number;
  /** Progress callback, called every 100 articles and at the end */
  onProgress?: (progress: IngestionProgress) => void;
  /** Abort signal for cancellation */
  signal?: AbortSignal;
  /** Optional logger for dependency injection (testing) */
  logger?: Logger;
}

/** Aggregated outcome of a batch */
export interface BatchReport {
  articlesProcessed: number;
  articlesFailed: number;
  chunksProduced: number;
  sidecarEntries: number;
  warningsByKind: Record<WarningKind, number>;
  /** Warnings of each article that had any */
  warningsByArticle: Record<string, ShredWarning[]>;
  failures: ArticleFailure[];
  durationMs: number;
}
