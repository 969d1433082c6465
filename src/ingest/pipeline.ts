/**
 * Ingestion pipeline
 *
 * Composes: ArchiveReader -> WikiShredder -> UniversalChunker -> DocumentStore
 *
 * Processing one article is a pure function of its markup and the
 * configuration; the pipeline only adds bounded concurrent reading and keeps
 * results in archive order.
 */

import { UniversalChunker } from '../chunk/chunker.js';
import type { ChunkerConfigInput, ShredderConfigInput } from '../lib/config-schema.js';
import { validatePipelineConfig, type PipelineConfig } from '../lib/config-schema.js';
import {
  ArticleNotFoundError,
  DeterminismViolationError,
  errorMessage,
  isFatalKind,
  isTypedError,
} from '../lib/errors.js';
import { createLogger, withArticleContext, withArticleContextAsync, type Logger } from '../lib/logger.js';
import { WikiShredder } from '../shred/shredder.js';
import type { ArticleSource } from '../shred/types.js';
import type { DocumentStore } from '../storage/types.js';
import { BatchReporter } from './report.js';
import type {
  ArchiveReader,
  ArticleFailure,
  ArticleOutcome,
  BatchReport,
  IngestionOptions,
  IngestionProgress,
  ProcessedArticle,
} from './types.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('ingest');

/** Progress is reported every this many articles */
const PROGRESS_INTERVAL = 100;

// ============================================================================
// Single article
// ============================================================================

/**
 * A shredder and a chunker sharing one validated configuration
 */
export class ArticleProcessor {
  private readonly shredder: WikiShredder;
  private readonly chunker: UniversalChunker;

  /**
   * @throws {ConfigInvalidError} If either configuration is invalid
   */
  constructor(
    config: { shredder?: ShredderConfigInput; chunker?: ChunkerConfigInput } = {},
    options: { logger?: Logger } = {}
  ) {
    this.shredder = new WikiShredder(config.shredder, options);
    this.chunker = new UniversalChunker(config.chunker, options);
  }

  process(article: ArticleSource): ProcessedArticle {
    return withArticleContext({ articleId: article.id }, () => {
      const document = this.shredder.shred(article);
      const chunks = this.chunker.chunk(article.id, document.markdown);
      return { articleId: article.id, document, chunks };
    });
  }
}

/**
 * Shred and chunk one article
 *
 * @throws {ConfigInvalidError} If the configuration is invalid
 */
export function processArticle(
  article: ArticleSource,
  config: { shredder?: ShredderConfigInput; chunker?: ChunkerConfigInput } = {}
): ProcessedArticle {
  return new ArticleProcessor(config).process(article);
}

/** Fields compared by `verifyDeterminism` */
const COMPARED_FIELDS = ['markdown', 'sidecar', 'images', 'links', 'toc', 'abstract', 'warnings'] as const;

/**
 * Name of the first field on which two results differ
 */
function firstDifference(a: ProcessedArticle, b: ProcessedArticle): string | null {
  for (const field of COMPARED_FIELDS) {
    if (JSON.stringify(a.document[field]) !== JSON.stringify(b.document[field])) {
      return field;
    }
  }
  return JSON.stringify(a.chunks) === JSON.stringify(b.chunks) ? null : 'chunks';
}

/**
 * Process an article twice and require identical results
 *
 * @throws {DeterminismViolationError} If the two runs differ
 */
export function verifyDeterminism(
  article: ArticleSource,
  processor: ArticleProcessor = new ArticleProcessor()
): ProcessedArticle {
  const first = processor.process(article);
  const second = processor.process(article);
  const field = firstDifference(first, second);
  if (field !== null) {
    throw new DeterminismViolationError(
      `Article ${article.id} produced different ${field} on a second run`,
      article.id
    );
  }
  return first;
}

// ============================================================================
// Batches
// ============================================================================

/** Outcome of one task, or a defect that must stop the run */
type Settled = { outcome: ArticleOutcome } | { fatal: unknown };

function toFailure(articleId: string, error: unknown): ArticleFailure {
  return {
    articleId,
    kind: isTypedError(error) ? error.kind : 'UNKNOWN',
    message: errorMessage(error),
  };
}

function isFatal(error: unknown): boolean {
  return isTypedError(error) && isFatalKind(error.kind);
}

/**
 * Create an ingestion pipeline over an archive.
 *
 * Up to `concurrency` articles are read at once; outcomes are yielded in
 * archive order. Per-article failures are yielded as failed outcomes, while
 * defects (a determinism or invariant violation) end the iteration by
 * throwing.
 *
 * @example
 * ```typescript
 * const reader = new DirectoryArchiveReader('./archive');
 * for await (const outcome of createIngestionPipeline(reader, { concurrency: 8 })) {
 *   if (outcome.ok) console.log(outcome.result.articleId, outcome.result.chunks.length);
 * }
 * ```
 *
 * @throws {ConfigInvalidError} Before the first article, if the options are invalid
 */
export async function* createIngestionPipeline(
  reader: ArchiveReader,
  options: IngestionOptions = {}
): AsyncGenerator<ArticleOutcome, void, unknown> {
  const config: PipelineConfig = validatePipelineConfig({
    chunker: options.chunker,
    shredder: options.shredder,
    concurrency: options.concurrency,
    verifyDeterminism: options.verifyDeterminism,
  });
  const log = options.logger ?? getLog();
  const processor = new ArticleProcessor(config, options.logger ? { logger: options.logger } : {});
  const reporter = new BatchReporter();

  const run = (id: string): Promise<Settled> =>
    withArticleContextAsync({ articleId: id }, async (): Promise<Settled> => {
      try {
        const article = await reader.getArticle(id);
        if (!article) {
          throw new ArticleNotFoundError(id);
        }
        const result = config.verifyDeterminism
          ? verifyDeterminism(article, processor)
          : processor.process(article);

        if (result.document.warnings.length > 0) {
          log.warn('Article processed with warnings', {
            warnings: result.document.warnings.length,
            kinds: [...new Set(result.document.warnings.map((w) => w.kind))],
          });
        }
        return { outcome: { ok: true, result } };
      } catch (error) {
        if (isFatal(error)) {
          return { fatal: error };
        }
        const failure = toFailure(id, error);
        log.error('Article failed', { articleId: id, kind: failure.kind, error: failure.message });
        return { outcome: { ok: false, failure } };
      }
    });

  const pending: Array<Promise<Settled>> = [];
  let taken = 0;

  const settle = (settled: Settled): ArticleOutcome => {
    if ('fatal' in settled) {
      throw settled.fatal;
    }
    reporter.record(settled.outcome);
    const progress = reporter.progress();
    if ((progress.articlesProcessed + progress.articlesFailed) % PROGRESS_INTERVAL === 0) {
      options.onProgress?.(progress);
    }
    return settled.outcome;
  };

  log.info('Ingestion started', { concurrency: config.concurrency, limit: options.limit });

  try {
    for await (const id of reader.listArticleIds()) {
      options.signal?.throwIfAborted();
      if (options.limit !== undefined && taken >= options.limit) {
        break;
      }
      taken++;
      pending.push(run(id));

      if (pending.length >= config.concurrency) {
        const next = pending.shift();
        if (next) yield settle(await next);
      }
    }

    for (let next = pending.shift(); next; next = pending.shift()) {
      options.signal?.throwIfAborted();
      yield settle(await next);
    }
  } finally {
    const progress: IngestionProgress = reporter.progress();
    options.onProgress?.(progress);
    log.info('Ingestion finished', {
      articles: progress.articlesProcessed,
      failed: progress.articlesFailed,
      chunks: progress.chunksProduced,
    });
  }
}

/**
 * Run a whole archive through the pipeline, writing every processed article
 * to the store, and report the outcome.
 *
 * A store write failure counts as that article's failure; the batch goes on.
 */
export async function runBatch(
  reader: ArchiveReader,
  store: DocumentStore | null,
  options: IngestionOptions = {}
): Promise<BatchReport> {
  const log = (options.logger ?? getLog()).withOperation('store');
  const reporter = new BatchReporter();

  for await (const outcome of createIngestionPipeline(reader, options)) {
    if (!outcome.ok || !store) {
      reporter.record(outcome);
      continue;
    }
    const { articleId } = outcome.result;
    try {
      await store.writeArticle(outcome.result);
      reporter.record(outcome);
    } catch (error) {
      const failure = toFailure(articleId, error);
      log.error('Failed to store article', { articleId, error: failure.message });
      reporter.record({ ok: false, failure });
    }
  }

  return reporter.report();
}
