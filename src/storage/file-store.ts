/**
 * File-backed document store
 *
 * Layout:
 *
 *   <root>/articles/<safe-id>/content.md
 *                            abstract.md
 *                            toc.json
 *                            sidecar.json
 *                            images.json
 *                            chunks.json
 *                            meta.json
 *
 * Each article is written to a staging directory and renamed into place, so
 * a reader never observes a partially written article.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { stableHash } from '../lib/ids.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { ProcessedArticle } from '../ingest/types.js';
import { ARTICLE_FILES, type DocumentStore } from './types.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('storage');

const ARTICLES_DIR = 'articles';

/** Longest readable prefix kept in a directory name */
const MAX_NAME_LENGTH = 100;

/**
 * Directory name for an article id
 *
 * The readable part keeps letters, digits, spaces, `-` and `_`; the hash
 * suffix keeps ids that clean up to the same text apart.
 */
export function safeArticleName(articleId: string): string {
  const readable = articleId
    .replace(/[^A-Za-z0-9 _-]/g, '_')
    .slice(0, MAX_NAME_LENGTH)
    .trim();
  return `${readable || 'article'}-${stableHash(articleId, 8)}`;
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export interface FileDocumentStoreOptions {
  /** Optional logger for dependency injection (testing) */
  logger?: Logger;
}

export class FileDocumentStore implements DocumentStore {
  private readonly articlesDir: string;
  private readonly log: Logger;

  constructor(
    readonly rootDir: string,
    options: FileDocumentStoreOptions = {}
  ) {
    this.articlesDir = join(rootDir, ARTICLES_DIR);
    this.log = options.logger ?? getLog();
  }

  /** Directory holding an article's files */
  articleDir(articleId: string): string {
    return join(this.articlesDir, safeArticleName(articleId));
  }

  async hasArticle(articleId: string): Promise<boolean> {
    return exists(this.articleDir(articleId));
  }

  async writeArticle(result: ProcessedArticle): Promise<void> {
    const { articleId, document, chunks } = result;
    const target = this.articleDir(articleId);
    const nonce = randomUUID();
    const staging = join(this.articlesDir, `.staging-${nonce}`);
    const retired = join(this.articlesDir, `.retired-${nonce}`);

    await mkdir(staging, { recursive: true });
    try {
      await Promise.all([
        writeFile(join(staging, ARTICLE_FILES.content), `${document.markdown}\n`, 'utf-8'),
        writeFile(join(staging, ARTICLE_FILES.abstract), `${document.abstract}\n`, 'utf-8'),
        writeFile(join(staging, ARTICLE_FILES.toc), toJson(document.toc), 'utf-8'),
        writeFile(join(staging, ARTICLE_FILES.sidecar), toJson(document.sidecar), 'utf-8'),
        writeFile(join(staging, ARTICLE_FILES.images), toJson(document.images), 'utf-8'),
        writeFile(join(staging, ARTICLE_FILES.chunks), toJson(chunks), 'utf-8'),
        writeFile(
          join(staging, ARTICLE_FILES.meta),
          toJson({
            articleId,
            title: document.title,
            links: document.links,
            warnings: document.warnings,
          }),
          'utf-8'
        ),
      ]);

      const replacing = await exists(target);
      if (replacing) {
        await rename(target, retired);
      }
      await rename(staging, target);
      if (replacing) {
        await rm(retired, { recursive: true, force: true });
      }
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      throw error;
    }

    this.log.debug('Stored article', { articleId, dir: target, chunks: chunks.length });
  }
}
