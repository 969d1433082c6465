/**
 * Type definitions for the storage layer
 */

import type { ProcessedArticle } from '../ingest/types.js';

/**
 * Destination for processed articles
 *
 * `writeArticle` makes an article's documents and chunks visible as one
 * unit; a reader never sees a partially written article.
 */
export interface DocumentStore {
  writeArticle(result: ProcessedArticle): Promise<void>;
  hasArticle(articleId: string): Promise<boolean>;
}

/** File names inside one article directory */
export const ARTICLE_FILES = {
  content: 'content.md',
  abstract: 'abstract.md',
  toc: 'toc.json',
  sidecar: 'sidecar.json',
  images: 'images.json',
  chunks: 'chunks.json',
  meta: 'meta.json',
} as const;
