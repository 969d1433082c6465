/**
 * In-memory document store
 */

import type { ProcessedArticle } from '../ingest/types.js';
import type { DocumentStore } from './types.js';

export class MemoryDocumentStore implements DocumentStore {
  private readonly articles = new Map<string, ProcessedArticle>();

  async writeArticle(result: ProcessedArticle): Promise<void> {
    this.articles.set(result.articleId, result);
  }

  async hasArticle(articleId: string): Promise<boolean> {
    return this.articles.has(articleId);
  }

  getArticle(articleId: string): ProcessedArticle | undefined {
    return this.articles.get(articleId);
  }

  /** Stored article ids in write order */
  articleIds(): string[] {
    return [...this.articles.keys()];
  }
}
