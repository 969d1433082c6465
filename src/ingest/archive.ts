/**
 * Archive readers
 *
 * An archive is anything that can list article ids and return an article's
 * HTML by id. `DirectoryArchiveReader` reads an extracted archive (one HTML
 * file per article); `MemoryArchiveReader` serves tests and small imports.
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join, sep } from 'node:path';
import { createLogger } from '../lib/logger.js';
import type { ArticleSource } from '../shred/types.js';
import type { ArchiveReader } from './types.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('ingest');

const ARTICLE_EXTENSIONS: ReadonlySet<string> = new Set(['.html', '.htm']);

/**
 * Title shown for an article id: its last segment with underscores as spaces
 */
export function titleFromId(id: string): string {
  const segment = id.split('/').at(-1) ?? id;
  return segment.replace(/_/g, ' ').trim();
}

/**
 * Reads articles from a directory tree of `.html`/`.htm` files
 *
 * The id of `A/Albert_Einstein.html` is `A/Albert_Einstein`. Ids are listed
 * in sorted order so every run sees the same archive order.
 */
export class DirectoryArchiveReader implements ArchiveReader {
  private index: Promise<Map<string, string>> | null = null;

  constructor(private readonly directory: string) {}

  private loadIndex(): Promise<Map<string, string>> {
    this.index ??= this.scan();
    return this.index;
  }

  private async scan(): Promise<Map<string, string>> {
    const entries = await readdir(this.directory, { recursive: true });
    const files = new Map<string, string>();

    for (const entry of [...entries].sort()) {
      const extension = extname(entry).toLowerCase();
      if (!ARTICLE_EXTENSIONS.has(extension)) continue;

      const id = entry.slice(0, -extension.length).split(sep).join('/');
      if (files.has(id)) {
        getLog().warn('Duplicate article id, keeping the first file', { id, file: entry });
        continue;
      }
      files.set(id, join(this.directory, entry));
    }

    getLog().debug('Indexed archive directory', { directory: this.directory, articles: files.size });
    return files;
  }

  async *listArticleIds(): AsyncIterable<string> {
    const files = await this.loadIndex();
    yield* files.keys();
  }

  async getArticle(id: string): Promise<ArticleSource | undefined> {
    const files = await this.loadIndex();
    const file = files.get(id);
    if (file === undefined) {
      return undefined;
    }
    const markup = await readFile(file, 'utf-8');
    return { id, title: titleFromId(id), markup };
  }
}

/**
 * In-memory archive; ids are listed in insertion order
 */
export class MemoryArchiveReader implements ArchiveReader {
  private readonly articles = new Map<string, ArticleSource>();

  constructor(articles: Iterable<ArticleSource> = []) {
    for (const article of articles) {
      this.add(article);
    }
  }

  add(article: ArticleSource): this {
    this.articles.set(article.id, article);
    return this;
  }

  get size(): number {
    return this.articles.size;
  }

  async *listArticleIds(): AsyncIterable<string> {
    yield* this.articles.keys();
  }

  async getArticle(id: string): Promise<ArticleSource | undefined> {
    return this.articles.get(id);
  }
}
