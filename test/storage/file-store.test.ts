/**
 * Tests for the file-backed document store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { processArticle } from '../../src/ingest/pipeline.js';
import { stableHash } from '../../src/lib/ids.js';
import { FileDocumentStore, safeArticleName } from '../../src/storage/file-store.js';
import { MemoryDocumentStore } from '../../src/storage/memory-store.js';
import { ARTICLE_FILES } from '../../src/storage/types.js';
import { createArticle, createQuietLogger, page } from '../helpers.js';

const TABLE = '<table><caption>Scores</caption><tr><td>A</td><td>1</td></tr></table>';

describe('safeArticleName', () => {
  it('should keep a readable prefix and a hash suffix', () => {
    expect(safeArticleName('A/Paris')).toBe(`A_Paris-${stableHash('A/Paris', 8)}`);
  });

  it('should keep ids that clean up alike apart', () => {
    expect(safeArticleName('A/B')).not.toBe(safeArticleName('A:B'));
  });

  it('should name an empty id', () => {
    expect(safeArticleName('')).toBe(`article-${stableHash('', 8)}`);
  });

  it('should shorten long ids', () => {
    const name = safeArticleName('x'.repeat(300));

    expect(name).toBe(`${'x'.repeat(100)}-${stableHash('x'.repeat(300), 8)}`);
  });
});

describe('FileDocumentStore', () => {
  let dir: string;
  let store: FileDocumentStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'wiki-shredder-store-'));
    store = new FileDocumentStore(dir, { logger: createQuietLogger() });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write every article file', async () => {
    const result = processArticle(
      createArticle(page(`<p>Lead.</p>${TABLE}<h2>More</h2><p>Body.</p>`), { id: 'A/Scores', title: 'Scores' })
    );

    await store.writeArticle(result);
    const articleDir = store.articleDir('A/Scores');

    expect((await readdir(articleDir)).sort()).toEqual(Object.values(ARTICLE_FILES).sort());
    expect(await readFile(join(articleDir, ARTICLE_FILES.content), 'utf-8')).toBe(
      'Lead.\n\n**[<<TABLE: TBL_1 | Scores>>]**\n\n## More\n\nBody.\n'
    );
    expect(await readFile(join(articleDir, ARTICLE_FILES.abstract), 'utf-8')).toBe('Lead.\n');
    expect(JSON.parse(await readFile(join(articleDir, ARTICLE_FILES.toc), 'utf-8'))).toEqual([
      { level: 2, title: 'More' },
    ]);
    expect(JSON.parse(await readFile(join(articleDir, ARTICLE_FILES.sidecar), 'utf-8'))).toEqual(
      JSON.parse(JSON.stringify(result.document.sidecar))
    );
    expect(JSON.parse(await readFile(join(articleDir, ARTICLE_FILES.chunks), 'utf-8'))).toEqual(
      JSON.parse(JSON.stringify(result.chunks))
    );
    expect(JSON.parse(await readFile(join(articleDir, ARTICLE_FILES.meta), 'utf-8'))).toEqual({
      articleId: 'A/Scores',
      title: 'Scores',
      links: [],
      warnings: [],
    });
  });

  it('should replace an article written before', async () => {
    await store.writeArticle(processArticle(createArticle('<p>First.</p>', { id: 'Same' })));
    await store.writeArticle(processArticle(createArticle('<p>Second.</p>', { id: 'Same' })));

    expect(await readdir(join(dir, 'articles'))).toEqual([safeArticleName('Same')]);
    expect(await readFile(join(store.articleDir('Same'), ARTICLE_FILES.content), 'utf-8')).toBe('Second.\n');
  });

  it('should tell which articles exist', async () => {
    await store.writeArticle(processArticle(createArticle('<p>x</p>', { id: 'Here' })));

    expect(await store.hasArticle('Here')).toBe(true);
    expect(await store.hasArticle('Elsewhere')).toBe(false);
  });
});

describe('MemoryDocumentStore', () => {
  it('should keep written articles in write order', async () => {
    const store = new MemoryDocumentStore();
    const result = processArticle(createArticle('<p>x</p>', { id: 'One' }));

    await store.writeArticle(result);

    expect(store.articleIds()).toEqual(['One']);
    expect(store.getArticle('One')).toBe(result);
    expect(await store.hasArticle('One')).toBe(true);
    expect(await store.hasArticle('Two')).toBe(false);
  });
});
