/**
 * Test helpers and utilities
 */

import { Logger } from '../src/lib/logger.js';
import { findFirst, parseHtml, type HtmlElement } from '../src/shred/html-tree.js';
import type { ArticleSource } from '../src/shred/types.js';

/**
 * Wrap body markup in a minimal article page
 */
export function page(body: string, title = 'Test Page'): string {
  return `<html><head><title>${title}</title><style>p { margin: 0 }</style></head><body>${body}</body></html>`;
}

/**
 * Create an article for shredding
 */
export function createArticle(markup: string, overrides: Partial<ArticleSource> = {}): ArticleSource {
  return {
    id: 'Test_Article',
    title: 'Test Article',
    markup,
    ...overrides,
  };
}

/**
 * A sentence of `count` distinct words (`w1 w2 …`), ending with a period
 */
export function sentence(count: number, prefix = 'w'): string {
  return `${Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`).join(' ')}.`;
}

/**
 * Logger for injection that writes nothing below error level
 */
export function createQuietLogger(context = 'test'): Logger {
  return new Logger({ context, level: 'error', format: 'json' });
}

/**
 * First element with the given tag name in a parsed fragment
 */
export function parseFirst(markup: string, name: string): HtmlElement {
  const element = findFirst(parseHtml(markup), (el) => el.name === name);
  if (!element) {
    throw new Error(`No <${name}> in fixture`);
  }
  return element;
}
