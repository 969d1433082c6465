/**
 * Link and image references
 *
 * Internal article links are normalized to page titles; images are rewritten
 * to archive locators and never fetched.
 */

import { altFromFilename, imageFilename, safeDecode, toImageLocator } from '../lib/media.js';
import { getAttribute, type HtmlElement } from './html-tree.js';
import { collapseWhitespace } from './text.js';
import type { ImageLocator } from './types.js';

export type ResolvedHref =
  | { kind: 'internal'; target: string }
  | { kind: 'external'; url: string }
  | { kind: 'text' };

const EXTERNAL_SCHEME = /^(?:https?:|mailto:|ftp:)/i;
const ANY_SCHEME = /^[a-z][a-z0-9+.-]*:/i;
const INTERNAL_PREFIX = /^(?:\.\.?\/|\/wiki\/|A\/)/;

/**
 * Normalize an internal href to a page title (`./Moon_landing#History`)
 *
 * Returns null when nothing but a fragment remains.
 */
export function normalizeInternalTarget(href: string): string | null {
  const hashAt = href.indexOf('#');
  let path = hashAt === -1 ? href : href.slice(0, hashAt);
  const fragment = hashAt === -1 ? '' : href.slice(hashAt + 1);

  path = path.split('?', 1)[0] ?? '';
  let previous: string;
  do {
    previous = path;
    path = path.replace(INTERNAL_PREFIX, '');
  } while (path !== previous);

  path = safeDecode(path).trim().replace(/\s+/g, '_');
  if (!path) return null;
  path = path.charAt(0).toUpperCase() + path.slice(1);

  const anchor = safeDecode(fragment).trim().replace(/\s+/g, '_');
  return anchor ? `${path}#${anchor}` : path;
}

/**
 * Decide what an `<a href>` points to
 */
export function resolveHref(href: string | undefined): ResolvedHref {
  const value = href?.trim() ?? '';
  if (!value || value.startsWith('#')) return { kind: 'text' };
  if (value.startsWith('//')) return { kind: 'external', url: `https:${value}` };
  if (EXTERNAL_SCHEME.test(value)) return { kind: 'external', url: value };
  if (ANY_SCHEME.test(value)) return { kind: 'text' };
  const target = normalizeInternalTarget(value);
  return target ? { kind: 'internal', target } : { kind: 'text' };
}

/**
 * Archive reference for an `<img>`, or null when it has no usable source
 */
export function describeImage(img: HtmlElement, tokenId?: string): ImageLocator | null {
  const src = (getAttribute(img, 'src') ?? getAttribute(img, 'data-src') ?? '').trim();
  if (!src) return null;
  const filename = imageFilename(src);
  if (!filename) return null;
  const alt = collapseWhitespace(getAttribute(img, 'alt') ?? '') || altFromFilename(filename);
  const locator: ImageLocator = { locator: toImageLocator(filename), filename, alt, originalSrc: src };
  return tokenId === undefined ? locator : { ...locator, tokenId };
}
