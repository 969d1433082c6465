/**
 * Image locators
 *
 * Images stay inside the archive. The shredder only rewrites references to
 * `zim://I/<filename>`; a media server resolves them to bytes on demand.
 */

import { createHash } from 'node:crypto';
import { COMMONS_UPLOAD_BASE, IMAGE_LOCATOR_PREFIX } from './constants.js';

/** Thumbnail segment such as `220px-Apollo_11.jpg` */
const THUMB_PREFIX = /^\d+px-/;

/** Common raster/vector extensions, for alt text derived from a file name */
const IMAGE_EXTENSION = /\.(?:png|jpe?g|gif|svg|webp|tiff?|bmp)$/i;

/** Parsed `zim://` locator */
export interface ParsedLocator {
  namespace: string;
  filename: string;
}

/** `decodeURIComponent` that leaves malformed input alone */
export function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed percent escapes are kept verbatim
    return value;
  }
}

/**
 * Extract the archive file name from an `<img src>` value
 *
 * Handles archive-relative paths (`../I/File.jpg`), absolute Wikimedia URLs and
 * thumbnail URLs (`…/thumb/a/ab/File.jpg/220px-File.jpg` → `File.jpg`).
 */
export function imageFilename(src: string): string {
  const path = src.split(/[?#]/, 1)[0] ?? '';
  const segments = path.split('/').filter((s) => s.length > 0);
  let filename = segments.at(-1) ?? '';
  const previous = segments.at(-2);
  if (previous !== undefined && THUMB_PREFIX.test(filename) && segments.includes('thumb')) {
    filename = previous;
  }
  return safeDecode(filename).trim();
}

/**
 * Build the locator for an archive image
 */
export function toImageLocator(filename: string): string {
  return `${IMAGE_LOCATOR_PREFIX}${filename}`;
}

/**
 * Split a locator into namespace and file name
 */
export function parseImageLocator(locator: string): ParsedLocator | null {
  const match = /^zim:\/\/([A-Za-z-])\/(.+)$/.exec(locator);
  if (!match || match[1] === undefined || match[2] === undefined) {
    return null;
  }
  return { namespace: match[1], filename: match[2] };
}

/**
 * Human-readable alt text derived from a file name
 */
export function altFromFilename(filename: string): string {
  return filename.replace(IMAGE_EXTENSION, '').replace(/_/g, ' ').trim();
}

/**
 * Original Wikimedia Commons URL of a file
 *
 * Commons shards uploads by the MD5 of the underscored file name.
 */
export function commonsUrl(filename: string): string {
  const name = filename.trim().replace(/ /g, '_');
  const md5 = createHash('md5').update(name, 'utf8').digest('hex');
  return `${COMMONS_UPLOAD_BASE}/${md5.slice(0, 1)}/${md5.slice(0, 2)}/${encodeURIComponent(name)}`;
}
