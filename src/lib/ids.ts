/**
 * Stable identifiers
 *
 * Chunk ids are a pure function of (article id, section path, sequence index)
 * so that re-ingesting an unchanged article upserts the same rows.
 */

import { createHash } from 'node:crypto';

/** Hex characters kept from the SHA-256 digest (128 bits) */
const ID_LENGTH = 32;

/** Separators that cannot occur inside titles produced by the shredder */
const FIELD_SEPARATOR = '\u0000';
const PATH_SEPARATOR = '\u001f';

/**
 * SHA-256 of a string, hex encoded
 */
export function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Truncated SHA-256 used for ids
 */
export function stableHash(value: string, length = ID_LENGTH): string {
  return sha256Hex(value).slice(0, length);
}

/**
 * Key of a section path, identical for identical title sequences
 */
export function sectionPathKey(sectionPath: readonly string[]): string {
  return sectionPath.join(PATH_SEPARATOR);
}

/**
 * Deterministic chunk id
 *
 * @param occurrence - 0 for the first section with this exact path; sibling
 *   sections sharing a title get 1, 2, … so their ids stay distinct
 */
export function chunkId(
  articleId: string,
  sectionPath: readonly string[],
  sequence: number,
  occurrence = 0
): string {
  const fields = [articleId, sectionPathKey(sectionPath), String(sequence)];
  if (occurrence > 0) {
    fields.push(`#${occurrence}`);
  }
  return stableHash(fields.join(FIELD_SEPARATOR));
}
