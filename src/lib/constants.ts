/**
 * Centralized constants for the shredding pipeline
 *
 * Magic numbers and configuration defaults shared across modules. The
 * chunker and shredder schemas take their defaults from here.
 */

// ============================================================================
// Chunking (sizes in characters unless a custom measure is supplied)
// ============================================================================

/** Sections and windows below this size are merged with neighbours */
export const DEFAULT_MIN_CHUNK_SIZE = 200;

/** Size the sliding window aims for when a section is split */
export const DEFAULT_TARGET_CHUNK_SIZE = 500;

/** Hard upper bound for a chunk (a lone oversized placeholder excepted) */
export const DEFAULT_MAX_CHUNK_SIZE = 800;

/** Trailing context repeated at the start of the next split window */
export const DEFAULT_OVERLAP_SIZE = 50;

// ============================================================================
// Shredding
// ============================================================================

/** Tables with fewer data rows stay inline as Markdown (0 = always extract) */
export const DEFAULT_MIN_TABLE_ROWS = 0;

/** Deepest header level listed in the table of contents */
export const DEFAULT_TOC_MAX_LEVEL = 3;

/** Maximum abstract length */
export const DEFAULT_ABSTRACT_MAX_LENGTH = 2000;

/** Abstract fallback length when the article opens with a header */
export const ABSTRACT_FALLBACK_LENGTH = 1000;

/** Maximum placeholder label length */
export const DEFAULT_LABEL_MAX_LENGTH = 60;

/** Upper bound for a single rowspan/colspan value */
export const MAX_CELL_SPAN = 1000;

// ============================================================================
// Media
// ============================================================================

/** Locator scheme for images kept inside the archive */
export const IMAGE_LOCATOR_PREFIX = 'zim://I/';

/** Host serving original Wikimedia Commons files */
export const COMMONS_UPLOAD_BASE = 'https://upload.wikimedia.org/wikipedia/commons';

// ============================================================================
// Pipeline
// ============================================================================

/** Articles read from the archive at the same time */
export const DEFAULT_CONCURRENCY = 4;

/** Upper bound for the concurrency setting */
export const MAX_CONCURRENCY = 64;
