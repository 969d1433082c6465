/**
 * Types for the chunking stage
 */

/**
 * How a chunk was formed
 *
 * - `section`: one section's content, unchanged
 * - `merged`: several small sections folded together
 * - `split`: one window of a section too large for a single chunk
 * - `token`: a placeholder that alone exceeds the maximum size
 */
export type ChunkKind = 'section' | 'merged' | 'split' | 'token';

export interface Chunk {
  /** Deterministic id (32 hex chars) */
  readonly id: string;
  readonly articleId: string;
  /** Position in the article's chunk sequence */
  readonly index: number;
  /** Header titles from the outermost section down; `[]` for the lead */
  readonly sectionPath: readonly string[];
  /** Position within the section's run of chunks */
  readonly sequence: number;
  readonly kind: ChunkKind;
  readonly text: string;
  /** Length of the leading context repeated from the previous chunk */
  readonly overlapLength: number;
  /** Source text between the previous chunk's body and this one's */
  readonly separator: string;
  /** Measured size of `text` */
  readonly size: number;
  /** Placeholder ids contained in `text` */
  readonly tokens: readonly string[];
}

/** A blank-line separated block of Markdown */
export interface TextBlock {
  readonly text: string;
  /** Source text before the block (blank lines, or `\n` before a header) */
  readonly separator: string;
  readonly start: number;
  readonly end: number;
}

/** A node of the header hierarchy */
export interface SectionNode {
  /** 0 for the synthetic root, 1-6 for ATX headers */
  readonly level: number;
  /** Unescaped header text */
  readonly title: string;
  readonly path: readonly string[];
  /** The header line itself (absent for the root) */
  readonly heading: TextBlock | null;
  readonly blocks: TextBlock[];
  readonly children: SectionNode[];
}

/** Size function; defaults to string length */
export type MeasureFn = (text: string) => number;
