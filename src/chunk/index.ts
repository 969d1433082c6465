/**
 * Chunking stage: Markdown → ordered, size-bounded chunks
 */

export type { Chunk, ChunkKind, MeasureFn, SectionNode, TextBlock } from './types.js';
export { buildSectionTree, normalizeMarkdown, parseHeader, type SectionTree } from './section-tree.js';
export {
  UniversalChunker,
  reassembleChunks,
  chunkMarkdown,
  type UniversalChunkerOptions,
} from './chunker.js';
