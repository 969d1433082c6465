/**
 * wiki-shredder - Main Library Entry Point
 *
 * This module re-exports key functionality from the various sub-modules
 * for convenient access by library consumers.
 */

// ============================================================================
// SHREDDING - article HTML to Markdown + sidecar
// ============================================================================
export {
  WikiShredder,
  shredArticle,
  TokenRegistry,
  parseHtml,
  outerHtml,
  textOf,
  classifyElement,
  extractTable,
  extractInfobox,
  extractFormula,
  toCsv,
  toMarkdownTable,
  normalizeInternalTarget,
  escapeMarkdown,
  unescapeMarkdown,
} from './shred/index.js';

export type {
  ArticleSource,
  ElementAnchor,
  SidecarCategory,
  SidecarEntry,
  TableEntry,
  TablePayload,
  InfoboxEntry,
  InfoboxPayload,
  FormulaEntry,
  FormulaPayload,
  FormulaDisplay,
  ImageLocator,
  WikiLink,
  TocEntry,
  ShredWarning,
  ShreddedDocument,
  WikiShredderOptions,
  HtmlElement,
  HtmlNode,
} from './shred/index.js';

// ============================================================================
// CHUNKING - Markdown to deterministic chunks
// ============================================================================
export {
  UniversalChunker,
  chunkMarkdown,
  reassembleChunks,
  buildSectionTree,
  normalizeMarkdown,
} from './chunk/index.js';

export type {
  Chunk,
  ChunkKind,
  MeasureFn,
  SectionNode,
  SectionTree,
  UniversalChunkerOptions,
} from './chunk/index.js';

// ============================================================================
// INGESTION - archive to store
// ============================================================================
export {
  DirectoryArchiveReader,
  MemoryArchiveReader,
  ArticleProcessor,
  BatchReporter,
  createIngestionPipeline,
  processArticle,
  runBatch,
  verifyDeterminism,
} from './ingest/index.js';

export type {
  ArchiveReader,
  ArticleFailure,
  ArticleOutcome,
  BatchReport,
  IngestionOptions,
  IngestionProgress,
  ProcessedArticle,
} from './ingest/index.js';

// ============================================================================
// STORAGE
// ============================================================================
export { FileDocumentStore, MemoryDocumentStore, safeArticleName } from './storage/index.js';
export type { DocumentStore } from './storage/index.js';

// ============================================================================
// SHARED
// ============================================================================
export {
  formatPlaceholder,
  parsePlaceholder,
  scanPlaceholders,
  PLACEHOLDER_PATTERN,
  SIDECAR_CATEGORIES,
  type TokenReference,
} from './lib/tokens.js';
export { chunkId, stableHash } from './lib/ids.js';
export { toImageLocator, parseImageLocator, commonsUrl, imageFilename } from './lib/media.js';
export {
  ChunkerConfigSchema,
  ShredderConfigSchema,
  PipelineConfigSchema,
  validateChunkerConfig,
  validateShredderConfig,
  validatePipelineConfig,
  type ChunkerConfig,
  type ChunkerConfigInput,
  type ShredderConfig,
  type ShredderConfigInput,
  type PipelineConfig,
  type PipelineConfigInput,
} from './lib/config-schema.js';
export {
  ConfigInvalidError,
  DeterminismViolationError,
  InvariantViolationError,
  ArticleNotFoundError,
  isTypedError,
  type ErrorKind,
  type WarningKind,
} from './lib/errors.js';
export {
  createLogger,
  Logger,
  setLoggerProvider,
  resetLoggerProvider,
  withArticleContext,
  type LogLevel,
  type LoggerProvider,
} from './lib/logger.js';
