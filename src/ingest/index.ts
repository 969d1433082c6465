/**
 * Ingestion: archive articles in, shredded documents and chunks out
 */

export type {
  ArchiveReader,
  ArticleFailure,
  ArticleOutcome,
  BatchReport,
  IngestionOptions,
  IngestionProgress,
  ProcessedArticle,
} from './types.js';
export { DirectoryArchiveReader, MemoryArchiveReader, titleFromId } from './archive.js';
export {
  ArticleProcessor,
  createIngestionPipeline,
  processArticle,
  runBatch,
  verifyDeterminism,
} from './pipeline.js';
export { BatchReporter, countWarnings } from './report.js';
