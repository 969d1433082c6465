/**
 * Storage layer: where processed articles end up
 */

export { ARTICLE_FILES, type DocumentStore } from './types.js';
export { FileDocumentStore, safeArticleName, type FileDocumentStoreOptions } from './file-store.js';
export { MemoryDocumentStore } from './memory-store.js';
