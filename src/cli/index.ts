/**
 * CLI Module Exports
 *
 * Re-exports all CLI commands and utilities.
 */

// Commands
export { shredCommand, shredFile, type ShredOptions } from './shred.js';
export { ingestCommand, formatReport, type IngestOptions } from './ingest.js';

// Utilities
export {
  color,
  supportsColor,
  stripAnsi,
  createSpinner,
  formatDuration,
  formatNumber,
  formatTable,
  loadConfig,
  parseInteger,
  chunkerSettings,
  fatal,
  warn,
  truncate,
  resolvePath,
  CONFIG_FILE_NAME,
} from './utils.js';

export type { CliConfig, ChunkerFlags } from './utils.js';
