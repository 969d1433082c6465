/**
 * Ingest Command
 *
 * Shred and chunk every article of an extracted archive into a local store.
 */

import { Command } from 'commander';
import { errorMessage } from '../lib/errors.js';
import { DirectoryArchiveReader } from '../ingest/archive.js';
import { runBatch } from '../ingest/pipeline.js';
import { countWarnings } from '../ingest/report.js';
import type { BatchReport, IngestionOptions } from '../ingest/types.js';
import { FileDocumentStore } from '../storage/file-store.js';
import {
  chunkerSettings,
  color,
  createSpinner,
  fatal,
  formatDuration,
  formatNumber,
  formatTable,
  loadConfig,
  parseInteger,
  resolvePath,
  truncate,
  type ChunkerFlags,
} from './utils.js';

/** Ingest command options */
export interface IngestOptions extends ChunkerFlags {
  output?: string;
  concurrency?: string;
  limit?: string;
  verify: boolean;
  dryRun: boolean;
  json: boolean;
}

/** Failures listed before the summary is cut short */
const MAX_LISTED_FAILURES = 20;

/**
 * Human-readable batch summary
 */
export function formatReport(report: BatchReport, outputDir: string | null): string {
  const lines: string[] = [];
  const seconds = report.durationMs / 1000;

  lines.push('', '  Ingestion Complete', '');
  lines.push(`  Articles:       ${color.green(formatNumber(report.articlesProcessed))}`);
  lines.push(`  Failed:         ${report.articlesFailed > 0 ? color.red(formatNumber(report.articlesFailed)) : '0'}`);
  lines.push(`  Chunks:         ${color.cyan(formatNumber(report.chunksProduced))}`);
  lines.push(`  Sidecar:        ${color.cyan(formatNumber(report.sidecarEntries))}`);
  lines.push(`  Warnings:       ${formatNumber(countWarnings(report))}`);
  lines.push(`  Time Elapsed:   ${color.cyan(formatDuration(seconds))}`);
  if (outputDir) {
    lines.push(`  Output:         ${color.cyan(outputDir)}`);
  }

  const kinds = Object.entries(report.warningsByKind).filter(([, count]) => count > 0);
  if (kinds.length > 0) {
    lines.push('', '  Warnings by Kind:');
    lines.push(formatTable(kinds.map(([kind, count]) => ({ Kind: kind, Count: formatNumber(count) }))));
  }

  if (report.failures.length > 0) {
    lines.push('', '  Failures:');
    const listed = report.failures.slice(0, MAX_LISTED_FAILURES).map((failure) => ({
      Article: failure.articleId,
      Kind: failure.kind,
      Message: truncate(failure.message, 60),
    }));
    lines.push(formatTable(listed));
    if (report.failures.length > MAX_LISTED_FAILURES) {
      lines.push(color.dim(`    … and ${report.failures.length - MAX_LISTED_FAILURES} more`));
    }
  }

  lines.push('');
  return lines.join('\n');
}

export const ingestCommand = new Command('ingest')
  .description('Shred and chunk an extracted archive directory into local storage')
  .argument('[archiveDir]', 'Directory of article HTML files (default: archiveDir from .wikishredrc)')
  .option('-o, --output <dir>', 'Output directory (default: ./data)')
  .option('-c, --concurrency <n>', 'Articles read at the same time')
  .option('-l, --limit <count>', 'Maximum number of articles to process')
  .option('--min <n>', 'Minimum chunk size')
  .option('--target <n>', 'Target chunk size')
  .option('--max <n>', 'Maximum chunk size')
  .option('--overlap <n>', 'Overlap between split chunks')
  .option('--verify', 'Process every article twice and require identical output', false)
  .option('--dry-run', 'Process articles without writing them', false)
  .option('--json', 'Print the batch report as JSON', false)
  .action(async (archiveArg: string | undefined, options: IngestOptions) => {
    const abortController = new AbortController();
    const shutdown = (): void => {
      abortController.abort();
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    try {
      const config = await loadConfig();
      const archiveDir = archiveArg ?? config.archiveDir;
      if (!archiveDir) {
        fatal('No archive directory given (argument or archiveDir in .wikishredrc)');
      }
      const outputDir = resolvePath(options.output ?? config.dataDir ?? './data');

      const ingestion: IngestionOptions = {
        chunker: chunkerSettings(options, config),
        shredder: config.shredder,
        concurrency: options.concurrency
          ? parseInteger(options.concurrency, '--concurrency')
          : config.concurrency,
        verifyDeterminism: options.verify,
        signal: abortController.signal,
      };
      if (options.limit) {
        ingestion.limit = parseInteger(options.limit, '--limit', 0);
      }

      const spinner = options.json ? null : createSpinner('Shredding articles...');
      ingestion.onProgress = (progress) => {
        spinner?.update(
          `Shredding articles... ${formatNumber(progress.articlesProcessed)} done, ` +
            `${formatNumber(progress.chunksProduced)} chunks`
        );
      };

      const store = options.dryRun ? null : new FileDocumentStore(outputDir);
      let report: BatchReport;
      try {
        report = await runBatch(new DirectoryArchiveReader(resolvePath(archiveDir)), store, ingestion);
      } catch (error) {
        spinner?.fail('Ingestion stopped');
        throw error;
      }
      spinner?.success(`Processed ${formatNumber(report.articlesProcessed)} articles`);

      console.log(options.json ? JSON.stringify(report, null, 2) : formatReport(report, store ? outputDir : null));
      if (report.articlesFailed > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        console.log(color.yellow('\nIngestion interrupted.\n'));
        process.exitCode = 130;
      } else {
        fatal(`Ingestion failed: ${errorMessage(error)}`);
      }
    } finally {
      process.removeListener('SIGINT', shutdown);
      process.removeListener('SIGTERM', shutdown);
    }
  });
