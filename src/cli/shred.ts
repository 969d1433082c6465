/**
 * Shred Command
 *
 * Shred a single article HTML file and print its Markdown, document or chunks.
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { errorMessage } from '../lib/errors.js';
import { titleFromId } from '../ingest/archive.js';
import { processArticle } from '../ingest/pipeline.js';
import { chunkerSettings, fatal, loadConfig, resolvePath, warn, type ChunkerFlags } from './utils.js';

/** Shred command options */
export interface ShredOptions extends ChunkerFlags {
  id?: string;
  title?: string;
  json: boolean;
  chunks: boolean;
}

/**
 * Shred one file and render the requested output
 */
export async function shredFile(file: string, options: ShredOptions): Promise<string> {
  const config = await loadConfig();
  const path = resolvePath(file);
  const markup = await readFile(path, 'utf-8');
  const id = options.id ?? basename(path, extname(path));
  const title = options.title ?? titleFromId(id);

  const { document, chunks } = processArticle(
    { id, title, markup },
    { chunker: chunkerSettings(options, config), shredder: config.shredder }
  );

  for (const warning of document.warnings) {
    warn(`${warning.kind} at ${warning.path || '(root)'}: ${warning.message}`);
  }

  if (options.json && options.chunks) {
    return JSON.stringify({ document, chunks }, null, 2);
  }
  if (options.json) {
    return JSON.stringify(document, null, 2);
  }
  if (options.chunks) {
    return JSON.stringify(chunks, null, 2);
  }
  return document.markdown;
}

export const shredCommand = new Command('shred')
  .description('Shred one article HTML file into Markdown, sidecar and chunks')
  .argument('<file>', 'Article HTML file')
  .option('--id <id>', 'Article id (default: file name without extension)')
  .option('--title <title>', 'Article title (default: derived from the id)')
  .option('--json', 'Print the shredded document as JSON', false)
  .option('--chunks', 'Print the chunk list as JSON', false)
  .option('--min <n>', 'Minimum chunk size')
  .option('--target <n>', 'Target chunk size')
  .option('--max <n>', 'Maximum chunk size')
  .option('--overlap <n>', 'Overlap between split chunks')
  .action(async (file: string, options: ShredOptions) => {
    try {
      console.log(await shredFile(file, options));
    } catch (error) {
      fatal(errorMessage(error));
    }
  });
