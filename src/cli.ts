#!/usr/bin/env node
/**
 * wiki-shredder CLI
 *
 * Turn offline wiki archive articles into Markdown, structured sidecars and
 * retrieval chunks.
 */

import { Command } from 'commander';
import { ingestCommand } from './cli/ingest.js';
import { shredCommand } from './cli/shred.js';

const program = new Command()
  .name('wiki-shredder')
  .description('Shred offline wiki archive articles into Markdown, sidecars and chunks')
  .version('0.1.0');

// Register commands
program.addCommand(shredCommand);
program.addCommand(ingestCommand);

// Parse arguments
await program.parseAsync(process.argv);
