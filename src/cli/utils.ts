/**
 * CLI Utilities
 *
 * Shared utilities for the wiki-shredder CLI commands.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { ConfigInvalidError, errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import {
  type ChunkerConfigInput,
  type CliConfig,
  safeValidateCliConfig,
  formatValidationError,
} from '../lib/config-schema.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('cli');

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/** Check if color output is supported */
export function supportsColor(): boolean {
  if (process.env['NO_COLOR'] || process.env['FORCE_COLOR'] === '0') {
    return false;
  }
  if (process.env['FORCE_COLOR']) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function paint(...codes: string[]): (s: string) => string {
  return (s) => (supportsColor() ? `${codes.join('')}${s}${colors.reset}` : s);
}

/** Color output helpers */
export const color = {
  bold: paint(colors.bold),
  dim: paint(colors.dim),
  red: paint(colors.red),
  green: paint(colors.green),
  yellow: paint(colors.yellow),
  cyan: paint(colors.cyan),
  gray: paint(colors.gray),
  success: paint(colors.green, colors.bold),
  error: paint(colors.red, colors.bold),
  warning: paint(colors.yellow, colors.bold),
  info: paint(colors.cyan),
};

/** Strip ANSI codes from string */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Spinner for indeterminate progress
 */
export function createSpinner(message: string, stream: NodeJS.WriteStream = process.stderr): {
  update: (msg: string) => void;
  success: (msg: string) => void;
  fail: (msg: string) => void;
  stop: () => void;
} {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIndex = 0;
  let currentMessage = message;
  let interval: ReturnType<typeof setInterval> | null = null;

  function render(): void {
    const frame = color.cyan(frames[frameIndex] ?? '⠋');
    stream.write(`\r${frame} ${currentMessage}\x1b[K`);
    frameIndex = (frameIndex + 1) % frames.length;
  }

  // Start spinner
  interval = setInterval(render, 80);
  render();

  return {
    update(msg: string) {
      currentMessage = msg;
    },
    success(msg: string) {
      if (interval) clearInterval(interval);
      stream.write(`\r${color.green('✓')} ${msg}\x1b[K\n`);
    },
    fail(msg: string) {
      if (interval) clearInterval(interval);
      stream.write(`\r${color.red('✗')} ${msg}\x1b[K\n`);
    },
    stop() {
      if (interval) clearInterval(interval);
      stream.write('\r\x1b[K');
    },
  };
}

/**
 * Format duration as human-readable string
 */
export function formatDuration(seconds: number): string {
  if (!isFinite(seconds) || seconds < 0) return '--:--';
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const m = Math.floor(seconds / 60);
    const s = Math.round(seconds % 60);
    return `${m}m ${s}s`;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Format table data
 */
export function formatTable(
  rows: Record<string, unknown>[],
  columns?: string[],
  options: { padding?: number; header?: boolean } = {}
): string {
  if (rows.length === 0) return '';

  const { padding = 2, header = true } = options;
  const firstRow = rows[0];
  const cols = columns || (firstRow ? Object.keys(firstRow) : []);

  // Calculate column widths
  const widths: Record<string, number> = {};
  for (const col of cols) {
    widths[col] = col.length;
    for (const row of rows) {
      const value = String(row[col] ?? '');
      const stripped = stripAnsi(value);
      const currentWidth = widths[col] ?? 0;
      widths[col] = Math.max(currentWidth, stripped.length);
    }
  }

  const lines: string[] = [];
  const pad = ' '.repeat(padding);

  // Header
  if (header) {
    const headerLine = cols.map((col) => color.bold(col.padEnd(widths[col] ?? 0))).join(pad);
    lines.push(`    ${headerLine}`);
    const separator = cols.map((col) => color.dim('─'.repeat(widths[col] ?? 0))).join(pad);
    lines.push(`    ${separator}`);
  }

  // Rows
  for (const row of rows) {
    const rowLine = cols
      .map((col) => {
        const value = String(row[col] ?? '');
        const stripped = stripAnsi(value);
        const padLength = (widths[col] ?? 0) - stripped.length;
        return value + ' '.repeat(Math.max(0, padLength));
      })
      .join(pad);
    lines.push(`    ${rowLine}`);
  }

  return lines.join('\n');
}

// Re-export CliConfig type from schema
export type { CliConfig } from '../lib/config-schema.js';

/** Name of the configuration file looked up in cwd, then home */
export const CONFIG_FILE_NAME = '.wikishredrc';

/** Environment overrides and the config keys they set */
const ENV_STRINGS = {
  WIKISHRED_DATA_DIR: 'dataDir',
  WIKISHRED_ARCHIVE_DIR: 'archiveDir',
} as const;

const ENV_CHUNKER = {
  WIKISHRED_MIN_CHUNK_SIZE: 'minChunkSize',
  WIKISHRED_TARGET_CHUNK_SIZE: 'targetChunkSize',
  WIKISHRED_MAX_CHUNK_SIZE: 'maxChunkSize',
  WIKISHRED_OVERLAP_SIZE: 'overlapSize',
} as const;

const ENV_SHREDDER = {
  WIKISHRED_MIN_TABLE_ROWS: 'minTableRows',
  WIKISHRED_TOC_MAX_LEVEL: 'tocMaxLevel',
  WIKISHRED_ABSTRACT_MAX_LENGTH: 'abstractMaxLength',
  WIKISHRED_LABEL_MAX_LENGTH: 'labelMaxLength',
} as const;

/**
 * Lay numeric environment overrides over one nested block of the file config
 */
function mergeEnvNumbers(
  config: Record<string, unknown>,
  block: 'chunker' | 'shredder',
  names: Readonly<Record<string, string>>,
  env: NodeJS.ProcessEnv
): void {
  const overrides: Record<string, number> = {};
  for (const [name, key] of Object.entries(names)) {
    const value = env[name];
    if (value) {
      overrides[key] = Number(value);
    }
  }
  if (Object.keys(overrides).length === 0) return;
  const fromFile = config[block];
  const base = typeof fromFile === 'object' && fromFile !== null ? fromFile : {};
  config[block] = { ...base, ...overrides };
}

async function readConfigFile(path: string): Promise<Record<string, unknown> | null> {
  let data: string;
  try {
    data = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new ConfigInvalidError(`Invalid configuration in ${path}: ${errorMessage(error)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigInvalidError(`Invalid configuration in ${path}: expected a JSON object`);
  }
  return { ...parsed };
}

/**
 * Load configuration from .wikishredrc or environment
 *
 * Configuration is loaded from (in order of precedence):
 * 1. Environment variables (highest priority)
 * 2. .wikishredrc in current directory
 * 3. .wikishredrc in home directory (lowest priority)
 *
 * @returns Validated CLI configuration
 * @throws {ConfigInvalidError} If the file or the overrides are invalid
 */
export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  searchPaths: string[] = [join(process.cwd(), CONFIG_FILE_NAME), join(homedir(), CONFIG_FILE_NAME)]
): Promise<CliConfig> {
  let config: Record<string, unknown> = {};

  for (const configPath of searchPaths) {
    const fromFile = await readConfigFile(configPath);
    if (fromFile) {
      getLog().debug('Loaded configuration file', { path: configPath });
      config = fromFile;
      break;
    }
  }

  for (const [name, key] of Object.entries(ENV_STRINGS)) {
    const value = env[name];
    if (value) {
      config[key] = value;
    }
  }

  const envConcurrency = env['WIKISHRED_CONCURRENCY'];
  if (envConcurrency) {
    config['concurrency'] = Number(envConcurrency);
  }

  mergeEnvNumbers(config, 'chunker', ENV_CHUNKER, env);
  mergeEnvNumbers(config, 'shredder', ENV_SHREDDER, env);

  // Validate configuration with Zod
  const result = safeValidateCliConfig(config);
  if (!result.success) {
    throw new ConfigInvalidError(`Invalid configuration:\n${formatValidationError(result.error)}`);
  }

  return result.data;
}

/**
 * Parse a positive integer option
 *
 * @throws {ConfigInvalidError} If the value is not a whole number >= min
 */
export function parseInteger(value: string, name: string, min = 1): number {
  const trimmed = value.trim();
  const n = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(n) || n < min) {
    throw new ConfigInvalidError(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return n;
}

/**
 * Print error message and exit
 */
export function fatal(message: string): never {
  getLog().error(message, undefined, 'fatal');
  console.error(`\n${color.error('Error:')} ${message}\n`);
  process.exit(1);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  getLog().warn(message);
  console.error(`${color.warning('Warning:')} ${message}`);
}

/**
 * Truncate string to length with ellipsis
 */
export function truncate(s: string, maxLength: number): string {
  if (s.length <= maxLength) return s;
  return s.slice(0, maxLength - 3) + '...';
}

/**
 * Resolve path relative to cwd or absolute
 */
export function resolvePath(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return join(homedir(), p.slice(1));
  }
  return resolve(p);
}

/** Chunker threshold flags shared by the commands */
export interface ChunkerFlags {
  min?: string;
  target?: string;
  max?: string;
  overlap?: string;
}

/**
 * Chunker settings from flags over the configuration file
 *
 * @throws {ConfigInvalidError} If a flag is not a whole number
 */
export function chunkerSettings(flags: ChunkerFlags, config: CliConfig): ChunkerConfigInput {
  const settings: ChunkerConfigInput = { ...config.chunker };
  if (flags.min !== undefined) settings.minChunkSize = parseInteger(flags.min, '--min', 0);
  if (flags.target !== undefined) settings.targetChunkSize = parseInteger(flags.target, '--target');
  if (flags.max !== undefined) settings.maxChunkSize = parseInteger(flags.max, '--max');
  if (flags.overlap !== undefined) settings.overlapSize = parseInteger(flags.overlap, '--overlap', 0);
  return settings;
}
