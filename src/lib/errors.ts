/**
 * Typed error hierarchy for the shredding pipeline
 *
 * Every failure carries a `kind` discriminator. Recoverable kinds
 * (`PARSE_RECOVERABLE`, `EXTRACTION_DEGRADED`) are never thrown: they are
 * recorded as warnings on the shredded document. The remaining kinds are
 * thrown as the classes below.
 *
 * Usage:
 * ```ts
 * import { ConfigInvalidError, isTypedError } from './lib/errors.js';
 *
 * throw new ConfigInvalidError('maxChunkSize: must be >= targetChunkSize');
 *
 * if (isTypedError(error) && isFatalKind(error.kind)) { ... }
 * ```
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'PARSE_RECOVERABLE'
  | 'EXTRACTION_DEGRADED'
  | 'CONFIG_INVALID'
  | 'DETERMINISM_VIOLATION'
  | 'INVARIANT_VIOLATION'
  | 'NOT_FOUND';

/** Kinds that degrade output but never stop an article */
export type WarningKind = Extract<ErrorKind, 'PARSE_RECOVERABLE' | 'EXTRACTION_DEGRADED'>;

/** How the pipeline reacts to an error kind */
export type Severity = 'warning' | 'article' | 'fatal';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/**
 * Chunker or pipeline settings are inconsistent.
 *
 * Raised before any article is processed.
 */
export class ConfigInvalidError extends Error implements TypedError {
  readonly kind = 'CONFIG_INVALID' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigInvalidError';
    Object.setPrototypeOf(this, ConfigInvalidError.prototype);
  }
}

/**
 * Identical input produced different output across two runs.
 */
export class DeterminismViolationError extends Error implements TypedError {
  readonly kind = 'DETERMINISM_VIOLATION' as const;

  constructor(
    message: string,
    readonly articleId: string
  ) {
    super(message);
    this.name = 'DeterminismViolationError';
    Object.setPrototypeOf(this, DeterminismViolationError.prototype);
  }
}

/**
 * An internal invariant (such as the token/sidecar bijection) does not hold.
 */
export class InvariantViolationError extends Error implements TypedError {
  readonly kind = 'INVARIANT_VIOLATION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
    Object.setPrototypeOf(this, InvariantViolationError.prototype);
  }
}

/**
 * The archive has no article with the requested id.
 */
export class ArticleNotFoundError extends Error implements TypedError {
  readonly kind = 'NOT_FOUND' as const;

  constructor(readonly articleId: string) {
    super(`Article not found: ${articleId}`);
    this.name = 'ArticleNotFoundError';
    Object.setPrototypeOf(this, ArticleNotFoundError.prototype);
  }
}

const ERROR_KINDS: ReadonlySet<string> = new Set<ErrorKind>([
  'PARSE_RECOVERABLE',
  'EXTRACTION_DEGRADED',
  'CONFIG_INVALID',
  'DETERMINISM_VIOLATION',
  'INVARIANT_VIOLATION',
  'NOT_FOUND',
]);

/**
 * Type guard to check if an error is one of the pipeline's typed errors
 */
export function isTypedError(error: unknown): error is TypedError {
  if (!(error instanceof Error) || !('kind' in error)) {
    return false;
  }
  const kind: unknown = error.kind;
  return typeof kind === 'string' && ERROR_KINDS.has(kind);
}

/**
 * Map error kind to pipeline severity
 */
export function getSeverityForKind(kind: ErrorKind): Severity {
  switch (kind) {
    case 'PARSE_RECOVERABLE':
    case 'EXTRACTION_DEGRADED':
      return 'warning';
    case 'NOT_FOUND':
      return 'article';
    case 'CONFIG_INVALID':
    case 'DETERMINISM_VIOLATION':
    case 'INVARIANT_VIOLATION':
      return 'fatal';
    default:
      return 'fatal';
  }
}

/**
 * True for kinds that must stop the whole run
 */
export function isFatalKind(kind: ErrorKind): boolean {
  return getSeverityForKind(kind) === 'fatal';
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
