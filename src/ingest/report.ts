/**
 * Batch reporting
 */

import type { WarningKind } from '../lib/errors.js';
import type { ShredWarning } from '../shred/types.js';
import type { ArticleFailure, ArticleOutcome, BatchReport, IngestionProgress } from './types.js';

function emptyWarningCounts(): Record<WarningKind, number> {
  return { PARSE_RECOVERABLE: 0, EXTRACTION_DEGRADED: 0 };
}

/**
 * Accumulates article outcomes into a `BatchReport`
 */
export class BatchReporter {
  private readonly startTime: number;
  private articlesProcessed = 0;
  private chunksProduced = 0;
  private sidecarEntries = 0;
  private readonly warningsByKind = emptyWarningCounts();
  private readonly warningsByArticle = new Map<string, ShredWarning[]>();
  private readonly failures: ArticleFailure[] = [];

  constructor(now: number = Date.now()) {
    this.startTime = now;
  }

  record(outcome: ArticleOutcome): void {
    if (!outcome.ok) {
      this.failures.push(outcome.failure);
      return;
    }

    const { result } = outcome;
    this.articlesProcessed++;
    this.chunksProduced += result.chunks.length;
    this.sidecarEntries += result.document.sidecar.length;

    const warnings = result.document.warnings;
    if (warnings.length > 0) {
      this.warningsByArticle.set(result.articleId, [...warnings]);
      for (const warning of warnings) {
        this.warningsByKind[warning.kind]++;
      }
    }
  }

  progress(now: number = Date.now()): IngestionProgress {
    const elapsed = (now - this.startTime) / 1000;
    return {
      articlesProcessed: this.articlesProcessed,
      articlesFailed: this.failures.length,
      chunksProduced: this.chunksProduced,
      startTime: this.startTime,
      articlesPerSecond: elapsed > 0 ? this.articlesProcessed / elapsed : 0,
    };
  }

  report(now: number = Date.now()): BatchReport {
    return {
      articlesProcessed: this.articlesProcessed,
      articlesFailed: this.failures.length,
      chunksProduced: this.chunksProduced,
      sidecarEntries: this.sidecarEntries,
      warningsByKind: { ...this.warningsByKind },
      warningsByArticle: Object.fromEntries(this.warningsByArticle),
      failures: [...this.failures],
      durationMs: now - this.startTime,
    };
  }
}

/**
 * Total number of warnings in a report
 */
export function countWarnings(report: BatchReport): number {
  return Object.values(report.warningsByKind).reduce((sum, n) => sum + n, 0);
}
