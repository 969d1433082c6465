/**
 * Per-article token registry
 *
 * Issues `TBL_1`, `INFO_1`, `MATH_1`, … in document order. A new registry is
 * created for every article, so ids never depend on what was shredded before.
 */

import { InvariantViolationError } from '../lib/errors.js';
import {
  CATEGORY_CODES,
  formatPlaceholder,
  scanPlaceholders,
  type SidecarCategory,
} from '../lib/tokens.js';

export interface IssuedToken {
  readonly tokenId: string;
  readonly category: SidecarCategory;
  readonly placeholder: string;
}

/** Minimal view of a sidecar entry for the bijection check */
export interface RegisteredEntry {
  readonly tokenId: string;
  readonly category: SidecarCategory;
}

export class TokenRegistry {
  private readonly counters = new Map<SidecarCategory, number>();
  private readonly issued = new Map<string, SidecarCategory>();

  /**
   * Issue the next token of a category and render its placeholder
   */
  issue(category: SidecarCategory, label: string): IssuedToken {
    const ordinal = (this.counters.get(category) ?? 0) + 1;
    this.counters.set(category, ordinal);
    const tokenId = `${CATEGORY_CODES[category]}_${ordinal}`;
    if (this.issued.has(tokenId)) {
      throw new InvariantViolationError(`Token ${tokenId} issued twice`);
    }
    this.issued.set(tokenId, category);
    return { tokenId, category, placeholder: formatPlaceholder(category, tokenId, label) };
  }

  /** Number of tokens issued so far */
  get size(): number {
    return this.issued.size;
  }

  /**
   * Check that every placeholder in the Markdown has exactly one entry and
   * every entry exactly one placeholder
   *
   * @throws {InvariantViolationError}
   */
  verify(markdown: string, entries: readonly RegisteredEntry[]): void {
    const expected = new Map<string, SidecarCategory>();
    for (const entry of entries) {
      if (expected.has(entry.tokenId)) {
        throw new InvariantViolationError(`Sidecar holds ${entry.tokenId} more than once`);
      }
      if (this.issued.get(entry.tokenId) !== entry.category) {
        throw new InvariantViolationError(`Sidecar entry ${entry.tokenId} was not issued as ${entry.category}`);
      }
      expected.set(entry.tokenId, entry.category);
    }

    const seen = new Set<string>();
    for (const ref of scanPlaceholders(markdown)) {
      if (seen.has(ref.tokenId)) {
        throw new InvariantViolationError(`Placeholder ${ref.tokenId} appears more than once`);
      }
      seen.add(ref.tokenId);
      const category = expected.get(ref.tokenId);
      if (category === undefined) {
        throw new InvariantViolationError(`Placeholder ${ref.tokenId} has no sidecar entry`);
      }
      if (category !== ref.category) {
        throw new InvariantViolationError(
          `Placeholder ${ref.tokenId} is marked ${ref.category} but its entry is ${category}`
        );
      }
    }

    for (const tokenId of expected.keys()) {
      if (!seen.has(tokenId)) {
        throw new InvariantViolationError(`Sidecar entry ${tokenId} has no placeholder`);
      }
    }
  }
}
