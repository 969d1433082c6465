/**
 * UniversalChunker
 *
 * Cuts a shredded article's Markdown into a deterministic sequence of chunks:
 *
 * 1. build the section tree from ATX headers;
 * 2. fold sections smaller than `minChunkSize` into their neighbours;
 * 3. split units larger than `maxChunkSize` with a sliding window over block
 *    boundaries, repeating up to `overlapSize` of trailing context;
 * 4. derive each chunk id from (article id, section path, sequence).
 *
 * Placeholders are atomic: no cut ever falls inside one, and overlap context
 * never repeats one.
 */

import { validateChunkerConfig, type ChunkerConfig, type ChunkerConfigInput } from '../lib/config-schema.js';
import { chunkId, sectionPathKey } from '../lib/ids.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { PLACEHOLDER_PATTERN, scanPlaceholders, tokenIdsIn } from '../lib/tokens.js';
import { buildSectionTree } from './section-tree.js';
import type { Chunk, ChunkKind, MeasureFn, SectionNode, TextBlock } from './types.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('chunk');

export interface UniversalChunkerOptions {
  /** Size function (e.g. a tokenizer's count); defaults to string length */
  measure?: MeasureFn;
  /** Optional logger for dependency injection (testing) */
  logger?: Logger;
}

/** Consecutive blocks that become one chunk unless too large */
interface Unit {
  path: readonly string[];
  blocks: TextBlock[];
  /** Sections folded into this unit */
  members: number;
}

/** Smallest unit the window moves over */
interface Piece {
  text: string;
  separator: string;
  /** The piece is exactly one placeholder */
  token: boolean;
}

interface Segment {
  text: string;
  separator: string;
}

interface Draft {
  text: string;
  overlapLength: number;
  separator: string;
  kind: ChunkKind;
}

interface Span {
  start: number;
  end: number;
}

/** Pre-split levels for blocks above the maximum size */
const SPLIT_LEVELS: readonly RegExp[] = [/\n+/g, /(?<=[.!?])\s+/g, /\s+/g];

const defaultMeasure: MeasureFn = (text) => text.length;

function unitText(blocks: readonly TextBlock[]): string {
  return blocks.map((block, i) => (i === 0 ? block.text : `${block.separator}${block.text}`)).join('');
}

function mergeUnits(first: Unit, second: Unit): Unit {
  return {
    path: first.path,
    blocks: [...first.blocks, ...second.blocks],
    members: first.members + second.members,
  };
}

function tokenSpans(text: string): Span[] {
  return scanPlaceholders(text).map((ref) => ({ start: ref.start, end: ref.end }));
}

/**
 * Cut text at separator matches that fall outside every span; matches at the
 * very start or end are not cuts
 */
function cutAt(text: string, pattern: RegExp, spans: readonly Span[]): Segment[] {
  const out: Segment[] = [];
  let last = 0;
  let separator = '';
  for (const match of text.matchAll(new RegExp(pattern.source, 'g'))) {
    const index = match.index ?? 0;
    const length = match[0].length;
    if (length === 0 || index === 0 || index + length >= text.length) continue;
    if (spans.some((span) => index < span.end && index + length > span.start)) continue;
    out.push({ text: text.slice(last, index), separator });
    separator = match[0];
    last = index + length;
  }
  out.push({ text: text.slice(last), separator });
  return out;
}

export class UniversalChunker {
  private readonly config: ChunkerConfig;
  private readonly measure: MeasureFn;
  private readonly log: Logger;

  /**
   * @throws {ConfigInvalidError} Before any work when the thresholds are inconsistent
   */
  constructor(config: ChunkerConfigInput = {}, options: UniversalChunkerOptions = {}) {
    this.config = validateChunkerConfig(config);
    this.measure = options.measure ?? defaultMeasure;
    this.log = options.logger ?? getLog();
  }

  getConfig(): Readonly<ChunkerConfig> {
    return this.config;
  }

  /**
   * Chunk one article's Markdown
   */
  chunk(articleId: string, markdown: string): Chunk[] {
    const tree = buildSectionTree(markdown);
    const units = this.settle(this.flatten(tree.root));

    const chunks: Chunk[] = [];
    const occurrences = new Map<string, number>();
    for (const unit of units) {
      const key = sectionPathKey(unit.path);
      const occurrence = occurrences.get(key) ?? 0;
      occurrences.set(key, occurrence + 1);

      this.draft(unit).forEach((draft, sequence) => {
        chunks.push({
          id: chunkId(articleId, unit.path, sequence, occurrence),
          articleId,
          index: chunks.length,
          sectionPath: unit.path,
          sequence,
          kind: draft.kind,
          text: draft.text,
          overlapLength: draft.overlapLength,
          separator: draft.separator,
          size: this.measure(draft.text),
          tokens: tokenIdsIn(draft.text),
        });
      });
    }

    this.log.debug('Chunked article', {
      articleId,
      blocks: tree.blocks.length,
      units: units.length,
      chunks: chunks.length,
    });
    return chunks;
  }

  private size(unit: Unit): number {
    return this.measure(unitText(unit.blocks));
  }

  // ==========================================================================
  // Folding
  // ==========================================================================

  /**
   * Units of a subtree in document order, small siblings folded forward and
   * a small own part folded into the first child
   */
  private flatten(node: SectionNode): Unit[] {
    const min = this.config.minChunkSize;
    const ownBlocks = node.heading ? [node.heading, ...node.blocks] : [...node.blocks];
    const own: Unit | null = ownBlocks.length > 0 ? { path: node.path, blocks: ownBlocks, members: 1 } : null;

    const childUnits: Unit[] = [];
    let group: Unit | null = null;
    for (const child of node.children) {
      const units = this.flatten(child);
      const [head, ...tail] = units;
      if (!head) continue;
      const whole = tail.reduce(mergeUnits, head);

      if (group) {
        if (this.size(whole) >= min) {
          childUnits.push(mergeUnits(group, head), ...tail);
          group = null;
          continue;
        }
        group = mergeUnits(group, whole);
      } else if (this.size(whole) < min) {
        group = whole;
      } else {
        childUnits.push(...units);
        continue;
      }

      if (this.size(group) >= min) {
        childUnits.push(group);
        group = null;
      }
    }
    if (group) childUnits.push(group);

    if (!own) return childUnits;
    const [first, ...others] = childUnits;
    if (first && this.size(own) < min) {
      return [mergeUnits(own, first), ...others];
    }
    return [own, ...childUnits];
  }

  /**
   * Merge units still below the minimum into their predecessor
   */
  private settle(units: readonly Unit[]): Unit[] {
    const min = this.config.minChunkSize;
    const settled: Unit[] = [];
    for (const unit of units) {
      const previous = settled.at(-1);
      if (previous && this.size(unit) < min) {
        settled[settled.length - 1] = mergeUnits(previous, unit);
      } else {
        settled.push(unit);
      }
    }
    const [first, second, ...rest] = settled;
    if (first && second && this.size(first) < min) {
      return [mergeUnits(first, second), ...rest];
    }
    return settled;
  }

  // ==========================================================================
  // Splitting
  // ==========================================================================

  private draft(unit: Unit): Draft[] {
    const text = unitText(unit.blocks);
    const leading = unit.blocks[0]?.separator ?? '';
    if (this.measure(text) <= this.config.maxChunkSize) {
      return [{ text, overlapLength: 0, separator: leading, kind: unit.members > 1 ? 'merged' : 'section' }];
    }
    return this.split(this.toPieces(unit));
  }

  private toPieces(unit: Unit): Piece[] {
    const pieces: Piece[] = [];
    for (const block of unit.blocks) {
      const segments =
        this.measure(block.text) > this.config.maxChunkSize
          ? this.preSplit(block.text, 0)
          : [{ text: block.text, separator: '' }];
      segments.forEach((segment, i) => {
        pieces.push({
          text: segment.text,
          separator: i === 0 ? block.separator : segment.separator,
          token: PLACEHOLDER_PATTERN.test(segment.text),
        });
      });
    }
    return pieces;
  }

  /**
   * Split an oversized block at line, then sentence, then word boundaries
   */
  private preSplit(text: string, level: number): Segment[] {
    if (this.measure(text) <= this.config.maxChunkSize) {
      return [{ text, separator: '' }];
    }
    const pattern = SPLIT_LEVELS[level];
    if (!pattern) {
      return this.hardSplit(text);
    }
    const parts = cutAt(text, pattern, tokenSpans(text));
    if (parts.length === 1) {
      return this.preSplit(text, level + 1);
    }
    return parts.flatMap((part) =>
      this.preSplit(part.text, level + 1).map((segment, i) =>
        i === 0 ? { text: segment.text, separator: part.separator } : segment
      )
    );
  }

  /**
   * Last resort for a single oversized word: cut by characters, stepping
   * around placeholders
   */
  private hardSplit(text: string): Segment[] {
    const max = this.config.maxChunkSize;
    const spans = tokenSpans(text);
    const segments: Segment[] = [];
    let start = 0;
    while (start < text.length) {
      let lo = start + 1;
      let hi = text.length;
      while (lo < hi) {
        const mid = Math.ceil((lo + hi) / 2);
        if (this.measure(text.slice(start, mid)) <= max) lo = mid;
        else hi = mid - 1;
      }
      let end = lo;
      const inside = spans.find((span) => span.start < end && end < span.end);
      if (inside) {
        end = inside.start > start ? inside.start : inside.end;
      }
      segments.push({ text: text.slice(start, end), separator: '' });
      start = end;
    }
    return segments;
  }

  /**
   * Trailing context of a window: at most `overlapSize`, starting at a word
   * boundary after the last placeholder
   */
  private overlapTail(body: string): string {
    if (this.config.overlapSize === 0) return '';
    const floor = tokenSpans(body).at(-1)?.end ?? 0;
    for (const match of body.matchAll(/\s+/g)) {
      const start = (match.index ?? 0) + match[0].length;
      if (start < floor || start >= body.length) continue;
      const tail = body.slice(start);
      if (this.measure(tail) <= this.config.overlapSize) return tail;
    }
    return '';
  }

  private split(pieces: readonly Piece[]): Draft[] {
    const { minChunkSize: min, targetChunkSize: target, maxChunkSize: max } = this.config;
    const drafts: Draft[] = [];

    const join = (from: number, to: number): string =>
      pieces
        .slice(from, to)
        .map((piece, i) => (i === 0 ? piece.text : `${piece.separator}${piece.text}`))
        .join('');

    // Overlap prefix for a window starting at `from`, dropped when it would
    // push the first piece over the maximum
    const prefixFor = (previous: string | null, from: number): string => {
      const first = pieces[from];
      if (previous === null || !first) return '';
      const tail = this.overlapTail(previous);
      if (!tail || this.measure(`${tail}${first.separator}${first.text}`) > max) return '';
      return tail;
    };

    const compose = (prefix: string, from: number, body: string): Draft => {
      const separator = pieces[from]?.separator ?? '';
      return prefix
        ? {
            text: `${prefix}${separator}${body}`,
            overlapLength: prefix.length + separator.length,
            separator,
            kind: 'split',
          }
        : { text: body, overlapLength: 0, separator, kind: 'split' };
    };

    const sizeOf = (prefix: string, from: number, body: string): number =>
      this.measure(compose(prefix, from, body).text);

    let previous: string | null = null;
    let i = 0;
    while (i < pieces.length) {
      const first = pieces[i];
      if (!first) break;

      if (this.measure(first.text) > max) {
        drafts.push({
          text: first.text,
          overlapLength: 0,
          separator: first.separator,
          kind: first.token ? 'token' : 'split',
        });
        previous = first.text;
        i++;
        continue;
      }

      const prefix = prefixFor(previous, i);
      const rest = join(i, pieces.length);
      if (sizeOf(prefix, i, rest) <= max) {
        drafts.push(compose(prefix, i, rest));
        break;
      }

      let j = i + 1;
      let body = first.text;
      while (j < pieces.length) {
        const next = pieces[j];
        if (!next) break;
        const candidate = `${body}${next.separator}${next.text}`;
        if (sizeOf(prefix, i, candidate) > max) break;
        if (this.measure(candidate) <= target || this.measure(body) < min) {
          body = candidate;
          j++;
        } else {
          break;
        }
      }

      // Leave the remainder large enough to stand alone where possible
      if (j < pieces.length && sizeOf(prefixFor(body, j), j, join(j, pieces.length)) < min) {
        for (let k = j - 1; k > i; k--) {
          const shorter = join(i, k);
          const remainder = join(k, pieces.length);
          const remainderSize = sizeOf(prefixFor(shorter, k), k, remainder);
          if (sizeOf(prefix, i, shorter) >= min && remainderSize >= min && remainderSize <= max) {
            j = k;
            body = shorter;
            break;
          }
        }
      }

      drafts.push(compose(prefix, i, body));
      previous = body;
      i = j;
    }

    return drafts;
  }
}

/**
 * Rebuild the normalized Markdown from a complete chunk sequence
 */
export function reassembleChunks(chunks: readonly Chunk[]): string {
  return chunks.map((chunk) => `${chunk.separator}${chunk.text.slice(chunk.overlapLength)}`).join('');
}

/**
 * Chunk with a one-off chunker
 */
export function chunkMarkdown(articleId: string, markdown: string, config: ChunkerConfigInput = {}): Chunk[] {
  return new UniversalChunker(config).chunk(articleId, markdown);
}
