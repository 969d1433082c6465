/**
 * WikiShredder
 *
 * Turns one article's HTML into clean Markdown with placeholder tokens, a
 * sidecar of the extracted tables, infoboxes and formulas, and the article's
 * image references, links, table of contents and abstract.
 *
 * Shredding is a pure function of (markup, id, title, config): token
 * ordinals restart at 1 for every article and nothing is shared between calls.
 */

import { validateShredderConfig, type ShredderConfig, type ShredderConfigInput } from '../lib/config-schema.js';
import { ABSTRACT_FALLBACK_LENGTH } from '../lib/constants.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { scanPlaceholders, type SidecarCategory } from '../lib/tokens.js';
import { isRemoved } from './classify.js';
import { extractFormula } from './formula.js';
import { findAll, parseHtml, type HtmlElement, type HtmlNode } from './html-tree.js';
import { extractInfobox } from './infobox.js';
import { describeImage } from './links.js';
import { MarkdownRenderer, type HeavyRendering, type RenderSink, type RenderedBlock } from './markdown.js';
import { extractTable, toMarkdownTable } from './tables.js';
import { TokenRegistry } from './token-registry.js';
import type {
  ArticleSource,
  Extraction,
  PayloadFor,
  ShreddedDocument,
  SidecarEntry,
} from './types.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('shred');

export interface WikiShredderOptions {
  /** Optional logger for dependency injection (testing) */
  logger?: Logger;
}

type Captured = {
  [C in SidecarCategory]: { category: C; extraction: Extraction<PayloadFor<C>> };
}[SidecarCategory];

interface EntryBase {
  tokenId: string;
  label: string;
  anchor: { path: string; offset: number };
  degraded: boolean;
  warnings: string[];
}

/** Table structure elements; anything else directly inside a table is stray */
const TABLE_SECTIONS: ReadonlySet<string> = new Set(['thead', 'tbody', 'tfoot']);
const TABLE_PARTS: ReadonlySet<string> = new Set(['caption', 'colgroup', 'col', 'tr']);

function capture(element: HtmlElement, category: SidecarCategory, labelMaxLength: number): Captured {
  switch (category) {
    case 'TABLE':
      return { category, extraction: extractTable(element, labelMaxLength) };
    case 'INFOBOX':
      return { category, extraction: extractInfobox(element, labelMaxLength) };
    case 'FORMULA':
      return { category, extraction: extractFormula(element, labelMaxLength) };
  }
}

function toEntry(captured: Captured, base: EntryBase): SidecarEntry {
  switch (captured.category) {
    case 'TABLE':
      return { ...base, category: 'TABLE', payload: captured.extraction.payload };
    case 'INFOBOX':
      return { ...base, category: 'INFOBOX', payload: captured.extraction.payload };
    case 'FORMULA':
      return { ...base, category: 'FORMULA', payload: captured.extraction.payload };
  }
}

/**
 * Content that does not belong to a table's row structure
 */
export function strayTableContent(table: HtmlElement): HtmlNode[] {
  const stray: HtmlNode[] = [];
  for (const child of table.children) {
    if (child.type === 'text') {
      if (child.data.trim()) stray.push(child);
    } else if (TABLE_SECTIONS.has(child.name)) {
      stray.push(...strayTableContent(child));
    } else if (!TABLE_PARTS.has(child.name)) {
      stray.push(child);
    }
  }
  return stray;
}

/**
 * Cut text at the last word boundary within `maxLength`
 */
export function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const cut = text.slice(0, maxLength);
  if (/\s/.test(text.charAt(maxLength))) return cut.trimEnd();
  const boundary = cut.search(/\s\S*$/);
  return (boundary > 0 ? cut.slice(0, boundary) : cut).trimEnd();
}

function stripPlaceholders(text: string): string {
  let out = '';
  let last = 0;
  for (const ref of scanPlaceholders(text)) {
    out += text.slice(last, ref.start);
    last = ref.end;
  }
  out += text.slice(last);
  return out.replace(/[ \t]{2,}/g, ' ').replace(/[ \t]*\n[ \t]*/g, '\n').trim();
}

/**
 * Lead paragraphs: flow text before the first section header
 */
export function buildAbstract(blocks: readonly RenderedBlock[], markdown: string, maxLength: number): string {
  const paragraphs: string[] = [];
  for (const block of blocks) {
    if (block.kind === 'header' && (block.level ?? 1) >= 2) break;
    if (block.kind !== 'paragraph') continue;
    const text = stripPlaceholders(block.text);
    if (text) paragraphs.push(text);
  }
  const abstract = paragraphs.join('\n\n');
  if (!abstract) {
    return truncateAtWord(markdown, Math.min(ABSTRACT_FALLBACK_LENGTH, maxLength));
  }
  return truncateAtWord(abstract, maxLength);
}

export class WikiShredder {
  private readonly config: ShredderConfig;
  private readonly log: Logger;

  /**
   * @throws {ConfigInvalidError} If the options are invalid
   */
  constructor(config: ShredderConfigInput = {}, options: WikiShredderOptions = {}) {
    this.config = validateShredderConfig(config);
    this.log = options.logger ?? getLog();
  }

  getConfig(): Readonly<ShredderConfig> {
    return this.config;
  }

  /**
   * Shred one article
   *
   * @throws {InvariantViolationError} If placeholders and sidecar disagree
   */
  shred(article: ArticleSource): ShreddedDocument {
    const root = parseHtml(article.markup);
    const registry = new TokenRegistry();
    const sink: RenderSink = { images: [], links: [], toc: [], warnings: [] };
    const pending: Array<{ captured: Captured; base: EntryBase }> = [];

    const onHeavy = (element: HtmlElement, category: SidecarCategory): HeavyRendering => {
      const captured = capture(element, category, this.config.labelMaxLength);
      const { extraction } = captured;

      if (
        captured.category === 'TABLE' &&
        !extraction.degraded &&
        !element.unterminated &&
        captured.extraction.payload.rowCount < this.config.minTableRows
      ) {
        return { kind: 'markdown', text: toMarkdownTable(captured.extraction.payload) };
      }

      const token = registry.issue(category, extraction.label);
      const warnings = [...extraction.warnings];
      for (const message of extraction.warnings) {
        sink.warnings.push({ kind: 'EXTRACTION_DEGRADED', message, path: element.path, tokenId: token.tokenId });
      }

      let recovered: HtmlNode[] = [];
      if (element.unterminated) {
        const message = `Unterminated <${element.name}>; extracted best effort`;
        warnings.push(message);
        sink.warnings.push({ kind: 'PARSE_RECOVERABLE', message, path: element.path, tokenId: token.tokenId });
        if (category === 'TABLE') {
          recovered = strayTableContent(element);
        }
      }

      if (category !== 'FORMULA') {
        // Stray content is rendered as flow and records its own images
        const stray = new Set<HtmlNode>(recovered);
        const images = findAll(element, (el) => el.name === 'img' && !stray.has(el), {
          prune: (el) => isRemoved(el) || stray.has(el),
        });
        for (const img of images) {
          const image = describeImage(img, token.tokenId);
          if (image) sink.images.push(image);
        }
      }

      pending.push({
        captured,
        base: {
          tokenId: token.tokenId,
          label: extraction.label,
          anchor: { path: element.path, offset: -1 },
          degraded: extraction.degraded || element.unterminated,
          warnings,
        },
      });

      const block = captured.category !== 'FORMULA' || captured.extraction.payload.display === 'block';
      return { kind: 'placeholder', text: token.placeholder, block, recovered };
    };

    const renderer = new MarkdownRenderer(sink, onHeavy, { tocMaxLevel: this.config.tocMaxLevel });
    const blocks = renderer.render(root);
    const markdown = blocks.map((block) => block.text).join('\n\n');

    const offsets = new Map(
      scanPlaceholders(markdown).map((ref): [string, number] => [ref.tokenId, ref.start])
    );
    registry.verify(
      markdown,
      pending.map(({ captured, base }) => ({ tokenId: base.tokenId, category: captured.category }))
    );
    const sidecar = pending.map(({ captured, base }) =>
      toEntry(captured, {
        ...base,
        anchor: { path: base.anchor.path, offset: offsets.get(base.tokenId) ?? -1 },
      })
    );

    if (sink.warnings.length > 0) {
      this.log.debug('Shredded with warnings', {
        articleId: article.id,
        warnings: sink.warnings.length,
        kinds: [...new Set(sink.warnings.map((w) => w.kind))],
      });
    }

    return {
      articleId: article.id,
      title: article.title,
      markdown,
      sidecar,
      images: sink.images,
      links: sink.links,
      toc: sink.toc,
      abstract: buildAbstract(blocks, markdown, this.config.abstractMaxLength),
      warnings: sink.warnings,
    };
  }
}

/**
 * Shred with a one-off shredder
 */
export function shredArticle(article: ArticleSource, config: ShredderConfigInput = {}): ShreddedDocument {
  return new WikiShredder(config).shred(article);
}
