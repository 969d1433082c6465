/**
 * Flow elements → Markdown blocks
 *
 * The renderer walks the tree once in document order. Heavy elements are
 * handed to a callback that returns their placeholder; everything else is
 * rendered here. Blocks never contain blank lines outside fenced code, so a
 * blank line in the output always separates two blocks.
 */

import { PLACEHOLDER_PATTERN, type SidecarCategory } from '../lib/tokens.js';
import { classifyElement } from './classify.js';
import {
  codeBlock,
  codeSpan,
  encodeDestination,
  escapeHeaderText,
  escapeLineStarts,
  escapeMarkdown,
  imageDestination,
  wrapInline,
} from './escape.js';
import { getAttribute, rawText, type HtmlElement, type HtmlNode } from './html-tree.js';
import { describeImage, resolveHref } from './links.js';
import { textOf } from './text.js';
import type { ImageLocator, ShredWarning, TocEntry, WikiLink } from './types.js';

export type BlockKind =
  | 'paragraph'
  | 'header'
  | 'placeholder'
  | 'list'
  | 'quote'
  | 'code'
  | 'rule'
  | 'table';

export interface RenderedBlock {
  readonly kind: BlockKind;
  readonly text: string;
  /** Header level */
  readonly level?: number;
}

/** How the shredder replaced a heavy element */
export type HeavyRendering =
  | {
      kind: 'placeholder';
      text: string;
      /** Own block, or inline within the surrounding paragraph */
      block: boolean;
      /** Stray content to render as flow after the placeholder */
      recovered: readonly HtmlNode[];
    }
  | { kind: 'markdown'; text: string };

export type HeavyHandler = (element: HtmlElement, category: SidecarCategory) => HeavyRendering;

/** Records collected while rendering */
export interface RenderSink {
  readonly images: ImageLocator[];
  readonly links: WikiLink[];
  readonly toc: TocEntry[];
  readonly warnings: ShredWarning[];
}

export interface MarkdownRendererOptions {
  /** Deepest header level recorded in the table of contents */
  tocMaxLevel: number;
}

type WriterItem =
  | { kind: 'inline'; text: string }
  | { kind: 'break' }
  | { kind: 'block'; block: RenderedBlock };

/**
 * Normalize a paragraph: single spaces, trimmed lines, no empty lines
 */
function normalizeParagraph(text: string): string {
  const lines = text
    .split('\n')
    .map((line) => line.replace(/ {2,}/g, ' ').trim())
    .filter((line) => line.length > 0);
  return escapeLineStarts(lines.join('\n'));
}

/**
 * Collects inline Markdown and blocks in document order
 */
export class BlockWriter {
  private readonly items: WriterItem[] = [];

  inline(text: string): void {
    if (text) this.items.push({ kind: 'inline', text });
  }

  paragraphBreak(): void {
    this.items.push({ kind: 'break' });
  }

  block(block: RenderedBlock): void {
    if (block.text) this.items.push({ kind: 'block', block });
  }

  absorb(other: BlockWriter): void {
    this.items.push(...other.items);
  }

  isInlineOnly(): boolean {
    return this.items.every((item) => item.kind === 'inline');
  }

  inlineText(): string {
    return this.items.map((item) => (item.kind === 'inline' ? item.text : '')).join('');
  }

  blocks(): RenderedBlock[] {
    const out: RenderedBlock[] = [];
    let parts: string[] = [];
    const flush = (): void => {
      const text = normalizeParagraph(parts.join(''));
      if (text) {
        out.push({ kind: PLACEHOLDER_PATTERN.test(text) ? 'placeholder' : 'paragraph', text });
      }
      parts = [];
    };
    for (const item of this.items) {
      if (item.kind === 'inline') {
        parts.push(item.text);
      } else {
        flush();
        if (item.kind === 'block') out.push(item.block);
      }
    }
    flush();
    return out;
  }
}

const HEADER_LEVELS: ReadonlyMap<string, number> = new Map([
  ['h1', 1],
  ['h2', 2],
  ['h3', 3],
  ['h4', 4],
  ['h5', 5],
  ['h6', 6],
]);

/** Elements rendered as paragraph boundaries around their content */
const CONTAINERS: ReadonlySet<string> = new Set([
  '#root',
  'html',
  'body',
  'p',
  'div',
  'section',
  'article',
  'main',
  'header',
  'footer',
  'nav',
  'aside',
  'figure',
  'figcaption',
  'center',
  'address',
  'details',
  'summary',
  'form',
  'fieldset',
  'dl',
  'dd',
  'li',
  'tr',
  'td',
  'th',
  'caption',
  'ul',
  'ol',
  'blockquote',
  'pre',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
]);

const CODE_ELEMENTS: ReadonlySet<string> = new Set(['code', 'tt', 'kbd', 'samp']);

function parseStart(value: string | undefined): number {
  const start = value === undefined ? Number.NaN : Number.parseInt(value, 10);
  return Number.isInteger(start) ? start : 1;
}

function indentContinuation(text: string, first: string): string[] {
  const [head = '', ...rest] = text.split('\n');
  return [`${first}${head}`, ...rest.map((line) => (line ? `  ${line}` : ''))];
}

export class MarkdownRenderer {
  constructor(
    private readonly sink: RenderSink,
    private readonly onHeavy: HeavyHandler,
    private readonly options: MarkdownRendererOptions
  ) {}

  /**
   * Render a whole document
   */
  render(root: HtmlElement): RenderedBlock[] {
    const writer = new BlockWriter();
    this.renderChildren(root, writer);
    return writer.blocks();
  }

  renderNodes(nodes: readonly HtmlNode[], writer: BlockWriter): void {
    for (const node of nodes) {
      this.renderNode(node, writer);
    }
  }

  private renderChildren(element: HtmlElement, writer: BlockWriter): void {
    this.renderNodes(element.children, writer);
  }

  private renderNode(node: HtmlNode, writer: BlockWriter): void {
    if (node.type === 'text') {
      writer.inline(escapeMarkdown(node.data.replace(/\s+/g, ' ')));
      return;
    }

    const elementClass = classifyElement(node);
    switch (elementClass) {
      case 'removed':
        return;
      case 'flow':
        if (node.unterminated) {
          this.renderUnterminated(node, writer);
        } else {
          this.renderFlow(node, writer);
        }
        return;
      default:
        this.renderHeavy(node, elementClass, writer);
    }
  }

  private renderHeavy(element: HtmlElement, category: SidecarCategory, writer: BlockWriter): void {
    const rendering = this.onHeavy(element, category);
    if (rendering.kind === 'markdown') {
      writer.block({ kind: 'table', text: rendering.text });
      return;
    }
    if (rendering.block) {
      writer.block({ kind: 'placeholder', text: rendering.text });
    } else {
      writer.inline(rendering.text);
    }
    if (rendering.recovered.length > 0) {
      writer.paragraphBreak();
      this.renderNodes(rendering.recovered, writer);
      writer.paragraphBreak();
    }
  }

  /**
   * Unterminated flow element: keep its content, drop its formatting
   */
  private renderUnterminated(element: HtmlElement, writer: BlockWriter): void {
    this.sink.warnings.push({
      kind: 'PARSE_RECOVERABLE',
      message: `Unterminated <${element.name}> rendered as plain flow`,
      path: element.path,
    });
    const boundary = CONTAINERS.has(element.name);
    if (boundary) writer.paragraphBreak();
    this.renderChildren(element, writer);
    if (boundary) writer.paragraphBreak();
  }

  private renderFlow(element: HtmlElement, writer: BlockWriter): void {
    const level = HEADER_LEVELS.get(element.name);
    if (level !== undefined) {
      this.renderHeader(element, level, writer);
      return;
    }

    switch (element.name) {
      case 'ul':
      case 'ol':
        this.renderList(element, writer);
        return;
      case 'blockquote':
        this.renderQuote(element, writer);
        return;
      case 'pre':
        this.renderPre(element, writer);
        return;
      case 'hr':
        writer.block({ kind: 'rule', text: '---' });
        return;
      case 'br':
        writer.inline('\n');
        return;
      case 'dt':
        this.renderTerm(element, writer);
        return;
      case 'b':
      case 'strong':
        this.renderWrapped(element, writer, '**');
        return;
      case 'i':
      case 'em':
        this.renderWrapped(element, writer, '*');
        return;
      case 'a':
        this.renderLink(element, writer);
        return;
      case 'img':
        this.renderImage(element, writer);
        return;
    }

    if (CODE_ELEMENTS.has(element.name)) {
      writer.inline(codeSpan(rawText(element).replace(/\s+/g, ' ').trim()));
      return;
    }

    if (CONTAINERS.has(element.name)) {
      writer.paragraphBreak();
      this.renderChildren(element, writer);
      writer.paragraphBreak();
      return;
    }

    this.renderChildren(element, writer);
  }

  /**
   * Headers are plain text. A formula inside one stays inline as `$tex$` and
   * gets no token, so section paths and the table of contents never hold a
   * placeholder.
   */
  private renderHeader(element: HtmlElement, level: number, writer: BlockWriter): void {
    const title = textOf(element);
    if (!title) return;
    writer.block({ kind: 'header', level, text: `${'#'.repeat(level)} ${escapeHeaderText(title)}` });
    if (level >= 2 && level <= this.options.tocMaxLevel) {
      this.sink.toc.push({ level, title });
    }
  }

  private renderList(element: HtmlElement, writer: BlockWriter): void {
    const ordered = element.name === 'ol';
    let ordinal = ordered ? parseStart(getAttribute(element, 'start')) : 1;
    const lines: string[] = [];

    for (const child of element.children) {
      if (child.type === 'text' && !child.data.trim()) continue;
      const sub = new BlockWriter();
      if (child.type === 'element' && child.name === 'li') {
        this.renderChildren(child, sub);
      } else {
        this.renderNode(child, sub);
      }
      const text = sub
        .blocks()
        .map((block) => block.text)
        .join('\n');
      if (!text) continue;
      const marker = ordered ? `${ordinal}. ` : '- ';
      ordinal++;
      lines.push(...indentContinuation(text, marker));
    }

    writer.block({ kind: 'list', text: lines.join('\n') });
  }

  private renderQuote(element: HtmlElement, writer: BlockWriter): void {
    const sub = new BlockWriter();
    this.renderChildren(element, sub);
    const lines: string[] = [];
    sub.blocks().forEach((block, i) => {
      if (i > 0) lines.push('>');
      for (const line of block.text.split('\n')) {
        lines.push(line ? `> ${line}` : '>');
      }
    });
    writer.block({ kind: 'quote', text: lines.join('\n') });
  }

  private renderPre(element: HtmlElement, writer: BlockWriter): void {
    const code = rawText(element).replace(/^\r?\n/, '').replace(/\s+$/, '');
    if (!code.trim()) return;
    writer.block({ kind: 'code', text: codeBlock(code) });
  }

  private renderTerm(element: HtmlElement, writer: BlockWriter): void {
    const sub = new BlockWriter();
    this.renderChildren(element, sub);
    if (!sub.isInlineOnly()) {
      writer.paragraphBreak();
      writer.absorb(sub);
      writer.paragraphBreak();
      return;
    }
    const text = normalizeParagraph(sub.inlineText());
    writer.block({ kind: 'paragraph', text: wrapInline(text, '**') });
  }

  private renderWrapped(element: HtmlElement, writer: BlockWriter, marker: string): void {
    const sub = new BlockWriter();
    this.renderChildren(element, sub);
    if (!sub.isInlineOnly()) {
      writer.absorb(sub);
      return;
    }
    const text = sub.inlineText();
    writer.inline(PLACEHOLDER_PATTERN.test(text.trim()) ? text : wrapInline(text, marker));
  }

  private renderLink(element: HtmlElement, writer: BlockWriter): void {
    const meaningful = element.children.filter((c) => c.type === 'element' || c.data.trim() !== '');
    const only = meaningful.length === 1 ? meaningful[0] : undefined;
    if (only?.type === 'element' && only.name === 'img') {
      this.renderImage(only, writer);
      return;
    }

    const sub = new BlockWriter();
    this.renderChildren(element, sub);
    if (!sub.isInlineOnly()) {
      writer.absorb(sub);
      return;
    }

    const inner = sub.inlineText();
    const href = resolveHref(getAttribute(element, 'href'));
    if (href.kind === 'text' || !inner.trim()) {
      writer.inline(inner);
      return;
    }

    let destination: string;
    if (href.kind === 'internal') {
      this.sink.links.push({ target: href.target, text: textOf(element) });
      destination = encodeDestination(href.target);
    } else {
      destination = encodeDestination(href.url);
    }
    const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(inner);
    const lead = match?.[1] ?? '';
    const core = match?.[2] ?? inner;
    const trail = match?.[3] ?? '';
    writer.inline(`${lead}[${core}](${destination})${trail}`);
  }

  private renderImage(element: HtmlElement, writer: BlockWriter): void {
    const image = describeImage(element);
    if (!image) return;
    this.sink.images.push(image);
    writer.inline(`![${escapeMarkdown(image.alt)}](${imageDestination(image.locator)})`);
  }
}
