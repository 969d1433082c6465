/**
 * Section tree
 *
 * ATX headers outside fenced code build a strict hierarchy: a level-L header
 * attaches to the nearest open header of a lower level. Everything else is
 * split into blank-line separated blocks belonging to the innermost section.
 */

import { unescapeMarkdown } from '../shred/escape.js';
import type { SectionNode, TextBlock } from './types.js';

const HEADER = /^ {0,3}(#{1,6})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE = /^ {0,3}(`{3,}|~{3,})/;

interface RawBlock {
  start: number;
  end: number;
  header?: { level: number; title: string };
}

export interface SectionTree {
  readonly root: SectionNode;
  /** The Markdown the offsets refer to */
  readonly text: string;
  readonly blocks: readonly TextBlock[];
}

/**
 * Line endings unified, leading blank lines and trailing whitespace removed
 */
export function normalizeMarkdown(markdown: string): string {
  return markdown.replace(/\r\n?/g, '\n').replace(/^(?:[ \t]*\n)+/, '').trimEnd();
}

export function parseHeader(line: string): { level: number; title: string } | null {
  const match = HEADER.exec(line);
  const hashes = match?.[1];
  const title = match?.[2];
  if (!hashes || title === undefined) return null;
  return { level: hashes.length, title: unescapeMarkdown(title.trim()) };
}

function scanBlocks(text: string): RawBlock[] {
  const blocks: RawBlock[] = [];
  let current: RawBlock | null = null;
  let fence: { char: string; length: number } | null = null;
  let pos = 0;

  const close = (): void => {
    if (current) blocks.push(current);
    current = null;
  };

  for (const line of text.split('\n')) {
    const start = pos;
    const end = pos + line.length;
    pos = end + 1;

    if (fence) {
      if (current) current.end = end;
      const closing = FENCE.exec(line)?.[1];
      if (closing && closing[0] === fence.char && closing.length >= fence.length && line.trim() === closing) {
        fence = null;
      }
      continue;
    }

    if (line.trim() === '') {
      close();
      continue;
    }

    const opening = FENCE.exec(line)?.[1];
    if (opening) {
      fence = { char: opening.charAt(0), length: opening.length };
    } else {
      const header = parseHeader(line);
      if (header) {
        close();
        blocks.push({ start, end, header });
        continue;
      }
    }

    if (current) {
      current.end = end;
    } else {
      current = { start, end };
    }
  }
  close();
  return blocks;
}

/**
 * Build the section tree of a Markdown document
 */
export function buildSectionTree(markdown: string): SectionTree {
  const text = normalizeMarkdown(markdown);
  const root: SectionNode = { level: 0, title: '', path: [], heading: null, blocks: [], children: [] };
  const stack: SectionNode[] = [root];
  const blocks: TextBlock[] = [];
  let previousEnd = 0;

  for (const raw of scanBlocks(text)) {
    const block: TextBlock = {
      text: text.slice(raw.start, raw.end),
      separator: text.slice(previousEnd, raw.start),
      start: raw.start,
      end: raw.end,
    };
    previousEnd = raw.end;
    blocks.push(block);

    if (!raw.header) {
      const owner = stack.at(-1) ?? root;
      owner.blocks.push(block);
      continue;
    }

    const { level, title } = raw.header;
    while (stack.length > 1 && (stack.at(-1)?.level ?? 0) >= level) {
      stack.pop();
    }
    const parent = stack.at(-1) ?? root;
    const node: SectionNode = {
      level,
      title,
      path: [...parent.path, title],
      heading: block,
      blocks: [],
      children: [],
    };
    parent.children.push(node);
    stack.push(node);
  }

  return { root, text, blocks };
}
