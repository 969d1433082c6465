/**
 * Tests for the Markdown section tree
 */

import { describe, it, expect } from 'vitest';
import { buildSectionTree, normalizeMarkdown, parseHeader } from '../../src/chunk/section-tree.js';
import type { SectionNode } from '../../src/chunk/types.js';

function outline(node: SectionNode): unknown {
  return {
    title: node.title,
    blocks: node.blocks.map((block) => block.text),
    children: node.children.map(outline),
  };
}

describe('normalizeMarkdown', () => {
  it('should unify line endings and trim the ends', () => {
    expect(normalizeMarkdown('\n\n  \nText\r\nmore  \n\n')).toBe('Text\nmore');
  });
});

describe('parseHeader', () => {
  it('should parse ATX headers', () => {
    expect(parseHeader('## History')).toEqual({ level: 2, title: 'History' });
    expect(parseHeader('### Closing ###')).toEqual({ level: 3, title: 'Closing' });
  });

  it('should unescape header text', () => {
    expect(parseHeader(String.raw`## snake\_case \#1`)).toEqual({ level: 2, title: 'snake_case #1' });
  });

  it('should reject lines that are not headers', () => {
    expect(parseHeader('#NoSpace')).toBeNull();
    expect(parseHeader('####### Seven')).toBeNull();
    expect(parseHeader(String.raw`\# escaped`)).toBeNull();
  });
});

describe('buildSectionTree', () => {
  const markdown = [
    '# Title',
    'Lead para.',
    '## A',
    'Text a.',
    '### A1',
    'Text a1.',
    '## B',
    '```\n# not a header\n\n```',
    'Text b.',
  ].join('\n\n');

  it('should nest sections by header level', () => {
    const { root } = buildSectionTree(markdown);

    expect(outline(root)).toEqual({
      title: '',
      blocks: [],
      children: [
        {
          title: 'Title',
          blocks: ['Lead para.'],
          children: [
            { title: 'A', blocks: ['Text a.'], children: [{ title: 'A1', blocks: ['Text a1.'], children: [] }] },
            { title: 'B', blocks: ['```\n# not a header\n\n```', 'Text b.'], children: [] },
          ],
        },
      ],
    });
  });

  it('should record section paths', () => {
    const { root } = buildSectionTree(markdown);
    const a1 = root.children[0]?.children[0]?.children[0];

    expect(a1?.path).toEqual(['Title', 'A', 'A1']);
  });

  it('should keep the separators between blocks', () => {
    const { blocks, text } = buildSectionTree(markdown);

    expect(blocks[0]).toEqual({ text: '# Title', separator: '', start: 0, end: 7 });
    expect(blocks[1]?.separator).toBe('\n\n');
    expect(blocks.map((block) => `${block.separator}${block.text}`).join('')).toBe(text);
  });

  it('should attach a deeper header to the nearest shallower one', () => {
    const { root } = buildSectionTree('## A\n\n#### Deep\n\n### C');

    expect(outline(root)).toEqual({
      title: '',
      blocks: [],
      children: [
        {
          title: 'A',
          blocks: [],
          children: [
            { title: 'Deep', blocks: [], children: [] },
            { title: 'C', blocks: [], children: [] },
          ],
        },
      ],
    });
  });

  it('should put text before the first header in the root', () => {
    const { root } = buildSectionTree('Lead.\n\n## A\n\nBody.');

    expect(root.blocks.map((block) => block.text)).toEqual(['Lead.']);
    expect(root.path).toEqual([]);
  });

  it('should handle empty input', () => {
    const tree = buildSectionTree('  \n\n');

    expect(tree.text).toBe('');
    expect(tree.blocks).toEqual([]);
    expect(tree.root.children).toEqual([]);
  });
});
