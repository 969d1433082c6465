/**
 * Tests for the universal chunker
 */

import { describe, it, expect } from 'vitest';
import { UniversalChunker, chunkMarkdown, reassembleChunks } from '../../src/chunk/chunker.js';
import { normalizeMarkdown } from '../../src/chunk/section-tree.js';
import { ConfigInvalidError } from '../../src/lib/errors.js';
import { chunkId } from '../../src/lib/ids.js';
import { createQuietLogger, sentence } from '../helpers.js';

const P1 = 'aaaa bbbb cccc dddd.';
const P2 = 'eeee ffff gggg hhhh.';
const P3 = 'iiii jjjj kkkk llll.';
const P4 = 'mmmm nnnn oooo pppp.';

const TABLE_TOKEN = '**[<<TABLE: TBL_1 | Population figures>>]**';

function chunker(config: ConstructorParameters<typeof UniversalChunker>[0]): UniversalChunker {
  return new UniversalChunker(config, { logger: createQuietLogger() });
}

describe('UniversalChunker', () => {
  describe('configuration', () => {
    it('should fill in defaults', () => {
      expect(chunker({}).getConfig()).toEqual({
        minChunkSize: 200,
        targetChunkSize: 500,
        maxChunkSize: 800,
        overlapSize: 50,
      });
    });

    it('should reject inconsistent thresholds before any work', () => {
      expect(() => chunker({ targetChunkSize: 500, overlapSize: 500 })).toThrow(ConfigInvalidError);
      expect(() => chunker({ targetChunkSize: 900 })).toThrow(ConfigInvalidError);
      expect(() => chunker({ minChunkSize: 600 })).toThrow(ConfigInvalidError);
    });
  });

  describe('sections', () => {
    const config = { minChunkSize: 10, targetChunkSize: 30, maxChunkSize: 60, overlapSize: 5 };
    const markdown = 'Lead text here.\n\n## A\n\nAlpha section body.\n\n## B\n\nBeta section body.';

    it('should emit one chunk per section that fits', () => {
      const chunks = chunker(config).chunk('Paris', markdown);

      expect(chunks.map((chunk) => ({ path: chunk.sectionPath, text: chunk.text, kind: chunk.kind }))).toEqual([
        { path: [], text: 'Lead text here.', kind: 'section' },
        { path: ['A'], text: '## A\n\nAlpha section body.', kind: 'section' },
        { path: ['B'], text: '## B\n\nBeta section body.', kind: 'section' },
      ]);
    });

    it('should number chunks and derive stable ids', () => {
      const chunks = chunker(config).chunk('Paris', markdown);

      expect(chunks.map((chunk) => chunk.index)).toEqual([0, 1, 2]);
      expect(chunks.map((chunk) => chunk.sequence)).toEqual([0, 0, 0]);
      expect(chunks.map((chunk) => chunk.id)).toEqual([
        chunkId('Paris', [], 0),
        chunkId('Paris', ['A'], 0),
        chunkId('Paris', ['B'], 0),
      ]);
      expect(chunks.every((chunk) => chunk.articleId === 'Paris')).toBe(true);
    });

    it('should record separators and sizes', () => {
      const chunks = chunker(config).chunk('Paris', markdown);

      expect(chunks.map((chunk) => chunk.separator)).toEqual(['', '\n\n', '\n\n']);
      expect(chunks.map((chunk) => chunk.size)).toEqual([15, 25, 24]);
      expect(chunks.map((chunk) => chunk.overlapLength)).toEqual([0, 0, 0]);
    });

    it('should reassemble to the input', () => {
      expect(reassembleChunks(chunker(config).chunk('Paris', markdown))).toBe(markdown);
    });

    it('should fold small sibling sections together', () => {
      const chunks = chunker({ minChunkSize: 20, targetChunkSize: 30, maxChunkSize: 60, overlapSize: 5 }).chunk(
        'Paris',
        '## A\n\nTiny.\n\n## B\n\nAlso tiny.\n\n## C\n\nThis section is long enough.'
      );

      expect(chunks.map((chunk) => ({ path: chunk.sectionPath, text: chunk.text, kind: chunk.kind }))).toEqual([
        { path: ['A'], text: '## A\n\nTiny.\n\n## B\n\nAlso tiny.', kind: 'merged' },
        { path: ['C'], text: '## C\n\nThis section is long enough.', kind: 'section' },
      ]);
    });

    it('should keep ids distinct for sections sharing a title', () => {
      const chunks = chunker({ minChunkSize: 0, targetChunkSize: 30, maxChunkSize: 60, overlapSize: 0 }).chunk(
        'Paris',
        '## Notes\n\nFirst notes section.\n\n## Notes\n\nSecond notes section.'
      );

      expect(chunks.map((chunk) => chunk.id)).toEqual([
        chunkId('Paris', ['Notes'], 0, 0),
        chunkId('Paris', ['Notes'], 0, 1),
      ]);
    });
  });

  describe('splitting', () => {
    const config = { minChunkSize: 10, targetChunkSize: 30, maxChunkSize: 60, overlapSize: 5 };
    const markdown = ['## S', P1, P2, P3, P4].join('\n\n');

    it('should split a large section into overlapping windows', () => {
      const chunks = chunker(config).chunk('Paris', markdown);

      expect(chunks.map((chunk) => chunk.text)).toEqual([
        `## S\n\n${P1}`,
        `dddd.\n\n${P2}`,
        `hhhh.\n\n${P3}\n\n${P4}`,
      ]);
      expect(chunks.map((chunk) => chunk.kind)).toEqual(['split', 'split', 'split']);
      expect(chunks.map((chunk) => chunk.sequence)).toEqual([0, 1, 2]);
      expect(chunks.map((chunk) => chunk.overlapLength)).toEqual([0, 7, 7]);
      expect(chunks.map((chunk) => chunk.sectionPath)).toEqual([['S'], ['S'], ['S']]);
    });

    it('should reassemble split windows to the input', () => {
      expect(reassembleChunks(chunker(config).chunk('Paris', markdown))).toBe(markdown);
    });

    it('should not leave a remainder below the minimum', () => {
      const chunks = chunker({ minChunkSize: 10, targetChunkSize: 45, maxChunkSize: 45, overlapSize: 0 }).chunk(
        'Paris',
        `${P1}\n\n${P2}\n\nab.`
      );

      expect(chunks.map((chunk) => chunk.text)).toEqual([P1, `${P2}\n\nab.`]);
    });

    it('should cut a single long word by characters', () => {
      const chunks = chunker({ minChunkSize: 1, targetChunkSize: 5, maxChunkSize: 10, overlapSize: 0 }).chunk(
        'Paris',
        'abcdefghijklmnopqrstuvwxy'
      );

      expect(chunks.map((chunk) => chunk.text)).toEqual(['abcdefghij', 'klmnopqrst', 'uvwxy']);
      expect(chunks.map((chunk) => chunk.separator)).toEqual(['', '', '']);
    });

    it('should measure with a custom size function', () => {
      const words = (text: string): number => text.split(/\s+/).filter((word) => word.length > 0).length;
      const custom = new UniversalChunker(
        { minChunkSize: 1, targetChunkSize: 3, maxChunkSize: 4, overlapSize: 0 },
        { measure: words, logger: createQuietLogger() }
      );
      const chunks = custom.chunk('Paris', 'one two three four five six');

      expect(chunks.map((chunk) => chunk.text)).toEqual(['one two three', 'four five six']);
      expect(chunks.map((chunk) => chunk.size)).toEqual([3, 3]);
      expect(chunks.map((chunk) => chunk.separator)).toEqual(['', ' ']);
    });
  });

  describe('placeholders', () => {
    const markdown = `Intro words here.\n\n${TABLE_TOKEN}\n\nAfter the table.`;

    it('should give an oversized placeholder a chunk of its own', () => {
      const chunks = chunker({ minChunkSize: 5, targetChunkSize: 20, maxChunkSize: 30, overlapSize: 0 }).chunk(
        'Paris',
        markdown
      );

      expect(chunks.map((chunk) => ({ text: chunk.text, kind: chunk.kind, tokens: chunk.tokens }))).toEqual([
        { text: 'Intro words here.', kind: 'split', tokens: [] },
        { text: TABLE_TOKEN, kind: 'token', tokens: ['TBL_1'] },
        { text: 'After the table.', kind: 'split', tokens: [] },
      ]);
      expect(chunks[1]?.size).toBe(43);
    });

    it('should not start an overlap inside a placeholder', () => {
      const chunks = chunker({ minChunkSize: 5, targetChunkSize: 20, maxChunkSize: 30, overlapSize: 5 }).chunk(
        'Paris',
        markdown
      );

      expect(chunks[2]).toMatchObject({ text: 'After the table.', overlapLength: 0, separator: '\n\n' });
      expect(reassembleChunks(chunks)).toBe(markdown);
    });

    it('should list the placeholders of a chunk', () => {
      const chunks = chunkMarkdown('Paris', `Intro ${TABLE_TOKEN} and **[<<FORMULA: MATH_1 | x>>]**.`);

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.tokens).toEqual(['TBL_1', 'MATH_1']);
    });
  });

  describe('placeholder under a nested header', () => {
    const markdown = '# Intro\n\nShort para.\n\n## GDP\n\n**[<<TABLE: TBL_1 | GDP Data>>]**\n\nMore economics text...';
    const config = { minChunkSize: 10, targetChunkSize: 30, maxChunkSize: 60, overlapSize: 5 };

    it('should follow the section tree and keep the table whole', () => {
      const chunks = chunker(config).chunk('Economy', markdown);

      expect(
        chunks.map((chunk) => ({ path: chunk.sectionPath, text: chunk.text, kind: chunk.kind, tokens: chunk.tokens }))
      ).toEqual([
        { path: ['Intro'], text: '# Intro\n\nShort para.', kind: 'section', tokens: [] },
        {
          path: ['Intro', 'GDP'],
          text: '## GDP\n\n**[<<TABLE: TBL_1 | GDP Data>>]**',
          kind: 'split',
          tokens: ['TBL_1'],
        },
        { path: ['Intro', 'GDP'], text: 'More economics text...', kind: 'split', tokens: [] },
      ]);
    });

    it('should reassemble to the input', () => {
      expect(reassembleChunks(chunker(config).chunk('Economy', markdown))).toBe(markdown);
    });
  });

  describe('default thresholds', () => {
    const markdown = [
      '# Article',
      sentence(80, 'a'),
      '## History',
      sentence(70, 'b'),
      sentence(70, 'c'),
      sentence(70, 'd'),
      '### Early',
      sentence(20, 'e'),
      '## Geography',
      sentence(100, 'g'),
      '## See also',
      '- One\n- Two',
    ].join('\n\n');

    it('should keep every chunk between the minimum and maximum size', () => {
      const chunks = chunker({}).chunk('Article', markdown);

      expect(chunks.map((chunk) => chunk.kind)).toEqual(['section', 'split', 'split', 'merged']);
      for (const chunk of chunks.filter((c) => c.kind !== 'token')) {
        expect(chunk.size).toBeGreaterThanOrEqual(200);
        expect(chunk.size).toBeLessThanOrEqual(800);
      }
      expect(reassembleChunks(chunks)).toBe(markdown);
    });

    it('should fold small sections into their neighbours', () => {
      const chunks = chunker({}).chunk('Article', markdown);

      expect(chunks.map((chunk) => chunk.sectionPath)).toEqual([
        ['Article'],
        ['Article', 'History'],
        ['Article', 'History'],
        ['Article', 'Geography'],
      ]);
      expect(chunks[2]?.text.endsWith(sentence(20, 'e'))).toBe(true);
      expect(chunks[3]?.text.endsWith('## See also\n\n- One\n- Two')).toBe(true);
    });
  });

  describe('whole articles', () => {
    const config = { minChunkSize: 50, targetChunkSize: 120, maxChunkSize: 200, overlapSize: 20 };
    const markdown = [
      '# Article',
      sentence(30, 'lead'),
      '## History',
      sentence(12, 'h'),
      `${sentence(40, 'early')} ${sentence(25, 'late')}`,
      '### Modern era',
      sentence(8, 'm'),
      '## Geography',
      `Terrain ${TABLE_TOKEN} covers ${sentence(20, 'g')}`,
      sentence(50, 'climate'),
      '## See also',
      '- One\n- Two',
    ].join('\n\n');

    it('should cover the article exactly once', () => {
      const chunks = chunker(config).chunk('Article', markdown);

      expect(reassembleChunks(chunks)).toBe(normalizeMarkdown(markdown));
    });

    it('should stay within the maximum size', () => {
      const chunks = chunker(config).chunk('Article', markdown);

      for (const chunk of chunks) {
        expect(chunk.size).toBeLessThanOrEqual(200);
      }
    });

    it('should keep every placeholder whole', () => {
      const chunks = chunker(config).chunk('Article', markdown);
      const tokens = chunks.flatMap((chunk) => chunk.tokens);

      expect(tokens).toContain('TBL_1');
      expect(chunks.filter((chunk) => chunk.text.includes(TABLE_TOKEN)).length).toBeGreaterThanOrEqual(1);
    });

    it('should be deterministic', () => {
      expect(chunker(config).chunk('Article', markdown)).toEqual(chunker(config).chunk('Article', markdown));
    });

    it('should give unique ids and consecutive indexes', () => {
      const chunks = chunker(config).chunk('Article', markdown);

      expect(new Set(chunks.map((chunk) => chunk.id)).size).toBe(chunks.length);
      expect(chunks.map((chunk) => chunk.index)).toEqual(chunks.map((_, i) => i));
    });
  });

  it('should return no chunks for empty input', () => {
    expect(chunkMarkdown('Paris', '')).toEqual([]);
    expect(chunkMarkdown('Paris', ' \n\n \n')).toEqual([]);
  });
});
