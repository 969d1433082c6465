/**
 * Tests for table extraction
 */

import { describe, it, expect } from 'vitest';
import { buildGrid, extractTable, parseSpan, toCsv, toMarkdownTable } from '../../src/shred/tables.js';
import { parseFirst } from '../helpers.js';

describe('parseSpan', () => {
  it('should accept positive integers', () => {
    expect(parseSpan('2')).toBe(2);
    expect(parseSpan(' 3 ')).toBe(3);
  });

  it('should treat anything else as 1', () => {
    expect(parseSpan(undefined)).toBe(1);
    expect(parseSpan('abc')).toBe(1);
    expect(parseSpan('0')).toBe(1);
    expect(parseSpan('-2')).toBe(1);
  });

  it('should cap very large spans', () => {
    expect(parseSpan('5000')).toBe(1000);
  });
});

describe('buildGrid', () => {
  it('should expand rowspan and colspan', () => {
    const table = parseFirst(
      '<table>' +
        '<tr><th>A</th><th>B</th><th>C</th></tr>' +
        '<tr><td rowspan="2">1</td><td colspan="2">2</td></tr>' +
        '<tr><td>3</td><td>4</td></tr>' +
        '</table>',
      'table'
    );

    expect(buildGrid(table)).toEqual({
      rows: [
        ['A', 'B', 'C'],
        ['1', '2', '2'],
        ['1', '3', '4'],
      ],
      header: true,
      columnCount: 3,
    });
  });

  it('should pad short rows', () => {
    const table = parseFirst('<table><tr><td>a</td><td>b</td></tr><tr><td>c</td></tr></table>', 'table');

    expect(buildGrid(table).rows).toEqual([
      ['a', 'b'],
      ['c', ''],
    ]);
  });

  it('should skip hidden and empty rows', () => {
    const table = parseFirst(
      '<table><tr><td>a</td></tr><tr style="display: none"><td>h</td></tr><tr><td> </td></tr></table>',
      'table'
    );

    expect(buildGrid(table).rows).toEqual([['a']]);
  });

  it('should leave rows of nested tables out', () => {
    const table = parseFirst(
      '<table><tr><td>outer<table><tr><td>inner</td></tr></table></td></tr></table>',
      'table'
    );

    expect(buildGrid(table).rows).toEqual([['outer inner']]);
  });
});

describe('toCsv', () => {
  it('should quote only fields that need it', () => {
    expect(
      toCsv([
        ['a,b', 'say "hi"', 'plain'],
        ['line\nbreak', '', 'x'],
      ])
    ).toBe('"a,b","say ""hi""",plain\n"line\nbreak",,x\n');
  });
});

describe('toMarkdownTable', () => {
  it('should render the header and escape pipes', () => {
    const markdown = toMarkdownTable({
      caption: null,
      header: ['Name', 'Note'],
      rows: [['x', 'a|b']],
      csv: '',
      rowCount: 1,
      columnCount: 2,
    });

    expect(markdown).toBe('| Name | Note |\n| --- | --- |\n| x | a\\|b |');
  });

  it('should use the first row when there is no header', () => {
    const markdown = toMarkdownTable({
      caption: null,
      header: null,
      rows: [['1', '2'], ['3', '4']],
      csv: '',
      rowCount: 2,
      columnCount: 2,
    });

    expect(markdown).toBe('| 1 | 2 |\n| --- | --- |\n| 3 | 4 |');
  });
});

describe('extractTable', () => {
  it('should capture caption, header, rows and CSV', () => {
    const table = parseFirst(
      '<table><caption>GDP by year</caption>' +
        '<tr><th>Year</th><th>GDP</th></tr>' +
        '<tr><td>2020</td><td>100</td></tr>' +
        '<tr><td>2021</td><td>110</td></tr></table>',
      'table'
    );

    expect(extractTable(table, 60)).toEqual({
      payload: {
        caption: 'GDP by year',
        header: ['Year', 'GDP'],
        rows: [
          ['2020', '100'],
          ['2021', '110'],
        ],
        csv: 'Year,GDP\n2020,100\n2021,110\n',
        rowCount: 2,
        columnCount: 2,
      },
      label: 'GDP by year',
      degraded: false,
      warnings: [],
    });
  });

  it('should fall back to the default label', () => {
    const table = parseFirst('<table><tr><td>x</td></tr></table>', 'table');

    expect(extractTable(table, 60).label).toBe('Data Table');
  });

  it('should keep the text of a table without rows as one cell', () => {
    const table = parseFirst('<table><caption>Empty</caption></table>', 'table');
    const extraction = extractTable(table, 60);

    expect(extraction.degraded).toBe(true);
    expect(extraction.payload.rows).toEqual([['Empty']]);
    expect(extraction.warnings).toEqual(['Table has no rows; kept its text as a single cell']);
  });
});
