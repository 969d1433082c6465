/**
 * Table extraction
 *
 * Builds a rectangular grid from `<tr>`/`<td>`/`<th>`, honouring rowspan and
 * colspan, and renders it as CSV or as a Markdown table.
 */

import { MAX_CELL_SPAN } from '../lib/constants.js';
import { DEFAULT_LABELS, sanitizeLabel } from '../lib/tokens.js';
import { escapeMarkdown } from './escape.js';
import { childElements, findAll, getAttribute, type HtmlElement } from './html-tree.js';
import { textOf } from './text.js';
import type { Extraction, TablePayload } from './types.js';

interface GridCell {
  text: string;
  header: boolean;
}

/** Rectangular cell matrix; `header` is true when the first row is all `<th>` */
export interface TableGrid {
  rows: string[][];
  header: boolean;
  columnCount: number;
}

const HIDDEN_STYLE = /display\s*:\s*none/i;

function isCell(el: HtmlElement): boolean {
  return el.name === 'td' || el.name === 'th';
}

/**
 * Parse a span attribute; anything but a positive integer counts as 1
 */
export function parseSpan(value: string | undefined): number {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return 1;
  const span = Number.parseInt(value, 10);
  return span >= 1 ? Math.min(span, MAX_CELL_SPAN) : 1;
}

/**
 * Rows belonging to this table (rows of nested tables excluded)
 */
export function ownRows(table: HtmlElement): HtmlElement[] {
  return findAll(table, (el) => el.name === 'tr', { prune: (el) => el.name === 'table' }).filter(
    (row) => !HIDDEN_STYLE.test(getAttribute(row, 'style') ?? '')
  );
}

/**
 * Build the cell matrix of a table
 */
export function buildGrid(table: HtmlElement): TableGrid {
  const rows = ownRows(table);
  const cells: (GridCell | undefined)[][] = rows.map(() => []);
  let columnCount = 0;

  rows.forEach((row, r) => {
    const line = cells[r] ?? [];
    let c = 0;
    for (const cell of childElements(row).filter(isCell)) {
      while (line[c] !== undefined) c++;
      const rowSpan = Math.min(parseSpan(getAttribute(cell, 'rowspan')), rows.length - r);
      const colSpan = parseSpan(getAttribute(cell, 'colspan'));
      const value: GridCell = { text: textOf(cell), header: cell.name === 'th' };
      for (let dr = 0; dr < rowSpan; dr++) {
        const target = cells[r + dr];
        if (!target) continue;
        for (let dc = 0; dc < colSpan; dc++) {
          target[c + dc] ??= value;
        }
      }
      c += colSpan;
      columnCount = Math.max(columnCount, c);
    }
  });

  const kept = cells.filter((line) => line.some((cell) => cell !== undefined && cell.text !== ''));
  const first = kept[0];
  const header =
    first !== undefined &&
    first.some((cell) => cell !== undefined) &&
    first.every((cell) => cell === undefined || cell.header);

  return {
    rows: kept.map((line) => Array.from({ length: columnCount }, (_, i) => line[i]?.text ?? '')),
    header,
    columnCount,
  };
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * CSV with minimal quoting, every row terminated by `\n`
 */
export function toCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => `${row.map(csvField).join(',')}\n`).join('');
}

function markdownCell(value: string): string {
  return escapeMarkdown(value).replace(/\|/g, '\\|');
}

/**
 * Markdown pipe table; the first row serves as header when none is marked
 */
export function toMarkdownTable(payload: TablePayload): string {
  const all = payload.header ? [payload.header, ...payload.rows] : payload.rows;
  const [head, ...body] = all;
  if (!head) return '';
  const line = (row: readonly string[]) => `| ${row.map(markdownCell).join(' | ')} |`;
  const rule = `| ${head.map(() => '---').join(' | ')} |`;
  return [line(head), rule, ...body.map(line)].join('\n');
}

/**
 * Capture a table for the sidecar
 */
export function extractTable(table: HtmlElement, labelMaxLength: number): Extraction<TablePayload> {
  const captionEl = childElements(table).find((el) => el.name === 'caption');
  const caption = captionEl ? textOf(captionEl) || null : null;
  const label = caption
    ? sanitizeLabel(caption, labelMaxLength, DEFAULT_LABELS.TABLE)
    : DEFAULT_LABELS.TABLE;
  const grid = buildGrid(table);

  if (grid.rows.length === 0) {
    const text = textOf(table);
    const rows = [[text]];
    return {
      payload: { caption, header: null, rows, csv: toCsv(rows), rowCount: 1, columnCount: 1 },
      label,
      degraded: true,
      warnings: ['Table has no rows; kept its text as a single cell'],
    };
  }

  const [first, ...rest] = grid.rows;
  const header = grid.header && first ? first : null;
  const rows = header ? rest : grid.rows;

  return {
    payload: {
      caption,
      header,
      rows,
      csv: toCsv(grid.rows),
      rowCount: rows.length,
      columnCount: grid.columnCount,
    },
    label,
    degraded: false,
    warnings: [],
  };
}
