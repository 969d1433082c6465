/**
 * Infobox extraction
 *
 * Infoboxes are label/value tables (`<th>` label, `<td>` value) topped by a
 * caption or a full-width header row holding the subject's name.
 */

import { sanitizeLabel } from '../lib/tokens.js';
import { childElements, classList, outerHtml, type HtmlElement } from './html-tree.js';
import { ownRows } from './tables.js';
import { textOf } from './text.js';
import type { Extraction, InfoboxPayload } from './types.js';

/** Classes that say nothing about the subject */
const GENERIC_CLASSES: ReadonlySet<string> = new Set([
  'infobox',
  'vcard',
  'vevent',
  'hproduct',
  'plainlist',
]);

const DEFAULT_TYPE = 'Attributes';

export function infoboxType(element: HtmlElement): string {
  return classList(element).find((c) => !GENERIC_CLASSES.has(c)) ?? DEFAULT_TYPE;
}

function cellsOf(row: HtmlElement): HtmlElement[] {
  return childElements(row).filter((el) => el.name === 'td' || el.name === 'th');
}

/** A row holding a single header cell */
function isTitleRow(row: HtmlElement): boolean {
  const cells = cellsOf(row);
  return cells.length === 1 && cells[0]?.name === 'th';
}

/**
 * Add a field, numbering repeated keys ` (2)`, ` (3)`, …
 */
function addField(fields: Map<string, string>, key: string, value: string): void {
  let name = key;
  let n = 1;
  while (fields.has(name)) {
    n++;
    name = `${key} (${n})`;
  }
  fields.set(name, value);
}

/**
 * Capture an infobox for the sidecar
 */
export function extractInfobox(element: HtmlElement, labelMaxLength: number): Extraction<InfoboxPayload> {
  const type = infoboxType(element);
  const raw = outerHtml(element);
  const rows = ownRows(element);

  let title: string | null = null;
  const captionEl = childElements(element).find((el) => el.name === 'caption');
  if (captionEl) {
    title = textOf(captionEl) || null;
  }

  const fields = new Map<string, string>();
  const remaining: HtmlElement[] = [];
  for (const row of rows) {
    if (title === null && isTitleRow(row)) {
      title = textOf(row) || null;
      continue;
    }
    remaining.push(row);
    const cells = cellsOf(row);
    const labelIndex = cells.findIndex((cell) => cell.name === 'th');
    const labelCell = cells[labelIndex];
    const valueCell = cells.slice(labelIndex + 1).find((cell) => cell.name === 'td');
    if (!labelCell || !valueCell) continue;
    const key = textOf(labelCell);
    if (key) addField(fields, key, textOf(valueCell));
  }

  const label = sanitizeLabel(title ?? `Summary of ${type}`, labelMaxLength, `Summary of ${type}`);

  if (fields.size > 0) {
    return { payload: { type, title, fields: Object.fromEntries(fields), raw }, label, degraded: false, warnings: [] };
  }

  // No label/value rows: keep every non-empty row under a positional key
  const texts = remaining.length > 0 ? remaining.map(textOf) : [textOf(element)];
  texts
    .filter((text) => text.length > 0)
    .forEach((text, i) => {
      fields.set(`row_${i + 1}`, text);
    });
  return {
    payload: { type, title, fields: Object.fromEntries(fields), raw },
    label,
    degraded: true,
    warnings: ['Infobox has no label/value rows; kept rows as positional fields'],
  };
}
