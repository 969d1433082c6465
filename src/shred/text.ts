/**
 * Plain text of a subtree, as used for table cells, infobox fields, labels and
 * the table of contents
 */

import { isFormula, isRemoved } from './classify.js';
import { extractTex } from './formula.js';
import type { HtmlNode } from './html-tree.js';

/** Elements that separate words when flattened */
const BLOCK_LIKE: ReadonlySet<string> = new Set([
  'p',
  'div',
  'li',
  'ul',
  'ol',
  'dl',
  'dt',
  'dd',
  'tr',
  'td',
  'th',
  'table',
  'caption',
  'blockquote',
  'pre',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'figure',
  'figcaption',
]);

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function collect(node: HtmlNode): string {
  if (node.type === 'text') return node.data;
  if (isRemoved(node)) return '';
  if (node.name === 'br') return ' ';
  if (isFormula(node)) {
    const tex = extractTex(node);
    return tex ? `$${tex}$` : '';
  }
  const inner = node.children.map(collect).join('');
  return BLOCK_LIKE.has(node.name) ? ` ${inner} ` : inner;
}

/**
 * Whitespace-collapsed text with chrome removed and formulas as `$tex$`
 */
export function textOf(node: HtmlNode): string {
  return collapseWhitespace(collect(node));
}
