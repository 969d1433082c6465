/**
 * Element classification
 *
 * Every element met during the walk falls into exactly one class, checked in
 * a fixed precedence: removed chrome, infobox, formula, table, flow.
 */

import type { SidecarCategory } from '../lib/tokens.js';
import { classList, type HtmlElement } from './html-tree.js';

export type ElementClass = 'removed' | SidecarCategory | 'flow';

/** Tags dropped with their content */
const REMOVED_TAGS: ReadonlySet<string> = new Set([
  'script',
  'style',
  'link',
  'meta',
  'noscript',
  'head',
  'template',
]);

/** Page chrome and footnote markers */
const REMOVED_CLASSES: ReadonlySet<string> = new Set([
  'mw-editsection',
  'reference',
  'navbox',
  'noprint',
]);

export function isRemoved(element: HtmlElement): boolean {
  if (REMOVED_TAGS.has(element.name)) return true;
  return classList(element).some((c) => REMOVED_CLASSES.has(c));
}

export function isInfobox(element: HtmlElement): boolean {
  return classList(element).includes('infobox');
}

export function isFormula(element: HtmlElement): boolean {
  return element.name === 'math' || classList(element).includes('mwe-math-element');
}

export function classifyElement(element: HtmlElement): ElementClass {
  if (isRemoved(element)) return 'removed';
  if (isInfobox(element)) return 'INFOBOX';
  if (isFormula(element)) return 'FORMULA';
  if (element.name === 'table') return 'TABLE';
  return 'flow';
}
