/**
 * Formula extraction
 *
 * MediaWiki renders math as a `mwe-math-element` span holding MathML with a
 * TeX annotation plus a fallback image whose alt text repeats the TeX.
 */

import { DEFAULT_LABELS, sanitizeLabel } from '../lib/tokens.js';
import {
  findAll,
  findFirst,
  getAttribute,
  hasClass,
  outerHtml,
  rawText,
  type HtmlElement,
} from './html-tree.js';
import type { Extraction, FormulaDisplay, FormulaPayload } from './types.js';

const TEX_ENCODING = 'application/x-tex';

const DISPLAY_CLASSES = ['mwe-math-fallback-image-display', 'mwe-math-mathml-display'];

/**
 * Remove the `{\displaystyle …}` wrapper MediaWiki adds around TeX
 */
export function unwrapDisplayStyle(tex: string): string {
  const match = /^\{\\(?:displaystyle|textstyle)\s*/.exec(tex);
  if (!match || !tex.endsWith('}')) return tex;
  // The opening brace must close at the very end
  let depth = 0;
  for (let i = 0; i < tex.length; i++) {
    const c = tex[i];
    if (c === '\\') {
      i++;
    } else if (c === '{') {
      depth++;
    } else if (c === '}') {
      depth--;
      if (depth === 0 && i < tex.length - 1) return tex;
    }
  }
  return depth === 0 ? tex.slice(match[0].length, -1).trim() : tex;
}

function imageAlt(element: HtmlElement): string | undefined {
  const img = element.name === 'img' ? element : findFirst(element, (el) => el.name === 'img');
  return img ? getAttribute(img, 'alt') : undefined;
}

function mathAltText(element: HtmlElement): string | undefined {
  const math = findFirst(element, (el) => el.name === 'math');
  return math ? getAttribute(math, 'alttext') : undefined;
}

/**
 * TeX source of a formula element, or null when none can be found
 */
export function extractTex(element: HtmlElement): string | null {
  const annotation = findFirst(
    element,
    (el) => el.name === 'annotation' && getAttribute(el, 'encoding') === TEX_ENCODING
  );
  const candidates = [
    annotation ? rawText(annotation) : undefined,
    imageAlt(element),
    getAttribute(element, 'alttext') ?? mathAltText(element),
  ];
  for (const candidate of candidates) {
    const tex = candidate?.trim();
    if (tex) return unwrapDisplayStyle(tex);
  }
  return null;
}

export function formulaDisplay(element: HtmlElement): FormulaDisplay {
  const nodes = [element, ...findAll(element, () => true)];
  const block = nodes.some(
    (el) =>
      (el.name === 'math' && getAttribute(el, 'display') === 'block') ||
      DISPLAY_CLASSES.some((c) => hasClass(el, c))
  );
  return block ? 'block' : 'inline';
}

/**
 * Capture a formula for the sidecar
 */
export function extractFormula(element: HtmlElement, labelMaxLength: number): Extraction<FormulaPayload> {
  const markup = outerHtml(element);
  const display = formulaDisplay(element);
  const tex = extractTex(element);

  if (tex === null) {
    const text = rawText(element).replace(/\s+/g, ' ').trim();
    return {
      payload: { tex: text, markup, display },
      label: DEFAULT_LABELS.FORMULA,
      degraded: true,
      warnings: ['Formula has no TeX source; kept its text content'],
    };
  }

  return {
    payload: { tex, markup, display },
    label: sanitizeLabel(tex, labelMaxLength, DEFAULT_LABELS.FORMULA),
    degraded: false,
    warnings: [],
  };
}
