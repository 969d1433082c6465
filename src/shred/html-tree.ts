/**
 * Article HTML as an explicit node tree
 *
 * htmlparser2 emits SAX-style events; this module folds them into a small
 * tree so the shredder can walk it depth-first. Each element records its
 * structural path and whether it was closed implicitly although HTML requires
 * an explicit end tag.
 */

import { Parser } from 'htmlparser2';

export interface HtmlText {
  readonly type: 'text';
  data: string;
}

export interface HtmlElement {
  readonly type: 'element';
  /** Lower-cased tag name (`#root` for the synthetic document node) */
  readonly name: string;
  readonly attribs: Readonly<Record<string, string>>;
  readonly children: HtmlNode[];
  readonly parent: HtmlElement | null;
  /** `html[0]/body[0]/table[1]`; index counts same-name element siblings */
  readonly path: string;
  /** Closed by end of input or by an enclosing end tag */
  unterminated: boolean;
}

export type HtmlNode = HtmlElement | HtmlText;

export const ROOT_NAME = '#root';

/** Elements that never have content */
const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

/** Elements whose end tag HTML allows to be omitted */
const OPTIONAL_END_TAG: ReadonlySet<string> = new Set([
  'html',
  'head',
  'body',
  'p',
  'li',
  'dt',
  'dd',
  'tr',
  'td',
  'th',
  'thead',
  'tbody',
  'tfoot',
  'caption',
  'colgroup',
  'option',
  'optgroup',
  'rb',
  'rt',
  'rtc',
  'rp',
]);

export function isElement(node: HtmlNode): node is HtmlElement {
  return node.type === 'element';
}

export function isVoidElement(name: string): boolean {
  return VOID_ELEMENTS.has(name);
}

function createElement(
  name: string,
  attribs: Record<string, string>,
  parent: HtmlElement | null,
  siblingCounts: WeakMap<HtmlElement, Map<string, number>>
): HtmlElement {
  let path = '';
  if (parent) {
    let counts = siblingCounts.get(parent);
    if (!counts) {
      counts = new Map();
      siblingCounts.set(parent, counts);
    }
    const index = counts.get(name) ?? 0;
    counts.set(name, index + 1);
    const segment = `${name}[${index}]`;
    path = parent.path ? `${parent.path}/${segment}` : segment;
  }
  return { type: 'element', name, attribs, children: [], parent, path, unterminated: false };
}

/**
 * Parse HTML into a tree under a synthetic root element
 *
 * Never throws: malformed markup is repaired the way htmlparser2 repairs it,
 * and the elements it had to close are flagged `unterminated`.
 */
export function parseHtml(markup: string): HtmlElement {
  const siblingCounts = new WeakMap<HtmlElement, Map<string, number>>();
  const root = createElement(ROOT_NAME, {}, null, siblingCounts);
  let current = root;

  // `<mspace/>` inside svg/math is reported as an implied close of its own tag
  const selfClosed = (endIndex: number): boolean =>
    markup.charAt(endIndex) === '>' && markup.charAt(endIndex - 1) === '/';

  const parser: Parser = new Parser(
    {
      onopentag(name, attribs) {
        const element = createElement(name, attribs, current, siblingCounts);
        current.children.push(element);
        current = element;
      },
      ontext(data) {
        const last = current.children.at(-1);
        if (last && last.type === 'text') {
          last.data += data;
        } else {
          current.children.push({ type: 'text', data });
        }
      },
      onclosetag(name, isImplied) {
        if (current.parent === null) {
          return;
        }
        if (
          isImplied &&
          current.name === name &&
          !VOID_ELEMENTS.has(name) &&
          !OPTIONAL_END_TAG.has(name) &&
          !selfClosed(parser.endIndex)
        ) {
          current.unterminated = true;
        }
        current = current.parent;
      },
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true }
  );

  parser.write(markup);
  parser.end();
  return root;
}

// ============================================================================
// Queries
// ============================================================================

export function getAttribute(element: HtmlElement, name: string): string | undefined {
  return Object.hasOwn(element.attribs, name) ? element.attribs[name] : undefined;
}

export function classList(element: HtmlElement): string[] {
  const value = getAttribute(element, 'class');
  return value ? value.split(/\s+/).filter((c) => c.length > 0) : [];
}

export function hasClass(element: HtmlElement, className: string): boolean {
  return classList(element).includes(className);
}

/**
 * Element children only
 */
export function childElements(element: HtmlElement): HtmlElement[] {
  return element.children.filter(isElement);
}

/**
 * Depth-first search for elements matching a predicate
 *
 * @param options.prune - do not look inside elements for which this returns true
 */
export function findAll(
  element: HtmlElement,
  predicate: (el: HtmlElement) => boolean,
  options: { prune?: (el: HtmlElement) => boolean } = {}
): HtmlElement[] {
  const found: HtmlElement[] = [];
  const visit = (node: HtmlElement): void => {
    for (const child of node.children) {
      if (!isElement(child)) continue;
      if (predicate(child)) found.push(child);
      if (!options.prune?.(child)) visit(child);
    }
  };
  visit(element);
  return found;
}

export function findFirst(
  element: HtmlElement,
  predicate: (el: HtmlElement) => boolean
): HtmlElement | undefined {
  for (const child of element.children) {
    if (!isElement(child)) continue;
    if (predicate(child)) return child;
    const nested = findFirst(child, predicate);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * Raw concatenated text of a subtree
 */
export function rawText(node: HtmlNode): string {
  if (node.type === 'text') return node.data;
  return node.children.map(rawText).join('');
}

// ============================================================================
// Serialization
// ============================================================================

function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;');
}

/**
 * Serialize a node back to HTML
 *
 * Unterminated elements come out well-formed.
 */
export function outerHtml(node: HtmlNode): string {
  if (node.type === 'text') {
    return escapeText(node.data);
  }
  const inner = node.children.map(outerHtml).join('');
  if (node.name === ROOT_NAME) {
    return inner;
  }
  const attrs = Object.entries(node.attribs)
    .map(([key, value]) => ` ${key}="${escapeAttribute(value)}"`)
    .join('');
  if (VOID_ELEMENTS.has(node.name)) {
    return `<${node.name}${attrs}>`;
  }
  return `<${node.name}${attrs}>${inner}</${node.name}>`;
}
