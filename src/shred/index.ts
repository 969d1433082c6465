/**
 * Shredding stage: article HTML → Markdown + sidecar
 */

export * from './types.js';
export { WikiShredder, shredArticle, buildAbstract, truncateAtWord, type WikiShredderOptions } from './shredder.js';
export { TokenRegistry, type IssuedToken, type RegisteredEntry } from './token-registry.js';
export { parseHtml, outerHtml, type HtmlElement, type HtmlNode, type HtmlText } from './html-tree.js';
export { textOf } from './text.js';
export { classifyElement, type ElementClass } from './classify.js';
export { buildGrid, toCsv, toMarkdownTable, extractTable, parseSpan, type TableGrid } from './tables.js';
export { extractInfobox, infoboxType } from './infobox.js';
export { extractFormula, extractTex, formulaDisplay, unwrapDisplayStyle } from './formula.js';
export { normalizeInternalTarget, resolveHref, describeImage, type ResolvedHref } from './links.js';
export { escapeMarkdown, unescapeMarkdown } from './escape.js';
