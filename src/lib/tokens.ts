/**
 * Placeholder tokens
 *
 * Heavy elements removed from the Markdown are replaced by a placeholder of
 * the exact form
 *
 *   **[<<CATEGORY: TOKEN_ID | ShortLabel>>]**
 *
 * Flow text is Markdown-escaped before it reaches the document, so the
 * literal `**[<<` never appears outside a placeholder and scanning is exact.
 */

/** Kinds of elements moved to the sidecar */
export type SidecarCategory = 'TABLE' | 'INFOBOX' | 'FORMULA';

export const SIDECAR_CATEGORIES: readonly SidecarCategory[] = ['TABLE', 'INFOBOX', 'FORMULA'];

/** Prefix of the token ids issued for each category */
export const CATEGORY_CODES: Readonly<Record<SidecarCategory, string>> = {
  TABLE: 'TBL',
  INFOBOX: 'INFO',
  FORMULA: 'MATH',
};

/** Label used when an element offers nothing better */
export const DEFAULT_LABELS: Readonly<Record<SidecarCategory, string>> = {
  TABLE: 'Data Table',
  INFOBOX: 'Summary of Attributes',
  FORMULA: 'Formula',
};

/** A placeholder found in Markdown */
export interface TokenReference {
  category: SidecarCategory;
  tokenId: string;
  label: string;
  /** Offset of the first `*` */
  start: number;
  /** Offset just past the closing `**` */
  end: number;
}

const PLACEHOLDER_SOURCE = String.raw`\*\*\[<<(TABLE|INFOBOX|FORMULA): ([A-Z]+_[1-9][0-9]*) \| ([^\n]*?)>>\]\*\*`;

/** Pattern matching exactly one placeholder */
export const PLACEHOLDER_PATTERN = new RegExp(`^${PLACEHOLDER_SOURCE}$`);

/** Characters a label may not carry */
const LABEL_FORBIDDEN = /[|<>[\]*\\`]/g;

function isCategory(value: string): value is SidecarCategory {
  return value === 'TABLE' || value === 'INFOBOX' || value === 'FORMULA';
}

/**
 * Reduce free text to a label that cannot break the placeholder syntax
 */
export function sanitizeLabel(label: string, maxLength: number, fallback = 'Element'): string {
  let clean = label.replace(LABEL_FORBIDDEN, ' ').replace(/\s+/g, ' ').trim();
  if (clean.length > maxLength) {
    const cut = clean.slice(0, maxLength - 1);
    const lastSpace = cut.lastIndexOf(' ');
    clean = `${(lastSpace > maxLength / 2 ? cut.slice(0, lastSpace) : cut).trimEnd()}…`;
  }
  return clean || fallback;
}

/**
 * Render a placeholder
 */
export function formatPlaceholder(category: SidecarCategory, tokenId: string, label: string): string {
  return `**[<<${category}: ${tokenId} | ${label}>>]**`;
}

/**
 * Parse a single placeholder string
 */
export function parsePlaceholder(text: string): TokenReference | null {
  const match = PLACEHOLDER_PATTERN.exec(text);
  if (!match) return null;
  const [, category, tokenId, label] = match;
  if (category === undefined || tokenId === undefined || label === undefined || !isCategory(category)) {
    return null;
  }
  return { category, tokenId, label, start: 0, end: text.length };
}

/**
 * Find every placeholder in a Markdown string, in order of appearance
 */
export function scanPlaceholders(markdown: string): TokenReference[] {
  const refs: TokenReference[] = [];
  if (markdown.indexOf('**[<<') === -1) {
    return refs;
  }
  const pattern = new RegExp(PLACEHOLDER_SOURCE, 'g');
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(markdown)) !== null) {
    const [whole, category, tokenId, label] = match;
    if (category === undefined || tokenId === undefined || label === undefined || !isCategory(category)) {
      continue;
    }
    refs.push({ category, tokenId, label, start: match.index, end: match.index + whole.length });
  }
  return refs;
}

/**
 * Ordered, de-duplicated token ids referenced by a Markdown string
 */
export function tokenIdsIn(markdown: string): string[] {
  const seen = new Set<string>();
  for (const ref of scanPlaceholders(markdown)) {
    seen.add(ref.tokenId);
  }
  return [...seen];
}

/**
 * Storage-wide key of a token
 */
export function qualifiedTokenId(articleId: string, tokenId: string): string {
  return `${articleId}#${tokenId}`;
}

/**
 * Neutralize anything that would read as a placeholder inside verbatim text
 * (code spans and fenced code cannot be escaped)
 */
export function neutralizePlaceholders(text: string): string {
  return text.replace(/\[<</g, '[ <<');
}
