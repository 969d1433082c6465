/**
 * Markdown escaping
 *
 * Flow text is escaped so that nothing in it can be read as formatting, a
 * header, a code fence or a placeholder token.
 */

import { neutralizePlaceholders } from '../lib/tokens.js';

const INLINE_SPECIAL = /[\\`*_[\]]/g;

/**
 * Escape inline Markdown syntax in plain text
 */
export function escapeMarkdown(text: string): string {
  return text.replace(INLINE_SPECIAL, '\\$&');
}

/**
 * Escape header text (also `#`, which a header parser would strip at the end)
 */
export function escapeHeaderText(text: string): string {
  return escapeMarkdown(text).replace(/#/g, '\\#');
}

/**
 * Escape `#` at the start of any line of a block
 */
export function escapeLineStarts(block: string): string {
  return block.replace(/^([ \t]*)#/gm, '$1\\#');
}

/**
 * Reverse {@link escapeHeaderText}
 */
export function unescapeMarkdown(text: string): string {
  return text.replace(/\\([\\`*_[\]#])/g, '$1');
}

function longestRun(text: string, char: string): number {
  let longest = 0;
  let run = 0;
  for (const c of text) {
    run = c === char ? run + 1 : 0;
    if (run > longest) longest = run;
  }
  return longest;
}

/**
 * Inline code span with a fence longer than any backtick run inside
 */
export function codeSpan(code: string): string {
  const content = neutralizePlaceholders(code);
  if (!content) return '';
  const fence = '`'.repeat(longestRun(content, '`') + 1);
  const pad = content.startsWith('`') || content.endsWith('`') ? ' ' : '';
  return `${fence}${pad}${content}${pad}${fence}`;
}

/**
 * Fenced code block
 */
export function codeBlock(code: string, language = ''): string {
  const content = neutralizePlaceholders(code);
  const fence = '`'.repeat(Math.max(3, longestRun(content, '`') + 1));
  return `${fence}${language}\n${content}\n${fence}`;
}

/**
 * Make a URL safe to use as a Markdown link destination
 *
 * Angle brackets are percent-encoded so no destination can close a
 * placeholder; spaces and parentheses are encoded for plain link targets.
 */
export function encodeDestination(url: string): string {
  return url
    .replace(/ /g, '%20')
    .replace(/\(/g, '%28')
    .replace(/\)/g, '%29')
    .replace(/</g, '%3C')
    .replace(/>/g, '%3E');
}

/**
 * Image destination: wrapped in `<…>` when it holds spaces or parentheses
 */
export function imageDestination(locator: string): string {
  const safe = locator.replace(/</g, '%3C').replace(/>/g, '%3E');
  return /[\s()]/.test(safe) ? `<${safe}>` : safe;
}

/**
 * Wrap inline Markdown in emphasis markers, keeping surrounding whitespace
 * outside the markers
 */
export function wrapInline(text: string, marker: string): string {
  const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(text);
  const lead = match?.[1] ?? '';
  const core = match?.[2] ?? text;
  const trail = match?.[3] ?? '';
  if (!core) return `${lead}${trail}`;
  return `${lead}${marker}${core}${marker}${trail}`;
}
