/**
 * Plain text → HTML conversion
 *
 * Escapes literal text and wraps recognized URLs in anchors. URLs may carry
 * one level of balanced parentheses, so a Wikipedia-style link keeps its
 * `(...)` suffix while a link written inside prose parentheses leaves the
 * closing `)` to the surrounding text.
 */

import { escapeHtml } from './escapeHtml.js';

/** Span of a recognized URL within the scanned text (end is exclusive) */
export interface UrlMatch {
  start: number;
  end: number;
  url: string;
}

export interface FormatOptions {
  /** Input is already HTML; use it as-is */
  html?: boolean;
}

// ASCII whitespace only: non-breaking and other Unicode spaces stay inside a URL.
const WHITESPACE = '\\t\\n\\f\\r ';

/** Any character a URL body may contain outside of parentheses */
const URL_CHAR = `[^${WHITESPACE}()<>]`;

/** `( ... )` with an optional single nested `( ... )` group inside */
const PAREN_GROUP = `\\((?:${URL_CHAR}|\\(${URL_CHAR}+\\))*\\)`;

/** Last character of a URL: never sentence punctuation or a quote */
const TRAILING_CHAR = `[^${WHITESPACE}\`!()\\[\\]{};:'".,<>?«»“”‘’]`;

// Case is folded by hand: with the `i` flag, `\b` would also count ſ (U+017F)
// and K (U+212A) as word characters. Both still fold to s and k in the scheme.
const SCHEME = '(?:[Hh][Tt][Tt][Pp][Ss\\u017f]?:(?:\\/{1,3}|[0-9A-Za-z%\\u017f\\u212a]))';

// Each body token is a single character or a whole group, so a failed match
// backtracks linearly instead of re-partitioning long runs of characters.
// `u` makes every token a whole code point, so an emoji is one character.
const URL_PATTERN = new RegExp(
  `\\b${SCHEME}(?:${URL_CHAR}|${PAREN_GROUP})+(?:${PAREN_GROUP}|${TRAILING_CHAR})`,
  'u',
);

/**
 * Find the leftmost URL in `text`.
 *
 * @returns the match span, or undefined when the text contains no URL
 */
export function findUrl(text: string): UrlMatch | undefined {
  const match = URL_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const url = match[0];
  return { start: match.index, end: match.index + url.length, url };
}

/** Render a URL as an anchor whose target and text are the raw URL */
export function linkHtml(url: string): string {
  return `<a href="${url}">${url}</a>`;
}

/**
 * Convert plain text to HTML.
 *
 * Text outside URLs is escaped exactly once; URLs are emitted verbatim.
 */
export function processPlainText(text: string): string {
  let out = '';
  let rest = text;

  for (;;) {
    const match = findUrl(rest);
    if (!match) {
      out += escapeHtml(rest);
      return out;
    }
    out += escapeHtml(rest.slice(0, match.start));
    out += linkHtml(match.url);
    rest = rest.slice(match.end);
  }
}

/**
 * Produce the message body sent on the wire.
 *
 * With `html` set the caller vouches for the markup, so the text passes through untouched.
 */
export function formatMessageBody(text: string, options: FormatOptions = {}): string {
  if (options.html) {
    return text;
  }
  return processPlainText(text);
}
