/**
 * HTML escaping for literal message text
 */

const HTML_ESCAPE_PATTERN = /[&<>'"]/g;

/**
 * Escape the five HTML-sensitive characters.
 *
 * Quotes use numeric entities so the output is also safe inside attribute values.
 */
export function escapeHtml(text: string): string {
  return text.replace(HTML_ESCAPE_PATTERN, (char) => {
    switch (char) {
      case '&':
        return '&amp;';
      case '<':
        return '&lt;';
      case '>':
        return '&gt;';
      case "'":
        return '&#39;';
      default:
        return '&#34;';
    }
  });
}
