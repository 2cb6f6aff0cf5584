/**
 * Whitespace as the Unicode White_Space property defines it.
 *
 * `String.prototype.trim` differs: it strips U+FEFF (a byte-order mark is
 * text, not whitespace) and keeps U+0085 (NEL).
 */

const WHITESPACE_CLASS = "\\t\\n\\v\\f\\r \\u0085\\u00A0\\u1680\\u2000-\\u200A\\u2028\\u2029\\u202F\\u205F\\u3000";

const WHITESPACE_ONLY = new RegExp(`^[${WHITESPACE_CLASS}]*$`);
const LEADING = new RegExp(`^[${WHITESPACE_CLASS}]+`);
const TRAILING = new RegExp(`[${WHITESPACE_CLASS}]+$`);

export function isWhitespaceOnly(text: string): boolean {
  return WHITESPACE_ONLY.test(text);
}

export function trimWhitespace(text: string): string {
  return text.replace(LEADING, "").replace(TRAILING, "");
}
