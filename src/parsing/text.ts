/**
 * Removes hyphenation artifacts left by PDF extraction.
 *
 * - Removes soft hyphens (\u00AD)
 * - Joins words split by a hyphen at a line break ("manage-\nment" → "management")
 */
export function removeHyphenation(text: string): string {
  text = text.replace(/\u00AD/g, '');
  text = text.replace(/(\p{L}+)-[ \t]*(?:\r\n|\r|\n)+[ \t]*(\p{L}+)/gu, '$1$2');
  return text;
}

/**
 * Replaces control characters (except tab, CR and LF) with a space so words on
 * either side do not get glued together.
 */
export function stripControlCharacters(text: string): string {
  return text.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, ' ');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Normalizes extracted document text into a single line: hyphenation fixed,
 * control characters dropped, every whitespace run collapsed to one space.
 */
export function cleanText(text: string): string {
  return collapseWhitespace(stripControlCharacters(removeHyphenation(text)));
}

/**
 * Cleans model output for tables and CSV: markdown emphasis markers removed and
 * whitespace collapsed.
 */
export function sanitizeLlmText(text: string): string {
  if (!text) return '';
  return collapseWhitespace(text.replace(/\*{2,3}/g, ''));
}

export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, Math.max(0, maxChars - 1)).trimEnd()}…`;
}
