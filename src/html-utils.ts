const htmlEntities: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape a string for HTML text or attribute contexts.
 * Encodes `&`, `<`, `>`, `"` and `'`.
 *
 * @param str The string to escape.
 * @returns The escaped string.
 *
 * @example
 * ```ts
 * escapeHtml('<b title="x">');
 * // '&lt;b title=&quot;x&quot;&gt;'
 * ```
 */
export function escapeHtml (str: string): string {
  return String(str).replace(/[&<>"']/g, (ch) => htmlEntities[ch]);
}
