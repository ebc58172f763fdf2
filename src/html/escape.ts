/**
 * HTML escaping for text and attribute values
 *
 * Only `&`, `<`, `>` and `"` are replaced; the entities produced contain no
 * inline markup characters, so escaped text parses back as plain text.
 */
const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}
