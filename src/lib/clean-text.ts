/**
 * Strip model artifacts from a generated letter: end-of-sequence tokens,
 * markdown markers, spaces after line breaks and doubled spaces.
 * Line breaks themselves are kept.
 */
export function cleanCompletion(text: string): string {
  if (!text) return '';

  let result = text.replace(/<\/s>/g, '').replace(/<\|[a-z_]+\|>/gi, '');

  // Markdown markers the letter must not carry
  result = result.replace(/[#*`]/g, '');

  // Trailing/leading spaces on each line, doubled spaces inside it
  result = result
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n');

  // Collapse 3+ newlines to 2
  result = result.replace(/\n{3,}/g, '\n\n');

  return result.trim();
}

/**
 * Reduce vacancy HTML (hh.ru descriptions) to readable plain text.
 */
export function htmlToText(html: string | null | undefined): string {
  if (!html) return '';

  let result = html;

  // Block-level breaks become newlines, list items get a dash
  result = result.replace(/<br\s*\/?>/gi, '\n');
  result = result.replace(/<li[^>]*>/gi, '\n- ');
  result = result.replace(/<\/(p|div|ul|ol|h[1-6])>/gi, '\n');

  // Remove all remaining HTML tags
  result = result.replace(/<[^>]+>/g, '');

  result = result
    .replace(/&nbsp;/g, ' ')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&laquo;/g, '«')
    .replace(/&raquo;/g, '»')
    .replace(/&mdash;/g, '—')
    .replace(/&ndash;/g, '–')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');

  // Collapse whitespace without losing line structure
  result = result
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n');

  return result.trim();
}
