/**
 * Text helpers for messages and source comparison.
 */

/** Collapse whitespace and cut at a word boundary, marking the cut with `[...]`. */
export function shorten(text: string, width: number): string {
  const words = text.split(/\s+/).filter(Boolean);
  const collapsed = words.join(' ');
  if (collapsed.length <= width) return collapsed;

  const placeholder = ' [...]';
  let kept = '';
  for (const word of words) {
    const next = kept ? `${kept} ${word}` : word;
    if (next.length + placeholder.length > width) break;
    kept = next;
  }
  return kept ? `${kept}${placeholder}` : placeholder.trim();
}

export function stripWhitespace(text: string): string {
  return text.replace(/\s+/g, '');
}

export function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
