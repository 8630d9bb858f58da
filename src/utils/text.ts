/**
 * Shortens `text` to at most `maxLength` characters, marking the cut with an
 * ellipsis. Counts code points so a cut never splits a surrogate pair.
 */
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text)
  if (chars.length <= maxLength) return text
  if (maxLength <= 1) return chars.slice(0, maxLength).join('')
  return `${chars.slice(0, maxLength - 1).join('')}…`
}
