/**
 * Parses a bracketed list field such as `['Cycling Road', 'Cycling Track']`.
 *
 * Items may be single- or double-quoted (quotes are not escaped inside an
 * item), or bare. The whole field may itself be wrapped in quotes. Anything
 * that is not a bracketed list yields an empty list.
 *
 * @example
 * ```typescript
 * parseListField("['Athletics']")             // ['Athletics']
 * parseListField('"[\\"Men\'s 100m\\"]"')    // ["Men's 100m"]
 * parseListField('[Invalid]')                 // ['Invalid']
 * parseListField('Athletics')                 // []
 * ```
 */
export function parseListField(value: string | null | undefined): string[] {
  let s = (value ?? '').trim()
  if (!s) return []

  if (
    s.length >= 2 &&
    ((s.startsWith('"') && s.endsWith('"')) ||
      (s.startsWith("'") && s.endsWith("'")))
  ) {
    s = s.slice(1, -1).trim()
  }

  if (!(s.startsWith('[') && s.endsWith(']'))) return []

  const content = s.slice(1, -1).trim()
  const items: string[] = []
  let i = 0

  while (i < content.length) {
    while (i < content.length && (content[i] === ' ' || content[i] === ',')) {
      i++
    }
    if (i >= content.length) break

    const quote = content[i]
    if (quote === '"' || quote === "'") {
      // A quote closes the item only when followed by a separator or the end
      let end = i + 1
      while (end < content.length) {
        if (content[end] === quote && /^\s*(,|$)/.test(content.slice(end + 1))) {
          break
        }
        end++
      }
      items.push(content.slice(i + 1, end))
      i = end + 1
    } else {
      let end = i
      while (end < content.length && content[end] !== ',') {
        end++
      }
      const item = content.slice(i, end).trim()
      if (item) items.push(item)
      i = end
    }
  }

  return items
}
