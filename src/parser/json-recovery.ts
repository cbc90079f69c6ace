/**
 * JSON Recovery
 *
 * Helpers for pulling JSON objects out of exports where they are embedded in
 * free text and occasionally corrupted (control bytes, trailing commas,
 * string values cut off before their closing quote).
 */

export const RAW_CONTENT_LIMIT = 500

// C0/C1 controls, keeping tab, newline and carriage return
const CONTROL_CHARS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f]/g
const TRAILING_COMMA = /,(\s*[}\]])/g
const TRUNCATED_ID = /"id"\s*:\s*"([^"]*),\s*$/
const TRUNCATED_VALUE = /"([^"]+)"\s*:\s*"([^"]*),\s*$/

export interface BraceSpan {
  readonly start: number
  /** Exclusive */
  readonly end: number
}

/**
 * Find the first `{` at or after `from` and the `}` that closes it, counting
 * depth over every brace (quotes are not tracked, since a truncated string
 * would otherwise swallow the rest of the object). The scan stops at `limit`.
 * Returns null when there is no `{`, or when depth never returns to zero.
 */
export function findBraceSpan(content: string, from: number, limit = content.length): BraceSpan | null {
  const start = content.indexOf('{', from)
  if (start === -1 || start >= limit) {
    return null
  }

  let depth = 0
  for (let i = start; i < limit; i++) {
    const ch = content[i]
    if (ch === '{') {
      depth++
    } else if (ch === '}') {
      depth--
      if (depth === 0) {
        return { start, end: i + 1 }
      }
    }
  }
  return null
}

/**
 * Remove control characters and trailing commas before a closing bracket.
 */
export function cleanJson(json: string): string {
  return json.replace(CONTROL_CHARS, '').replace(TRAILING_COMMA, '$1')
}

function countQuotes(line: string): number {
  let count = 0
  for (const ch of line) {
    if (ch === '"') count++
  }
  return count
}

/**
 * Re-close string values that were cut off before their closing quote
 * (`"id" : "1234,`). Works line by line on odd quote counts only.
 */
export function repairTruncatedStrings(json: string): string {
  return json
    .split('\n')
    .map((line) => {
      const quotes = countQuotes(line)
      if (line.includes('"id"') && quotes === 3) {
        const match = TRUNCATED_ID.exec(line)
        if (match) {
          return `${line.slice(0, match.index)}"id" : "${match[1] ?? ''}",`
        }
      }
      if (quotes % 2 !== 0 && line.trimEnd().endsWith(',')) {
        const match = TRUNCATED_VALUE.exec(line)
        if (match) {
          return `${line.slice(0, match.index)}"${match[1] ?? ''}" : "${match[2] ?? ''}",`
        }
      }
      return line
    })
    .join('\n')
}

export type JsonDecodeResult =
  | { readonly ok: true; readonly value: unknown; readonly repaired: boolean }
  | { readonly ok: false; readonly error: string }

function tryParse(text: string): { value: unknown } | { error: string } {
  try {
    return { value: JSON.parse(text) }
  } catch (error) {
    return { error: error instanceof Error ? error.message : String(error) }
  }
}

/**
 * Clean and decode a JSON span, retrying once after the truncation repair.
 */
export function decodeJsonSpan(span: string): JsonDecodeResult {
  const cleaned = cleanJson(span)
  const direct = tryParse(cleaned)
  if ('value' in direct) {
    return { ok: true, value: direct.value, repaired: false }
  }

  const repaired = tryParse(repairTruncatedStrings(cleaned))
  if ('value' in repaired) {
    return { ok: true, value: repaired.value, repaired: true }
  }
  return { ok: false, error: repaired.error }
}

/**
 * Bounded diagnostic snippet of an offending span.
 */
export function truncateRaw(raw: string, limit = RAW_CONTENT_LIMIT): string {
  return raw.length > limit ? `${raw.slice(0, limit)}...` : raw
}
