/**
 * Text Decoding
 *
 * Exports arrive in whatever encoding the platform (or a later editor) saved
 * them in, and the declared encoding is often wrong. Decoding walks a cascade
 * of candidate encodings and keeps the first one that accepts the bytes.
 */

import { isUtf8 } from 'node:buffer'
import * as iconv from 'iconv-lite'

export const DEFAULT_ENCODINGS: readonly string[] = ['utf-8', 'utf-16le', 'utf-16be', 'windows-1252']

export interface DecodedText {
  readonly text: string
  readonly encoding: string
}

const REPLACEMENT_CHAR = '\uFFFD'

const UTF16_BOMS: Record<string, readonly number[]> = {
  'utf-16le': [0xff, 0xfe],
  'utf-16be': [0xfe, 0xff]
}

function hasBom(bytes: Uint8Array, bom: readonly number[]): boolean {
  return bom.every((byte, i) => bytes[i] === byte)
}

function isUtf8Label(encoding: string): boolean {
  return encoding === 'utf-8' || encoding === 'utf8'
}

export function isSupportedEncoding(label: string): boolean {
  const normalized = label.trim()
  return normalized.length > 0 && iconv.encodingExists(normalized)
}

/**
 * Decode strictly: null when the bytes are not valid in `encoding`.
 *
 * UTF-8 is validated up front. UTF-16 without a byte order mark decodes
 * almost any even-length input, so it is only attempted when the matching BOM
 * is present. Other encodings reject output containing U+FFFD, which iconv
 * emits for sequences it cannot map.
 */
function tryDecode(bytes: Uint8Array, encoding: string): string | null {
  if (!isSupportedEncoding(encoding)) return null

  const buffer = Buffer.from(bytes)
  if (isUtf8Label(encoding)) {
    return isUtf8(buffer) ? iconv.decode(buffer, encoding) : null
  }

  const bom = UTF16_BOMS[encoding]
  if (bom) {
    return hasBom(bytes, bom) && bytes.length % 2 === 0 ? iconv.decode(buffer, encoding) : null
  }

  const text = iconv.decode(buffer, encoding)
  return text.includes(REPLACEMENT_CHAR) ? null : text
}

/**
 * Build the ordered, de-duplicated list of encodings to try.
 */
export function buildCascade(preferred: readonly string[] = []): string[] {
  const seen = new Set<string>()
  const cascade: string[] = []
  for (const encoding of [...preferred, ...DEFAULT_ENCODINGS]) {
    const normalized = encoding.trim().toLowerCase()
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized)
      cascade.push(normalized)
    }
  }
  return cascade
}

/**
 * Decode bytes with the first encoding in the cascade that succeeds.
 * Returns null when every candidate rejects the input. A leading BOM is
 * stripped from the text.
 */
export function decodeWithFallback(
  bytes: Uint8Array,
  cascade: readonly string[] = DEFAULT_ENCODINGS
): DecodedText | null {
  for (const encoding of cascade) {
    const text = tryDecode(bytes, encoding)
    if (text !== null) {
      return { text, encoding }
    }
  }
  return null
}

/**
 * Lenient decode for content sniffing: UTF-16 when the sample opens with its
 * BOM, UTF-8 otherwise. Invalid or truncated sequences (the sample may end
 * mid-character) become U+FFFD.
 */
export function decodeSample(bytes: Uint8Array): string {
  const buffer = Buffer.from(bytes)
  for (const [encoding, bom] of Object.entries(UTF16_BOMS)) {
    if (hasBom(bytes, bom)) {
      return iconv.decode(buffer, encoding)
    }
  }
  return iconv.decode(buffer, 'utf-8')
}
