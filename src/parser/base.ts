/**
 * Base Parser
 *
 * Contract every export parser implements. Subclasses supply identity,
 * a detection predicate and the format-specific content walk; reading,
 * decoding and the format check live here.
 */

import { readFileSync } from 'node:fs'
import type {
  Conversation,
  Message,
  ParsedExport,
  ParseOptions,
  ParserInfo,
  ParserSettings,
  ParserWarning,
  PlatformName,
  PrimarySenderResolution
} from '../types'
import { buildCascade, decodeWithFallback } from './encoding'
import { describeError, FormatError, UnreadableFileError } from './errors'
import { resolveByMessageCount } from './sender'

export const DEFAULT_SAMPLE_BYTES = 8192

export interface ContentResult {
  conversations: Conversation[]
  warnings: ParserWarning[]
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/)
}

function fallbackMessage(encoding: string, cascade: readonly string[]): string {
  const rejected = cascade.slice(0, cascade.indexOf(encoding))
  return rejected.length === 0
    ? `Decoded as ${encoding} (preferred encoding)`
    : `Decoded as ${encoding} after ${rejected.join(', ')} failed`
}

export abstract class BaseParser {
  abstract readonly platformName: PlatformName
  abstract readonly fileExtensions: readonly string[]
  abstract readonly fileDescription: string

  protected readonly settings: ParserSettings

  constructor(settings: ParserSettings = {}) {
    this.settings = settings
  }

  /**
   * Whether this parser handles the file. Pure; the sample is a bounded
   * prefix that may end mid-line or mid-character.
   */
  abstract canParse(path: string, sample: string): boolean

  protected abstract parseContent(text: string, lines: readonly string[]): ContentResult

  get info(): ParserInfo {
    return {
      platformName: this.platformName,
      fileExtensions: this.fileExtensions,
      fileDescription: this.fileDescription
    }
  }

  /**
   * Read, decode and parse an export file.
   * @throws UnreadableFileError when the file cannot be read or decoded
   * @throws FormatError when the content is not this parser's format
   */
  parseFile(path: string, options: ParseOptions = {}): ParsedExport {
    let bytes: Uint8Array
    try {
      bytes = readFileSync(path)
    } catch (error) {
      throw new UnreadableFileError(`Error reading file: ${describeError(error)}`, path, {
        cause: error
      })
    }

    const cascade = buildCascade(options.encodings)
    const decoded = decodeWithFallback(bytes, cascade)
    if (!decoded) {
      throw new UnreadableFileError(
        `Could not decode file with any of: ${cascade.join(', ')}`,
        path
      )
    }

    const parsed = this.parseText(decoded.text, path, decoded.encoding)
    if (decoded.encoding === 'utf-8') {
      return parsed
    }
    return {
      ...parsed,
      warnings: [
        { code: 'encoding_fallback', message: fallbackMessage(decoded.encoding, cascade) },
        ...parsed.warnings
      ]
    }
  }

  /**
   * Parse already-decoded export content.
   */
  parseText(text: string, path = '<memory>', encoding = 'utf-8'): ParsedExport {
    const sampleSize = this.settings.sampleBytes ?? DEFAULT_SAMPLE_BYTES
    if (!this.canParse(path, text.slice(0, sampleSize))) {
      throw new FormatError(`Not a ${this.platformName} export`, path)
    }

    const lines = splitLines(text)
    const { conversations, warnings } = this.parseContent(text, lines)
    return { platform: this.platformName, conversations, lines, warnings, encoding }
  }

  /**
   * Who the account owner is, with how that was decided.
   * Default: the participant with the most authored messages.
   */
  resolvePrimarySender(
    conversation: Conversation,
    _options: ParseOptions = {}
  ): PrimarySenderResolution {
    return resolveByMessageCount(conversation)
  }

  getPrimarySender(conversation: Conversation, options: ParseOptions = {}): string | null {
    return this.resolvePrimarySender(conversation, options).senderId
  }

  isMessageFromPrimary(
    message: Message,
    conversation: Conversation,
    options: ParseOptions = {}
  ): boolean {
    return message.senderId === this.getPrimarySender(conversation, options)
  }
}
