/**
 * Parser Registry
 *
 * Explicit, ordered list of export parsers. Detection tries them in
 * registration order, so an ambiguous sample always resolves the same way.
 */

import { closeSync, openSync, readSync } from 'node:fs'
import type { FileFilter, ParsedExport, ParseOptions, ParserInfo, ParserSettings } from '../types'
import { type BaseParser, DEFAULT_SAMPLE_BYTES } from './base'
import { decodeSample } from './encoding'
import { UnrecognizedFormatError } from './errors'
import { KikParser } from './kik'
import { SnapchatParser } from './snapchat'
import { TwitterDmParser } from './twitter-dm'

export const ALL_SUPPORTED_DESCRIPTION = 'All supported formats'
export const ALL_FILES_FILTER: FileFilter = { description: 'All files', pattern: '*.*' }

/**
 * Read at most `maxBytes` from the start of a file.
 */
function readPrefix(path: string, maxBytes: number): Uint8Array {
  const fd = openSync(path, 'r')
  try {
    const buffer = Buffer.alloc(maxBytes)
    const bytesRead = readSync(fd, buffer, 0, maxBytes, 0)
    return buffer.subarray(0, bytesRead)
  } finally {
    closeSync(fd)
  }
}

/**
 * A throwing predicate counts as a rejection, so it cannot hide the parsers
 * registered after it.
 */
function accepts(parser: BaseParser, path: string, sample: string): boolean {
  try {
    return parser.canParse(path, sample)
  } catch {
    return false
  }
}

function extensionPattern(extensions: readonly string[]): string {
  return extensions.map((ext) => `*${ext}`).join(' ')
}

export class ParserRegistry {
  private readonly parsers: readonly BaseParser[]
  private readonly sampleBytes: number

  constructor(parsers: readonly BaseParser[], sampleBytes = DEFAULT_SAMPLE_BYTES) {
    this.parsers = [...parsers]
    this.sampleBytes = sampleBytes
  }

  getAvailableParsers(): BaseParser[] {
    return [...this.parsers]
  }

  getParserByName(name: string): BaseParser | null {
    const wanted = name.toLowerCase()
    return this.parsers.find((parser) => parser.platformName.toLowerCase() === wanted) ?? null
  }

  /**
   * First parser whose predicate accepts the file's leading bytes, or null.
   * Detection is advisory: unreadable files and throwing predicates yield null.
   */
  detectParser(path: string): BaseParser | null {
    let sample: string
    try {
      sample = decodeSample(readPrefix(path, this.sampleBytes))
    } catch {
      return null
    }

    return this.parsers.find((parser) => accepts(parser, path, sample)) ?? null
  }

  /**
   * Detect the format and parse the file.
   * @throws UnrecognizedFormatError when no parser accepts the file
   */
  parseFile(path: string, options: ParseOptions = {}): ParsedExport {
    const parser = this.detectParser(path)
    if (!parser) {
      throw new UnrecognizedFormatError(path)
    }
    return parser.parseFile(path, options)
  }

  /**
   * File-dialog filters: "all supported" first, one per parser, "all files" last.
   */
  getFileFilters(): FileFilter[] {
    const filters = this.parsers.map((parser) => ({
      description: parser.fileDescription,
      pattern: extensionPattern(parser.fileExtensions)
    }))

    const allExtensions = [...new Set(this.parsers.flatMap((p) => [...p.fileExtensions]))].sort()
    if (allExtensions.length > 0) {
      filters.unshift({
        description: ALL_SUPPORTED_DESCRIPTION,
        pattern: extensionPattern(allExtensions)
      })
    }
    filters.push(ALL_FILES_FILTER)
    return filters
  }

  getParserInfo(): ParserInfo[] {
    return this.parsers.map((parser) => parser.info)
  }
}

/**
 * Registry with every built-in parser, in detection order.
 */
export function createDefaultRegistry(settings: ParserSettings = {}): ParserRegistry {
  return new ParserRegistry(
    [new TwitterDmParser(settings), new KikParser(settings), new SnapchatParser(settings)],
    settings.sampleBytes
  )
}
