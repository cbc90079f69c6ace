/**
 * Parser Errors
 *
 * Fatal failures of a parse call. Recoverable faults (a broken conversation
 * unit, a short CSV row) are reported as warnings instead.
 */

export class ParseError extends Error {
  readonly path: string | undefined

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ParseError'
    this.path = path
  }
}

/** The file could not be read, or no encoding in the cascade decoded it. */
export class UnreadableFileError extends ParseError {
  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super(message, path, options)
    this.name = 'UnreadableFileError'
  }
}

/** The content is not in the shape the selected parser expects. */
export class FormatError extends ParseError {
  constructor(message: string, path?: string) {
    super(message, path)
    this.name = 'FormatError'
  }
}

/** No registered parser accepted the file. */
export class UnrecognizedFormatError extends ParseError {
  constructor(path: string) {
    super(`No suitable parser found for ${path}`, path)
    this.name = 'UnrecognizedFormatError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
