/**
 * CLI Logger
 *
 * Console reporting for the CLI. The parser library never logs; it returns
 * ParserWarnings and the commands report them here.
 */

import type { ParserWarning } from '../types'

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  /** `line` is the export line the warning concerns, when there is one */
  warn: (msg: string, line?: number) => void
  error: (msg: string) => void
}

function withLine(msg: string, line: number | undefined): string {
  return line === undefined ? msg : `line ${line}: ${msg}`
}

/**
 * One-line rendering of a parser warning, e.g.
 * `line 4: [missing_column] Skipping row 4 due to missing column: msg`
 */
export function formatParserWarning(warning: ParserWarning): string {
  return withLine(`[${warning.code}] ${warning.message}`, warning.line)
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg) => {
      if (!quiet) console.log(msg)
    },
    verbose: (msg) => {
      if (verbose) console.log(`  [debug] ${msg}`)
    },
    success: (msg) => {
      if (!quiet) console.log(`  ✓ ${msg}`)
    },
    warn: (msg, line) => {
      if (!quiet) console.warn(`  ! ${withLine(msg, line)}`)
    },
    // Errors print even under --quiet
    error: (msg) => {
      console.error(`  ✗ ${msg}`)
    }
  }
}
