#!/usr/bin/env node
/**
 * dm-ingest CLI
 *
 * Local front end for the parser library: detection, parsing, reporting.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdConfig } from './cli/commands/config'
import { cmdDetect } from './cli/commands/detect'
import { cmdFormats } from './cli/commands/formats'
import { cmdParse } from './cli/commands/parse'
import { createLogger } from './cli/logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'parse':
        await cmdParse(args, logger)
        break

      case 'detect':
        await cmdDetect(args, logger)
        break

      case 'formats':
        cmdFormats(logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'dm-ingest --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
