/**
 * Formats Command
 *
 * List registered parsers and their file-dialog filters.
 */

import { createDefaultRegistry } from '../../parser/index'
import type { Logger } from '../logger'

export function cmdFormats(logger: Logger): void {
  const registry = createDefaultRegistry()

  logger.log('\nSupported formats (detection order):')
  for (const info of registry.getParserInfo()) {
    const extensions = info.fileExtensions.join(', ')
    logger.log(`  ${info.platformName.padEnd(14)} ${info.fileDescription} (${extensions})`)
  }

  logger.log('\nFile filters:')
  for (const filter of registry.getFileFilters()) {
    logger.log(`  ${filter.description}: ${filter.pattern}`)
  }
}
