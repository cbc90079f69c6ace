/**
 * Detect Command
 *
 * Report which parser would handle a file.
 */

import { createDefaultRegistry } from '../../parser/index'
import type { CLIArgs } from '../args'
import { resolveSettings } from '../config'
import type { Logger } from '../logger'

export async function cmdDetect(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  const settings = await resolveSettings({}, args.configFile)
  const registry = createDefaultRegistry({ sampleBytes: settings.sampleBytes })
  const parser = registry.detectParser(args.input)

  if (!parser) {
    throw new Error(`No suitable parser found for ${args.input}`)
  }
  logger.success(`${args.input}: ${parser.platformName}`)
}
