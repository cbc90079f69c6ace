/**
 * Parse Command
 *
 * Parse an export and report what was recovered.
 */

import { VERSION } from '../../index'
import { exportToJSON } from '../../export/json'
import { type BaseParser, createDefaultRegistry, summarizeExport } from '../../parser/index'
import type { ParsedExport, ParseOptions } from '../../types'
import type { CLIArgs } from '../args'
import { resolveSettings } from '../config'
import { resolveOutputPath, writeOutputFile } from '../io'
import { formatParserWarning, type Logger } from '../logger'

/**
 * Format participant list, showing top 5 + "and N others" if more.
 */
export function formatParticipants(participants: readonly string[]): string {
  if (participants.length <= 5) {
    return participants.join(', ')
  }
  const top5 = participants.slice(0, 5).join(', ')
  const remaining = participants.length - 5
  return `${top5}, and ${remaining} others`
}

function plural(count: number, word: string): string {
  return `${count.toLocaleString()} ${word}${count !== 1 ? 's' : ''}`
}

/**
 * Primary sender per conversation. Best-effort guesses are logged so the
 * analyst knows direction may be wrong.
 */
function resolvePrimarySenders(
  parser: BaseParser,
  parsed: ParsedExport,
  options: ParseOptions,
  logger: Logger
): Record<string, string> {
  const senders: Record<string, string> = {}
  for (const conversation of parsed.conversations) {
    const resolution = parser.resolvePrimarySender(conversation, options)
    if (!resolution.senderId) continue
    senders[conversation.id] = resolution.senderId
    const note = resolution.bestEffort ? ' (best effort: first sender)' : ''
    logger.verbose(
      `${conversation.id}: owner ${resolution.senderId} via ${resolution.method ?? 'unknown'}${note}`
    )
  }
  return senders
}

export async function cmdParse(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  logger.log(`\ndm-ingest v${VERSION}`)

  const settings = await resolveSettings(
    { ownerId: args.ownerId, encodings: args.encodings },
    args.configFile
  )
  const registry = createDefaultRegistry({
    defaultOwnerId: settings.ownerId,
    sampleBytes: settings.sampleBytes
  })

  let parser: BaseParser | null
  if (args.platform) {
    parser = registry.getParserByName(args.platform)
    if (!parser) {
      const names = registry.getAvailableParsers().map((p) => p.platformName)
      throw new Error(`Unknown platform: ${args.platform}. Available: ${names.join(', ')}`)
    }
  } else {
    parser = registry.detectParser(args.input)
    if (!parser) {
      throw new Error(`No suitable parser found for ${args.input}`)
    }
  }

  const options: ParseOptions = { ownerId: settings.ownerId, encodings: settings.encodings }
  const parsed = parser.parseFile(args.input, options)
  const summary = summarizeExport(parsed)

  logger.success(`Valid ${parsed.platform} export (${parsed.encoding})`)
  logger.success(plural(summary.conversationCount, 'conversation'))
  logger.success(plural(summary.messageCount, 'message'))
  if (summary.dateRange) {
    const start = summary.dateRange.start.toISOString().split('T')[0]
    const end = summary.dateRange.end.toISOString().split('T')[0]
    logger.success(`Date range: ${start} to ${end}`)
  }
  logger.success(plural(summary.participantCount, 'participant'))

  if (summary.errorCount > 0) {
    logger.warn(`${plural(summary.errorCount, 'conversation')} could not be decoded`)
  }
  for (const warning of parsed.warnings) {
    logger.verbose(formatParserWarning(warning))
  }
  if (parsed.warnings.length > 0) {
    logger.warn(`${plural(parsed.warnings.length, 'warning')} (use --verbose for details)`)
  }

  for (const conversation of parsed.conversations) {
    const label = conversation.metadata.title || formatParticipants(conversation.participants)
    logger.verbose(
      `${conversation.id} (line ${conversation.sourceLineNumber}): ${plural(conversation.messages.length, 'message')} with ${label}`
    )
  }

  const primarySenders = resolvePrimarySenders(parser, parsed, options, logger)

  if (args.jsonOutput) {
    const json = exportToJSON(parsed, { version: VERSION, inputFile: args.input, primarySenders })
    if (args.jsonOutput === 'stdout') {
      console.log(json)
    } else {
      const outputPath = resolveOutputPath(args.jsonOutput, settings.outputDir)
      await writeOutputFile(outputPath, json)
      logger.success(`Saved to ${outputPath}`)
    }
  }
}
