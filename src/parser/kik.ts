/**
 * Kik Messenger Parser
 *
 * Parses the Kik CSV export: one row per message, no conversation column.
 *
 * Format:
 * msg_id,sender_jid,receiver_jid,chat_type,msg,sent_at
 * 1,alice_x1@talk.kik.com,bob_y2@talk.kik.com,chat,hi,2023-01-05T10:00:00Z
 */

import type { Conversation, ParseOptions, ParserWarning, PrimarySenderResolution } from '../types'
import { BaseParser, type ContentResult } from './base'
import {
  ConversationAccumulator,
  findHeaderLine,
  missingColumns,
  missingColumnWarning,
  parseTimestampOrNow,
  readCsvTable
} from './csv'
import { FormatError } from './errors'
import { resolveFromCandidates } from './sender'

export const KIK_COLUMNS = ['msg_id', 'sender_jid', 'receiver_jid', 'chat_type', 'msg', 'sent_at'] as const

const HAS_OFFSET = /(?:Z|[+-]\d{2}:?\d{2})$/i

/**
 * ISO-8601 timestamp, optionally `Z`-suffixed. Values without an offset are
 * read as UTC.
 */
export function parseKikTimestamp(value: string): Date | null {
  let iso = value.trim()
  if (!iso) return null
  iso = iso.replace(/^(\d{4}-\d{2}-\d{2}) /, '$1T')
  if (!HAS_OFFSET.test(iso) && iso.includes('T')) {
    iso = `${iso}Z`
  }
  const ts = Date.parse(iso)
  return Number.isNaN(ts) ? null : new Date(ts)
}

interface KikGroupState {
  isGroup: boolean
}

export class KikParser extends BaseParser {
  readonly platformName = 'Kik Messenger' as const
  readonly fileExtensions = ['.csv'] as const
  readonly fileDescription = 'Kik Messenger CSV Export'

  canParse(_path: string, sample: string): boolean {
    return KIK_COLUMNS.every((column) => sample.includes(column))
  }

  protected parseContent(_text: string, lines: readonly string[]): ContentResult {
    const headerIndex = findHeaderLine(lines, KIK_COLUMNS)
    if (headerIndex === -1) {
      throw new FormatError('Could not find CSV header in file')
    }

    const table = readCsvTable(lines, headerIndex)
    const warnings: ParserWarning[] = []
    const accumulator = new ConversationAccumulator<KikGroupState>(() => ({ isGroup: false }))

    table.rows.forEach((row, rowIndex) => {
      const missing = missingColumns(row, KIK_COLUMNS)
      if (missing.length > 0) {
        warnings.push(missingColumnWarning(row, missing))
        return
      }

      const { values } = row
      const group = accumulator.add(
        {
          id: values.msg_id || String(rowIndex),
          senderId: values.sender_jid ?? '',
          recipientId: values.receiver_jid ?? '',
          text: values.msg ?? '',
          timestamp: parseTimestampOrNow(values.sent_at ?? '', parseKikTimestamp, row, warnings),
          sourceLineNumber: row.line,
          mediaUrls: [],
          urls: []
        },
        row.line
      )
      if (values.chat_type === 'groupchat') {
        group.state.isGroup = true
      }
    })

    const conversations = accumulator.build((group) => ({ isGroup: group.state.isGroup }))
    return { conversations, warnings }
  }

  override resolvePrimarySender(
    conversation: Conversation,
    options: ParseOptions = {}
  ): PrimarySenderResolution {
    return resolveFromCandidates(conversation, [options.ownerId, this.settings.defaultOwnerId])
  }
}
