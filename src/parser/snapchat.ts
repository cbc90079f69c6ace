/**
 * Snapchat Parser
 *
 * Parses the Snapchat chat-history CSV. The table is preceded by a free-text
 * legend describing the columns, so the header is located by content.
 *
 * Format:
 * <legend lines>
 * content_type,message_type,conversation_id,message_id,sender_username,recipient_username,text,...
 * TEXT,RECEIVED,conv-1,m1,alice,bob,hello,...,Sat Dec 24 18:37:19 UTC 2022
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

export const SNAPCHAT_REQUIRED_COLUMNS = [
  'content_type',
  'message_type',
  'conversation_id',
  'timestamp'
] as const

const SNAPCHAT_SIGNATURE_COLUMNS = [
  'content_type',
  'message_type',
  'conversation_id',
  'sender_username',
  'recipient_username',
  'text',
  'is_saved',
  'is_one_on_one',
  'timestamp'
] as const

/** Signature columns that must appear in a sample */
const MIN_SIGNATURE_MATCHES = 7

const MEDIA_PLACEHOLDERS: Record<string, string> = {
  ExternalMedia: '[Media]',
  Media: '[Media]',
  AudioSnap: '[Audio Message]',
  SilentSnap: '[Silent Snap]',
  VoiceNote: '[Voice Note]',
  Sticker: '[Sticker]'
}

const TEXT_CONTENT_TYPES = new Set(['', 'text', 'chat'])

// Sat Dec 24 18:37:19 UTC 2022
const TIMESTAMP_PATTERN =
  /^[A-Z][a-z]{2} ([A-Z][a-z]{2}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([A-Z]{1,5}) (\d{4})$/

const MONTHS: Record<string, number> = {
  Jan: 0,
  Feb: 1,
  Mar: 2,
  Apr: 3,
  May: 4,
  Jun: 5,
  Jul: 6,
  Aug: 7,
  Sep: 8,
  Oct: 9,
  Nov: 10,
  Dec: 11
}

// Offsets in hours for the zone names the export writes
const ZONE_OFFSETS: Record<string, number> = {
  UTC: 0,
  GMT: 0,
  Z: 0,
  EST: -5,
  EDT: -4,
  CST: -6,
  CDT: -5,
  MST: -7,
  MDT: -6,
  PST: -8,
  PDT: -7
}

/**
 * Parse a Snapchat timestamp: Sat Dec 24 18:37:19 UTC 2022
 */
export function parseSnapchatTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim())
  if (!match) return null

  const [, monthName, day, hour, minute, second, zone, year] = match
  const month = MONTHS[monthName ?? '']
  const offset = ZONE_OFFSETS[zone ?? '']
  if (month === undefined || offset === undefined) return null

  const utc = Date.UTC(
    Number.parseInt(year ?? '', 10),
    month,
    Number.parseInt(day ?? '', 10),
    Number.parseInt(hour ?? '', 10) - offset,
    Number.parseInt(minute ?? '', 10),
    Number.parseInt(second ?? '', 10)
  )
  return Number.isNaN(utc) ? null : new Date(utc)
}

/**
 * Body text, or a placeholder when the row is media-only.
 */
export function describeContent(text: string, contentType: string): string {
  if (text) return text
  const placeholder = MEDIA_PLACEHOLDERS[contentType]
  if (placeholder) return placeholder
  return TEXT_CONTENT_TYPES.has(contentType.toLowerCase()) ? '' : `[${contentType}]`
}

function splitList(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(';')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

interface SnapchatGroupState {
  isGroup: boolean
  title: string
  sourceConversationIds: Set<string>
  savedCount: number
}

export class SnapchatParser extends BaseParser {
  readonly platformName = 'Snapchat' as const
  readonly fileExtensions = ['.csv'] as const
  readonly fileDescription = 'Snapchat CSV Export'

  canParse(_path: string, sample: string): boolean {
    const found = SNAPCHAT_SIGNATURE_COLUMNS.filter((column) => sample.includes(column)).length
    return found >= MIN_SIGNATURE_MATCHES
  }

  protected parseContent(_text: string, lines: readonly string[]): ContentResult {
    const headerIndex = findHeaderLine(lines, SNAPCHAT_REQUIRED_COLUMNS)
    if (headerIndex === -1) {
      throw new FormatError('Could not find CSV header in file')
    }

    const table = readCsvTable(lines, headerIndex)
    const warnings: ParserWarning[] = []
    const accumulator = new ConversationAccumulator<SnapchatGroupState>(() => ({
      isGroup: false,
      title: '',
      sourceConversationIds: new Set<string>(),
      savedCount: 0
    }))

    table.rows.forEach((row, rowIndex) => {
      const missing = missingColumns(row, SNAPCHAT_REQUIRED_COLUMNS)
      if (missing.length > 0) {
        warnings.push(missingColumnWarning(row, missing))
        return
      }

      const { values } = row
      const contentType = values.content_type ?? ''
      const group = accumulator.add(
        {
          id: values.message_id || String(rowIndex),
          senderId: values.sender_username ?? '',
          recipientId: values.recipient_username ?? '',
          text: describeContent(values.text ?? '', contentType),
          timestamp: parseTimestampOrNow(values.timestamp ?? '', parseSnapchatTimestamp, row, warnings),
          sourceLineNumber: row.line,
          mediaUrls: splitList(values.media_id),
          urls: []
        },
        row.line,
        splitList(values.group_member_usernames)
      )

      const { state } = group
      if (values.is_one_on_one?.toLowerCase() === 'false') {
        state.isGroup = true
      }
      if (!state.title && values.conversation_title) {
        state.title = values.conversation_title
      }
      if (values.conversation_id) {
        state.sourceConversationIds.add(values.conversation_id)
      }
      if (values.is_saved?.toLowerCase() === 'true') {
        state.savedCount++
      }
    })

    const conversations = accumulator.build(({ state }) => ({
      isGroup: state.isGroup,
      title: state.title,
      sourceConversationIds: [...state.sourceConversationIds],
      savedCount: state.savedCount
    }))
    return { conversations, warnings }
  }

  override resolvePrimarySender(
    conversation: Conversation,
    options: ParseOptions = {}
  ): PrimarySenderResolution {
    return resolveFromCandidates(conversation, [options.ownerId, this.settings.defaultOwnerId])
  }
}
