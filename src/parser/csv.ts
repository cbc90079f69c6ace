/**
 * CSV Reconstruction
 *
 * Flat per-message CSV exports carry no conversation boundaries. These
 * helpers find the real header, read rows with their source lines, and fold
 * rows into conversations keyed by the unordered {sender, recipient} pair.
 */

import { parse } from 'csv-parse/sync'
import type { Conversation, ConversationMetadata, Message, ParserWarning } from '../types'
import { describeError, FormatError } from './errors'

export interface CsvRow {
  /** 1-based line the record starts on */
  readonly line: number
  /** Column name → cell, for the columns this row actually has */
  readonly values: Readonly<Record<string, string>>
}

export interface CsvTable {
  readonly header: readonly string[]
  readonly rows: readonly CsvRow[]
}

interface RecordWithInfo {
  record: unknown[]
  info: { lines: number }
}

function isRecordWithInfo(value: unknown): value is RecordWithInfo {
  if (typeof value !== 'object' || value === null) return false
  if (!('record' in value) || !('info' in value)) return false
  const info = value.info
  return (
    Array.isArray(value.record) &&
    typeof info === 'object' &&
    info !== null &&
    'lines' in info &&
    typeof info.lines === 'number'
  )
}

function headerCells(line: string): Set<string> {
  return new Set(line.split(',').map((cell) => cell.trim().replace(/^"|"$/g, '')))
}

/**
 * Index of the first line that has every required column as a cell, with
 * enough commas to be a header row. Legends above the header mention column
 * names in prose, so a substring match is not enough.
 */
export function findHeaderLine(lines: readonly string[], required: readonly string[]): number {
  const minCommas = Math.max(0, required.length - 1)
  return lines.findIndex((line) => {
    const cells = headerCells(line)
    return cells.size > minCommas && required.every((column) => cells.has(column))
  })
}

/**
 * Read the table that starts at `headerIndex` (0-based line index). Lines
 * above the header are free text and never reach the CSV reader.
 * Short rows are kept; callers decide what a missing column means.
 */
export function readCsvTable(lines: readonly string[], headerIndex: number): CsvTable {
  const tableLines = lines.slice(headerIndex)
  let parsed: unknown
  try {
    parsed = parse(tableLines.join('\n'), {
      info: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      trim: false
    })
  } catch (error) {
    throw new FormatError(`Malformed CSV: ${describeError(error)}`)
  }

  if (!Array.isArray(parsed)) {
    throw new FormatError('Malformed CSV: unexpected parser output')
  }

  const records = parsed.filter(isRecordWithInfo)
  const [headerRecord, ...dataRecords] = records
  if (!headerRecord) {
    return { header: [], rows: [] }
  }

  const header = headerRecord.record.map((cell) => String(cell).trim())
  // info.lines is where a record ends; it starts after the previous one,
  // past any blank lines the reader skipped
  let previousEnd = headerRecord.info.lines
  const rows = dataRecords.map((entry) => {
    let start = previousEnd + 1
    while (start < entry.info.lines && tableLines[start - 1] === '') {
      start++
    }
    previousEnd = entry.info.lines

    const values: Record<string, string> = {}
    header.forEach((column, i) => {
      if (i < entry.record.length) {
        values[column] = String(entry.record[i] ?? '')
      }
    })
    return { line: headerIndex + start, values }
  })

  return { header, rows }
}

export function missingColumns(row: CsvRow, required: readonly string[]): string[] {
  return required.filter((column) => row.values[column] === undefined)
}

export function missingColumnWarning(row: CsvRow, missing: readonly string[]): ParserWarning {
  return {
    code: 'missing_column',
    message: `Skipping row ${row.line} due to missing column: ${missing.join(', ')}`,
    line: row.line
  }
}

/**
 * Sorted members of the unordered {sender, recipient} pair.
 */
export function groupingKey(senderId: string, recipientId: string): string[] {
  return [...new Set([senderId, recipientId])].sort()
}

export function conversationIdFor(members: readonly string[]): string {
  return members.join('-')
}

export interface ConversationGroup<T> {
  readonly id: string
  readonly participants: Set<string>
  readonly messages: Message[]
  readonly firstLine: number
  /** Format-specific accumulator */
  readonly state: T
}

/**
 * Folds rows into conversations, one per distinct member set. One instance
 * per parse call.
 */
export class ConversationAccumulator<T> {
  private readonly groups = new Map<string, ConversationGroup<T>>()

  constructor(private readonly createState: () => T) {}

  add(
    message: Message,
    line: number,
    extraParticipants: readonly string[] = []
  ): ConversationGroup<T> {
    const members = groupingKey(message.senderId, message.recipientId)
    // Ids may contain the '-' separator, so the display id is not a safe key
    const key = JSON.stringify(members)
    let group = this.groups.get(key)
    if (!group) {
      group = {
        id: conversationIdFor(members),
        participants: new Set<string>(),
        messages: [],
        firstLine: line,
        state: this.createState()
      }
      this.groups.set(key, group)
    }

    group.participants.add(message.senderId)
    group.participants.add(message.recipientId)
    for (const participant of extraParticipants) {
      group.participants.add(participant)
    }
    group.messages.push(message)
    return group
  }

  /**
   * Conversations with messages in timestamp order, listed by their earliest
   * message. Both sorts are stable.
   */
  build(metadataFor: (group: ConversationGroup<T>) => ConversationMetadata): Conversation[] {
    const conversations = [...this.groups.values()].map((group) => ({
      id: group.id,
      participants: [...group.participants],
      messages: [...group.messages].sort(byTimestamp),
      sourceLineNumber: group.firstLine,
      metadata: metadataFor(group)
    }))

    return conversations.sort((a, b) => earliest(a) - earliest(b))
  }
}

function byTimestamp(a: Message, b: Message): number {
  return a.timestamp.getTime() - b.timestamp.getTime()
}

function earliest(conversation: Conversation): number {
  return conversation.messages[0]?.timestamp.getTime() ?? Number.POSITIVE_INFINITY
}

/**
 * Timestamp parse with a "now" fallback, noting the fallback as a warning.
 */
export function parseTimestampOrNow(
  value: string,
  parseFn: (value: string) => Date | null,
  row: CsvRow,
  warnings: ParserWarning[]
): Date {
  const parsed = parseFn(value)
  if (parsed) return parsed
  warnings.push({
    code: 'invalid_timestamp',
    message: `Unparseable timestamp "${value}" on row ${row.line}`,
    line: row.line
  })
  return new Date()
}
