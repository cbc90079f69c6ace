/**
 * Twitter DM Parser
 *
 * Parses the signed DM export: a PGP-signed text envelope holding one unit per
 * conversation.
 *
 * Format:
 * -----BEGIN PGP SIGNED MESSAGE-----
 * **** conversationId: 111-222 ****
 * { "dmConversation": { "messages": [ { "messageCreate": { ... } } ] } }
 * **** conversationId: 111-333 ****
 * { ... }
 * -----BEGIN PGP SIGNATURE-----
 */

import type { Conversation, Message, ParserWarning } from '../types'
import { BaseParser, type ContentResult } from './base'
import { FormatError } from './errors'
import { decodeJsonSpan, findBraceSpan, truncateRaw } from './json-recovery'

const PGP_BEGIN = '-----BEGIN PGP SIGNED MESSAGE-----'
const PGP_SIGNATURE = '-----BEGIN PGP SIGNATURE-----'
const CONVERSATION_MARKER = '**** conversationId:'
const CONVERSATION_PATTERN = /\*\*\*\* conversationId: (\S+) \*\*\*\*/g
const ID_FIELD_PATTERN = /"id"\s*:\s*"([^"]+)"/g

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function asString(value: unknown): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return ''
}

function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === 'string')
}

/**
 * URL entities carry `url` (t.co) and `expanded`; prefer the expanded form.
 */
function extractUrls(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  const urls: string[] = []
  for (const entry of value) {
    if (typeof entry === 'string') {
      urls.push(entry)
    } else if (isObject(entry)) {
      const url = asString(entry.expanded) || asString(entry.url)
      if (url) urls.push(url)
    }
  }
  return urls
}

function parseCreatedAt(value: string): Date {
  const ts = Date.parse(value)
  return Number.isNaN(ts) ? new Date() : new Date(ts)
}

/**
 * Locates the source line of a message id. Built once per file: every
 * `"id" : "..."` occurrence is indexed on first sight, with a substring scan
 * as fallback for ids written in some other shape.
 */
class MessageLineIndex {
  private readonly byId = new Map<string, number>()

  constructor(private readonly lines: readonly string[]) {
    lines.forEach((line, i) => {
      for (const match of line.matchAll(ID_FIELD_PATTERN)) {
        const id = match[1]
        if (id && !this.byId.has(id)) {
          this.byId.set(id, i + 1)
        }
      }
    })
  }

  lineOf(id: string): number {
    if (!id) return 0
    const indexed = this.byId.get(id)
    if (indexed !== undefined) return indexed
    const found = this.lines.findIndex((line) => line.includes(id))
    return found === -1 ? 0 : found + 1
  }
}

export class TwitterDmParser extends BaseParser {
  readonly platformName = 'Twitter DM' as const
  readonly fileExtensions = ['.txt'] as const
  readonly fileDescription = 'Twitter DM Export Files'

  canParse(_path: string, sample: string): boolean {
    return (
      sample.includes(PGP_BEGIN) &&
      sample.includes(CONVERSATION_MARKER) &&
      sample.includes('"dmConversation"')
    )
  }

  protected parseContent(_text: string, lines: readonly string[]): ContentResult {
    const pgpStart = lines.findIndex((line) => line.includes(PGP_BEGIN))
    const pgpEnd =
      pgpStart === -1
        ? -1
        : lines.findIndex((line, i) => i > pgpStart && line.includes(PGP_SIGNATURE))

    if (pgpStart === -1 || pgpEnd === -1) {
      throw new FormatError('No PGP signed content found in file')
    }

    const content = lines.slice(pgpStart, pgpEnd).join('\n')
    const lineIndex = new MessageLineIndex(lines)
    const markers = [...content.matchAll(CONVERSATION_PATTERN)]
    const conversations: Conversation[] = []
    const warnings: ParserWarning[] = []
    // Position among all messages in the file; stands in for a missing id
    let sequence = 0
    const nextSequence = (): number => sequence++

    markers.forEach((marker, i) => {
      const conversationId = marker[1] ?? ''
      const markerStart = marker.index ?? 0
      const unitEnd = markers[i + 1]?.index ?? content.length
      const lineNumber = pgpStart + countNewlines(content, markerStart) + 1

      const span = findBraceSpan(content, markerStart + marker[0].length, unitEnd)
      const raw = span
        ? content.slice(span.start, span.end)
        : content.slice(markerStart + marker[0].length, unitEnd).trim()

      const failure = (reason: string): void => {
        conversations.push({
          id: conversationId,
          participants: [],
          messages: [],
          sourceLineNumber: lineNumber,
          metadata: { error: reason, rawContent: truncateRaw(raw) }
        })
        warnings.push({
          code: 'malformed_conversation',
          message: `Conversation ${conversationId}: ${reason}`,
          line: lineNumber
        })
      }

      if (!span) {
        failure(
          raw.includes('{') ? 'Unterminated JSON object' : 'No JSON object after conversation marker'
        )
        return
      }

      const decoded = decodeJsonSpan(raw)
      if (!decoded.ok) {
        failure(decoded.error)
        return
      }

      conversations.push(
        this.toConversation(conversationId, decoded.value, lineNumber, lineIndex, nextSequence)
      )
    })

    return { conversations, warnings }
  }

  private toConversation(
    conversationId: string,
    document: unknown,
    lineNumber: number,
    lineIndex: MessageLineIndex,
    nextSequence: () => number
  ): Conversation {
    const participants = new Set<string>()
    const messages: Message[] = []

    const dm = isObject(document) ? document.dmConversation : undefined
    const entries: unknown[] = isObject(dm) && Array.isArray(dm.messages) ? dm.messages : []

    for (const entry of entries) {
      const create = isObject(entry) ? entry.messageCreate : undefined
      if (!isObject(create)) continue

      const senderId = asString(create.senderId)
      const recipientId = asString(create.recipientId)
      participants.add(senderId)
      participants.add(recipientId)

      const sourceId = asString(create.id)
      const index = nextSequence()
      messages.push({
        id: sourceId || String(index),
        senderId,
        recipientId,
        text: asString(create.text),
        timestamp: parseCreatedAt(asString(create.createdAt)),
        sourceLineNumber: lineIndex.lineOf(sourceId),
        mediaUrls: asStringArray(create.mediaUrls),
        urls: extractUrls(create.urls)
      })
    }

    // Exports list newest first
    messages.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())

    return {
      id: conversationId,
      participants: [...participants],
      messages,
      sourceLineNumber: lineNumber,
      metadata: {}
    }
  }
}

function countNewlines(content: string, end: number): number {
  let count = 0
  let index = content.indexOf('\n')
  while (index !== -1 && index < end) {
    count++
    index = content.indexOf('\n', index + 1)
  }
  return count
}
