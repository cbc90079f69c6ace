/**
 * JSON Export
 *
 * Serialize a parsed export for downstream viewers, with metadata.
 * Raw lines are left out; consumers cite line numbers against the source file.
 */

import type { Conversation, ParsedExport, ParserWarning, PlatformName } from '../types'

export interface JsonExportMetadata {
  readonly version: string
  readonly generatedAt: Date
  readonly inputFile?: string | undefined
  readonly platform: PlatformName
  readonly encoding: string
  readonly conversationCount: number
  readonly messageCount: number
  /** Primary sender per conversation id, when resolved */
  readonly primarySenders?: Readonly<Record<string, string>> | undefined
}

export interface JsonExport {
  metadata: JsonExportMetadata
  conversations: Conversation[]
  warnings: ParserWarning[]
}

/**
 * Export a parsed file to JSON.
 *
 * @param parsed Result of a parse call
 * @param metadata Extra metadata (version, input file, resolved senders)
 * @returns JSON string
 */
export function exportToJSON(
  parsed: ParsedExport,
  metadata: Partial<Omit<JsonExportMetadata, 'platform' | 'encoding'>> = {}
): string {
  const messageCount = parsed.conversations.reduce((n, c) => n + c.messages.length, 0)

  const exportData: JsonExport = {
    metadata: {
      version: metadata.version ?? '1.0.0',
      generatedAt: metadata.generatedAt ?? new Date(),
      inputFile: metadata.inputFile,
      platform: parsed.platform,
      encoding: parsed.encoding,
      conversationCount: metadata.conversationCount ?? parsed.conversations.length,
      messageCount: metadata.messageCount ?? messageCount,
      primarySenders: metadata.primarySenders
    },
    conversations: [...parsed.conversations],
    warnings: [...parsed.warnings]
  }

  return JSON.stringify(exportData, null, 2)
}

/**
 * Parse a JSON export back, restoring Date values.
 */
export function parseJSON(json: string): JsonExport {
  const data = JSON.parse(json) as JsonExport

  data.conversations = data.conversations.map((conversation) => ({
    ...conversation,
    messages: conversation.messages.map((message) => ({
      ...message,
      timestamp: new Date(message.timestamp)
    }))
  }))

  if (typeof data.metadata.generatedAt === 'string') {
    data.metadata = { ...data.metadata, generatedAt: new Date(data.metadata.generatedAt) }
  }

  return data
}
