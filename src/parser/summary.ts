/**
 * Export Summary
 *
 * Headline numbers for a parsed export: what the CLI prints after a parse.
 */

import type { ExportSummary, ParsedExport } from '../types'

export function summarizeExport(parsed: ParsedExport): ExportSummary {
  const participants = new Set<string>()
  let messageCount = 0
  let errorCount = 0
  let urlCount = 0
  let mediaCount = 0
  let start: Date | null = null
  let end: Date | null = null

  for (const conversation of parsed.conversations) {
    if (conversation.metadata.error) {
      errorCount++
    }
    for (const participant of conversation.participants) {
      participants.add(participant)
    }
    for (const message of conversation.messages) {
      messageCount++
      if (message.urls.length > 0) urlCount++
      if (message.mediaUrls.length > 0) mediaCount++
      if (!start || message.timestamp < start) start = message.timestamp
      if (!end || message.timestamp > end) end = message.timestamp
    }
  }

  return {
    conversationCount: parsed.conversations.length,
    messageCount,
    errorCount,
    participantCount: participants.size,
    dateRange: start && end ? { start, end } : null,
    urlCount,
    mediaCount
  }
}
