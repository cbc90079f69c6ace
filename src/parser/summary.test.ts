import { describe, expect, it } from 'vitest'
import { createConversation, createMessage } from '../test-support/index'
import type { ParsedExport } from '../types'
import { summarizeExport } from './summary'

function parsedWith(conversations: ParsedExport['conversations']): ParsedExport {
  return { platform: 'Kik Messenger', conversations, lines: [], warnings: [], encoding: 'utf-8' }
}

describe('summarizeExport', () => {
  it('counts messages, participants and attachments', () => {
    const summary = summarizeExport(
      parsedWith([
        createConversation([
          createMessage({
            id: '1',
            senderId: 'a',
            recipientId: 'b',
            timestamp: new Date('2024-01-03T00:00:00Z'),
            urls: ['https://example.com']
          }),
          createMessage({
            id: '2',
            senderId: 'b',
            recipientId: 'a',
            timestamp: new Date('2024-01-01T00:00:00Z'),
            mediaUrls: ['media-1']
          })
        ]),
        createConversation([createMessage({ id: '3', senderId: 'c', recipientId: 'a' })], 'a-c')
      ])
    )

    expect(summary).toEqual({
      conversationCount: 2,
      messageCount: 3,
      errorCount: 0,
      participantCount: 3,
      dateRange: {
        start: new Date('2024-01-01T00:00:00Z'),
        end: new Date('2024-01-03T00:00:00Z')
      },
      urlCount: 1,
      mediaCount: 1
    })
  })

  it('counts error conversations and has no range without messages', () => {
    const summary = summarizeExport(
      parsedWith([
        {
          id: 'broken',
          participants: [],
          messages: [],
          sourceLineNumber: 4,
          metadata: { error: 'Unterminated JSON object', rawContent: '{' }
        }
      ])
    )

    expect(summary.errorCount).toBe(1)
    expect(summary.messageCount).toBe(0)
    expect(summary.dateRange).toBeNull()
  })
})
