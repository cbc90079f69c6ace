/**
 * Test Support Module
 *
 * Builders for normalized values and synthetic export files.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { Conversation, Message } from '../types'

/**
 * Create a Message with default values for testing.
 */
export function createMessage(
  overrides: Partial<Message> & { id: string; senderId: string }
): Message {
  return {
    recipientId: 'other',
    text: 'hello',
    timestamp: new Date('2024-01-01T10:00:00Z'),
    sourceLineNumber: 0,
    mediaUrls: [],
    urls: [],
    ...overrides
  }
}

/**
 * Create a Conversation whose participants are taken from its messages.
 */
export function createConversation(messages: readonly Message[], id = 'conv'): Conversation {
  const participants = new Set<string>()
  for (const message of messages) {
    participants.add(message.senderId)
    participants.add(message.recipientId)
  }
  return { id, participants: [...participants], messages, sourceLineNumber: 1, metadata: {} }
}

/**
 * Scratch directory for fixture files. Call cleanup() in afterEach.
 */
export class TempFiles {
  readonly dir: string

  constructor(prefix = 'dm-ingest-test-') {
    this.dir = mkdtempSync(join(tmpdir(), prefix))
  }

  write(name: string, content: string | Uint8Array): string {
    const path = join(this.dir, name)
    writeFileSync(path, content)
    return path
  }

  cleanup(): void {
    rmSync(this.dir, { recursive: true, force: true })
  }
}

export interface TwitterMessageFixture {
  id: string
  senderId: string
  recipientId: string
  text: string
  createdAt: string
  urls?: { url: string; expanded?: string }[]
  mediaUrls?: string[]
}

/**
 * JSON body of one conversation unit, pretty-printed the way exports are.
 */
export function twitterUnit(messages: readonly TwitterMessageFixture[]): string {
  const document = {
    dmConversation: {
      messages: messages.map((m) => ({
        messageCreate: {
          id: m.id,
          senderId: m.senderId,
          recipientId: m.recipientId,
          text: m.text,
          createdAt: m.createdAt,
          mediaUrls: m.mediaUrls ?? [],
          urls: m.urls ?? []
        }
      }))
    }
  }
  return JSON.stringify(document, null, 2)
}

/**
 * A complete signed export. Each unit is `[conversationId, jsonBody]`.
 */
export function twitterExport(units: readonly (readonly [string, string])[]): string {
  const body = units.map(([id, json]) => `**** conversationId: ${id} ****\n${json}`).join('\n')
  return [
    '-----BEGIN PGP SIGNED MESSAGE-----',
    'Hash: SHA256',
    '',
    body,
    '-----BEGIN PGP SIGNATURE-----',
    'c2lnbmF0dXJl',
    '-----END PGP SIGNATURE-----',
    ''
  ].join('\n')
}

export const KIK_HEADER = 'msg_id,sender_jid,receiver_jid,chat_type,msg,sent_at'

export function kikCsv(rows: readonly string[]): string {
  return [KIK_HEADER, ...rows, ''].join('\n')
}

export const SNAPCHAT_HEADER =
  'content_type,message_type,conversation_id,message_id,sender_username,recipient_username,text,media_id,is_saved,is_one_on_one,conversation_title,group_member_usernames,timestamp'

export const SNAPCHAT_LEGEND = [
  'Snapchat chat history for target user',
  'Legend: content_type and message_type describe the item, timestamp is when it was sent',
  ''
]

export function snapchatCsv(rows: readonly string[]): string {
  return [...SNAPCHAT_LEGEND, SNAPCHAT_HEADER, ...rows, ''].join('\n')
}
