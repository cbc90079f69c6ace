/**
 * Primary Sender
 *
 * None of the supported exports label the account owner, yet it decides which
 * messages render as "sent". These helpers infer it.
 */

import type { Conversation, PrimarySenderResolution } from '../types'

const UNRESOLVED: PrimarySenderResolution = { senderId: null, method: null, bestEffort: false }

/**
 * Participant with the most authored messages. Ties go to whoever sent first.
 */
export function mostFrequentSender(conversation: Conversation): string | null {
  const counts = new Map<string, number>()
  for (const message of conversation.messages) {
    counts.set(message.senderId, (counts.get(message.senderId) ?? 0) + 1)
  }

  let best: string | null = null
  let bestCount = 0
  for (const [senderId, count] of counts) {
    if (count > bestCount) {
      best = senderId
      bestCount = count
    }
  }
  return best
}

/**
 * Sender of the chronologically first message. Messages are already sorted,
 * so this is the head of the list.
 */
export function firstSender(conversation: Conversation): string | null {
  return conversation.messages[0]?.senderId ?? null
}

export function hasAuthored(conversation: Conversation, senderId: string): boolean {
  return conversation.messages.some((m) => m.senderId === senderId)
}

export function resolveByMessageCount(conversation: Conversation): PrimarySenderResolution {
  const senderId = mostFrequentSender(conversation)
  return senderId === null ? UNRESOLVED : { senderId, method: 'most-messages', bestEffort: false }
}

/**
 * Owner resolution for exports reconstructed from flat rows:
 * 1. a configured owner id that authored at least one message
 * 2. two-party conversations: whoever spoke first (a guess, flagged bestEffort)
 * 3. the most frequent sender
 */
export function resolveFromCandidates(
  conversation: Conversation,
  ownerIds: readonly (string | undefined)[]
): PrimarySenderResolution {
  for (const ownerId of ownerIds) {
    if (ownerId && hasAuthored(conversation, ownerId)) {
      return { senderId: ownerId, method: 'configured', bestEffort: false }
    }
  }

  if (conversation.participants.length === 2) {
    const senderId = firstSender(conversation)
    if (senderId !== null) {
      return { senderId, method: 'first-sender', bestEffort: true }
    }
  }

  return resolveByMessageCount(conversation)
}
