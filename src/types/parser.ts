/**
 * Parser Types
 *
 * Normalized message model shared by every export parser and its consumers.
 */

export type PlatformName = 'Twitter DM' | 'Kik Messenger' | 'Snapchat'

export interface Message {
  readonly id: string
  readonly senderId: string
  readonly recipientId: string
  /** Body text, or a placeholder such as "[Media]" for media-only messages */
  readonly text: string
  readonly timestamp: Date
  /** 1-based line in the raw file (0 when it could not be located) */
  readonly sourceLineNumber: number
  readonly mediaUrls: readonly string[]
  readonly urls: readonly string[]
}

export interface ConversationMetadata {
  /** Failure reason for a conversation unit that could not be decoded */
  readonly error?: string | undefined
  /** Bounded prefix of the offending span */
  readonly rawContent?: string | undefined
  readonly isGroup?: boolean | undefined
  readonly title?: string | undefined
  /** Platform conversation ids merged into this conversation */
  readonly sourceConversationIds?: readonly string[] | undefined
  readonly savedCount?: number | undefined
  readonly [key: string]: unknown
}

export interface Conversation {
  readonly id: string
  /** First-seen order */
  readonly participants: readonly string[]
  /** Ascending by timestamp, stable on ties */
  readonly messages: readonly Message[]
  readonly sourceLineNumber: number
  readonly metadata: ConversationMetadata
}

export type ParserWarningCode =
  | 'missing_column'
  | 'invalid_timestamp'
  | 'malformed_conversation'
  | 'encoding_fallback'

export interface ParserWarning {
  readonly code: ParserWarningCode
  readonly message: string
  /** 1-based source line, when the warning concerns one */
  readonly line?: number | undefined
}

export interface ParsedExport {
  readonly platform: PlatformName
  readonly conversations: readonly Conversation[]
  /** Raw file lines, for citing source line numbers */
  readonly lines: readonly string[]
  readonly warnings: readonly ParserWarning[]
  /** Encoding the file was decoded with */
  readonly encoding: string
}

export interface ParseOptions {
  /** Account owner identifier, when known from the case configuration */
  readonly ownerId?: string | undefined
  /** Encodings to try before the built-in cascade */
  readonly encodings?: readonly string[] | undefined
}

export type PrimarySenderMethod = 'configured' | 'first-sender' | 'most-messages'

export interface PrimarySenderResolution {
  readonly senderId: string | null
  readonly method: PrimarySenderMethod | null
  /** True when the result rests on a directionality guess */
  readonly bestEffort: boolean
}

export interface FileFilter {
  readonly description: string
  readonly pattern: string
}

export interface ParserInfo {
  readonly platformName: PlatformName
  readonly fileExtensions: readonly string[]
  readonly fileDescription: string
}

export interface ExportSummary {
  readonly conversationCount: number
  readonly messageCount: number
  readonly errorCount: number
  readonly participantCount: number
  readonly dateRange: {
    readonly start: Date
    readonly end: Date
  } | null
  readonly urlCount: number
  readonly mediaCount: number
}

/** Construction-time settings, typically from the case configuration */
export interface ParserSettings {
  /** Owner id consulted after a per-call ownerId */
  readonly defaultOwnerId?: string | undefined
  /** Bytes read for content sniffing */
  readonly sampleBytes?: number | undefined
}
