/**
 * Parser Module
 *
 * Detect and parse message exports into normalized conversations.
 */

export { BaseParser, DEFAULT_SAMPLE_BYTES, splitLines } from './base'
export {
  buildCascade,
  DEFAULT_ENCODINGS,
  decodeSample,
  decodeWithFallback,
  isSupportedEncoding
} from './encoding'
export {
  describeError,
  FormatError,
  ParseError,
  UnreadableFileError,
  UnrecognizedFormatError
} from './errors'
export { KikParser, parseKikTimestamp } from './kik'
export {
  ALL_FILES_FILTER,
  ALL_SUPPORTED_DESCRIPTION,
  createDefaultRegistry,
  ParserRegistry
} from './registry'
export { firstSender, mostFrequentSender, resolveFromCandidates } from './sender'
export { describeContent, parseSnapchatTimestamp, SnapchatParser } from './snapchat'
export { summarizeExport } from './summary'
export { TwitterDmParser } from './twitter-dm'
