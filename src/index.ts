/**
 * dm-ingest Core Library
 *
 * Normalize messaging-platform exports (Twitter DM, Kik, Snapchat) into one
 * conversation/message model.
 *
 * Design principle: no network, no logging, no state shared between calls.
 * Each parse reads one file and returns fresh values.
 *
 * @license AGPL-3.0
 */

export { exportToJSON, type JsonExport, type JsonExportMetadata, parseJSON } from './export/json'
export {
  BaseParser,
  buildCascade,
  createDefaultRegistry,
  DEFAULT_ENCODINGS,
  DEFAULT_SAMPLE_BYTES,
  decodeWithFallback,
  FormatError,
  KikParser,
  ParseError,
  ParserRegistry,
  SnapchatParser,
  summarizeExport,
  TwitterDmParser,
  UnreadableFileError,
  UnrecognizedFormatError
} from './parser/index'
export type * from './types'

export const VERSION = '0.1.0'
