/**
 * @fileoverview sbstore-dump - URL blocklist database decoder
 *
 * Decodes `.sbstore` store files and their companion `.pset` prefix set
 * files into sorted, typed records, and renders them as text.
 *
 * **Layout**:
 * - **Core**: byte-sliced column codec, store parser, prefix set decoder,
 *   record assembler, and the `decodeList` boundary API. Pure functions
 *   over bytes; no I/O and no logging.
 * - **Outer layers**: directory scanning, text reporting, and the `sbdump`
 *   command-line tool.
 *
 * @module sbstore-dump
 *
 * @example
 * ```typescript
 * import { readFile } from 'fs/promises'
 * import { decodeList, formatDataset } from 'sbstore-dump'
 *
 * const result = decodeList(
 *   await readFile('goog-malware-shavar.sbstore'),
 *   await readFile('goog-malware-shavar.pset'),
 *   { name: 'goog-malware-shavar' }
 * )
 * if (result.ok) {
 *   console.log(formatDataset(result.dataset).join('\n'))
 * }
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type {
  AddPrefix,
  PendingAddPrefix,
  SubPrefix,
  AddComplete,
  SubComplete,
  HashRecord,
  HashRecordKind,
  StoreHeader,
  ParsedStore,
  ListDataset,
  PrefixSetIndex,
} from './types/records'

export { COMPLETE_HASH_SIZE, CHECKSUM_SIZE } from './types/records'

// =============================================================================
// Errors
// =============================================================================

export {
  DumpError,
  FormatError,
  ScanError,
  ConfigError,
  isDumpError,
  isFormatError,
  isScanError,
  hasErrorCode,
  type DumpErrorCode,
  type FormatErrorCode,
  type FormatErrorContext,
  type ScanErrorCode,
} from './errors'

// =============================================================================
// Core decoding
// =============================================================================

export { ByteReader } from './store/reader'
export { decodeColumn, COMPRESSED_SLICES } from './store/byte-slice'
export {
  parseStore,
  parseStoreHeader,
  computeStoreChecksum,
  STORE_HEADER_SIZE,
  type ParseStoreOptions,
} from './store/parser'
export {
  decodePrefixSet,
  readPrefixSetIndex,
  expandPrefixSet,
  PREFIX_SET_HEADER_SIZE,
} from './pset/decoder'
export {
  fillAddPrefixes,
  sortDataset,
  compareBytes,
  compareAddPrefix,
  compareSubPrefix,
  compareAddComplete,
  compareSubComplete,
} from './dataset/assembler'
export { decodeList, type DecodeOptions, type DecodeResult } from './decode'

// =============================================================================
// Outer layers
// =============================================================================

export {
  scanDirectory,
  readListFiles,
  STORE_EXTENSION,
  PREFIX_SET_EXTENSION,
  type ListFiles,
  type ListBytes,
  type ScanOptions,
} from './scan/directory'
export {
  formatDataset,
  formatHeader,
  formatChunkList,
  formatAddPrefix,
  formatSubPrefix,
  formatAddComplete,
  formatSubComplete,
  formatChecksum,
  formatError,
  type FormatOptions,
} from './report/format'
export { resolveConfig, DEFAULT_LOG_LEVEL, type DumpConfig, type DumpFlags, type Env } from './config'
export { createLogger, noopLogger, parseLogLevel, LogLevel, type Logger, type LogEntry, type LoggerOptions } from './utils/logger'
export { bytesToHex, formatPrefix } from './utils/hex'
export { runCLI, parseArgs, type CLIOptions, type CLIResult, type ParsedArgs } from './cli/index'
export { runDump, type DumpSummary, type DumpIO, type ListFailure } from './cli/commands/dump'
