/**
 * @fileoverview Text rendering of decoded lists.
 *
 * Every function returns lines without trailing newlines; the CLI decides
 * where they go. Each line is tagged with the list name in brackets.
 *
 * @module report/format
 *
 * @example
 * ```typescript
 * for (const line of formatDataset(dataset, { verbose: true })) {
 *   console.log(line)
 * }
 * // [test-malware-simple] Magic 1231AF3B Version 3 NumAddChunk: 2 ...
 * // [test-malware-simple] AddChunks: 1,2
 * // [test-malware-simple] addPrefix[chunk:1] 0a0b0c0d
 * ```
 */

import { isDumpError } from '../errors'
import type {
  AddComplete,
  AddPrefix,
  ListDataset,
  StoreHeader,
  SubComplete,
  SubPrefix,
} from '../types/records'
import { bytesToHex, formatPrefix, formatUint32Upper } from '../utils/hex'

export interface FormatOptions {
  /** Include chunk lists, prefixes and add completes */
  verbose?: boolean
}

export function formatHeader(name: string, header: StoreHeader): string {
  return (
    `[${name}] Magic ${formatUint32Upper(header.magic)} Version ${header.version}` +
    ` NumAddChunk: ${header.numAddChunk} NumSubChunk: ${header.numSubChunk}` +
    ` NumAddPrefix: ${header.numAddPrefix} NumSubPrefix: ${header.numSubPrefix}` +
    ` NumAddComplete: ${header.numAddComplete} NumSubComplete: ${header.numSubComplete}`
  )
}

export function formatChunkList(name: string, label: 'AddChunks' | 'SubChunks', chunks: Iterable<number>): string {
  return `[${name}] ${label}: ${Array.from(chunks).join(',')}`
}

export function formatAddPrefix(name: string, record: AddPrefix): string {
  return `[${name}] addPrefix[chunk:${record.addChunk}] ${formatPrefix(record.prefix)}`
}

export function formatSubPrefix(name: string, record: SubPrefix): string {
  return `[${name}] subPrefix[chunk:${record.subChunk}] ${formatPrefix(record.prefix)}`
}

export function formatAddComplete(name: string, record: AddComplete): string {
  return `[${name}] addComplete[chunk:${record.addChunk}] ${bytesToHex(record.hash)}`
}

export function formatSubComplete(name: string, record: SubComplete): string {
  return `[${name}] subComplete[chunk:${record.subChunk}]: ${bytesToHex(record.hash)}`
}

export function formatChecksum(name: string, checksum: Uint8Array): string {
  return `[${name}] MD5: ${bytesToHex(checksum)}`
}

/**
 * Render a whole list.
 *
 * Sub completes, the header and the checksum are always shown; everything
 * else only in verbose mode.
 *
 * @param dataset - Decoded list; its `name` tags every line (`?` if unset)
 */
export function formatDataset(dataset: ListDataset, options: FormatOptions = {}): string[] {
  const name = dataset.name ?? '?'
  const lines: string[] = [formatHeader(name, dataset.header)]

  if (options.verbose) {
    lines.push(formatChunkList(name, 'AddChunks', dataset.addChunks))
    lines.push(formatChunkList(name, 'SubChunks', dataset.subChunks))
    for (const record of dataset.addPrefixes) lines.push(formatAddPrefix(name, record))
    for (const record of dataset.subPrefixes) lines.push(formatSubPrefix(name, record))
    for (const record of dataset.addCompletes) lines.push(formatAddComplete(name, record))
  }

  for (const record of dataset.subCompletes) lines.push(formatSubComplete(name, record))
  lines.push(formatChecksum(name, dataset.checksum))
  return lines
}

/**
 * One-line description of a failure for a list.
 */
export function formatError(name: string, error: unknown): string {
  if (isDumpError(error)) {
    return `[${name}] error ${error.code}: ${error.message}`
  }
  const message = error instanceof Error ? error.message : String(error)
  return `[${name}] error: ${message}`
}
