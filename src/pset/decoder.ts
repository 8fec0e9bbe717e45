/**
 * @fileoverview Prefix set (.pset) decoding
 *
 * A prefix set stores a sorted list of 32-bit prefixes as a sparse index
 * of full "anchor" values, each followed by a run of 16-bit forward deltas:
 *
 * ```
 * uint32 version, indexSize, deltaSize
 * uint32[indexSize] index prefixes (anchors)
 * uint32[indexSize] index starts (first delta of each anchor's run)
 * uint16[deltaSize] deltas
 * ```
 *
 * Anchor `i` owns the deltas in `[starts[i], starts[i + 1])`; the last
 * anchor owns everything up to `deltaSize`.
 *
 * @module pset/decoder
 */

import { FormatError } from '../errors'
import type { PrefixSetIndex } from '../types/records'
import { ByteReader } from '../store/reader'

/** Size of the prefix set header in bytes */
export const PREFIX_SET_HEADER_SIZE = 12

/**
 * Read the raw index + delta arrays from a prefix set file.
 *
 * @throws {FormatError} TRUNCATED if the file is shorter than the sizes require
 */
export function readPrefixSetIndex(data: Uint8Array): PrefixSetIndex {
  const reader = new ByteReader(data)
  const version = reader.readUint32('pset version')
  const indexSize = reader.readUint32('pset indexSize')
  const deltaSize = reader.readUint32('pset deltaSize')

  const prefixes = reader.readUint32Array(indexSize, 'pset index prefixes')
  const starts = reader.readUint32Array(indexSize, 'pset index starts')
  const deltas = reader.readUint16Array(deltaSize, 'pset deltas')

  return { version, prefixes, starts, deltas }
}

/**
 * Expand an index into the flat, ascending prefix list.
 *
 * @throws {FormatError} INVALID_INDEX if a run's range is reversed or
 *   extends past the delta array
 *
 * @example
 * expandPrefixSet({ version: 1, prefixes: [100], starts: [0], deltas: [5, 5] })
 * // => [100, 105, 110]
 */
export function expandPrefixSet(index: PrefixSetIndex): number[] {
  const { prefixes: anchors, starts, deltas } = index
  const result: number[] = []

  for (let i = 0; i < anchors.length; i++) {
    let prefix = anchors[i]
    result.push(prefix)

    const start = starts[i]
    const end = i !== anchors.length - 1 ? starts[i + 1] : deltas.length
    if (start > end || end > deltas.length) {
      throw FormatError.invalidIndex(i, start, end, deltas.length)
    }

    for (let j = start; j < end; j++) {
      prefix += deltas[j]
      result.push(prefix)
    }
  }

  return result
}

/**
 * Decode a prefix set file into its sorted list of prefixes.
 *
 * A list whose first prefix is 0 is the canonical encoding of the empty
 * set and decodes to `[]`.
 *
 * @param data - The whole `.pset` file
 * @returns Prefixes in file order (ascending for well-formed files)
 * @throws {FormatError} TRUNCATED or INVALID_INDEX
 */
export function decodePrefixSet(data: Uint8Array): number[] {
  const prefixes = expandPrefixSet(readPrefixSetIndex(data))
  if (prefixes.length > 0 && prefixes[0] === 0) {
    return []
  }
  return prefixes
}
