/**
 * @fileoverview Decoding one list from its store and prefix set bytes.
 *
 * @module decode
 */

import { FormatError } from './errors'
import { fillAddPrefixes, sortDataset } from './dataset/assembler'
import { decodePrefixSet } from './pset/decoder'
import { parseStore } from './store/parser'
import type { ListDataset } from './types/records'

export interface DecodeOptions {
  /** List name recorded on the dataset */
  name?: string
  /** Verify the store's trailing MD5 checksum */
  verifyChecksum?: boolean
}

export type DecodeResult =
  | { ok: true; dataset: ListDataset }
  | { ok: false; error: FormatError }

/**
 * Decode a list into a sorted, fully reconstructed dataset.
 *
 * Format failures are returned, not thrown. Anything else that throws is a
 * bug and propagates.
 *
 * @example
 * const result = decodeList(storeBytes, psetBytes, { name: 'goog-phish-shavar' })
 * if (result.ok) {
 *   console.log(result.dataset.addPrefixes.length)
 * } else {
 *   console.error(result.error.code, result.error.message)
 * }
 */
export function decodeList(
  storeBytes: Uint8Array,
  prefixSetBytes: Uint8Array,
  options: DecodeOptions = {}
): DecodeResult {
  try {
    const store = parseStore(storeBytes, { verifyChecksum: options.verifyChecksum })
    const prefixes = decodePrefixSet(prefixSetBytes)
    const dataset = fillAddPrefixes(store, prefixes, options.name)
    return { ok: true, dataset: sortDataset(dataset) }
  } catch (error) {
    if (error instanceof FormatError) {
      return { ok: false, error }
    }
    throw error
  }
}
