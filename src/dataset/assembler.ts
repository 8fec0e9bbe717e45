/**
 * @fileoverview Binding prefix set values onto store records, and sorting.
 *
 * @module dataset/assembler
 */

import { FormatError } from '../errors'
import type {
  AddComplete,
  AddPrefix,
  ListDataset,
  ParsedStore,
  SubComplete,
  SubPrefix,
} from '../types/records'

// ============================================================================
// Fill
// ============================================================================

/**
 * Bind decoded prefixes onto the store's pending add prefixes.
 *
 * `prefixes[i]` becomes the prefix of the i-th add prefix in store order.
 * The two files are written in the same order; that is not re-checked.
 *
 * @param store - Parsed store
 * @param prefixes - Output of {@link decodePrefixSet} for the same list
 * @param name - Optional list name to record on the dataset
 * @throws {FormatError} PREFIX_COUNT_MISMATCH if the lengths differ
 */
export function fillAddPrefixes(store: ParsedStore, prefixes: readonly number[], name?: string): ListDataset {
  if (prefixes.length !== store.addPrefixes.length) {
    throw FormatError.prefixCount(store.addPrefixes.length, prefixes.length)
  }

  const addPrefixes = store.addPrefixes.map(
    (pending, i): AddPrefix => ({ kind: 'add-prefix', prefix: prefixes[i], addChunk: pending.addChunk })
  )

  return {
    ...(name !== undefined && { name }),
    header: store.header,
    addChunks: store.addChunks,
    subChunks: store.subChunks,
    addPrefixes,
    subPrefixes: store.subPrefixes,
    addCompletes: store.addCompletes,
    subCompletes: store.subCompletes,
    checksum: store.checksum,
  }
}

// ============================================================================
// Ordering
// ============================================================================

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Lexicographic comparison by unsigned byte; a shorter array that is a
 * prefix of the other sorts first.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length)
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i]
    }
  }
  return a.length - b.length
}

/** Orders by (prefix, addChunk) */
export function compareAddPrefix(a: AddPrefix, b: AddPrefix): number {
  return compareNumbers(a.prefix, b.prefix) || compareNumbers(a.addChunk, b.addChunk)
}

/** Orders by (prefix, subChunk, addChunk) */
export function compareSubPrefix(a: SubPrefix, b: SubPrefix): number {
  return (
    compareNumbers(a.prefix, b.prefix) ||
    compareNumbers(a.subChunk, b.subChunk) ||
    compareNumbers(a.addChunk, b.addChunk)
  )
}

/** Orders by (hash, addChunk) */
export function compareAddComplete(a: AddComplete, b: AddComplete): number {
  return compareBytes(a.hash, b.hash) || compareNumbers(a.addChunk, b.addChunk)
}

/** Orders by (hash, subChunk, addChunk) */
export function compareSubComplete(a: SubComplete, b: SubComplete): number {
  return (
    compareBytes(a.hash, b.hash) ||
    compareNumbers(a.subChunk, b.subChunk) ||
    compareNumbers(a.addChunk, b.addChunk)
  )
}

/**
 * Return a copy of the dataset with all four record sequences in canonical
 * order. Sorting is stable: records with equal keys keep their store order.
 */
export function sortDataset(dataset: ListDataset): ListDataset {
  return {
    ...dataset,
    addPrefixes: [...dataset.addPrefixes].sort(compareAddPrefix),
    subPrefixes: [...dataset.subPrefixes].sort(compareSubPrefix),
    addCompletes: [...dataset.addCompletes].sort(compareAddComplete),
    subCompletes: [...dataset.subCompletes].sort(compareSubComplete),
  }
}
