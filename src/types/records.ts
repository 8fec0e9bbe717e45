/**
 * @fileoverview Record and dataset types for decoded blocklist lists.
 *
 * A list is stored as two files: the `.sbstore` store holds chunk ids, the
 * add chunk of every add prefix, the sub prefixes and the full-hash
 * completions; the `.pset` prefix set holds the add prefix values
 * themselves. Store parsing therefore yields {@link PendingAddPrefix}
 * records, which only become {@link AddPrefix} records once the prefix set
 * has been decoded and bound onto them.
 *
 * @module types/records
 */

/** Length in bytes of a full-hash completion */
export const COMPLETE_HASH_SIZE = 32

/** Length in bytes of the trailing store checksum */
export const CHECKSUM_SIZE = 16

/**
 * Prefix added by an add chunk.
 */
export interface AddPrefix {
  readonly kind: 'add-prefix'
  /** 32-bit hash prefix */
  readonly prefix: number
  readonly addChunk: number
}

/**
 * Add prefix as read from the store, before its prefix value is known.
 */
export interface PendingAddPrefix {
  readonly kind: 'add-prefix'
  readonly addChunk: number
}

/**
 * Prefix removed by a sub chunk. `addChunk` names the chunk that added it.
 */
export interface SubPrefix {
  readonly kind: 'sub-prefix'
  readonly prefix: number
  readonly addChunk: number
  readonly subChunk: number
}

/**
 * Full 32-byte hash added by an add chunk.
 */
export interface AddComplete {
  readonly kind: 'add-complete'
  readonly hash: Uint8Array
  readonly addChunk: number
}

/**
 * Full 32-byte hash removed by a sub chunk.
 */
export interface SubComplete {
  readonly kind: 'sub-complete'
  readonly hash: Uint8Array
  readonly addChunk: number
  readonly subChunk: number
}

export type HashRecord = AddPrefix | SubPrefix | AddComplete | SubComplete

export type HashRecordKind = HashRecord['kind']

/**
 * Fixed 32-byte store header, eight little-endian uint32 fields.
 */
export interface StoreHeader {
  readonly magic: number
  readonly version: number
  readonly numAddChunk: number
  readonly numSubChunk: number
  readonly numAddPrefix: number
  readonly numSubPrefix: number
  readonly numAddComplete: number
  readonly numSubComplete: number
}

/**
 * Contents of a store file. Add prefixes are still pending.
 */
export interface ParsedStore {
  readonly header: StoreHeader
  readonly addChunks: ReadonlySet<number>
  readonly subChunks: ReadonlySet<number>
  readonly addPrefixes: readonly PendingAddPrefix[]
  readonly subPrefixes: readonly SubPrefix[]
  readonly addCompletes: readonly AddComplete[]
  readonly subCompletes: readonly SubComplete[]
  /** Raw trailing checksum, as stored */
  readonly checksum: Uint8Array
}

/**
 * A fully reconstructed list: store contents with every add prefix bound
 * to its value from the prefix set.
 */
export interface ListDataset extends Omit<ParsedStore, 'addPrefixes'> {
  /** List name, e.g. the file name without `.sbstore` */
  readonly name?: string
  readonly addPrefixes: readonly AddPrefix[]
}

/**
 * Raw index + delta encoding read from a prefix set file.
 */
export interface PrefixSetIndex {
  readonly version: number
  /** Anchor prefixes, one per index entry */
  readonly prefixes: readonly number[]
  /** Position in `deltas` where each anchor's run starts */
  readonly starts: readonly number[]
  /** 16-bit forward differences */
  readonly deltas: readonly number[]
}
