/**
 * @fileoverview Store (.sbstore) file parser
 *
 * Format (all integers little-endian):
 * - 8 x uint32 header: magic, version, numAddChunk, numSubChunk,
 *   numAddPrefix, numSubPrefix, numAddComplete, numSubComplete
 * - numAddChunk x uint32: add chunk numbers
 * - numSubChunk x uint32: sub chunk numbers
 * - byte sliced (numAddPrefix): add chunk of each add prefix
 * - byte sliced (numSubPrefix): add chunk of each sub prefix
 * - byte sliced (numSubPrefix): sub chunk of each sub prefix
 * - byte sliced (numSubPrefix): sub prefix values
 * - numAddComplete x (32-byte hash, uint32 addChunk)
 * - numSubComplete x (32-byte hash, uint32 addChunk, uint32 subChunk)
 * - 16-byte MD5 of all preceding data
 *
 * Add prefix values are not in the store; they come from the companion
 * prefix set file (see pset/decoder).
 *
 * @module store/parser
 */

import * as crypto from 'crypto'
import { FormatError } from '../errors'
import { bytesToHex } from '../utils/hex'
import {
  CHECKSUM_SIZE,
  COMPLETE_HASH_SIZE,
  type AddComplete,
  type ParsedStore,
  type PendingAddPrefix,
  type StoreHeader,
  type SubComplete,
  type SubPrefix,
} from '../types/records'
import { decodeColumn } from './byte-slice'
import { ByteReader } from './reader'

/** Size of the fixed store header in bytes */
export const STORE_HEADER_SIZE = 32

export interface ParseStoreOptions {
  /**
   * Compare the trailing checksum against the MD5 of the preceding bytes.
   * Off by default: the checksum is reported, not verified.
   */
  verifyChecksum?: boolean
}

/**
 * Read the fixed store header. The magic and version are returned as
 * found; no value is rejected.
 */
export function parseStoreHeader(reader: ByteReader): StoreHeader {
  const [
    magic,
    version,
    numAddChunk,
    numSubChunk,
    numAddPrefix,
    numSubPrefix,
    numAddComplete,
    numSubComplete,
  ] = reader.readUint32Array(STORE_HEADER_SIZE / 4, 'header')

  return {
    magic,
    version,
    numAddChunk,
    numSubChunk,
    numAddPrefix,
    numSubPrefix,
    numAddComplete,
    numSubComplete,
  }
}

function readChunkSet(reader: ByteReader, count: number, field: string): Set<number> {
  return new Set(reader.readUint32Array(count, field))
}

/**
 * Compute the digest a strict reader expects in the trailing checksum.
 */
export function computeStoreChecksum(body: Uint8Array): Uint8Array {
  return new Uint8Array(crypto.createHash('md5').update(body).digest())
}

/**
 * Parse a complete store file.
 *
 * @param data - The whole `.sbstore` file
 * @param options - Parse options
 * @returns Store contents with add prefixes still pending
 * @throws {FormatError} On truncated input, bad slices, trailing bytes, or a
 *   checksum mismatch when `verifyChecksum` is set
 *
 * @example
 * const store = parseStore(await fs.readFile('goog-malware-shavar.sbstore'))
 * console.log(store.header.numAddPrefix, bytesToHex(store.checksum))
 */
export function parseStore(data: Uint8Array, options: ParseStoreOptions = {}): ParsedStore {
  const reader = new ByteReader(data)
  const header = parseStoreHeader(reader)

  const addChunks = readChunkSet(reader, header.numAddChunk, 'addChunks')
  const subChunks = readChunkSet(reader, header.numSubChunk, 'subChunks')

  const addPrefixAddChunks = decodeColumn(reader, header.numAddPrefix, 'addPrefix.addChunk')
  const subPrefixAddChunks = decodeColumn(reader, header.numSubPrefix, 'subPrefix.addChunk')
  const subPrefixSubChunks = decodeColumn(reader, header.numSubPrefix, 'subPrefix.subChunk')
  const subPrefixValues = decodeColumn(reader, header.numSubPrefix, 'subPrefix.prefix')

  const addPrefixes: PendingAddPrefix[] = addPrefixAddChunks.map((addChunk): PendingAddPrefix => ({
    kind: 'add-prefix',
    addChunk,
  }))

  const subPrefixes: SubPrefix[] = []
  for (let i = 0; i < header.numSubPrefix; i++) {
    subPrefixes.push({
      kind: 'sub-prefix',
      prefix: subPrefixValues[i],
      addChunk: subPrefixAddChunks[i],
      subChunk: subPrefixSubChunks[i],
    })
  }

  const addCompletes: AddComplete[] = []
  for (let i = 0; i < header.numAddComplete; i++) {
    // Hashes are copied out of the input buffer
    const hash = reader.readBytes(COMPLETE_HASH_SIZE, `addComplete[${i}].hash`).slice()
    const addChunk = reader.readUint32(`addComplete[${i}].addChunk`)
    addCompletes.push({ kind: 'add-complete', hash, addChunk })
  }

  const subCompletes: SubComplete[] = []
  for (let i = 0; i < header.numSubComplete; i++) {
    const hash = reader.readBytes(COMPLETE_HASH_SIZE, `subComplete[${i}].hash`).slice()
    const addChunk = reader.readUint32(`subComplete[${i}].addChunk`)
    const subChunk = reader.readUint32(`subComplete[${i}].subChunk`)
    subCompletes.push({ kind: 'sub-complete', hash, addChunk, subChunk })
  }

  const bodyEnd = reader.offset
  const checksum = reader.readBytes(CHECKSUM_SIZE, 'checksum').slice()

  if (reader.remaining > 0) {
    throw FormatError.trailingData(reader.offset, reader.remaining)
  }

  if (options.verifyChecksum) {
    const computed = computeStoreChecksum(data.subarray(0, bodyEnd))
    const expected = bytesToHex(computed)
    const actual = bytesToHex(checksum)
    if (expected !== actual) {
      throw FormatError.checksumMismatch(bodyEnd, expected, actual)
    }
  }

  return {
    header,
    addChunks,
    subChunks,
    addPrefixes,
    subPrefixes,
    addCompletes,
    subCompletes,
    checksum,
  }
}
