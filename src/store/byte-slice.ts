/**
 * @fileoverview Byte-sliced uint32 column decoding
 *
 * The store keeps several uint32 columns (chunk numbers, sub prefixes) in a
 * "byte-sliced" layout. Adjacent values share their high-order bytes but
 * not their low-order ones, and DEFLATE needs matches of at least three
 * bytes, so each value is split into four one-byte slices that are stored
 * separately:
 *
 * ```
 * uint32 len1, bytes[len1]   zlib data, inflates to the MSB of every value
 * uint32 len2, bytes[len2]   zlib data, 2nd byte of every value
 * uint32 len3, bytes[len3]   zlib data, 3rd byte of every value
 * bytes[count]               LSB of every value, uncompressed
 * ```
 *
 * @module store/byte-slice
 */

import pako from 'pako'
import { FormatError } from '../errors'
import type { ByteReader } from './reader'

/** Number of DEFLATE-compressed slices before the raw LSB slice */
export const COMPRESSED_SLICES = 3

/** zlib status for input that ends before the stream does */
const Z_BUF_ERROR = -5

/**
 * Inflate one zlib-wrapped slice.
 */
function inflateSlice(data: Uint8Array, field: string, offset: number): Uint8Array {
  const inflator = new pako.Inflate()
  inflator.push(data, true)

  if (inflator.err === Z_BUF_ERROR) {
    throw FormatError.decompression(field, offset, 'incomplete deflate stream')
  }
  if (inflator.err !== 0) {
    throw FormatError.decompression(field, offset, inflator.msg || `zlib error ${inflator.err}`)
  }

  // pako leaves `result` unset when the stream ends before its final block
  const result: unknown = inflator.result
  if (!(result instanceof Uint8Array)) {
    throw FormatError.decompression(field, offset, 'incomplete deflate stream')
  }
  return result
}

/**
 * Decode a byte-sliced column of `count` unsigned 32-bit values.
 *
 * @param reader - Reader positioned at the first slice length
 * @param count - Number of values in the column
 * @param column - Column name used in error messages
 * @returns The decoded values; the reader is left after the raw slice
 * @throws {FormatError} TRUNCATED, DECOMPRESSION_ERROR or SLICE_LENGTH_MISMATCH
 *
 * @example
 * const reader = new ByteReader(bytes)
 * const addChunks = decodeColumn(reader, header.numAddPrefix, 'addPrefix.addChunk')
 */
export function decodeColumn(reader: ByteReader, count: number, column = 'column'): number[] {
  const slices: Uint8Array[] = []

  for (let s = 1; s <= COMPRESSED_SLICES; s++) {
    const field = `${column} slice ${s}`
    const start = reader.offset
    const compressedLength = reader.readUint32(`${field} length`)
    const compressed = reader.readBytes(compressedLength, field)
    const slice = inflateSlice(compressed, field, start)
    if (slice.length !== count) {
      throw FormatError.sliceLength(field, start, count, slice.length)
    }
    slices.push(slice)
  }

  const raw = reader.readBytes(count, `${column} slice ${COMPRESSED_SLICES + 1}`)

  const [msb, second, third] = slices
  const values = new Array<number>(count)
  for (let i = 0; i < count; i++) {
    values[i] = ((msb[i] << 24) | (second[i] << 16) | (third[i] << 8) | raw[i]) >>> 0
  }
  return values
}
