/**
 * @fileoverview Little-endian cursor over an in-memory file.
 *
 * Every read checks the remaining length first and throws
 * {@link FormatError} `TRUNCATED` instead of returning a short result.
 *
 * @module store/reader
 */

import { FormatError } from '../errors'

export class ByteReader {
  private readonly data: Uint8Array
  private readonly view: DataView
  private pos = 0

  constructor(data: Uint8Array) {
    this.data = data
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  }

  /** Current read position */
  get offset(): number {
    return this.pos
  }

  /** Number of unread bytes */
  get remaining(): number {
    return this.data.length - this.pos
  }

  /** Total input length */
  get length(): number {
    return this.data.length
  }

  private require(n: number, field: string): void {
    if (n > this.remaining) {
      throw FormatError.truncated(field, this.pos, n, this.remaining)
    }
  }

  readUint32(field: string): number {
    this.require(4, field)
    const value = this.view.getUint32(this.pos, true)
    this.pos += 4
    return value
  }

  readUint16(field: string): number {
    this.require(2, field)
    const value = this.view.getUint16(this.pos, true)
    this.pos += 2
    return value
  }

  /**
   * Read `n` bytes. The result is a view into the input, not a copy.
   */
  readBytes(n: number, field: string): Uint8Array {
    this.require(n, field)
    const bytes = this.data.subarray(this.pos, this.pos + n)
    this.pos += n
    return bytes
  }

  /**
   * Read `count` little-endian uint32 values.
   *
   * The whole array is length-checked before the first value is read.
   */
  readUint32Array(count: number, field: string): number[] {
    this.require(count * 4, field)
    const values = new Array<number>(count)
    for (let i = 0; i < count; i++) {
      values[i] = this.view.getUint32(this.pos, true)
      this.pos += 4
    }
    return values
  }

  readUint16Array(count: number, field: string): number[] {
    this.require(count * 2, field)
    const values = new Array<number>(count)
    for (let i = 0; i < count; i++) {
      values[i] = this.view.getUint16(this.pos, true)
      this.pos += 2
    }
    return values
  }

  /**
   * The bytes from `start` up to the current position.
   */
  consumedSince(start: number): Uint8Array {
    return this.data.subarray(start, this.pos)
  }
}
