/**
 * Test-only encoders for store and prefix set files.
 *
 * The library has no write path; these helpers build well-formed (or
 * deliberately broken) inputs for the decoder tests.
 */

import * as crypto from 'crypto'
import pako from 'pako'

export function u32(value: number): Uint8Array {
  const bytes = new Uint8Array(4)
  new DataView(bytes.buffer).setUint32(0, value >>> 0, true)
  return bytes
}

export function u16(value: number): Uint8Array {
  const bytes = new Uint8Array(2)
  new DataView(bytes.buffer).setUint16(0, value, true)
  return bytes
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0)
  const out = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    out.set(part, offset)
    offset += part.length
  }
  return out
}

/** A 32-byte hash filled with `byte`, optionally with a different first byte */
export function hash(byte: number, first = byte): Uint8Array {
  const bytes = new Uint8Array(32).fill(byte)
  bytes[0] = first
  return bytes
}

/**
 * Encode the three compressed slices and the raw slice as given.
 */
export function encodeSlices(compressed: [Uint8Array, Uint8Array, Uint8Array], raw: Uint8Array): Uint8Array {
  const parts: Uint8Array[] = []
  for (const slice of compressed) {
    const deflated = pako.deflate(slice)
    parts.push(u32(deflated.length), deflated)
  }
  parts.push(raw)
  return concat(...parts)
}

/**
 * Byte-slice a uint32 column.
 */
export function encodeByteSliced(values: readonly number[]): Uint8Array {
  const slice = (shift: number) => Uint8Array.from(values, (v) => (v >>> shift) & 0xff)
  return encodeSlices([slice(24), slice(16), slice(8)], slice(0))
}

export interface StoreFixture {
  magic?: number
  version?: number
  addChunks?: number[]
  subChunks?: number[]
  /** Add chunk of each add prefix */
  addPrefixChunks?: number[]
  subPrefixes?: { prefix: number; addChunk: number; subChunk: number }[]
  addCompletes?: { hash: Uint8Array; addChunk: number }[]
  subCompletes?: { hash: Uint8Array; addChunk: number; subChunk: number }[]
  /** Explicit checksum; defaults to the MD5 of the preceding bytes */
  checksum?: Uint8Array
  /** Bytes appended after the checksum */
  trailing?: Uint8Array
}

export const TEST_MAGIC = 0x1231af3b
export const TEST_VERSION = 3

export function md5(data: Uint8Array): Uint8Array {
  return new Uint8Array(crypto.createHash('md5').update(data).digest())
}

export function buildStore(fixture: StoreFixture = {}): Uint8Array {
  const addChunks = fixture.addChunks ?? []
  const subChunks = fixture.subChunks ?? []
  const addPrefixChunks = fixture.addPrefixChunks ?? []
  const subPrefixes = fixture.subPrefixes ?? []
  const addCompletes = fixture.addCompletes ?? []
  const subCompletes = fixture.subCompletes ?? []

  const body = concat(
    u32(fixture.magic ?? TEST_MAGIC),
    u32(fixture.version ?? TEST_VERSION),
    u32(addChunks.length),
    u32(subChunks.length),
    u32(addPrefixChunks.length),
    u32(subPrefixes.length),
    u32(addCompletes.length),
    u32(subCompletes.length),
    ...addChunks.map(u32),
    ...subChunks.map(u32),
    encodeByteSliced(addPrefixChunks),
    encodeByteSliced(subPrefixes.map((p) => p.addChunk)),
    encodeByteSliced(subPrefixes.map((p) => p.subChunk)),
    encodeByteSliced(subPrefixes.map((p) => p.prefix)),
    ...addCompletes.flatMap((c) => [c.hash, u32(c.addChunk)]),
    ...subCompletes.flatMap((c) => [c.hash, u32(c.addChunk), u32(c.subChunk)])
  )

  return concat(body, fixture.checksum ?? md5(body), fixture.trailing ?? new Uint8Array(0))
}

export interface PrefixSetFixture {
  version?: number
  prefixes: number[]
  starts: number[]
  deltas: number[]
}

export function buildPrefixSet(fixture: PrefixSetFixture): Uint8Array {
  return concat(
    u32(fixture.version ?? 1),
    u32(fixture.prefixes.length),
    u32(fixture.deltas.length),
    ...fixture.prefixes.map(u32),
    ...fixture.starts.map(u32),
    ...fixture.deltas.map(u16)
  )
}

/**
 * Index + delta encode an ascending list of prefixes. A new anchor starts
 * when a gap does not fit in 16 bits or a run reaches `maxRun` deltas.
 */
export function encodePrefixSet(sorted: readonly number[], maxRun = 100): PrefixSetFixture {
  const prefixes: number[] = []
  const starts: number[] = []
  const deltas: number[] = []
  let run = 0

  for (let i = 0; i < sorted.length; i++) {
    const gap = i > 0 ? sorted[i] - sorted[i - 1] : Infinity
    if (gap > 0xffff || run >= maxRun) {
      prefixes.push(sorted[i])
      starts.push(deltas.length)
      run = 0
    } else {
      deltas.push(gap)
      run++
    }
  }

  return { prefixes, starts, deltas }
}

/** Prefix set file holding exactly `values`, in order */
export function prefixSetOf(values: readonly number[]): Uint8Array {
  return buildPrefixSet(encodePrefixSet(values))
}
