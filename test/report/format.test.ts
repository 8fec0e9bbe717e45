import { describe, it, expect } from 'vitest'
import {
  formatAddComplete,
  formatAddPrefix,
  formatChecksum,
  formatChunkList,
  formatDataset,
  formatError,
  formatHeader,
  formatSubComplete,
  formatSubPrefix,
} from '../../src/report/format'
import { FormatError, ScanError } from '../../src/errors'
import type { ListDataset } from '../../src/types/records'
import { hash } from '../helpers/fixtures'

const HASH_AB = 'ab'.repeat(32)
const HASH_CD = 'cd'.repeat(32)

const DATASET: ListDataset = {
  name: 'test-list',
  header: {
    magic: 0x1231af3b,
    version: 3,
    numAddChunk: 2,
    numSubChunk: 1,
    numAddPrefix: 1,
    numSubPrefix: 1,
    numAddComplete: 1,
    numSubComplete: 1,
  },
  addChunks: new Set([1, 2]),
  subChunks: new Set([9]),
  addPrefixes: [{ kind: 'add-prefix', prefix: 0x0a0b0c0d, addChunk: 1 }],
  subPrefixes: [{ kind: 'sub-prefix', prefix: 0xff, addChunk: 2, subChunk: 9 }],
  addCompletes: [{ kind: 'add-complete', hash: hash(0xab), addChunk: 2 }],
  subCompletes: [{ kind: 'sub-complete', hash: hash(0xcd), addChunk: 1, subChunk: 9 }],
  checksum: Uint8Array.from({ length: 16 }, (_, i) => i),
}

describe('Report formatting', () => {
  describe('line formatters', () => {
    it('should format the header', () => {
      expect(formatHeader('test-list', DATASET.header)).toBe(
        '[test-list] Magic 1231AF3B Version 3 NumAddChunk: 2 NumSubChunk: 1 NumAddPrefix: 1 NumSubPrefix: 1 NumAddComplete: 1 NumSubComplete: 1'
      )
    })

    it('should format chunk lists comma-separated', () => {
      expect(formatChunkList('l', 'AddChunks', [1, 2, 30])).toBe('[l] AddChunks: 1,2,30')
      expect(formatChunkList('l', 'SubChunks', new Set<number>())).toBe('[l] SubChunks: ')
    })

    it('should format prefixes as 8 hex digits', () => {
      expect(formatAddPrefix('l', { kind: 'add-prefix', prefix: 0x0a0b0c0d, addChunk: 4 })).toBe(
        '[l] addPrefix[chunk:4] 0a0b0c0d'
      )
      expect(formatSubPrefix('l', { kind: 'sub-prefix', prefix: 0xffffffff, addChunk: 4, subChunk: 6 })).toBe(
        '[l] subPrefix[chunk:6] ffffffff'
      )
    })

    it('should format completes with their full hash', () => {
      expect(formatAddComplete('l', { kind: 'add-complete', hash: hash(0xab), addChunk: 3 })).toBe(
        `[l] addComplete[chunk:3] ${HASH_AB}`
      )
      expect(formatSubComplete('l', { kind: 'sub-complete', hash: hash(0xcd), addChunk: 3, subChunk: 5 })).toBe(
        `[l] subComplete[chunk:5]: ${HASH_CD}`
      )
    })

    it('should format the checksum', () => {
      expect(formatChecksum('l', DATASET.checksum)).toBe('[l] MD5: 000102030405060708090a0b0c0d0e0f')
    })
  })

  describe('formatDataset', () => {
    it('should print the header, sub completes and checksum by default', () => {
      expect(formatDataset(DATASET)).toEqual([
        '[test-list] Magic 1231AF3B Version 3 NumAddChunk: 2 NumSubChunk: 1 NumAddPrefix: 1 NumSubPrefix: 1 NumAddComplete: 1 NumSubComplete: 1',
        `[test-list] subComplete[chunk:9]: ${HASH_CD}`,
        '[test-list] MD5: 000102030405060708090a0b0c0d0e0f',
      ])
    })

    it('should print every record in verbose mode', () => {
      expect(formatDataset(DATASET, { verbose: true })).toEqual([
        '[test-list] Magic 1231AF3B Version 3 NumAddChunk: 2 NumSubChunk: 1 NumAddPrefix: 1 NumSubPrefix: 1 NumAddComplete: 1 NumSubComplete: 1',
        '[test-list] AddChunks: 1,2',
        '[test-list] SubChunks: 9',
        '[test-list] addPrefix[chunk:1] 0a0b0c0d',
        '[test-list] subPrefix[chunk:9] 000000ff',
        `[test-list] addComplete[chunk:2] ${HASH_AB}`,
        `[test-list] subComplete[chunk:9]: ${HASH_CD}`,
        '[test-list] MD5: 000102030405060708090a0b0c0d0e0f',
      ])
    })

    it('should tag lines with ? when the dataset has no name', () => {
      const lines = formatDataset({ ...DATASET, name: undefined })

      expect(lines[lines.length - 1]).toBe('[?] MD5: 000102030405060708090a0b0c0d0e0f')
    })
  })

  describe('formatError', () => {
    it('should include the code of library errors', () => {
      expect(formatError('l', FormatError.trailingData(40, 1))).toBe(
        "[l] error TRAILING_DATA: File doesn't end where expected: 1 bytes remaining at offset 40"
      )
      expect(formatError('l', ScanError.missingPrefixSet('/db/l.pset'))).toBe(
        '[l] error MISSING_PREFIX_SET: Prefix set file not found: /db/l.pset'
      )
    })

    it('should print other errors by message', () => {
      expect(formatError('l', new Error('boom'))).toBe('[l] error: boom')
      expect(formatError('l', 'plain')).toBe('[l] error: plain')
    })
  })
})
