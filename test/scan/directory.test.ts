import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { readListFiles, scanDirectory } from '../../src/scan/directory'
import { ScanError } from '../../src/errors'
import { createLogger, LogLevel, type LogEntry } from '../../src/utils/logger'

async function catchScanError(promise: Promise<unknown>): Promise<ScanError> {
  try {
    await promise
  } catch (error) {
    if (error instanceof ScanError) return error
    throw error
  }
  throw new Error('expected a ScanError')
}

describe('Directory scanning', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sbdump-scan-'))
    await fs.writeFile(path.join(dir, 'test-phish-simple.sbstore'), Uint8Array.from([1, 2]))
    await fs.writeFile(path.join(dir, 'test-phish-simple.pset'), Uint8Array.from([3]))
    await fs.writeFile(path.join(dir, 'test-malware-simple.sbstore'), Uint8Array.from([4]))
    await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored')
    await fs.mkdir(path.join(dir, 'nested'))
    await fs.writeFile(path.join(dir, 'nested', 'deep.sbstore'), Uint8Array.from([5]))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  describe('scanDirectory', () => {
    it('should list top-level stores sorted by name', async () => {
      const lists = await scanDirectory(dir)

      expect(lists).toEqual([
        {
          name: 'test-malware-simple',
          storePath: path.join(dir, 'test-malware-simple.sbstore'),
          prefixSetPath: path.join(dir, 'test-malware-simple.pset'),
        },
        {
          name: 'test-phish-simple',
          storePath: path.join(dir, 'test-phish-simple.sbstore'),
          prefixSetPath: path.join(dir, 'test-phish-simple.pset'),
        },
      ])
    })

    it('should filter by name', async () => {
      const lists = await scanDirectory(dir, { name: 'test-phish-simple' })

      expect(lists.map((l) => l.name)).toEqual(['test-phish-simple'])
    })

    it('should treat an empty name as no filter', async () => {
      expect(await scanDirectory(dir, { name: '' })).toHaveLength(2)
    })

    it('should return no lists for an unknown name', async () => {
      expect(await scanDirectory(dir, { name: 'missing' })).toEqual([])
    })

    it('should log skipped lists at debug level', async () => {
      const entries: LogEntry[] = []
      const logger = createLogger({ minLevel: LogLevel.DEBUG, handler: (e) => entries.push(e) })

      await scanDirectory(dir, { name: 'test-phish-simple', logger })

      expect(entries.map((e) => e.message)).toEqual(['Skipping list', 'Scanned directory'])
      expect(entries[0].data).toEqual({ name: 'test-malware-simple' })
      expect(entries[1].data).toEqual({ dir, lists: 1 })
    })

    it('should report NOT_FOUND for a missing directory', async () => {
      const missing = path.join(dir, 'absent')
      const error = await catchScanError(scanDirectory(missing))

      expect(error.code).toBe('NOT_FOUND')
      expect(error.path).toBe(missing)
      expect(error.message).toBe(`Directory not found: ${missing}`)
    })

    it('should report NOT_A_DIRECTORY for a file', async () => {
      const file = path.join(dir, 'notes.txt')
      const error = await catchScanError(scanDirectory(file))

      expect(error.code).toBe('NOT_A_DIRECTORY')
      expect(error.path).toBe(file)
    })
  })

  describe('readListFiles', () => {
    it('should read both files', async () => {
      const [list] = await scanDirectory(dir, { name: 'test-phish-simple' })
      const bytes = await readListFiles(list)

      expect(Array.from(bytes.storeBytes)).toEqual([1, 2])
      expect(Array.from(bytes.prefixSetBytes)).toEqual([3])
    })

    it('should report MISSING_PREFIX_SET when the .pset is absent', async () => {
      const [list] = await scanDirectory(dir, { name: 'test-malware-simple' })
      const error = await catchScanError(readListFiles(list))

      expect(error.code).toBe('MISSING_PREFIX_SET')
      expect(error.path).toBe(list.prefixSetPath)
    })

    it('should report NOT_FOUND when the store vanished', async () => {
      const [list] = await scanDirectory(dir, { name: 'test-phish-simple' })
      await fs.rm(list.storePath)

      const error = await catchScanError(readListFiles(list))

      expect(error.code).toBe('NOT_FOUND')
      expect(error.message).toBe(`Store file not found: ${list.storePath}`)
    })
  })
})
