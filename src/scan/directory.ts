/**
 * @fileoverview Locating and reading list files in a database directory.
 *
 * A database directory (e.g. a browser profile's `safebrowsing/` folder)
 * holds one `<name>.sbstore` and one `<name>.pset` per list. Only the top
 * level is scanned.
 *
 * @module scan/directory
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { ScanError } from '../errors'
import { noopLogger, type Logger } from '../utils/logger'

export const STORE_EXTENSION = '.sbstore'
export const PREFIX_SET_EXTENSION = '.pset'

/**
 * Paths of the two files making up one list.
 */
export interface ListFiles {
  name: string
  storePath: string
  prefixSetPath: string
}

/**
 * Raw contents of a list's two files.
 */
export interface ListBytes {
  storeBytes: Uint8Array
  prefixSetBytes: Uint8Array
}

export interface ScanOptions {
  /** Only return the list with this name */
  name?: string
  logger?: Logger
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * List the stores in a directory, sorted by name.
 *
 * Prefix set paths are derived, not checked: a missing `.pset` surfaces
 * when the list is read.
 *
 * @throws {ScanError} NOT_FOUND or NOT_A_DIRECTORY
 */
export async function scanDirectory(dir: string, options: ScanOptions = {}): Promise<ListFiles[]> {
  const logger = options.logger ?? noopLogger

  let entries: string[]
  try {
    const stat = await fs.stat(dir)
    if (!stat.isDirectory()) {
      throw ScanError.notADirectory(dir)
    }
    entries = await fs.readdir(dir)
  } catch (error) {
    if (error instanceof ScanError) throw error
    if (errorCode(error) === 'ENOENT') throw ScanError.notFound(dir, error)
    throw ScanError.readError(dir, error)
  }

  const lists: ListFiles[] = []
  for (const entry of entries) {
    if (!entry.endsWith(STORE_EXTENSION)) continue

    const name = entry.slice(0, -STORE_EXTENSION.length)
    if (options.name !== undefined && options.name !== '' && options.name !== name) {
      logger.debug('Skipping list', { name })
      continue
    }

    lists.push({
      name,
      storePath: path.join(dir, entry),
      prefixSetPath: path.join(dir, name + PREFIX_SET_EXTENSION),
    })
  }

  lists.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  logger.debug('Scanned directory', { dir, lists: lists.length })
  return lists
}

async function readFile(filePath: string, missing: (cause: unknown) => ScanError): Promise<Uint8Array> {
  try {
    const buffer = await fs.readFile(filePath)
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
  } catch (error) {
    if (errorCode(error) === 'ENOENT') throw missing(error)
    throw ScanError.readError(filePath, error)
  }
}

/**
 * Read a list's store and prefix set concurrently.
 *
 * @throws {ScanError} MISSING_PREFIX_SET, NOT_FOUND (store) or READ_ERROR
 */
export async function readListFiles(files: ListFiles): Promise<ListBytes> {
  const [storeBytes, prefixSetBytes] = await Promise.all([
    readFile(files.storePath, (cause) => ScanError.missingStore(files.storePath, cause)),
    readFile(files.prefixSetPath, (cause) => ScanError.missingPrefixSet(files.prefixSetPath, cause)),
  ])
  return { storeBytes, prefixSetBytes }
}
