/**
 * Dump Command
 *
 * Scans a database directory and prints every list it decodes.
 */

import type { DumpConfig } from '../../config'
import { DumpError } from '../../errors'
import { decodeList } from '../../decode'
import { formatDataset, formatError } from '../../report/format'
import { readListFiles, scanDirectory } from '../../scan/directory'
import type { Logger } from '../../utils/logger'

// ============================================================================
// Types
// ============================================================================

export interface DumpIO {
  stdout: (msg: string) => void
  stderr: (msg: string) => void
  logger: Logger
}

export interface ListFailure {
  name: string
  error: Error
}

export interface DumpSummary {
  /** Names of the lists selected by the scan, in processing order */
  lists: string[]
  /** Names of the lists that decoded successfully */
  decoded: string[]
  failures: ListFailure[]
}

// ============================================================================
// Dump Command Implementation
// ============================================================================

/**
 * Dump every list in `config.dir`.
 *
 * A list that fails to read or decode is reported on stderr. Without
 * `keepGoing` the run stops there; with it, the remaining lists are still
 * processed. Directory errors propagate.
 */
export async function runDump(config: DumpConfig, io: DumpIO): Promise<DumpSummary> {
  const { stdout, stderr, logger } = io
  const files = await scanDirectory(config.dir, { name: config.name, logger })

  if (files.length === 0) {
    logger.warn('No lists found', { dir: config.dir, ...(config.name !== undefined && { name: config.name }) })
  }

  const summary: DumpSummary = { lists: files.map((f) => f.name), decoded: [], failures: [] }

  for (const list of files) {
    stdout(`- Reading sbstore: ${list.name}`)
    if (config.dry) continue

    const listLogger = logger.child({ list: list.name })
    let error: Error
    try {
      const { storeBytes, prefixSetBytes } = await readListFiles(list)
      listLogger.debug('Read list files', { storeBytes: storeBytes.length, prefixSetBytes: prefixSetBytes.length })

      const result = decodeList(storeBytes, prefixSetBytes, { name: list.name, verifyChecksum: config.strict })
      if (result.ok) {
        for (const line of formatDataset(result.dataset, { verbose: config.verbose })) {
          stdout(line)
        }
        stdout('')
        summary.decoded.push(list.name)
        continue
      }
      error = result.error
    } catch (err) {
      error = err instanceof Error ? err : DumpError.wrap(err)
    }

    listLogger.error('List failed', error)
    stderr(formatError(list.name, error))
    summary.failures.push({ name: list.name, error })
    if (!config.keepGoing) break
  }

  return summary
}
