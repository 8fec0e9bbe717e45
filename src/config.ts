/**
 * @fileoverview Dump configuration
 *
 * Merges parsed CLI flags with environment defaults into a typed config.
 * Flags win over the environment. Environment variables:
 *
 * - `SBDUMP_LOG_LEVEL`: debug | info | warn | error (default: warn)
 * - `SBDUMP_STRICT`: 1/true/yes to verify store checksums
 *
 * @module config
 */

import { ConfigError } from './errors'
import { LogLevel, parseLogLevel } from './utils/logger'

export interface DumpConfig {
  /** Directory holding `.sbstore` / `.pset` files */
  dir: string
  verbose: boolean
  /** List databases and stop without decoding */
  dry: boolean
  /** Only process the list with this name */
  name?: string
  /** Verify each store's trailing MD5 checksum */
  strict: boolean
  /** Report failing lists and continue instead of stopping */
  keepGoing: boolean
  logLevel: LogLevel
}

/**
 * CLI flags as handed over by the argument parser. Every field is optional;
 * missing ones fall back to the environment, then to defaults.
 */
export interface DumpFlags {
  dir?: string
  verbose?: boolean
  dry?: boolean
  name?: string
  strict?: boolean
  keepGoing?: boolean
  logLevel?: string
}

export type Env = Record<string, string | undefined>

export const DEFAULT_LOG_LEVEL = LogLevel.WARN

function parseEnvBoolean(env: Env, key: string): boolean | undefined {
  const value = env[key]
  if (value === undefined || value === '') return undefined
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  throw new ConfigError(`Invalid boolean for ${key}: ${value}`, key)
}

function resolveLogLevel(flag: string | undefined, env: Env): LogLevel {
  if (flag !== undefined) {
    const level = parseLogLevel(flag)
    if (!level) throw new ConfigError(`Invalid log level: ${flag}`, 'log-level')
    return level
  }
  const fromEnv = env.SBDUMP_LOG_LEVEL
  if (fromEnv !== undefined && fromEnv !== '') {
    const level = parseLogLevel(fromEnv)
    if (!level) throw new ConfigError(`Invalid log level in SBDUMP_LOG_LEVEL: ${fromEnv}`, 'SBDUMP_LOG_LEVEL')
    return level
  }
  return DEFAULT_LOG_LEVEL
}

/**
 * Build the run configuration.
 *
 * @throws {ConfigError} Missing directory, or an invalid level/boolean
 *
 * @example
 * const config = resolveConfig({ dir: './safebrowsing', verbose: true }, process.env)
 */
export function resolveConfig(flags: DumpFlags, env: Env = {}): DumpConfig {
  if (!flags.dir) {
    throw new ConfigError('Missing database directory argument', 'dir')
  }

  return {
    dir: flags.dir,
    verbose: flags.verbose ?? false,
    dry: flags.dry ?? false,
    ...(flags.name !== undefined && flags.name !== '' && { name: flags.name }),
    strict: flags.strict ?? parseEnvBoolean(env, 'SBDUMP_STRICT') ?? false,
    keepGoing: flags.keepGoing ?? false,
    logLevel: resolveLogLevel(flags.logLevel, env),
  }
}
