/**
 * @fileoverview CLI Entry Point for sbdump
 *
 * Parses arguments, builds the run configuration and hands over to the
 * dump command. Output goes through injectable `stdout`/`stderr`
 * functions so the CLI can be run and inspected from tests.
 *
 * @module cli/index
 *
 * @example
 * // Run programmatically, capturing output
 * import { runCLI } from './cli'
 *
 * const lines: string[] = []
 * const result = await runCLI(['-v', '--name', 'test-phish-simple', './safebrowsing'], {
 *   stdout: (msg) => lines.push(msg),
 * })
 * console.log(result.exitCode)
 */

import { cac } from 'cac'
import { resolveConfig, type DumpFlags, type Env } from '../config'
import { DumpError, isDumpError } from '../errors'
import { createLogger } from '../utils/logger'
import { runDump, type DumpSummary } from './commands/dump'

// ============================================================================
// Types
// ============================================================================

/**
 * Options for configuring CLI behavior.
 */
export interface CLIOptions {
  /** Standard output function (default: console.log) */
  stdout?: (msg: string) => void
  /** Error output function (default: console.error) */
  stderr?: (msg: string) => void
  /** Environment variables (default: process.env) */
  env?: Env
}

/**
 * Result returned from a CLI run.
 *
 * @property exitCode - 0 when every selected list decoded, 1 otherwise
 * @property summary - What was processed, absent for help/version/usage errors
 * @property error - First error encountered, if any
 */
export interface CLIResult {
  exitCode: number
  summary?: DumpSummary
  error?: Error
}

/**
 * Parsed command-line arguments.
 */
export interface ParsedArgs {
  /** Positional arguments */
  args: string[]
  /** Recognised flags */
  flags: DumpFlags
  help: boolean
  version: boolean
  /** Option names that are not recognised */
  unknown: string[]
}

// ============================================================================
// Constants
// ============================================================================

/** Current CLI version */
export const VERSION = '0.1.0'

/** CLI name */
export const NAME = 'sbdump'

/** Option keys cac may produce, including aliases */
const KNOWN_FLAGS = new Set([
  'v', 'verbose', 'n', 'dry', 'name', 'strict', 'k', 'keepGoing', 'logLevel', 'h', 'help', 'version', '--',
])

const HELP_TEXT = `${NAME} v${VERSION}

Dump URL blocklist databases (.sbstore and .pset files).

Usage: ${NAME} [options] <dir>

  <dir>  Directory holding the database files, e.g. the
         'safebrowsing' folder of a browser profile

Options:
  -v, --verbose            List database contents (prefixes, completes) in hex
  -n, --dry                List available databases and quit
  --name <name>            Process only the list named NAME
  --strict                 Verify each store's trailing MD5 checksum
  -k, --keep-going         Report failing lists and continue
  --log-level <level>      Diagnostic log level: debug, info, warn, error
  -h, --help               Show help
  --version                Show version

Environment:
  SBDUMP_LOG_LEVEL         Default for --log-level (default: warn)
  SBDUMP_STRICT            Default for --strict (1/true/yes)`

// ============================================================================
// Argument parsing
// ============================================================================

function readBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined
}

// mri turns numeric-looking values into numbers
function readString(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

// cac camel-cases option names before handing them to mri, so a kebab-case
// boolean is only recognised in its camel-case spelling
const LONG_BOOLEAN_ALIASES = new Map([['--keep-going', '--keepGoing']])

function normalizeArgs(args: string[]): string[] {
  return args.map((arg) => LONG_BOOLEAN_ALIASES.get(arg) ?? arg)
}

/**
 * Parses command-line arguments with cac.
 *
 * @param args - Arguments excluding 'node' and the script name
 *
 * @example
 * parseArgs(['-v', '--name', 'goog-malware-shavar', './db'])
 * // => { args: ['./db'], flags: { verbose: true, name: 'goog-malware-shavar', ... }, ... }
 */
export function parseArgs(args: string[]): ParsedArgs {
  const cli = cac(NAME)

  cli.option('-v, --verbose', 'List database contents in hex')
  cli.option('-n, --dry', 'List available databases and quit')
  cli.option('--name <name>', 'Process only the named list')
  cli.option('--strict', 'Verify store checksums')
  cli.option('-k, --keep-going', 'Report failing lists and continue')
  cli.option('--log-level <level>', 'Diagnostic log level')
  cli.option('-h, --help', 'Show help')
  cli.option('--version', 'Show version')

  const parsed = cli.parse(['node', NAME, ...normalizeArgs(args)], { run: false })
  const options: Record<string, unknown> = parsed.options

  const positional = parsed.args.map(String)
  const dir = positional[0]

  return {
    args: positional,
    flags: {
      ...(dir !== undefined && { dir }),
      verbose: readBoolean(options.verbose),
      dry: readBoolean(options.dry),
      name: readString(options.name),
      strict: readBoolean(options.strict),
      keepGoing: readBoolean(options.keepGoing),
      logLevel: readString(options.logLevel),
    },
    help: options.help === true,
    version: options.version === true,
    unknown: Object.keys(options).filter((key) => !KNOWN_FLAGS.has(key)),
  }
}

// ============================================================================
// Running
// ============================================================================

/**
 * Parse arguments and run a dump.
 *
 * @throws Never throws - errors are reported on stderr and returned in CLIResult.error
 *
 * @example
 * const result = await runCLI(['--dry', './safebrowsing'])
 * if (result.exitCode !== 0) {
 *   console.error(result.error?.message)
 * }
 */
export async function runCLI(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
  const stdout = options.stdout ?? console.log
  const stderr = options.stderr ?? console.error
  const env = options.env ?? process.env

  let parsed: ParsedArgs
  try {
    parsed = parseArgs(args)
  } catch (err) {
    const error = err instanceof Error ? err : DumpError.wrap(err)
    stderr(`Error: ${error.message}`)
    return { exitCode: 1, error }
  }

  if (parsed.help) {
    stdout(HELP_TEXT)
    return { exitCode: 0 }
  }

  if (parsed.version) {
    stdout(`${NAME} ${VERSION}`)
    return { exitCode: 0 }
  }

  if (parsed.unknown.length > 0) {
    const flag = parsed.unknown[0]
    stderr(`Unknown option: ${flag.length === 1 ? '-' : '--'}${flag}\nRun '${NAME} --help' for usage.`)
    return { exitCode: 1, error: new Error(`Unknown option: ${flag}`) }
  }

  if (parsed.args.length > 1) {
    stderr(`Unexpected argument: ${parsed.args[1]}\nRun '${NAME} --help' for usage.`)
    return { exitCode: 1, error: new Error(`Unexpected argument: ${parsed.args[1]}`) }
  }

  try {
    const config = resolveConfig(parsed.flags, env)
    const logger = createLogger({
      component: NAME,
      minLevel: config.logLevel,
      handler: (entry) => stderr(JSON.stringify(entry)),
    })

    logger.debug('Starting dump', { dir: config.dir, dry: config.dry, strict: config.strict })
    const summary = await runDump(config, { stdout, stderr, logger })

    const first = summary.failures[0]
    return first ? { exitCode: 1, summary, error: first.error } : { exitCode: 0, summary }
  } catch (err) {
    const error = err instanceof Error ? err : DumpError.wrap(err)
    stderr(isDumpError(error) ? `Error: ${error.message}` : `Error: ${error.message}\n${error.stack ?? ''}`.trimEnd())
    return { exitCode: 1, error }
  }
}
