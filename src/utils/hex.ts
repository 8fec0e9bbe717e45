/**
 * Hex formatting helpers for prefixes, hashes and checksums.
 *
 * @module utils/hex
 */

/**
 * Convert bytes to a lower-case hex string.
 */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = ''
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, '0')
  }
  return hex
}

/**
 * Format a 32-bit prefix as 8 lower-case hex digits, most significant byte first.
 *
 * @example
 * formatPrefix(0x0a0b0c0d) // '0a0b0c0d'
 */
export function formatPrefix(prefix: number): string {
  return (prefix >>> 0).toString(16).padStart(8, '0')
}

/**
 * Format a uint32 as upper-case hex without padding, e.g. a store magic number.
 */
export function formatUint32Upper(value: number): string {
  return (value >>> 0).toString(16).toUpperCase()
}
