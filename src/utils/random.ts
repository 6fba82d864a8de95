/**
 * Random suffixes for temporary file names
 *
 * @module utils/random
 */

/**
 * Generate cryptographically secure random bytes (Web Crypto, Node >= 15)
 */
export function getRandomBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length)
  crypto.getRandomValues(bytes)
  return bytes
}

/**
 * Generate a random base36 string, e.g. for `forms.tsv.tmp.<ts>.<rand>`
 */
export function getRandomBase36(length: number): string {
  const charset = '0123456789abcdefghijklmnopqrstuvwxyz'
  let result = ''
  for (const byte of getRandomBytes(length)) {
    result += charset.charAt(byte % 36)
  }
  return result
}
