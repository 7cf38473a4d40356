/**
 * Byte utilities
 *
 * Conversions between program text and the raw bytes the VM reads and writes
 */

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Byte view of a string (UTF-8) or a copy of a byte array
 */
export function toBytes(input: string | Uint8Array | number[]): Uint8Array {
  if (typeof input === 'string') {
    return encoder.encode(input)
  }
  return Uint8Array.from(input)
}

/**
 * Decode bytes as UTF-8, replacing invalid sequences
 */
export function bytesToText(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}

/**
 * Printable rendering of a single cell value for logs
 * e.g. 72 -> "72 'H'", 10 -> "10"
 */
export function describeByte(byte: number): string {
  if (byte >= 0x20 && byte < 0x7f) {
    return `${byte} '${String.fromCharCode(byte)}'`
  }
  return `${byte}`
}

