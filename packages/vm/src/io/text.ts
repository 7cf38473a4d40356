import { bytesToText, toBytes } from '@bfvm/core'
import type { ByteSink, ByteSource, Safe } from '@bfvm/types'
import { safeError, safeResult } from '@bfvm/types'

const NEWLINE = 0x0a
const CARRIAGE_RETURN = 0x0d

/**
 * Read one line from a byte source
 * The line ending (\n or \r\n) is dropped. Returns null at end of input
 * when no byte was read.
 */
export function readLine(source: ByteSource): Safe<string | null> {
  const bytes: number[] = []
  for (;;) {
    const [error, byte] = source.readByte()
    if (error) {
      return safeError(error)
    }
    if (byte === null) {
      if (bytes.length === 0) return safeResult(null)
      break
    }
    if (byte === NEWLINE) break
    bytes.push(byte)
  }
  if (bytes[bytes.length - 1] === CARRIAGE_RETURN) {
    bytes.pop()
  }
  return safeResult(bytesToText(Uint8Array.from(bytes)))
}

/**
 * Write a string to a byte sink as UTF-8
 */
export function writeText(sink: ByteSink, text: string): Safe<void> {
  for (const byte of toBytes(text)) {
    const [error] = sink.writeByte(byte)
    if (error) {
      return safeError(error)
    }
  }
  return safeResult(undefined)
}
