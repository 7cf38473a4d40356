import { bytesToText, toBytes } from '@bfvm/core'
import type { ByteSink, ByteSource, Safe } from '@bfvm/types'
import { safeResult } from '@bfvm/types'

/**
 * In-memory byte source; reports end of input once every byte is consumed
 */
export class BufferByteSource implements ByteSource {
  private readonly bytes: Uint8Array
  private offset = 0

  constructor(input: string | Uint8Array | number[] = new Uint8Array(0)) {
    this.bytes = toBytes(input)
  }

  get remaining(): number {
    return this.bytes.length - this.offset
  }

  readByte(): Safe<number | null> {
    if (this.offset >= this.bytes.length) {
      return safeResult(null)
    }
    const byte = this.bytes[this.offset]
    this.offset += 1
    return safeResult(byte)
  }
}

/**
 * In-memory byte sink collecting everything written to it
 */
export class BufferByteSink implements ByteSink {
  private readonly chunks: number[] = []

  get length(): number {
    return this.chunks.length
  }

  writeByte(byte: number): Safe<void> {
    this.chunks.push(byte & 0xff)
    return safeResult(undefined)
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.chunks)
  }

  toString(): string {
    return bytesToText(this.toUint8Array())
  }

  clear(): void {
    this.chunks.length = 0
  }
}
