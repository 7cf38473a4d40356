/**
 * Blocking byte streams over file descriptors (stdin/stdout by default)
 */

import { readSync, writeSync } from 'node:fs'
import type { ByteSink, ByteSource, Safe } from '@bfvm/types'
import { safeError, safeResult, safeTrySync } from '@bfvm/types'

const BACKOFF_INITIAL_MS = 1
const BACKOFF_MAX_MS = 50

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms)
}

/**
 * Run a blocking descriptor call, retrying while it reports EAGAIN
 * Waits between attempts double from 1 ms up to 50 ms.
 */
export function retryWhileBusy<T>(operation: () => T): Safe<T> {
  let delay = BACKOFF_INITIAL_MS
  for (;;) {
    const [error, result] = safeTrySync(operation)
    if (!error) {
      return safeResult(result)
    }
    // Non-blocking descriptor with nothing buffered yet
    if (errorCode(error) !== 'EAGAIN') {
      return safeError(error)
    }
    sleepSync(delay)
    delay = Math.min(delay * 2, BACKOFF_MAX_MS)
  }
}

export class FileDescriptorByteSource implements ByteSource {
  private readonly buffer = Buffer.alloc(1)

  constructor(private readonly fd: number = 0) {}

  readByte(): Safe<number | null> {
    const [error, bytesRead] = retryWhileBusy(() =>
      readSync(this.fd, this.buffer, 0, 1, null),
    )
    if (error) {
      if (errorCode(error) === 'EOF') return safeResult(null)
      return safeError(error)
    }
    return safeResult(bytesRead === 0 ? null : this.buffer[0])
  }
}

/**
 * Every byte goes straight to the descriptor; there is nothing to flush
 */
export class FileDescriptorByteSink implements ByteSink {
  private readonly buffer = Buffer.alloc(1)

  constructor(private readonly fd: number = 1) {}

  writeByte(byte: number): Safe<void> {
    this.buffer[0] = byte
    const [error] = retryWhileBusy(() => writeSync(this.fd, this.buffer, 0, 1))
    if (error) {
      return safeError(error)
    }
    return safeResult(undefined)
  }
}
