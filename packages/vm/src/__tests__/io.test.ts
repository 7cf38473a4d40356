/**
 * Byte Stream Tests
 */

import {
  closeSync,
  mkdtempSync,
  openSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  BufferByteSink,
  BufferByteSource,
  FileDescriptorByteSink,
  FileDescriptorByteSource,
  readLine,
  retryWhileBusy,
  writeText,
} from '../io'

describe('BufferByteSource', () => {
  it('should yield UTF-8 bytes then end of input', () => {
    const source = new BufferByteSource('hé')

    expect(source.remaining).toBe(3)
    expect(source.readByte()).toEqual([undefined, 0x68])
    expect(source.readByte()).toEqual([undefined, 0xc3])
    expect(source.readByte()).toEqual([undefined, 0xa9])
    expect(source.readByte()).toEqual([undefined, null])
    expect(source.readByte()).toEqual([undefined, null])
    expect(source.remaining).toBe(0)
  })

  it('should be empty by default', () => {
    expect(new BufferByteSource().readByte()).toEqual([undefined, null])
  })
})

describe('BufferByteSink', () => {
  it('should collect bytes in order', () => {
    const sink = new BufferByteSink()

    sink.writeByte(72)
    sink.writeByte(105)

    expect(sink.length).toBe(2)
    expect(sink.toUint8Array()).toEqual(new Uint8Array([72, 105]))
    expect(sink.toString()).toBe('Hi')

    sink.clear()
    expect(sink.length).toBe(0)
  })
})

describe('readLine', () => {
  it('should split lines and drop line endings', () => {
    const source = new BufferByteSource('one\r\ntwo\nthree')

    expect(readLine(source)).toEqual([undefined, 'one'])
    expect(readLine(source)).toEqual([undefined, 'two'])
    expect(readLine(source)).toEqual([undefined, 'three'])
    expect(readLine(source)).toEqual([undefined, null])
  })

  it('should return an empty string for a blank line', () => {
    const source = new BufferByteSource('\n')

    expect(readLine(source)).toEqual([undefined, ''])
    expect(readLine(source)).toEqual([undefined, null])
  })
})

describe('writeText', () => {
  it('should write UTF-8 bytes', () => {
    const sink = new BufferByteSink()

    const [error] = writeText(sink, '>é')

    expect(error).toBeUndefined()
    expect(sink.toUint8Array()).toEqual(new Uint8Array([0x3e, 0xc3, 0xa9]))
  })
})

describe('File descriptor streams', () => {
  let directory: string

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'bfvm-io-'))
  })

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true })
  })

  it('should read bytes from a file descriptor', () => {
    const path = join(directory, 'input.txt')
    writeFileSync(path, 'ok')
    const fd = openSync(path, 'r')

    const source = new FileDescriptorByteSource(fd)
    const bytes = [source.readByte(), source.readByte(), source.readByte()]
    closeSync(fd)

    expect(bytes).toEqual([
      [undefined, 0x6f],
      [undefined, 0x6b],
      [undefined, null],
    ])
  })

  it('should write bytes to a file descriptor', () => {
    const path = join(directory, 'output.txt')
    const fd = openSync(path, 'w')

    const sink = new FileDescriptorByteSink(fd)
    const results = [sink.writeByte(0x42), sink.writeByte(0x46)]
    closeSync(fd)

    expect(results).toEqual([
      [undefined, undefined],
      [undefined, undefined],
    ])
    expect(readFileSync(path, 'utf8')).toBe('BF')
  })

  it('should report a bad descriptor as an error', () => {
    const [readError] = new FileDescriptorByteSource(-1).readByte()
    const [writeError] = new FileDescriptorByteSink(-1).writeByte(0)

    expect(readError).toBeInstanceOf(Error)
    expect(writeError).toBeInstanceOf(Error)
  })
})

describe('retryWhileBusy', () => {
  function busyError(): Error {
    return Object.assign(new Error('resource temporarily unavailable'), {
      code: 'EAGAIN',
    })
  }

  it('should wait and retry while the descriptor is busy', () => {
    let attempts = 0
    const operation = vi.fn(() => {
      attempts += 1
      if (attempts < 3) {
        throw busyError()
      }
      return 7
    })

    const started = performance.now()
    const result = retryWhileBusy(operation)
    const elapsed = performance.now() - started

    expect(result).toEqual([undefined, 7])
    expect(operation).toHaveBeenCalledTimes(3)
    // Two waits of 1 ms and 2 ms
    expect(elapsed).toBeGreaterThanOrEqual(2)
  })

  it('should return other errors without retrying', () => {
    const failure = Object.assign(new Error('bad file descriptor'), {
      code: 'EBADF',
    })
    const operation = vi.fn(() => {
      throw failure
    })

    const [error] = retryWhileBusy(operation)

    expect(error).toBe(failure)
    expect(operation).toHaveBeenCalledTimes(1)
  })
})
