/**
 * Interactive interpreter tests
 */

import { logger, toBytes } from '@bfvm/core'
import type { ByteSink, ByteSource, Safe } from '@bfvm/types'
import { safeError } from '@bfvm/types'
import { BufferByteSink, BufferByteSource, Executor } from '@bfvm/vm'
import { beforeAll, describe, expect, it } from 'vitest'
import { BANNER, PROMPT, Repl } from '../repl'

beforeAll(() => {
  logger.init()
})

/**
 * Sink that accepts a fixed number of bytes, then fails
 */
class LimitedSink implements ByteSink {
  private readonly accepted = new BufferByteSink()

  constructor(private readonly limit: number) {}

  writeByte(byte: number): Safe<void> {
    if (this.accepted.length >= this.limit) {
      return safeError(new Error('sink closed'))
    }
    return this.accepted.writeByte(byte)
  }

  toString(): string {
    return this.accepted.toString()
  }
}

/**
 * Source that yields its bytes, then fails instead of reporting end of input
 */
class LimitedSource implements ByteSource {
  private readonly bytes: BufferByteSource

  constructor(input: string) {
    this.bytes = new BufferByteSource(input)
  }

  readByte(): Safe<number | null> {
    if (this.bytes.remaining === 0) {
      return safeError(new Error('source closed'))
    }
    return this.bytes.readByte()
  }
}

function runSession(input: string) {
  const source = new BufferByteSource(input)
  const output = new BufferByteSink()
  const reports: string[] = []
  const repl = new Repl({
    executor: new Executor({
      input: source,
      output,
      tapeCapacity: 16,
      persistent: true,
    }),
    input: source,
    output,
    report: (message) => reports.push(message),
  })
  const exitCode = repl.run()
  return { exitCode, output: output.toString(), reports }
}

describe('Repl', () => {
  it('should run a line and prompt again', () => {
    const session = runSession('++++++++[>++++++<-]>+.\nexit\n')

    expect(session.exitCode).toBe(0)
    expect(session.output).toBe(`${BANNER}>1>`)
    expect(session.reports).toEqual([])
  })

  it('should continue an unclosed loop on the next line', () => {
    const session = runSession('++++++++[>++++++\n<-]>+.\nexit\n')

    expect(session.output).toBe(`${BANNER}>==>1>`)
    expect(session.reports).toEqual([])
  })

  it('should report a stray loop close and keep going', () => {
    const session = runSession(']\nexit\n')

    expect(session.exitCode).toBe(0)
    expect(session.output).toBe(`${BANNER}>>`)
    expect(session.reports).toEqual([
      "Error: Cannot close ']' at position 0 without first opening a '['",
    ])
  })

  it('should report a pointer underflow and keep going', () => {
    const session = runSession('<\n+.\nexit\n')

    expect(session.output).toBe(`${BANNER}>>\u0001>`)
    expect(session.reports).toEqual([
      "Error: '<' at position 0 moved the data pointer left of cell 0",
    ])
  })

  it('should end at end of input', () => {
    const session = runSession('+\n')

    expect(session.exitCode).toBe(0)
    expect(session.output).toBe(`${BANNER}>>`)
  })

  it('should end at end of input inside an unclosed loop', () => {
    const session = runSession('[\n')

    expect(session.exitCode).toBe(0)
    expect(session.output).toBe(`${BANNER}>==>`)
  })

  it('should accept exit surrounded by spaces', () => {
    expect(runSession('  exit \n+.\n').output).toBe(`${BANNER}>`)
  })

  it('should keep the tape between lines', () => {
    const session = runSession('+++\n.\nexit\n')

    expect(session.output).toBe(`${BANNER}>>\u0003>`)
  })

  it('should keep the data pointer between lines', () => {
    const session = runSession('++>+++\n.<.\nexit\n')

    expect(session.output).toBe(`${BANNER}>>\u0003\u0002>`)
  })

  it('should feed following input lines to the program', () => {
    const session = runSession(',.\nA\nexit\n')

    expect(session.output).toBe(`${BANNER}>A>>`)
  })

  it('should stop when the program output fails', () => {
    const source = new BufferByteSource('+.\nexit\n')
    // Accepts the banner and the first prompt
    const output = new LimitedSink(toBytes(BANNER).length + PROMPT.length)
    const reports: string[] = []

    const exitCode = new Repl({
      executor: new Executor({ input: source, output, persistent: true }),
      input: source,
      output,
      report: (message) => reports.push(message),
    }).run()

    expect(exitCode).toBe(1)
    expect(reports).toEqual(['Error: Output failed at position 1: sink closed'])
    expect(output.toString()).toBe(`${BANNER}>`)
  })

  it('should stop when the program input fails', () => {
    // Yields ",\n" then fails
    const source = new LimitedSource(',\n')
    const output = new BufferByteSink()
    const reports: string[] = []

    const exitCode = new Repl({
      executor: new Executor({ input: source, output, persistent: true }),
      input: source,
      output,
      report: (message) => reports.push(message),
    }).run()

    expect(exitCode).toBe(1)
    expect(reports).toEqual(['Error: Input failed at position 0: source closed'])
    expect(output.toString()).toBe(`${BANNER}>`)
  })

  it('should stop when reading a line fails', () => {
    const source = new LimitedSource('')
    const output = new BufferByteSink()
    const reports: string[] = []

    const exitCode = new Repl({
      executor: new Executor({ input: source, output }),
      input: source,
      output,
      report: (message) => reports.push(message),
    }).run()

    expect(exitCode).toBe(1)
    expect(reports).toEqual(['Error: source closed'])
  })

  it('should stop when the banner cannot be written', () => {
    class ClosedSink implements ByteSink {
      writeByte(): Safe<void> {
        return safeError(new Error('sink closed'))
      }
    }
    const source = new BufferByteSource('+.\n')
    const output = new ClosedSink()
    const reports: string[] = []

    const exitCode = new Repl({
      executor: new Executor({ input: source, output }),
      input: source,
      output,
      report: (message) => reports.push(message),
    }).run()

    expect(exitCode).toBe(1)
    expect(reports).toEqual(['Error: sink closed'])
  })
})
