import type { ExecutionError, ExecutorState } from '@bfvm/types'
import { Executor } from './executor'
import { BufferByteSink, BufferByteSource } from './io'

export interface RunProgramOptions {
  /** Bytes (or UTF-8 text) fed to ',' */
  input?: string | Uint8Array | number[]
  tapeCapacity?: number
}

export interface ProgramRun {
  /** undefined when the program finished normally */
  error: ExecutionError | undefined
  output: Uint8Array
  state: ExecutorState
}

/**
 * Run a program over in-memory streams
 */
export function runProgram(
  source: string,
  options: RunProgramOptions = {},
): ProgramRun {
  const output = new BufferByteSink()
  const executor = new Executor({
    input: new BufferByteSource(options.input),
    output,
    tapeCapacity: options.tapeCapacity,
  })
  const [error] = executor.execute(source)
  return {
    error,
    output: output.toUint8Array(),
    state: executor.getState(),
  }
}
