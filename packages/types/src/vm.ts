/**
 * Virtual machine types shared by the VM runtime and its front ends
 */

import type { ExecutionError } from './errors'
import type { Safe } from './safe'

/**
 * Readable byte stream: a byte in [0, 255], null at end of input
 */
export interface ByteSource {
  readByte(): Safe<number | null>
}

/**
 * Writable byte stream
 */
export interface ByteSink {
  writeByte(byte: number): Safe<void>
}

/**
 * Growable byte tape addressed by the data pointer
 */
export interface Tape {
  /** Number of cells reachable so far */
  readonly length: number
  get(index: number): number
  /** Stores value mod 256 */
  set(index: number, value: number): void
  /** Grows the tape with zero cells so that `index` is addressable */
  ensure(index: number): void
  snapshot(): Uint8Array
}

/**
 * Bidirectional bracket partner lookup
 */
export interface JumpTableLookup {
  readonly size: number
  partner(position: number): number | undefined
  has(position: number): boolean
}

/**
 * Mutable state handed to an instruction handler
 */
export interface InstructionContext {
  tape: Tape
  dataPointer: number
  /** Instruction pointer of the instruction being executed */
  position: number
  jumpTable: JumpTableLookup
  input: ByteSource
  output: ByteSink
}

/**
 * Instruction result
 * fault = null continues execution; jumpTo overrides the next instruction pointer
 */
export interface InstructionResult {
  fault: ExecutionError | null
  jumpTo?: number
}

export interface ExecutorState {
  tape: Uint8Array
  dataPointer: number
  instructionPointer: number
  steps: number
}

export interface ExecutionLogEntry {
  step: number
  position: number
  instruction: string
  dataPointer: number
  cell: number
}
