/**
 * Tape Machine Executor
 *
 * Resolves loops, then dispatches one instruction per step until the
 * instruction pointer runs off the end of the source or a handler faults.
 */

import { logger } from '@bfvm/core'
import type {
  ByteSink,
  ByteSource,
  ExecutionError,
  ExecutionLogEntry,
  ExecutorState,
  InstructionContext,
  Safe,
} from '@bfvm/types'
import { safeError, safeResult } from '@bfvm/types'
import { TAPE_CONFIG, TRACE_CONFIG } from './config'
import { InstructionRegistry } from './instructions/registry'
import { FileDescriptorByteSink, FileDescriptorByteSource } from './io'
import { LoopResolver } from './loop-resolver'
import { GrowableTape } from './tape'

export interface ExecutorOptions {
  /** Defaults to stdin */
  input?: ByteSource
  /** Defaults to stdout */
  output?: ByteSink
  registry?: InstructionRegistry
  /** Starting capacity of the tape buffer */
  tapeCapacity?: number
  /** Record an ExecutionLogEntry for every dispatched instruction */
  trace?: boolean
  /** Most recent log entries kept per run when tracing */
  traceLimit?: number
  /** Keep tape and data pointer between execute() calls */
  persistent?: boolean
}

/**
 * Executor
 *
 * Tape, data pointer and instruction pointer are reset by every execute()
 * call; the state of the last run stays readable through getState().
 * A persistent executor only resets the instruction pointer, the step
 * count and the logs, so consecutive programs share one tape.
 */
export class Executor {
  protected readonly registry: InstructionRegistry
  protected readonly resolver = new LoopResolver()
  protected readonly input: ByteSource
  protected readonly output: ByteSink
  protected readonly tapeCapacity: number
  protected readonly trace: boolean
  protected readonly traceLimit: number
  protected readonly persistent: boolean

  protected tape: GrowableTape
  protected dataPointer = 0
  protected instructionPointer = 0
  /** Dispatched instructions in the current run */
  protected executionStep = 0
  protected executionLogs: ExecutionLogEntry[] = []
  /** Index of the oldest entry once the log is full */
  protected logStart = 0

  constructor(options: ExecutorOptions = {}) {
    this.input = options.input ?? new FileDescriptorByteSource()
    this.output = options.output ?? new FileDescriptorByteSink()
    this.registry = options.registry ?? new InstructionRegistry()
    this.tapeCapacity =
      options.tapeCapacity ?? TAPE_CONFIG.DEFAULT_INITIAL_CAPACITY
    this.trace = options.trace ?? false
    this.traceLimit = Math.max(
      1,
      Math.floor(options.traceLimit ?? TRACE_CONFIG.DEFAULT_LOG_LIMIT),
    )
    this.persistent = options.persistent ?? false
    this.tape = new GrowableTape(this.tapeCapacity)
  }

  /**
   * Run a program to completion
   * Unbalanced brackets are reported before any instruction runs.
   */
  public execute(source: string): Safe<void, ExecutionError> {
    if (this.persistent) {
      this.startRun()
    } else {
      this.reset()
    }

    const [resolveError, jumpTable] = this.resolver.resolve(source)
    if (resolveError) {
      return safeError(resolveError)
    }

    logger.debug('Execute: program resolved', {
      length: source.length,
      loops: jumpTable.size,
    })

    const context: InstructionContext = {
      tape: this.tape,
      dataPointer: this.dataPointer,
      position: 0,
      jumpTable,
      input: this.input,
      output: this.output,
    }

    while (this.instructionPointer < source.length) {
      const handler = this.registry.getHandler(
        source.charCodeAt(this.instructionPointer),
      )

      // Not an instruction: comment character
      if (!handler) {
        this.instructionPointer += 1
        continue
      }

      context.position = this.instructionPointer
      const result = handler.execute(context)
      this.dataPointer = context.dataPointer
      this.executionStep += 1

      if (this.trace) {
        this.recordLog({
          step: this.executionStep,
          position: this.instructionPointer,
          instruction: handler.name,
          dataPointer: this.dataPointer,
          cell: this.tape.get(this.dataPointer),
        })
      }

      if (result.fault) {
        // Instruction pointer stays on the faulting instruction
        logger.debug('Execute: instruction fault', {
          instruction: handler.name,
          code: result.fault.code,
          position: result.fault.position,
          steps: this.executionStep,
        })
        return safeError(result.fault)
      }

      this.instructionPointer = result.jumpTo ?? this.instructionPointer + 1
    }

    logger.debug('Execute: program finished', {
      steps: this.executionStep,
      tapeLength: this.tape.length,
    })
    return safeResult(undefined)
  }

  /**
   * Reset to initial state
   */
  public reset(): void {
    this.tape = new GrowableTape(this.tapeCapacity)
    this.dataPointer = 0
    this.startRun()
  }

  /**
   * Rewind to the start of a new program, keeping tape and data pointer
   */
  protected startRun(): void {
    this.instructionPointer = 0
    this.executionStep = 0
    this.executionLogs = []
    this.logStart = 0
  }

  /**
   * Append to the execution log, overwriting the oldest entry when full
   */
  protected recordLog(entry: ExecutionLogEntry): void {
    if (this.executionLogs.length < this.traceLimit) {
      this.executionLogs.push(entry)
      return
    }
    this.executionLogs[this.logStart] = entry
    this.logStart = (this.logStart + 1) % this.traceLimit
  }

  /**
   * Get current state
   */
  public getState(): ExecutorState {
    return {
      tape: this.tape.snapshot(),
      dataPointer: this.dataPointer,
      instructionPointer: this.instructionPointer,
      steps: this.executionStep,
    }
  }

  /**
   * Execution logs of the last run, in execution order (empty unless tracing)
   * Only the most recent traceLimit entries are kept.
   */
  public getExecutionLogs(): ExecutionLogEntry[] {
    return [
      ...this.executionLogs.slice(this.logStart),
      ...this.executionLogs.slice(0, this.logStart),
    ]
  }
}
