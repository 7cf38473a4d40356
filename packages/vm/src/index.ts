/**
 * bfvm Package Exports
 *
 * Tape machine runtime: loop resolution, instruction dispatch, byte streams
 */

// Logger
export { logger } from '@bfvm/core'
// Re-export types from centralized types package
export * from '@bfvm/types'
// Configuration constants
export { OPCODES, type Opcode, TAPE_CONFIG, TRACE_CONFIG } from './config'
export { Executor, type ExecutorOptions } from './executor'
// Instructions
export {
  BaseInstruction,
  CONTINUE,
  type InstructionHandler,
} from './instructions/base'
export {
  DecrementInstruction,
  IncrementInstruction,
} from './instructions/cell'
export { ReadInstruction, WriteInstruction } from './instructions/io'
export {
  LoopCloseInstruction,
  LoopOpenInstruction,
} from './instructions/loop'
export {
  MoveLeftInstruction,
  MoveRightInstruction,
} from './instructions/pointer'
export { InstructionRegistry } from './instructions/registry'
// Byte streams
export * from './io'
export { JumpTable, LoopResolver, resolveLoops } from './loop-resolver'
export { type ProgramRun, type RunProgramOptions, runProgram } from './run'
export { GrowableTape } from './tape'
