/**
 * VM Configuration Constants
 *
 * Centralized configuration for the tape machine runtime
 */

import { MAX_TAPE_INITIAL_CAPACITY } from '@bfvm/core'

// Tape configuration
export const TAPE_CONFIG = {
  /** Classic tape size, used as the starting capacity of the backing buffer */
  DEFAULT_INITIAL_CAPACITY: 30_000,
  MAX_INITIAL_CAPACITY: MAX_TAPE_INITIAL_CAPACITY,
} as const

// Trace configuration
export const TRACE_CONFIG = {
  /** Execution log entries kept per run; older entries are dropped */
  DEFAULT_LOG_LIMIT: 10_000,
} as const

// Opcodes are the character codes of the eight instructions
export const OPCODES = {
  MOVE_RIGHT: 0x3e, // '>'
  MOVE_LEFT: 0x3c, // '<'
  INCREMENT: 0x2b, // '+'
  DECREMENT: 0x2d, // '-'
  WRITE: 0x2e, // '.'
  READ: 0x2c, // ','
  LOOP_OPEN: 0x5b, // '['
  LOOP_CLOSE: 0x5d, // ']'
} as const

export type Opcode = (typeof OPCODES)[keyof typeof OPCODES]
