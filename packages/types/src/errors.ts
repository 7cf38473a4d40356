/**
 * VM Error Constants and Classes
 *
 * Centralized definitions of every error the virtual machine can return.
 * Errors travel as values inside Safe tuples; the VM never throws them
 * across the execute boundary.
 */

/**
 * VM error codes
 */
export const VM_ERRORS = {
  UNBALANCED_BRACKETS: 'unbalanced_brackets',
  POINTER_UNDERFLOW: 'pointer_underflow',
  OUTPUT_FAILURE: 'output_failure',
  INPUT_FAILURE: 'input_failure',
} as const

export type VMErrorCode = (typeof VM_ERRORS)[keyof typeof VM_ERRORS]

export type Bracket = '[' | ']'

/**
 * Base class for all VM errors
 */
export class VMError extends Error {
  constructor(
    message: string,
    public readonly code: VMErrorCode,
    public readonly position: number,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'VMError'
  }
}

/**
 * A `[` without its `]`, or a `]` without its `[`.
 * `position` points at the stray `]`, or at the earliest unclosed `[`.
 */
export class UnbalancedBracketsError extends VMError {
  constructor(
    position: number,
    public readonly bracket: Bracket,
  ) {
    super(
      bracket === '['
        ? `Unmatched '[' at position ${position}`
        : `Unexpected ']' at position ${position}`,
      VM_ERRORS.UNBALANCED_BRACKETS,
      position,
      { bracket },
    )
    this.name = 'UnbalancedBracketsError'
  }
}

export class PointerUnderflowError extends VMError {
  constructor(position: number) {
    super(
      `Data pointer moved left of cell 0 at position ${position}`,
      VM_ERRORS.POINTER_UNDERFLOW,
      position,
    )
    this.name = 'PointerUnderflowError'
  }
}

export class OutputError extends VMError {
  constructor(position: number, cause: Error) {
    super(
      `Output failed at position ${position}: ${cause.message}`,
      VM_ERRORS.OUTPUT_FAILURE,
      position,
      undefined,
      { cause },
    )
    this.name = 'OutputError'
  }
}

export class InputError extends VMError {
  constructor(position: number, cause: Error) {
    super(
      `Input failed at position ${position}: ${cause.message}`,
      VM_ERRORS.INPUT_FAILURE,
      position,
      undefined,
      { cause },
    )
    this.name = 'InputError'
  }
}

export type ExecutionError =
  | UnbalancedBracketsError
  | PointerUnderflowError
  | OutputError
  | InputError
