import type { ExecutionError } from '@bfvm/types'
import { UnbalancedBracketsError, VM_ERRORS } from '@bfvm/types'

/**
 * Human-readable message for an execution error
 */
export function formatExecutionError(error: ExecutionError): string {
  if (error instanceof UnbalancedBracketsError) {
    return error.bracket === '['
      ? `Error: All the '[' instructions must be closed with a ']' instruction (unclosed '[' at position ${error.position})`
      : `Error: Cannot close ']' at position ${error.position} without first opening a '['`
  }
  if (error.code === VM_ERRORS.POINTER_UNDERFLOW) {
    return `Error: '<' at position ${error.position} moved the data pointer left of cell 0`
  }
  return `Error: ${error.message}`
}
