/**
 * Loop instructions
 *
 * LOOP_OPEN ('['), LOOP_CLOSE (']')
 * Targets come from the jump table built by the loop resolver.
 */

import type { InstructionContext, InstructionResult } from '@bfvm/types'
import { OPCODES } from '../config'
import { BaseInstruction, CONTINUE } from './base'

/**
 * LOOP_OPEN instruction ('[')
 * Skips the loop body when the current cell is zero
 */
export class LoopOpenInstruction extends BaseInstruction {
  readonly opcode = OPCODES.LOOP_OPEN
  readonly name = 'LOOP_OPEN'

  execute(context: InstructionContext): InstructionResult {
    if (this.getCell(context) === 0) {
      return this.jumpPastPartner(context)
    }
    return CONTINUE
  }
}

/**
 * LOOP_CLOSE instruction (']')
 * Re-enters the loop body when the current cell is non-zero
 */
export class LoopCloseInstruction extends BaseInstruction {
  readonly opcode = OPCODES.LOOP_CLOSE
  readonly name = 'LOOP_CLOSE'

  execute(context: InstructionContext): InstructionResult {
    if (this.getCell(context) !== 0) {
      return this.jumpPastPartner(context)
    }
    return CONTINUE
  }
}
