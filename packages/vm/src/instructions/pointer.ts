/**
 * Data pointer instructions
 *
 * MOVE_RIGHT ('>'), MOVE_LEFT ('<')
 */

import type { InstructionContext, InstructionResult } from '@bfvm/types'
import { PointerUnderflowError } from '@bfvm/types'
import { OPCODES } from '../config'
import { BaseInstruction, CONTINUE } from './base'

/**
 * MOVE_RIGHT instruction ('>')
 * Advances the data pointer, growing the tape with a zero cell when needed
 */
export class MoveRightInstruction extends BaseInstruction {
  readonly opcode = OPCODES.MOVE_RIGHT
  readonly name = 'MOVE_RIGHT'

  execute(context: InstructionContext): InstructionResult {
    context.dataPointer += 1
    context.tape.ensure(context.dataPointer)
    return CONTINUE
  }
}

/**
 * MOVE_LEFT instruction ('<')
 * The pointer never wraps: moving left of cell 0 is a fault
 */
export class MoveLeftInstruction extends BaseInstruction {
  readonly opcode = OPCODES.MOVE_LEFT
  readonly name = 'MOVE_LEFT'

  execute(context: InstructionContext): InstructionResult {
    if (context.dataPointer === 0) {
      return { fault: new PointerUnderflowError(context.position) }
    }
    context.dataPointer -= 1
    return CONTINUE
  }
}
