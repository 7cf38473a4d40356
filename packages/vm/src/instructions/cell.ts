/**
 * Cell arithmetic instructions
 *
 * INCREMENT ('+'), DECREMENT ('-'), both wrapping modulo 256
 */

import type { InstructionContext, InstructionResult } from '@bfvm/types'
import { OPCODES } from '../config'
import { BaseInstruction, CONTINUE } from './base'

export class IncrementInstruction extends BaseInstruction {
  readonly opcode = OPCODES.INCREMENT
  readonly name = 'INCREMENT'

  execute(context: InstructionContext): InstructionResult {
    // 255 + 1 stores as 0
    this.setCell(context, this.getCell(context) + 1)
    return CONTINUE
  }
}

export class DecrementInstruction extends BaseInstruction {
  readonly opcode = OPCODES.DECREMENT
  readonly name = 'DECREMENT'

  execute(context: InstructionContext): InstructionResult {
    // 0 - 1 stores as 255
    this.setCell(context, this.getCell(context) - 1)
    return CONTINUE
  }
}
