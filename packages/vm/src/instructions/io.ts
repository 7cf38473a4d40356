/**
 * I/O instructions
 *
 * WRITE ('.'), READ (',')
 */

import type { InstructionContext, InstructionResult } from '@bfvm/types'
import { InputError, OutputError } from '@bfvm/types'
import { OPCODES } from '../config'
import { BaseInstruction, CONTINUE } from './base'

/**
 * WRITE instruction ('.')
 * Writes the current cell to the output sink
 */
export class WriteInstruction extends BaseInstruction {
  readonly opcode = OPCODES.WRITE
  readonly name = 'WRITE'

  execute(context: InstructionContext): InstructionResult {
    const [error] = context.output.writeByte(this.getCell(context))
    if (error) {
      return { fault: new OutputError(context.position, error) }
    }
    return CONTINUE
  }
}

/**
 * READ instruction (',')
 * Stores the next input byte in the current cell.
 * At end of input the cell keeps its value, so a program can preload a
 * sentinel and compare after the read.
 */
export class ReadInstruction extends BaseInstruction {
  readonly opcode = OPCODES.READ
  readonly name = 'READ'

  execute(context: InstructionContext): InstructionResult {
    const [error, byte] = context.input.readByte()
    if (error) {
      return { fault: new InputError(context.position, error) }
    }
    if (byte !== null) {
      this.setCell(context, byte)
    }
    return CONTINUE
  }
}
