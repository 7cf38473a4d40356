/**
 * Base Instruction System
 *
 * Defines the base interfaces and abstract class for all VM instructions.
 */

import type { InstructionContext, InstructionResult } from '@bfvm/types'

/**
 * Base interface for all instruction handlers
 */
export interface InstructionHandler {
  /** Character code of the instruction */
  readonly opcode: number
  readonly name: string
  /** The instruction character, e.g. '+' */
  readonly symbol: string

  /**
   * Execute the instruction (mutates context in place)
   * @returns fault = null to continue, jumpTo to branch
   */
  execute(context: InstructionContext): InstructionResult
}

/** Shared result for the common "continue" case */
export const CONTINUE: InstructionResult = Object.freeze({ fault: null })

/**
 * Abstract base class for instructions
 */
export abstract class BaseInstruction implements InstructionHandler {
  abstract readonly opcode: number
  abstract readonly name: string

  get symbol(): string {
    return String.fromCharCode(this.opcode)
  }

  abstract execute(context: InstructionContext): InstructionResult

  protected getCell(context: InstructionContext): number {
    return context.tape.get(context.dataPointer)
  }

  protected setCell(context: InstructionContext, value: number): void {
    context.tape.set(context.dataPointer, value)
  }

  /**
   * Branch to just past the partner bracket of the current position
   */
  protected jumpPastPartner(context: InstructionContext): InstructionResult {
    const partner = context.jumpTable.partner(context.position)
    if (partner === undefined) {
      // Resolution guarantees a partner for every bracket
      throw new Error(
        `${this.name}: no partner bracket for position ${context.position}`,
      )
    }
    return { fault: null, jumpTo: partner + 1 }
  }
}
