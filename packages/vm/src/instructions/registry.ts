/**
 * Instruction Registry
 *
 * Maps opcodes (character codes) to their instruction handlers.
 * Acts as the dispatcher for the VM runtime.
 */

import type { InstructionHandler } from './base'
import { DecrementInstruction, IncrementInstruction } from './cell'
import { ReadInstruction, WriteInstruction } from './io'
import { LoopCloseInstruction, LoopOpenInstruction } from './loop'
import { MoveLeftInstruction, MoveRightInstruction } from './pointer'

export class InstructionRegistry {
  private handlers: Map<number, InstructionHandler> = new Map()

  constructor() {
    this.registerInstructions()
  }

  /**
   * Register all instruction handlers
   */
  private registerInstructions(): void {
    // Data pointer
    this.register(new MoveRightInstruction())
    this.register(new MoveLeftInstruction())

    // Cell arithmetic
    this.register(new IncrementInstruction())
    this.register(new DecrementInstruction())

    // I/O
    this.register(new WriteInstruction())
    this.register(new ReadInstruction())

    // Loops
    this.register(new LoopOpenInstruction())
    this.register(new LoopCloseInstruction())
  }

  private register(handler: InstructionHandler): void {
    this.handlers.set(handler.opcode, handler)
  }

  /**
   * Handler for an opcode; undefined for characters that are comments
   */
  getHandler(opcode: number): InstructionHandler | undefined {
    return this.handlers.get(opcode)
  }

  hasHandler(opcode: number): boolean {
    return this.handlers.has(opcode)
  }

  getAllHandlers(): InstructionHandler[] {
    return Array.from(this.handlers.values())
  }
}
