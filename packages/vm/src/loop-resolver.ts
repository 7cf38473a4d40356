/**
 * Loop Resolver
 *
 * Pairs every '[' with its ']' in a single pass so that dispatch never
 * scans the source for a partner bracket.
 */

import { logger } from '@bfvm/core'
import type { JumpTableLookup, Safe } from '@bfvm/types'
import { safeError, safeResult, UnbalancedBracketsError } from '@bfvm/types'
import { OPCODES } from './config'

/**
 * Immutable bidirectional map between partner bracket positions
 */
export class JumpTable implements JumpTableLookup {
  private readonly partners: ReadonlyMap<number, number>

  constructor(pairs: Iterable<readonly [number, number]>) {
    const partners = new Map<number, number>()
    for (const [open, close] of pairs) {
      partners.set(open, close)
      partners.set(close, open)
    }
    this.partners = partners
  }

  /** Number of bracket pairs */
  get size(): number {
    return this.partners.size / 2
  }

  partner(position: number): number | undefined {
    return this.partners.get(position)
  }

  has(position: number): boolean {
    return this.partners.has(position)
  }

  /**
   * [open, close] pairs in order of their opening bracket
   */
  *pairs(): IterableIterator<[number, number]> {
    const opens = [...this.partners.entries()]
      .filter(([position, partner]) => position < partner)
      .sort(([a], [b]) => a - b)
    for (const pair of opens) {
      yield pair
    }
  }
}

/**
 * Loop Resolver
 *
 * Classic balanced-parenthesis matching with a stack of open positions
 */
export class LoopResolver {
  resolve(source: string): Safe<JumpTable, UnbalancedBracketsError> {
    const openStack: number[] = []
    const pairs: Array<[number, number]> = []

    for (let position = 0; position < source.length; position++) {
      const code = source.charCodeAt(position)

      if (code === OPCODES.LOOP_OPEN) {
        openStack.push(position)
      } else if (code === OPCODES.LOOP_CLOSE) {
        const open = openStack.pop()
        if (open === undefined) {
          logger.debug('LoopResolver: stray loop close', { position })
          return safeError(new UnbalancedBracketsError(position, ']'))
        }
        pairs.push([open, position])
      }
    }

    if (openStack.length > 0) {
      // Report the outermost unclosed bracket
      const position = openStack[0]
      logger.debug('LoopResolver: unclosed loop open', {
        position,
        unclosed: openStack.length,
      })
      return safeError(new UnbalancedBracketsError(position, '['))
    }

    return safeResult(new JumpTable(pairs))
  }
}

const defaultResolver = new LoopResolver()

export function resolveLoops(
  source: string,
): Safe<JumpTable, UnbalancedBracketsError> {
  return defaultResolver.resolve(source)
}
