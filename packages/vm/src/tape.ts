import type { Tape } from '@bfvm/types'
import { TAPE_CONFIG } from './config'

/**
 * Growable byte tape
 *
 * Cells live in a Uint8Array, which gives the mod 256 wrap for free.
 * `length` is the number of cells the program has reached; the backing
 * buffer doubles whenever a new cell falls outside its capacity.
 */
export class GrowableTape implements Tape {
  /**
   * Starting capacity actually used for a requested one
   * NaN falls back to the default; everything else is floored and
   * clamped to [1, MAX_INITIAL_CAPACITY].
   */
  static normalizeCapacity(requested: number): number {
    if (Number.isNaN(requested)) {
      return TAPE_CONFIG.DEFAULT_INITIAL_CAPACITY
    }
    return Math.min(
      Math.max(1, Math.floor(requested)),
      TAPE_CONFIG.MAX_INITIAL_CAPACITY,
    )
  }

  private cells: Uint8Array
  private reached = 1

  constructor(initialCapacity: number = TAPE_CONFIG.DEFAULT_INITIAL_CAPACITY) {
    this.cells = new Uint8Array(GrowableTape.normalizeCapacity(initialCapacity))
  }

  get length(): number {
    return this.reached
  }

  /** Size of the backing buffer */
  get capacity(): number {
    return this.cells.length
  }

  get(index: number): number {
    return index < this.reached ? this.cells[index] : 0
  }

  set(index: number, value: number): void {
    this.ensure(index)
    // Uint8Array stores ToUint8(value), i.e. value mod 256
    this.cells[index] = value
  }

  ensure(index: number): void {
    if (index < this.reached) {
      return
    }
    if (index >= this.cells.length) {
      let capacity = this.cells.length * 2
      while (capacity <= index) {
        capacity *= 2
      }
      const grown = new Uint8Array(capacity)
      grown.set(this.cells)
      this.cells = grown
    }
    this.reached = index + 1
  }

  snapshot(): Uint8Array {
    return this.cells.slice(0, this.reached)
  }
}
