/**
 * Interactive interpreter
 *
 * Reads programs line by line from the same byte source the programs read
 * their input from. A line that leaves a '[' open is continued on the next
 * prompt. Complete buffers run one after another on the executor's tape,
 * so a persistent executor carries cells and the data pointer across lines.
 */

import type { ByteSink, ByteSource } from '@bfvm/types'
import { UnbalancedBracketsError, VM_ERRORS } from '@bfvm/types'
import { type Executor, readLine, writeText } from '@bfvm/vm'
import { formatExecutionError } from './utils/format'

export const EXIT_COMMAND = 'exit'
export const BANNER = 'Write exit to finish the interpreter\n'
export const PROMPT = '>'
export const CONTINUATION_PROMPT = '==>'

export interface ReplOptions {
  executor: Executor
  input: ByteSource
  output: ByteSink
  report: (message: string) => void
}

export class Repl {
  private buffer = ''

  constructor(private readonly options: ReplOptions) {}

  /**
   * Run the session
   * @returns process exit code
   */
  run(): number {
    const { executor, input, output, report } = this.options

    const [bannerError] = writeText(output, BANNER)
    if (bannerError) {
      report(`Error: ${bannerError.message}`)
      return 1
    }

    for (;;) {
      const [promptError] = writeText(
        output,
        this.buffer === '' ? PROMPT : CONTINUATION_PROMPT,
      )
      if (promptError) {
        report(`Error: ${promptError.message}`)
        return 1
      }

      const [readError, line] = readLine(input)
      if (readError) {
        report(`Error: ${readError.message}`)
        return 1
      }
      if (line === null || line.trim() === EXIT_COMMAND) {
        return 0
      }

      this.buffer += `${line}\n`
      const [error] = executor.execute(this.buffer)
      if (!error) {
        this.buffer = ''
        continue
      }

      // Unclosed loop: keep reading the rest of it
      if (error instanceof UnbalancedBracketsError && error.bracket === '[') {
        continue
      }

      report(formatExecutionError(error))
      if (
        error.code === VM_ERRORS.OUTPUT_FAILURE ||
        error.code === VM_ERRORS.INPUT_FAILURE
      ) {
        return 1
      }
      this.buffer = ''
    }
  }
}
