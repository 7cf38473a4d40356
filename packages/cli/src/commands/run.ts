import { describeByte, logger, type VmEnv } from '@bfvm/core'
import type { ByteSink, ByteSource } from '@bfvm/types'
import { Executor } from '@bfvm/vm'
import { type CliOptions, resolveMode } from '../mode'
import { Repl } from '../repl'
import { formatExecutionError } from '../utils/format'

export interface CliIO {
  input: ByteSource
  output: ByteSink
  report: (message: string) => void
}

/**
 * Run the front end for already parsed options
 * @returns process exit code
 */
export async function runCli(
  options: CliOptions,
  io: CliIO,
  env: Pick<VmEnv, 'BFVM_TAPE_INITIAL_CAPACITY'>,
): Promise<number> {
  const [modeError, mode] = await resolveMode(options)
  if (modeError) {
    io.report(modeError.message)
    return 1
  }

  if (options.trace) {
    logger.setLevel('debug')
  }

  const executor = new Executor({
    input: io.input,
    output: io.output,
    tapeCapacity: env.BFVM_TAPE_INITIAL_CAPACITY,
    trace: options.trace,
    // The interpreter keeps one tape across lines
    persistent: mode.kind === 'interactive',
  })

  if (mode.kind === 'interactive') {
    return new Repl({
      executor,
      input: io.input,
      output: io.output,
      report: io.report,
    }).run()
  }

  logger.debug('Run: executing script', {
    origin: mode.origin,
    length: mode.source.length,
  })
  const [error] = executor.execute(mode.source)

  if (options.trace) {
    for (const entry of executor.getExecutionLogs()) {
      logger.debug('Trace', { ...entry, cell: describeByte(entry.cell) })
    }
    const { dataPointer, instructionPointer, steps, tape } =
      executor.getState()
    logger.debug('Run: final state', {
      dataPointer,
      instructionPointer,
      steps,
      tapeLength: tape.length,
    })
  }

  if (error) {
    io.report(formatExecutionError(error))
    return 1
  }
  return 0
}
