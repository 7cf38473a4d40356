import { readFile } from 'node:fs/promises'
import type { SafePromise } from '@bfvm/types'
import { safeError, safeResult, safeTry } from '@bfvm/types'
import { z } from 'zod'
import { CLI_ERRORS, CliError } from './errors'

export const cliOptionsSchema = z.object({
  file: z.string().optional(),
  interpreter: z.boolean().optional(),
  execute: z.string().optional(),
  trace: z.boolean().optional(),
})

export type CliOptions = z.infer<typeof cliOptionsSchema>

/**
 * How the front end runs
 * A file wins over an inline script, which wins over interactive mode.
 */
export type Mode =
  | { kind: 'script'; source: string; origin: 'file' | 'inline' }
  | { kind: 'interactive' }

export async function resolveMode(
  options: CliOptions,
): SafePromise<Mode, CliError> {
  if (options.file !== undefined) {
    const [error, source] = await safeTry(readFile(options.file, 'utf8'))
    if (error) {
      return safeError(
        new CliError(`Cannot read the script ${error.message}`, CLI_ERRORS.IO, {
          cause: error,
        }),
      )
    }
    const mode: Mode = { kind: 'script', source, origin: 'file' }
    return safeResult(mode)
  }

  if (options.execute !== undefined) {
    const mode: Mode = {
      kind: 'script',
      source: options.execute,
      origin: 'inline',
    }
    return safeResult(mode)
  }

  if (options.interpreter) {
    const mode: Mode = { kind: 'interactive' }
    return safeResult(mode)
  }

  return safeError(
    new CliError(
      'Error: No file provided and not running in interpreted mode or eval mode',
      CLI_ERRORS.USAGE,
    ),
  )
}
