/**
 * CLI error codes
 */
export const CLI_ERRORS = {
  USAGE: 'usage',
  IO: 'io',
} as const

export type CliErrorCode = (typeof CLI_ERRORS)[keyof typeof CLI_ERRORS]

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'CliError'
  }
}
