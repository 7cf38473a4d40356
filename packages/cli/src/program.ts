import { Command, type OptionValues } from 'commander'
import { type CliOptions, cliOptionsSchema } from './mode'

export const VERSION = '0.1.0'

/**
 * Command line definition
 * The handler receives validated options; mode selection happens there.
 */
export function createProgram(
  handler: (options: CliOptions) => Promise<void>,
): Command {
  return new Command('bfvm')
    .description('Run programs for the eight-instruction byte tape machine')
    .version(VERSION)
    .argument('[file]', 'Script file to run')
    .option('-i, --interpreter', 'Run the real-time interpreter')
    .option('-e, --execute <source>', 'Execute a literal script')
    .option('--trace', 'Log every executed instruction at debug level')
    .action(async (file: string | undefined, options: OptionValues) => {
      await handler(cliOptionsSchema.parse({ ...options, file }))
    })
}
