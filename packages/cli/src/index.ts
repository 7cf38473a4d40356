#!/usr/bin/env tsx

import { loadVmEnv, logger } from '@bfvm/core'
import { safeTrySync } from '@bfvm/types'
import { FileDescriptorByteSink, FileDescriptorByteSource } from '@bfvm/vm'
import { runCli } from './commands/run'
import { createProgram } from './program'

const [envError, env] = safeTrySync(() => loadVmEnv())
if (envError) {
  console.error(`Invalid environment: ${envError.message}`)
  process.exit(1)
}

logger.init(env.LOG_LEVEL)

const program = createProgram(async (options) => {
  process.exitCode = await runCli(
    options,
    {
      input: new FileDescriptorByteSource(0),
      output: new FileDescriptorByteSink(1),
      report: (message) => console.error(message),
    },
    env,
  )
})

program.parseAsync(process.argv).catch((error) => {
  console.error('Unhandled error:', error)
  process.exit(1)
})
