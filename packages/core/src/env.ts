import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

/** Largest starting tape buffer, in cells (16 MiB) */
export const MAX_TAPE_INITIAL_CAPACITY = 2 ** 24

// VM specific variables
export const vmEnvSchema = baseEnvSchema.extend({
  BFVM_TAPE_INITIAL_CAPACITY: z
    .string()
    .regex(/^\d+$/, 'must be a positive integer')
    .transform((val) => Number.parseInt(val, 10))
    .refine((val) => val > 0, 'must be a positive integer')
    .refine(
      (val) => val <= MAX_TAPE_INITIAL_CAPACITY,
      `must be at most ${MAX_TAPE_INITIAL_CAPACITY}`,
    )
    .default('30000'),
})

export type VmEnv = z.infer<typeof vmEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @param source - Variables to validate, process.env by default
 * @returns Validated environment variables
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): z.infer<T> {
  // dotenv fills process.env, never overriding what is already set
  dotenvConfig({ path: envPath })

  return schema.parse(source)
}

/**
 * Load the VM environment
 * @param envPath - Optional path to .env file
 */
export function loadVmEnv(
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): VmEnv {
  return loadEnvVariables(vmEnvSchema, envPath, source)
}
