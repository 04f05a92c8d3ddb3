import type { SquareConfig } from '@dasquare/types'
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

const powerOfTwo = z
  .string()
  .default('128')
  .transform((val) => Number.parseInt(val, 10))
  .refine(
    (val) => Number.isInteger(val) && val > 0 && (val & (val - 1)) === 0,
    'must be a positive power of two',
  )

const positiveInt = z
  .string()
  .default('64')
  .transform((val) => Number.parseInt(val, 10))
  .refine((val) => Number.isInteger(val) && val >= 1, 'must be at least 1')

/**
 * Environment of a process that packs or verifies squares
 */
export const squareEnvSchema = baseEnvSchema.extend({
  SQUARE_MAX_SIZE: powerOfTwo,
  SQUARE_SUBTREE_ROOT_THRESHOLD: positiveInt,
})

export type SquareEnv = z.infer<typeof squareEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @returns Validated environment variables
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  envPath?: string,
): z.infer<T> {
  // Load environment variables from .env file
  dotenvConfig({ path: envPath })

  // Validate and parse environment variables
  return schema.parse(process.env)
}

/**
 * Load the square builder parameters from the environment
 * @param envPath - Optional path to .env file
 */
export function loadSquareConfig(envPath?: string): SquareConfig {
  const env = loadEnvVariables(squareEnvSchema, envPath)
  return {
    maxSquareSize: env.SQUARE_MAX_SIZE,
    subtreeRootThreshold: env.SQUARE_SUBTREE_ROOT_THRESHOLD,
  }
}
