import { z } from 'zod'
import dotenv from 'dotenv'
import { CategorizedError, ErrorCategory, ErrorSeverity } from './errors.js'

dotenv.config()

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1'),
})

export type AppConfig = z.infer<typeof envSchema>

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new CategorizedError(
      'Invalid environment configuration',
      ErrorCategory.CONFIGURATION,
      ErrorSeverity.CRITICAL,
      { context: { issues: parsed.error.issues } }
    )
  }
  return parsed.data
}

let configInstance: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig()
  }
  return configInstance
}

/**
 * Drops the memoized config so the next getConfig() re-reads process.env.
 */
export function resetConfig(): void {
  configInstance = null
}
