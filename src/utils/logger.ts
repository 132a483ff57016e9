import { pino, type Logger } from 'pino'
import { getConfig } from './config.js'

const config = getConfig()

export const baseLogger: Logger = pino({
  level: config.LOG_LEVEL,
  transport: config.LOG_PRETTY && config.NODE_ENV !== 'production' ? { target: 'pino-pretty' } : undefined,
  base: {
    pid: process.pid,
    hostname: undefined,
    service: 'hedged-twr'
  }
})

export const logger = baseLogger

export function createLogger(bindings: Record<string, unknown>): Logger {
  return baseLogger.child(bindings)
}
