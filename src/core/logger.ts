import pino from 'pino'
import type { Logger } from 'pino'
import { resolveLogLevel } from './config'

const logger: Logger = pino({
  name: 'pagewise',
  level: resolveLogLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
})

/** Child logger tagged with the emitting module. */
export function createLogger(module: string): Logger {
  return logger.child({ module })
}

export type { Logger }

export default logger
