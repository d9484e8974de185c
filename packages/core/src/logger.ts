/**
 * Logging
 *
 * One root pino logger per process; modules take a child bound to their name.
 * Level comes from HERALD_LOG_LEVEL, pretty output from HERALD_LOG_PRETTY=1.
 */

import { pino, type Logger, type LoggerOptions } from 'pino'

export type { Logger } from 'pino'

export function loggerOptions(): LoggerOptions {
  const options: LoggerOptions = {
    level: process.env.HERALD_LOG_LEVEL ?? 'info',
  }

  if (process.env.HERALD_LOG_PRETTY === '1') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    }
  }

  return options
}

let root: Logger | null = null

export function rootLogger(): Logger {
  if (!root) {
    root = pino(loggerOptions())
  }
  return root
}

/**
 * Child logger for a module, e.g. createLogger('Reconciler').
 */
export function createLogger(module: string): Logger {
  return rootLogger().child({ module })
}
