import { AsyncLocalStorage } from 'node:async_hooks'
import pino, { type Logger } from 'pino'
import { env } from '@env/index'

interface LogContext {
  operationId?: number
}

const contextStorage = new AsyncLocalStorage<LogContext>()

export const logger = pino({
  name: env.APP_NAME,
  level: env.LOG_LEVEL,
  // Every line written inside runWithOperationId carries the operation id
  mixin() {
    return contextStorage.getStore() ?? {}
  },
  transport:
    env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname' },
        }
      : undefined,
})

export type { Logger }

export function runWithOperationId<T>(operationId: number, fn: () => T): T {
  return contextStorage.run({ ...contextStorage.getStore(), operationId }, fn)
}

export function createComponentLogger(component: string, enabled = true): Logger {
  const child = logger.child({ component })

  if (!enabled) {
    child.level = 'silent'
  }

  return child
}
