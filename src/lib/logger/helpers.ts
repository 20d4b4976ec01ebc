import { logger, type Logger } from '@lib/logger'

export function logError(
  error: unknown,
  context: Record<string, unknown> = {},
  message = 'Unexpected error',
  target: Logger = logger,
): void {
  if (error instanceof Error) {
    target.error({ ...context, err: { name: error.name, message: error.message, stack: error.stack } }, message)
    return
  }

  target.error({ ...context, err: error }, message)
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Unknown error'
}
