import { describe, it, expect, vi, afterEach } from 'vitest'
import { createComponentLogger, logger, runWithOperationId } from '@lib/logger'
import { errorMessageOf, logError } from './helpers'

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should bind the component to child loggers', () => {
    const child = createComponentLogger('ResultAggregator')

    expect(child.bindings()).toMatchObject({ component: 'ResultAggregator' })
    expect(child.level).toBe(logger.level)
  })

  it('should silence a disabled component logger', () => {
    expect(createComponentLogger('MockSearchBackend', false).level).toBe('silent')
  })

  it('should run the callback inside an operation context', () => {
    expect(runWithOperationId(7, () => 'done')).toBe('done')
  })

  it('should log errors with their name and message', () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => {})
    const failure = new TypeError('boom')

    logError(failure, { query: 'Lisbon' }, 'Search crashed')

    expect(error).toHaveBeenCalledWith(
      { query: 'Lisbon', err: { name: 'TypeError', message: 'boom', stack: failure.stack } },
      'Search crashed',
    )
  })

  it('should read a message from any thrown value', () => {
    expect(errorMessageOf(new Error('boom'))).toBe('boom')
    expect(errorMessageOf('plain')).toBe('plain')
    expect(errorMessageOf(42)).toBe('Unknown error')
  })
})
