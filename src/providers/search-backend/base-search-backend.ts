import { EventEmitter } from 'events'
import type { City } from '@models/city'
import { createComponentLogger, runWithOperationId, type Logger } from '@lib/logger'
import { errorMessageOf, logError } from '@lib/logger/helpers'
import type { SearchBackend, SearchBackendEvent, SearchBackendListener } from './search-backend.interface'
import { EmptySearchQueryError } from './error/empty-search-query-error'

const BACKEND_EVENT = 'event'

export interface BaseSearchBackendOptions {
  enableLogging?: boolean
}

/**
 * Operation bookkeeping shared by every backend: monotonic operation ids,
 * event delivery, cancellation by identity and request statistics.
 */
export abstract class BaseSearchBackend implements SearchBackend {
  abstract readonly name: string
  abstract readonly version: string
  abstract readonly description: string
  abstract readonly supportedFeatures: readonly string[]
  abstract readonly supportsAutoComplete: boolean
  abstract readonly requiresCredential: boolean
  abstract readonly rateLimitPerMinute: number
  abstract readonly supportedCountries: readonly string[]

  protected readonly log: Logger

  private readonly emitter = new EventEmitter()
  private operationCounter = 0
  private pendingOperationId: number | null = null

  private lastErrorMessage = ''
  private successfulRequests = 0
  private failedRequests = 0

  constructor(component: string, options: BaseSearchBackendOptions = {}) {
    this.log = createComponentLogger(component, options.enableLogging ?? true)
  }

  get isAvailable(): boolean {
    return true
  }

  get lastError(): string {
    return this.lastErrorMessage
  }

  get successCount(): number {
    return this.successfulRequests
  }

  get failureCount(): number {
    return this.failedRequests
  }

  searchCities(query: string): number {
    if (this.pendingOperationId !== null) {
      this.log.warn({ operationId: this.pendingOperationId }, 'Search already in progress, cancelling previous search')
      this.cancelSearch()
    }

    const operationId = ++this.operationCounter
    this.pendingOperationId = operationId

    runWithOperationId(operationId, () => {
      this.log.info({ query }, 'Starting search')
      this.emit({ type: 'started', operationId })

      if (query.trim().length === 0) {
        // Reported asynchronously like any other outcome
        queueMicrotask(() => this.fail(operationId, new EmptySearchQueryError()))
        return
      }

      this.startOperation(operationId, query)
    })

    return operationId
  }

  cancelSearch(): void {
    const operationId = this.pendingOperationId

    if (operationId === null) {
      this.log.debug('Cancel requested but no search in progress')
      return
    }

    this.log.info({ operationId }, 'Cancelling search')
    this.pendingOperationId = null
    this.abortOperation(operationId)
    this.emit({ type: 'finished', operationId })
  }

  isSearching(): boolean {
    return this.pendingOperationId !== null
  }

  /** A throwing listener is logged and does not keep the others from the event. */
  subscribe(listener: SearchBackendListener): () => void {
    const guarded: SearchBackendListener = (event) => {
      try {
        listener(event)
      } catch (error) {
        logError(error, { event: event.type, operationId: event.operationId }, 'Search backend listener failed', this.log)
      }
    }

    this.emitter.on(BACKEND_EVENT, guarded)

    return () => {
      this.emitter.off(BACKEND_EVENT, guarded)
    }
  }

  /** Begins the backend-specific work for a non-empty query. */
  protected abstract startOperation(operationId: number, query: string): void

  /** Stops the work of a cancelled operation. Its outcome is discarded anyway. */
  protected abstract abortOperation(operationId: number): void

  protected isPending(operationId: number): boolean {
    return this.pendingOperationId === operationId
  }

  protected succeed(operationId: number, cities: City[]): void {
    if (!this.isPending(operationId)) {
      this.log.debug({ operationId }, 'Discarding result of a superseded operation')
      return
    }

    this.pendingOperationId = null
    this.successfulRequests++
    this.lastErrorMessage = ''

    this.log.info({ operationId, count: cities.length }, 'Search returned cities')
    this.emit({ type: 'citiesFound', operationId, cities })
    this.emit({ type: 'finished', operationId })
  }

  protected fail(operationId: number, error: unknown): void {
    if (!this.isPending(operationId)) {
      this.log.debug({ operationId }, 'Discarding error of a superseded operation')
      return
    }

    const message = errorMessageOf(error)

    this.pendingOperationId = null
    this.failedRequests++
    this.lastErrorMessage = message

    this.log.warn({ operationId, error: message }, 'Search failed')
    this.emit({ type: 'searchError', operationId, message })
    this.emit({ type: 'finished', operationId })
  }

  private emit(event: SearchBackendEvent): void {
    this.emitter.emit(BACKEND_EVENT, event)
  }
}
