import { EventEmitter } from 'events'
import type {
  SearchBackend,
  SearchBackendEvent,
  SearchBackendListener,
} from '@providers/search-backend/search-backend.interface'

/**
 * Backend whose outcomes are emitted by the test. Cancelling does not stop a
 * later `deliver`, so late events of superseded operations can be replayed.
 */
export class ScriptedSearchBackend implements SearchBackend {
  readonly name = 'Scripted'
  readonly version = 'test'
  readonly description = 'Backend driven by the test'
  readonly supportedFeatures = ['basic_search']
  readonly supportsAutoComplete = false
  readonly requiresCredential = false
  readonly rateLimitPerMinute = 1000
  readonly supportedCountries: readonly string[] = []
  readonly isAvailable = true
  readonly lastError = ''
  readonly successCount = 0
  readonly failureCount = 0

  readonly queries: string[] = []

  private readonly emitter = new EventEmitter()
  private operationCounter = 0
  private pending: number | null = null

  searchCities(query: string): number {
    this.cancelSearch()

    const operationId = ++this.operationCounter
    this.pending = operationId
    this.queries.push(query)
    this.deliver({ type: 'started', operationId })

    return operationId
  }

  cancelSearch(): void {
    if (this.pending === null) {
      return
    }

    const operationId = this.pending
    this.pending = null
    this.deliver({ type: 'finished', operationId })
  }

  isSearching(): boolean {
    return this.pending !== null
  }

  subscribe(listener: SearchBackendListener): () => void {
    this.emitter.on('event', listener)

    return () => {
      this.emitter.off('event', listener)
    }
  }

  deliver(event: SearchBackendEvent): void {
    if (event.type === 'finished' && event.operationId === this.pending) {
      this.pending = null
    }

    this.emitter.emit('event', event)
  }
}
