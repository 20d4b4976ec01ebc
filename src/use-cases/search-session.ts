import { EventEmitter } from 'events'
import { ResultAggregator } from '@aggregator/result-aggregator'
import { createComponentLogger } from '@lib/logger'
import type { City } from '@models/city'
import type { SearchBackend, SearchBackendEvent } from '@providers/search-backend/search-backend.interface'
import {
  BackendRegistry,
  type ServiceConfigurationInput,
} from '@providers/search-backend/backend-registry'
import { EmptyQueryError } from '@use-cases/errors/empty-query-error'
import { ServiceNotAvailableError } from '@use-cases/errors/service-not-available-error'
import { openLocationExternally, type OpenLocationResult, type UrlOpener } from './open-location-externally'

export type SearchState = 'idle' | 'searching' | 'completed' | 'errored'

export type SearchSessionEvent =
  | { type: 'stateChanged'; state: SearchState }
  | { type: 'isSearchingChanged'; isSearching: boolean }
  | { type: 'errorChanged'; message: string }
  | { type: 'searchCompleted'; resultCount: number }

export type SearchSessionListener = (event: SearchSessionEvent) => void

export interface SearchSessionOptions {
  registry?: BackendRegistry
  /** Configuration for backends created by name. */
  backendConfig?: ServiceConfigurationInput
  aggregator?: ResultAggregator
  urlOpener?: UrlOpener
}

const SESSION_EVENT = 'event'

type SessionUpdate = () => void

/**
 * Owns the current search: delegates to the active backend, discards
 * events from superseded operations or backends, and feeds accepted batches
 * into the result aggregator.
 *
 * Counters are session-level and survive backend swaps. Notifications are
 * delivered only after an update has finished mutating state, so a listener
 * may start a new search from inside a notification.
 */
export class SearchSession {
  readonly results: ResultAggregator

  private backend: SearchBackend
  private detachBackend: () => void
  private activeOperationId: number | null = null

  private currentState: SearchState = 'idle'
  private searching = false
  private errorMessage = ''
  private successfulSearches = 0
  private failedSearches = 0

  private readonly registry: BackendRegistry
  private readonly backendConfig: ServiceConfigurationInput
  private readonly urlOpener: UrlOpener | undefined
  private readonly emitter = new EventEmitter()
  private readonly pendingEvents: SearchSessionEvent[] = []
  private updateDepth = 0
  private delivering = false
  private readonly log = createComponentLogger('SearchSession')

  constructor(backend: SearchBackend, options: SearchSessionOptions = {}) {
    this.results = options.aggregator ?? new ResultAggregator()
    this.registry = options.registry ?? new BackendRegistry()
    this.backendConfig = options.backendConfig ?? {}
    this.urlOpener = options.urlOpener

    this.backend = backend
    this.detachBackend = this.attach(backend)
  }

  get state(): SearchState {
    return this.currentState
  }

  get isSearching(): boolean {
    return this.searching
  }

  get lastError(): string {
    return this.errorMessage
  }

  get successCount(): number {
    return this.successfulSearches
  }

  get failureCount(): number {
    return this.failedSearches
  }

  get activeBackend(): SearchBackend {
    return this.backend
  }

  search(query: string): void {
    this.update(() => {
      // A new search always supersedes the outstanding one
      this.discardActiveOperation()

      if (query.trim().length === 0) {
        this.setSearching(false)
        this.failedSearches++
        this.setError(new EmptyQueryError().message)
        this.relax('errored')
        return
      }

      this.results.clear()
      this.setError('')
      this.setSearching(true)
      this.setState('searching')

      this.activeOperationId = this.backend.searchCities(query)
      this.log.debug({ operationId: this.activeOperationId, backend: this.backend.name }, 'Search delegated to backend')
    })
  }

  cancel(): void {
    this.update(() => {
      if (this.activeOperationId === null) {
        this.backend.cancelSearch()
        return
      }

      this.log.info({ operationId: this.activeOperationId }, 'Cancelling search')
      // The backend confirms with `finished`, which returns the session to idle
      this.backend.cancelSearch()

      if (this.activeOperationId !== null) {
        this.discardActiveOperation()
        this.setSearching(false)
        this.setState('idle')
      }
    })
  }

  clearResults(): void {
    this.update(() => {
      this.results.clear()
      this.setError('')
      this.cancel()
    })
  }

  setBackend(backend: SearchBackend): void {
    if (backend === this.backend) {
      return
    }

    this.update(() => {
      const previous = this.backend
      this.activeOperationId = null

      previous.cancelSearch()
      this.detachBackend()

      this.backend = backend
      this.detachBackend = this.attach(backend)

      this.setSearching(false)
      this.setError('')
      this.setState('idle')

      this.log.info({ from: previous.name, to: backend.name }, 'Switched search backend')
    })
  }

  /** Unknown names fall back to the registry's default backend. */
  setBackendByName(name: string): void {
    const kind = this.registry.stringToKind(name)

    if (!this.registry.isAvailable(kind)) {
      this.update(() => this.setError(new ServiceNotAvailableError(name).message))
      return
    }

    this.setBackend(this.registry.create(kind, this.backendConfig))
  }

  currentBackendName(): string {
    return this.backend.name
  }

  availableBackends(): string[] {
    return this.registry.availableKinds()
  }

  backendDescription(): string {
    return this.backend.description
  }

  backendSuccessfulRequests(): number {
    return this.backend.successCount
  }

  backendFailedRequests(): number {
    return this.backend.failureCount
  }

  async openLocation(latitude: number, longitude: number, label?: string): Promise<OpenLocationResult> {
    const result = await openLocationExternally(latitude, longitude, label, this.urlOpener)

    const { error } = result
    if (!result.opened && error) {
      this.update(() => this.setError(error))
    }

    return result
  }

  subscribe(listener: SearchSessionListener): () => void {
    this.emitter.on(SESSION_EVENT, listener)

    return () => {
      this.emitter.off(SESSION_EVENT, listener)
    }
  }

  /** Resolves once no search is outstanding. */
  waitUntilIdle(): Promise<void> {
    if (!this.searching) {
      return Promise.resolve()
    }

    return new Promise((resolve) => {
      const unsubscribe = this.subscribe((event) => {
        // A listener may already have started the next search
        if (event.type === 'isSearchingChanged' && !this.searching) {
          unsubscribe()
          resolve()
        }
      })
    })
  }

  private attach(backend: SearchBackend): () => void {
    return backend.subscribe((event) => this.update(() => this.handleBackendEvent(backend, event)))
  }

  private handleBackendEvent(source: SearchBackend, event: SearchBackendEvent): void {
    if (source !== this.backend) {
      return
    }

    if (event.type === 'started') {
      this.log.debug({ operationId: event.operationId }, 'Backend started search')
      return
    }

    if (event.operationId !== this.activeOperationId) {
      this.log.debug({ operationId: event.operationId, type: event.type }, 'Ignoring event of a stale operation')
      return
    }

    switch (event.type) {
      case 'citiesFound':
        this.onCitiesFound(event.cities)
        break
      case 'searchError':
        this.onSearchError(event.message)
        break
      case 'finished':
        // Cancelled before any outcome
        this.discardActiveOperation()
        this.setSearching(false)
        this.setState('idle')
        break
    }
  }

  private onCitiesFound(cities: readonly City[]): void {
    this.discardActiveOperation()

    const resultCount = cities.length
    const inserted = this.results.addBatch(cities)
    this.successfulSearches++
    this.setError('')
    this.setSearching(false)

    this.log.info({ resultCount, inserted }, 'Search completed')
    this.setState('completed')
    this.notify({ type: 'searchCompleted', resultCount })
    this.setState('idle')
  }

  private onSearchError(message: string): void {
    this.discardActiveOperation()

    this.failedSearches++
    this.setError(message)
    this.setSearching(false)
    this.relax('errored')
  }

  private discardActiveOperation(): void {
    if (this.activeOperationId === null) {
      return
    }

    const operationId = this.activeOperationId
    this.activeOperationId = null

    if (this.backend.isSearching()) {
      this.backend.cancelSearch()
      this.log.debug({ operationId }, 'Superseded outstanding operation')
    }
  }

  private relax(transient: 'completed' | 'errored'): void {
    this.setState(transient)
    this.setState('idle')
  }

  private setState(state: SearchState): void {
    if (this.currentState === state) {
      return
    }

    this.currentState = state
    this.notify({ type: 'stateChanged', state })
  }

  private setSearching(searching: boolean): void {
    if (this.searching === searching) {
      return
    }

    this.searching = searching
    this.notify({ type: 'isSearchingChanged', isSearching: searching })
  }

  private setError(message: string): void {
    if (this.errorMessage === message) {
      return
    }

    this.errorMessage = message
    this.notify({ type: 'errorChanged', message })
  }

  /** Runs a state mutation and delivers its notifications once the outermost update returns. */
  private update(mutate: SessionUpdate): void {
    this.updateDepth++

    try {
      mutate()
    } finally {
      this.updateDepth--
    }

    if (this.updateDepth === 0) {
      this.deliverPendingEvents()
    }
  }

  private notify(event: SearchSessionEvent): void {
    this.pendingEvents.push(event)
  }

  private deliverPendingEvents(): void {
    // Events queued by a listener are delivered by the loop already running
    if (this.delivering) {
      return
    }

    this.delivering = true

    try {
      let event = this.pendingEvents.shift()
      while (event) {
        this.emitter.emit(SESSION_EVENT, event)
        event = this.pendingEvents.shift()
      }
    } finally {
      this.delivering = false
    }
  }
}
