import type { City } from '@models/city'

export type SearchBackendEvent =
  | { type: 'started'; operationId: number }
  | { type: 'citiesFound'; operationId: number; cities: City[] }
  | { type: 'searchError'; operationId: number; message: string }
  | { type: 'finished'; operationId: number }

export type SearchBackendListener = (event: SearchBackendEvent) => void

export interface SearchBackendMetadata {
  readonly name: string
  readonly version: string
  readonly description: string
  readonly supportedFeatures: readonly string[]
  readonly supportsAutoComplete: boolean
  readonly requiresCredential: boolean
  readonly rateLimitPerMinute: number
  /** Empty means unrestricted. */
  readonly supportedCountries: readonly string[]
}

export interface SearchBackendHealth {
  readonly isAvailable: boolean
  readonly lastError: string
  readonly successCount: number
  readonly failureCount: number
}

/**
 * A pluggable provider of asynchronous city search.
 *
 * `searchCities` emits `started` before it returns, then later exactly one of
 * `citiesFound` / `searchError` followed by `finished`, all tagged with the
 * returned operation id. A cancelled operation only emits `finished`.
 */
export interface SearchBackend extends SearchBackendMetadata, SearchBackendHealth {
  searchCities(query: string): number
  cancelSearch(): void
  isSearching(): boolean
  subscribe(listener: SearchBackendListener): () => void
}
