import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { City } from '@models/city'
import { foundCities, nextFinished, recordEvents } from '@tests/helpers/search-backend-events'
import { MockSearchBackend } from './mock-search-backend'
import type { SearchBackendEvent } from './search-backend.interface'

describe('Mock Search Backend', () => {
  let backend: MockSearchBackend
  let events: SearchBackendEvent[]

  beforeEach(() => {
    backend = new MockSearchBackend({ enableLogging: false })
    backend.setSimulateNetworkDelay(false)
    events = recordEvents(backend)
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('should expose its metadata', () => {
    expect(backend.name).toBe('Mock')
    expect(backend.version).toBe('1.0-test')
    expect(backend.supportsAutoComplete).toBe(true)
    expect(backend.requiresCredential).toBe(false)
    expect(backend.rateLimitPerMinute).toBe(1000)
    expect(backend.supportedCountries).toEqual(['US', 'DE', 'FR', 'UK'])
    expect(backend.isAvailable).toBe(true)
  })

  it('should emit started synchronously and the outcome later', async () => {
    const finished = nextFinished(backend)
    const operationId = backend.searchCities('Berlin')

    expect(events).toEqual([{ type: 'started', operationId }])
    expect(backend.isSearching()).toBe(true)

    await finished

    expect(events.map((event) => event.type)).toEqual(['started', 'citiesFound', 'finished'])
    expect(events.every((event) => event.operationId === operationId)).toBe(true)
    expect(backend.isSearching()).toBe(false)
  })

  it('should return both Berlin rows from the table', async () => {
    const finished = nextFinished(backend)
    backend.searchCities('Berlin')
    await finished

    const cities = foundCities(events)

    expect(cities).toHaveLength(2)
    expect(cities.map((city) => city.displayName)).toEqual(['Berlin, Germany', 'Berlin, Germany'])
    expect(backend.successCount).toBe(1)
  })

  it('should match rows by country', async () => {
    const finished = nextFinished(backend)
    backend.searchCities('germany')
    await finished

    expect(foundCities(events).map((city) => city.name)).toEqual([
      'Berlin',
      'Munich',
      'Hamburg',
      'Cologne',
      'Frankfurt',
      'Berlin',
    ])
  })

  it('should seed Test City duplicates for test queries', async () => {
    const finished = nextFinished(backend)
    backend.searchCities('test')
    await finished

    const cities = foundCities(events)

    expect(cities).toHaveLength(4)
    expect(cities[1]).toMatchObject({ name: 'Test City', latitude: 50.0001, longitude: 10.0001 })
  })

  it('should generate placeholder cities when nothing matches', async () => {
    const finished = nextFinished(backend)
    backend.searchCities('Xyz')
    await finished

    expect(foundCities(events).map((city) => city.displayName)).toEqual([
      'Mock City 1 (Xyz), Mock Country',
      'Mock City 2 (Xyz), Mock Country',
      'Mock City 3 (Xyz), Mock Country',
    ])
  })

  it('should report an empty query as an error', async () => {
    const finished = nextFinished(backend)
    const operationId = backend.searchCities('   ')
    await finished

    expect(events).toContainEqual({ type: 'searchError', operationId, message: 'Please enter a search query' })
    expect(backend.failureCount).toBe(1)
    expect(backend.lastError).toBe('Please enter a search query')
  })

  it('should serve custom results instead of the table', async () => {
    const custom: City = { name: 'Nowhere', displayName: 'Nowhere, Testland', country: 'Testland', latitude: 1, longitude: 1 }
    backend.setCustomResults([custom])

    const finished = nextFinished(backend)
    backend.searchCities('Berlin')
    await finished

    expect(foundCities(events)).toEqual([custom])
  })

  it('should report no results for an empty custom result set', async () => {
    backend.setCustomResults([])

    const finished = nextFinished(backend)
    const operationId = backend.searchCities('Berlin')
    await finished

    expect(events).toContainEqual({
      type: 'searchError',
      operationId,
      message: 'No mock cities found for query: Berlin',
    })
  })

  it('should go back to generated data after clearing custom results', async () => {
    backend.setCustomResults([])
    backend.clearCustomResults()

    const finished = nextFinished(backend)
    backend.searchCities('Paris')
    await finished

    expect(foundCities(events)).toHaveLength(2)
  })

  it('should simulate network errors from the injected random source', async () => {
    const failing = new MockSearchBackend({ enableLogging: false, random: () => 0.05 })
    failing.setSimulateNetworkDelay(false)
    failing.setSimulateErrors(true, 0.1)
    const failingEvents = recordEvents(failing)

    const finished = nextFinished(failing)
    const operationId = failing.searchCities('Lyon')
    await finished

    expect(failingEvents).toContainEqual({
      type: 'searchError',
      operationId,
      message: 'Simulated network error for query: Lyon',
    })
    expect(failing.failureCount).toBe(1)
  })

  it('should clamp the error rate to one', async () => {
    const failing = new MockSearchBackend({ enableLogging: false, random: () => 0.99 })
    failing.setSimulateNetworkDelay(false)
    failing.setSimulateErrors(true, 5)

    const finished = nextFinished(failing)
    failing.searchCities('Lyon')
    await finished

    expect(failing.failureCount).toBe(1)
  })

  it('should deliver results after the configured delay', () => {
    vi.useFakeTimers()
    backend.setSimulateNetworkDelay(true, 200)

    backend.searchCities('Lyon')
    vi.advanceTimersByTime(199)

    expect(events.map((event) => event.type)).toEqual(['started'])

    vi.advanceTimersByTime(1)

    expect(events.map((event) => event.type)).toEqual(['started', 'citiesFound', 'finished'])
  })

  it('should only emit finished for a cancelled search', () => {
    vi.useFakeTimers()
    backend.setSimulateNetworkDelay(true)

    const operationId = backend.searchCities('Lyon')
    backend.cancelSearch()
    backend.cancelSearch()
    vi.advanceTimersByTime(1000)

    expect(events).toEqual([
      { type: 'started', operationId },
      { type: 'finished', operationId },
    ])
    expect(backend.successCount).toBe(0)
  })

  it('should cancel the pending search when a new one starts', () => {
    vi.useFakeTimers()
    backend.setSimulateNetworkDelay(true, 100)

    const first = backend.searchCities('Lyon')
    const second = backend.searchCities('Paris')
    vi.advanceTimersByTime(100)

    expect(second).toBe(first + 1)
    expect(events.map((event) => [event.type, event.operationId])).toEqual([
      ['started', first],
      ['finished', first],
      ['started', second],
      ['citiesFound', second],
      ['finished', second],
    ])
  })

  it('should stop notifying a listener after it unsubscribes', async () => {
    const listener = vi.fn()
    const unsubscribe = backend.subscribe(listener)
    unsubscribe()

    const finished = nextFinished(backend)
    backend.searchCities('Lyon')
    await finished

    expect(listener).not.toHaveBeenCalled()
  })

  it('should keep notifying other listeners when one throws', async () => {
    backend.subscribe((event) => {
      if (event.type === 'citiesFound') {
        throw new Error('listener failure')
      }
    })

    const finished = nextFinished(backend)
    backend.searchCities('Lyon')
    await finished

    expect(events.map((event) => event.type)).toEqual(['started', 'citiesFound', 'finished'])
    expect(backend.isSearching()).toBe(false)
    expect(backend.successCount).toBe(1)
  })
})
