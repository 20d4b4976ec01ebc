import { formatDisplayName, type City } from '@models/city'
import { BaseSearchBackend, type BaseSearchBackendOptions } from './base-search-backend'
import { NoMockCitiesFoundError } from './error/no-mock-cities-found-error'
import { SimulatedNetworkError } from './error/simulated-network-error'
// The last three rows repeat Berlin, London and Paris to exercise deduplication
import mockCityTable from './fixtures/mock-cities.json'

export interface MockSearchBackendOptions extends BaseSearchBackendOptions {
  /** Source of randomness for error injection, [0, 1). */
  random?: () => number
  rateLimitPerMinute?: number
  supportedCountries?: readonly string[]
}

const DEFAULT_DELAY_MS = 500
const DEFAULT_ERROR_RATE = 0.1
const GENERIC_RESULT_LIMIT = 3
const TEST_QUERY_MARKER = 'test'

/**
 * Deterministic backend for tests and offline development. Serves a fixed
 * city table (or custom results) with optional delay and error injection.
 */
export class MockSearchBackend extends BaseSearchBackend {
  readonly name = 'Mock'
  readonly version = '1.0-test'
  readonly description = 'Mock service for testing - returns predefined test data with configurable delays and errors'
  readonly supportedFeatures = ['basic_search', 'autocomplete', 'custom_results', 'error_simulation', 'delay_simulation']
  readonly supportsAutoComplete = true
  readonly requiresCredential = false
  readonly rateLimitPerMinute: number
  readonly supportedCountries: readonly string[]

  private simulateDelay = true
  private delayMs = DEFAULT_DELAY_MS
  private simulateErrors = false
  private errorRate = DEFAULT_ERROR_RATE
  private includeDuplicates = true
  private customResults: City[] | null = null

  private delayTimer: NodeJS.Timeout | undefined
  private readonly random: () => number

  constructor(options: MockSearchBackendOptions = {}) {
    super('MockSearchBackend', options)

    this.random = options.random ?? Math.random
    this.rateLimitPerMinute = options.rateLimitPerMinute ?? 1000
    this.supportedCountries = options.supportedCountries ?? ['US', 'DE', 'FR', 'UK']
  }

  setSimulateNetworkDelay(enable: boolean, delayMs = DEFAULT_DELAY_MS): void {
    this.simulateDelay = enable
    this.delayMs = Math.max(0, delayMs)
    this.log.info({ enable, delayMs: this.delayMs }, 'Network delay simulation updated')
  }

  setSimulateErrors(enable: boolean, errorRate = DEFAULT_ERROR_RATE): void {
    this.simulateErrors = enable
    this.errorRate = Math.min(1, Math.max(0, errorRate))
    this.log.info({ enable, errorRate: this.errorRate }, 'Error simulation updated')
  }

  /** Fixed result set served instead of the generated data. An empty set yields "no results". */
  setCustomResults(cities: readonly City[]): void {
    this.customResults = cities.map((city) => ({ ...city }))
    this.log.info({ count: this.customResults.length }, 'Custom mock results set')
  }

  clearCustomResults(): void {
    this.customResults = null
    this.log.info('Cleared custom mock results')
  }

  setIncludeDuplicatesInResults(enable: boolean): void {
    this.includeDuplicates = enable
  }

  protected startOperation(operationId: number, query: string): void {
    this.log.debug(
      { delayMs: this.simulateDelay ? this.delayMs : 0, errorSimulation: this.simulateErrors },
      'Mock search configuration',
    )

    const complete = () => this.simulateSearchCompleted(operationId, query)

    if (this.simulateDelay) {
      this.delayTimer = setTimeout(complete, this.delayMs)
    } else {
      queueMicrotask(complete)
    }
  }

  protected abortOperation(): void {
    if (this.delayTimer) {
      clearTimeout(this.delayTimer)
      this.delayTimer = undefined
    }
  }

  private simulateSearchCompleted(operationId: number, query: string): void {
    this.delayTimer = undefined

    if (!this.isPending(operationId)) {
      return
    }

    if (this.shouldSimulateError()) {
      this.log.warn('Simulating network error')
      this.fail(operationId, new SimulatedNetworkError(query))
      return
    }

    const results = this.customResults ? this.customResults.map((city) => ({ ...city })) : this.createMockCities(query)

    if (results.length === 0) {
      this.fail(operationId, new NoMockCitiesFoundError(query))
      return
    }

    this.succeed(operationId, results)
  }

  private createMockCities(query: string): City[] {
    const lowerQuery = query.toLowerCase()

    const cities: City[] = mockCityTable
      .filter((row) => {
        const name = row.name.toLowerCase()
        return name.includes(lowerQuery) || row.country.toLowerCase().includes(lowerQuery) || lowerQuery.includes(name)
      })
      .map((row) => ({
        name: row.name,
        displayName: formatDisplayName(row.name, row.country),
        country: row.country,
        latitude: row.lat,
        longitude: row.lon,
      }))

    if (this.includeDuplicates && lowerQuery.includes(TEST_QUERY_MARKER)) {
      const name = 'Test City'
      const country = 'Test Country'
      const displayName = formatDisplayName(name, country)

      cities.push(
        { name, displayName, country, latitude: 50.0, longitude: 10.0 },
        { name, displayName, country, latitude: 50.0001, longitude: 10.0001 },
        { name, displayName, country, latitude: 50.0, longitude: 10.0 },
        { name, displayName, country, latitude: 50.1, longitude: 10.1 },
      )
    }

    if (cities.length === 0 && lowerQuery.length > 0) {
      const country = 'Mock Country'

      for (let i = 0; i < Math.min(GENERIC_RESULT_LIMIT, lowerQuery.length); i++) {
        const name = `Mock City ${i + 1} (${query})`
        cities.push({
          name,
          displayName: formatDisplayName(name, country),
          country,
          latitude: 50.0 + i * 0.1,
          longitude: 10.0 + i * 0.1,
        })
      }
    }

    this.log.debug({ count: cities.length, query }, 'Generated mock cities')

    return cities
  }

  private shouldSimulateError(): boolean {
    return this.simulateErrors && this.random() < this.errorRate
  }
}
