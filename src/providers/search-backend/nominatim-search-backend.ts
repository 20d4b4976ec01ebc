import axios, { type AxiosError, type AxiosInstance } from 'axios'
import { z } from 'zod'
import { env } from '@env/index'
import { createHttpClient } from '@lib/http/create-http-client'
import { logError } from '@lib/logger/helpers'
import { createCity, DISPLAY_NAME_SEPARATOR, type City } from '@models/city'
import { BaseSearchBackend, type BaseSearchBackendOptions } from './base-search-backend'
import { createNominatimSearchRequest, DEFAULT_LIMIT, toSearchParams } from './nominatim-search-request'
import { InvalidResponseFormatError } from './error/invalid-response-format-error'
import { NetworkRequestError } from './error/network-request-error'
import { NoCitiesFoundError } from './error/no-cities-found-error'
import { SearchAbortedError } from './error/search-aborted-error'

export type NominatimHttpClient = Pick<AxiosInstance, 'get'>

export interface NominatimSearchBackendOptions extends BaseSearchBackendOptions {
  baseUrl?: string
  userAgent?: string
  timeoutMs?: number
  limit?: number
  rateLimitPerMinute?: number
  /** ISO 3166-1 alpha-2 codes forwarded as `countrycodes`. Empty means worldwide. */
  supportedCountries?: readonly string[]
  maxRetries?: number
  backoffMs?: number
  httpClient?: NominatimHttpClient
}

const nominatimAddressSchema = z.object({
  city: z.string().optional(),
  town: z.string().optional(),
  village: z.string().optional(),
  municipality: z.string().optional(),
  country: z.string().optional(),
})

const nominatimItemSchema = z.object({
  display_name: z.string().default(''),
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  address: nominatimAddressSchema.default({}),
})

type NominatimItem = z.infer<typeof nominatimItemSchema>

export class NominatimSearchBackend extends BaseSearchBackend {
  readonly name = 'Nominatim'
  readonly version = '1.0'
  readonly description = 'OpenStreetMap Nominatim geocoding service - free worldwide city search'
  readonly supportedFeatures = ['basic_search', 'address_details', 'coordinates', 'country_filter']
  readonly supportsAutoComplete = false
  readonly requiresCredential = false
  readonly rateLimitPerMinute: number
  readonly supportedCountries: readonly string[]

  // HTTP Settings
  private readonly MAX_RETRIES: number
  private readonly BACKOFF_MS: number
  private readonly MAX_RETRY_DELAY_MS = 30_000
  private readonly MAX_SOCKETS = 2
  private readonly MAX_FREE_SOCKETS = 1

  private readonly api: NominatimHttpClient
  private readonly limit: number
  private inFlight: { operationId: number; controller: AbortController } | null = null

  constructor(options: NominatimSearchBackendOptions = {}) {
    super('NominatimSearchBackend', options)

    this.rateLimitPerMinute = options.rateLimitPerMinute ?? 60
    this.supportedCountries = options.supportedCountries ?? []
    this.limit = options.limit ?? DEFAULT_LIMIT
    this.MAX_RETRIES = options.maxRetries ?? 2
    this.BACKOFF_MS = options.backoffMs ?? 300

    this.api =
      options.httpClient ??
      createHttpClient({
        baseURL: options.baseUrl ?? env.NOMINATIM_API_URL,
        userAgent: options.userAgent ?? env.NOMINATIM_USER_AGENT,
        timeoutMs: options.timeoutMs ?? env.NOMINATIM_TIMEOUT_MS,
        pool: { maxSockets: this.MAX_SOCKETS, maxFreeSockets: this.MAX_FREE_SOCKETS },
      })
  }

  protected startOperation(operationId: number, query: string): void {
    const controller = new AbortController()
    this.inFlight = { operationId, controller }

    // runOperation reports every outcome through events
    this.runOperation(operationId, query, controller.signal).catch((error) =>
      logError(error, { operationId }, 'Search operation failed', this.log),
    )
  }

  protected abortOperation(operationId: number): void {
    if (this.inFlight?.operationId === operationId) {
      this.inFlight.controller.abort()
      this.inFlight = null
    }
  }

  private async runOperation(operationId: number, query: string, signal: AbortSignal): Promise<void> {
    let cities: City[]

    try {
      cities = await this.fetchCities(query, signal)
    } catch (error) {
      if (signal.aborted) {
        this.log.debug({ operationId }, 'Nominatim request aborted')
        return
      }

      this.fail(operationId, error)
      return
    } finally {
      if (this.inFlight?.operationId === operationId) {
        this.inFlight = null
      }
    }

    this.succeed(operationId, cities)
  }

  private async fetchCities(query: string, signal: AbortSignal): Promise<City[]> {
    const request = createNominatimSearchRequest({
      query,
      limit: this.limit,
      countryCodes: [...this.supportedCountries],
    })
    const params = toSearchParams(request)

    for (let attempt = 0; ; attempt++) {
      if (signal.aborted) {
        throw new SearchAbortedError()
      }

      try {
        this.log.debug({ params, attempt }, 'Sending request to Nominatim API')
        const response = await this.api.get<unknown>('/search', { params, signal })

        return this.parseResponse(response.data)
      } catch (error) {
        if (signal.aborted) {
          throw new SearchAbortedError()
        }

        if (!axios.isAxiosError(error)) {
          throw error
        }

        const status = error.response?.status
        const isRetryable = !error.response || (typeof status === 'number' && (status >= 500 || status === 429))

        if (!isRetryable || attempt >= this.MAX_RETRIES) {
          this.log.error({ attempt, status, error: error.message }, 'Nominatim request failed after retries')
          throw new NetworkRequestError(error.message, status, error)
        }

        const delay = this.computeDelayMs(attempt, error)
        this.log.warn({ attempt, delay, status }, 'Retrying Nominatim request')
        await this.sleep(delay, signal)
      }
    }
  }

  private parseResponse(data: unknown): City[] {
    if (!Array.isArray(data)) {
      throw new InvalidResponseFormatError()
    }

    this.log.debug({ count: data.length }, 'Processing results from API')

    const cities: City[] = []
    for (const value of data) {
      const parsed = nominatimItemSchema.safeParse(value)
      if (!parsed.success) {
        continue
      }

      const city = this.toCity(parsed.data)
      if (city) {
        cities.push(city)
      }
    }

    if (cities.length === 0) {
      throw new NoCitiesFoundError()
    }

    return cities
  }

  private toCity(item: NominatimItem): City | null {
    const { address } = item
    const name =
      address.city ??
      address.town ??
      address.village ??
      address.municipality ??
      item.display_name.split(DISPLAY_NAME_SEPARATOR)[0]

    // Missing name or display name: dropped
    return createCity({
      name,
      displayName: item.display_name,
      country: address.country ?? '',
      latitude: item.lat,
      longitude: item.lon,
    })
  }

  private sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new SearchAbortedError())
        return
      }

      const onAbort = () => {
        clearTimeout(timer)
        reject(new SearchAbortedError())
      }

      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort)
        resolve()
      }, ms)

      signal.addEventListener('abort', onAbort, { once: true })
    })
  }

  private parseRetryAfterMs(value: unknown): number | null {
    if (typeof value !== 'string') return null
    const asSeconds = Number.parseInt(value, 10)
    if (Number.isFinite(asSeconds) && asSeconds >= 0) return asSeconds * 1000
    const asDate = Date.parse(value)
    if (!Number.isNaN(asDate)) {
      const delta = asDate - Date.now()
      return delta > 0 ? delta : 0
    }
    return null
  }

  private computeDelayMs(attempt: number, err: AxiosError): number {
    const base = this.BACKOFF_MS * Math.pow(2, attempt)
    if (err.response?.status === 429) {
      const retryAfter = this.parseRetryAfterMs(err.response.headers['retry-after'])
      if (retryAfter !== null) return Math.min(retryAfter, this.MAX_RETRY_DELAY_MS)
    }
    return Math.min(base, this.MAX_RETRY_DELAY_MS)
  }
}
