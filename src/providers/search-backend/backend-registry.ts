import { z } from 'zod'
import { createComponentLogger } from '@lib/logger'
import { BackendNotImplementedError } from '@use-cases/errors/backend-not-implemented-error'
import { NoSearchBackendError } from '@use-cases/errors/no-search-backend-error'
import type { SearchBackend } from './search-backend.interface'
import { MockSearchBackend } from './mock-search-backend'
import { NominatimSearchBackend } from './nominatim-search-backend'

export enum BackendKind {
  Nominatim = 'Nominatim',
  GooglePlaces = 'GooglePlaces',
  Mock = 'Mock',
}

export const DEFAULT_TIMEOUT_MS = 10000

export const serviceConfigurationSchema = z.object({
  baseUrl: z.url().optional(),
  rateLimitPerMinute: z.number().int().positive().optional(),
  supportedCountries: z.array(z.string().min(2)).optional(),
  enableLogging: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
})

export type ServiceConfigurationInput = z.input<typeof serviceConfigurationSchema>
export type ServiceConfiguration = z.output<typeof serviceConfigurationSchema>

export interface ServiceDescriptor {
  readonly kind: BackendKind
  readonly name: string
  readonly requiresCredential: boolean
  readonly rateLimitPerMinute: number
  readonly description: string
  /** Absent for kinds that are known but not implemented yet. */
  readonly create?: (config: ServiceConfiguration) => SearchBackend
}

function createMockBackend(config: ServiceConfiguration): SearchBackend {
  const mock = new MockSearchBackend({
    enableLogging: config.enableLogging,
    rateLimitPerMinute: config.rateLimitPerMinute,
    supportedCountries: config.supportedCountries,
  })

  // A non-default timeout simulates a slower network
  if (config.timeoutMs !== DEFAULT_TIMEOUT_MS) {
    mock.setSimulateNetworkDelay(true, config.timeoutMs / 10)
  }

  return mock
}

function createNominatimBackend(config: ServiceConfiguration): SearchBackend {
  return new NominatimSearchBackend({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    rateLimitPerMinute: config.rateLimitPerMinute,
    supportedCountries: config.supportedCountries,
    enableLogging: config.enableLogging,
  })
}

export const defaultBackendTable: readonly ServiceDescriptor[] = Object.freeze([
  Object.freeze({
    kind: BackendKind.Nominatim,
    name: 'Nominatim',
    requiresCredential: false,
    rateLimitPerMinute: 60,
    description: 'OpenStreetMap Nominatim search service - free, no API key required',
    create: createNominatimBackend,
  }),
  Object.freeze({
    kind: BackendKind.GooglePlaces,
    name: 'GooglePlaces',
    requiresCredential: true,
    rateLimitPerMinute: 600,
    description: 'Google Places search service - requires an API key',
  }),
  Object.freeze({
    kind: BackendKind.Mock,
    name: 'Mock',
    requiresCredential: false,
    rateLimitPerMinute: 1000,
    description: 'Mock service for testing - returns predefined test data',
    create: createMockBackend,
  }),
])

/**
 * Maps backend names to constructors. Unknown names resolve to the default
 * kind instead of failing.
 */
export class BackendRegistry {
  private readonly descriptors: ReadonlyMap<string, ServiceDescriptor>
  private readonly fallback: ServiceDescriptor
  private readonly log = createComponentLogger('BackendRegistry')

  constructor(
    table: readonly ServiceDescriptor[] = defaultBackendTable,
    defaultKind: BackendKind = BackendKind.Nominatim,
  ) {
    this.descriptors = new Map(table.map((descriptor): [string, ServiceDescriptor] => [descriptor.kind, descriptor]))

    const fallback = this.descriptors.get(defaultKind)
    if (!fallback?.create) {
      throw new NoSearchBackendError()
    }

    this.fallback = fallback
  }

  create(kind: string, config: ServiceConfigurationInput = {}): SearchBackend {
    const descriptor = this.resolve(kind)

    if (!descriptor.create) {
      this.log.warn({ kind: descriptor.name }, 'Search backend not implemented')
      throw new BackendNotImplementedError(descriptor.name)
    }

    const parsedConfig = serviceConfigurationSchema.parse(config)

    if (parsedConfig.enableLogging) {
      this.log.debug({ kind: descriptor.name }, 'Creating search backend')
    }

    return descriptor.create(parsedConfig)
  }

  /** Kinds with a working constructor. */
  availableKinds(): string[] {
    return [...this.descriptors.values()].filter((descriptor) => descriptor.create).map((descriptor) => descriptor.name)
  }

  defaultKind(): BackendKind {
    return this.fallback.kind
  }

  isAvailable(kind: string): boolean {
    return this.descriptors.get(kind)?.create !== undefined
  }

  kindToString(kind: BackendKind): string {
    return this.descriptors.get(kind)?.name ?? 'Unknown'
  }

  /** Case-sensitive. Unrecognized names map to the default kind. */
  stringToKind(name: string): BackendKind {
    for (const descriptor of this.descriptors.values()) {
      if (descriptor.name === name) {
        return descriptor.kind
      }
    }

    this.log.warn({ name, fallback: this.fallback.name }, 'Unknown search backend name, returning default')
    return this.fallback.kind
  }

  requiresCredential(kind: string): boolean {
    return this.resolve(kind).requiresCredential
  }

  description(kind: string): string {
    return this.resolve(kind).description
  }

  descriptor(kind: string): ServiceDescriptor {
    return this.resolve(kind)
  }

  private resolve(kind: string): ServiceDescriptor {
    return this.descriptors.get(kind) ?? this.descriptors.get(this.stringToKind(kind)) ?? this.fallback
  }
}
