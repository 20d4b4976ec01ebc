import { z } from 'zod'
import { messages } from '@constants/messages'

export interface City {
  readonly name: string
  readonly displayName: string
  readonly country: string
  readonly latitude: number
  readonly longitude: number
}

export const DISPLAY_NAME_SEPARATOR = ', '

const COORDINATE_EPSILON = 0.000001

const nonBlank = z.string().refine((value) => value.trim().length > 0)

const cityRecordSchema = z.object({
  name: nonBlank,
  displayName: nonBlank,
  country: z.string(),
  latitude: z.number().min(-90, messages.latitude.outOfRange).max(90, messages.latitude.outOfRange),
  longitude: z.number().min(-180, messages.longitude.outOfRange).max(180, messages.longitude.outOfRange),
})

// Upstream records may omit the country
export const citySchema = cityRecordSchema.extend({
  name: z.string().trim().min(1),
  displayName: z.string().trim().min(1),
  country: z.string().trim().default(''),
})

/**
 * Builds a City from an untrusted record. Returns null when the record is
 * missing its name or display name, or has coordinates out of range.
 */
export function createCity(input: unknown): City | null {
  const parsed = citySchema.safeParse(input)

  return parsed.success ? Object.freeze(parsed.data) : null
}

export function isValidCity(value: unknown): value is City {
  return cityRecordSchema.safeParse(value).success
}

export function formatDisplayName(name: string, country: string): string {
  return `${name}${DISPLAY_NAME_SEPARATOR}${country}`
}

function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function compareNumber(a: number, b: number): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Canonical ordering: display name (case-insensitive), then country,
 * latitude and longitude.
 */
export function compareCities(a: City, b: City): number {
  return (
    compareText(a.displayName.toLowerCase(), b.displayName.toLowerCase()) ||
    compareText(a.country, b.country) ||
    compareNumber(a.latitude, b.latitude) ||
    compareNumber(a.longitude, b.longitude)
  )
}

export function citiesEqual(a: City, b: City): boolean {
  return (
    a.displayName === b.displayName &&
    a.name === b.name &&
    a.country === b.country &&
    Math.abs(a.latitude - b.latitude) < COORDINATE_EPSILON &&
    Math.abs(a.longitude - b.longitude) < COORDINATE_EPSILON
  )
}
