import { z } from 'zod'
import { messages } from '@constants/messages'
import { InvalidSearchRequestError } from './error/invalid-search-request-error'

export const MIN_LIMIT = 1
export const MAX_LIMIT = 100
export const DEFAULT_LIMIT = 50

export const nominatimSearchRequestSchema = z.object({
  query: z.string().trim().min(1, messages.validation.queryCannotBeEmpty),
  limit: z
    .number()
    .int()
    .min(MIN_LIMIT, messages.validation.limitOutOfRange(MIN_LIMIT, MAX_LIMIT))
    .max(MAX_LIMIT, messages.validation.limitOutOfRange(MIN_LIMIT, MAX_LIMIT))
    .default(DEFAULT_LIMIT),
  addressDetails: z.boolean().default(true),
  format: z.string().min(1, messages.validation.formatCannotBeEmpty).default('json'),
  featureType: z.string().min(1, messages.validation.featureTypeCannotBeEmpty).default('city'),
  countryCodes: z.array(z.string().regex(/^[a-z]{2}$/i, messages.validation.invalidCountryCode)).default([]),
})

export type NominatimSearchRequestInput = z.input<typeof nominatimSearchRequestSchema>
export type NominatimSearchRequest = z.output<typeof nominatimSearchRequestSchema>

export function createNominatimSearchRequest(input: NominatimSearchRequestInput): NominatimSearchRequest {
  const parsed = nominatimSearchRequestSchema.safeParse(input)

  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? messages.validation.queryCannotBeEmpty
    throw new InvalidSearchRequestError(reason)
  }

  return parsed.data
}

export function toSearchParams(request: NominatimSearchRequest): Record<string, string> {
  const params: Record<string, string> = {
    q: request.query,
    format: request.format,
    addressdetails: request.addressDetails ? '1' : '0',
    limit: String(request.limit),
    featuretype: request.featureType,
  }

  if (request.countryCodes.length > 0) {
    params.countrycodes = request.countryCodes.map((code) => code.toLowerCase()).join(',')
  }

  return params
}
