import type { City } from '@models/city'

// Roughly 100 meters at the equator
export const COORDINATE_THRESHOLD = 0.001

export type DuplicateReason = 'displayName' | 'nameAndCountry' | 'coordinates'

export function areCoordinatesClose(lat1: number, lon1: number, lat2: number, lon2: number): boolean {
  return Math.abs(lat1 - lat2) < COORDINATE_THRESHOLD && Math.abs(lon1 - lon2) < COORDINATE_THRESHOLD
}

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

/**
 * Returns why `candidate` duplicates `existing`, or null when it does not.
 * Any single rule is enough.
 */
export function duplicateReason(candidate: City, existing: City): DuplicateReason | null {
  if (sameText(candidate.displayName, existing.displayName)) {
    return 'displayName'
  }

  if (sameText(candidate.name, existing.name) && sameText(candidate.country, existing.country)) {
    return 'nameAndCountry'
  }

  if (areCoordinatesClose(candidate.latitude, candidate.longitude, existing.latitude, existing.longitude)) {
    return 'coordinates'
  }

  return null
}

export function isDuplicate(candidate: City, existing: City): boolean {
  return duplicateReason(candidate, existing) !== null
}
