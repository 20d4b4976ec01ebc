import { compareCities, isValidCity, type City } from '@models/city'
import { createComponentLogger } from '@lib/logger'
import { duplicateReason, type DuplicateReason } from './duplicate-policy'

type Candidate = City | null | undefined

/**
 * Deduplicated collection of cities, kept sorted by the canonical city order.
 * Invalid records are dropped without being reported as errors.
 */
export class ResultAggregator implements Iterable<City> {
  private cities: City[] = []
  private readonly log = createComponentLogger('ResultAggregator')

  add(city: Candidate): boolean {
    if (!isValidCity(city)) {
      return false
    }

    const match = this.findDuplicate(city, this.cities)
    if (match) {
      this.log.debug({ displayName: city.displayName, reason: match.reason }, 'Skipping duplicate city')
      return false
    }

    this.cities.push(city)
    this.sort()

    return true
  }

  /**
   * Single pass over the batch. Each entry is checked against the current
   * collection and against the entries accepted earlier in the same batch,
   * so the first of several mutual duplicates wins.
   */
  addBatch(batch: Iterable<Candidate>): number {
    const accepted: City[] = []
    let duplicatesRemoved = 0

    for (const city of batch) {
      if (!isValidCity(city)) {
        continue
      }

      if (this.findDuplicate(city, this.cities) || this.findDuplicate(city, accepted)) {
        duplicatesRemoved++
        continue
      }

      accepted.push(city)
    }

    if (duplicatesRemoved > 0) {
      this.log.debug({ duplicatesRemoved }, 'Filtered out duplicate cities')
    }

    if (accepted.length === 0) {
      return 0
    }

    this.cities.push(...accepted)
    this.sort()

    return accepted.length
  }

  clear(): void {
    this.cities = []
  }

  count(): number {
    return this.cities.length
  }

  at(index: number): City | undefined {
    return this.cities[index]
  }

  containsDuplicateOf(city: City): boolean {
    return this.findDuplicate(city, this.cities) !== null
  }

  toArray(): City[] {
    return [...this.cities]
  }

  [Symbol.iterator](): Iterator<City> {
    return this.toArray()[Symbol.iterator]()
  }

  private findDuplicate(city: City, pool: readonly City[]): { existing: City; reason: DuplicateReason } | null {
    for (const existing of pool) {
      const reason = duplicateReason(city, existing)
      if (reason) {
        return { existing, reason }
      }
    }

    return null
  }

  private sort(): void {
    this.cities.sort(compareCities)
  }
}
