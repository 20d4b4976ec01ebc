export const messages = {
  validation: {
    emptyQuery: 'query cannot be empty',
    enterSearchQuery: 'Please enter a search query',
    queryCannotBeEmpty: 'Query cannot be empty',
    limitOutOfRange: (min: number, max: number) => `Limit must be between ${min} and ${max}`,
    formatCannotBeEmpty: 'Format cannot be empty',
    featureTypeCannotBeEmpty: 'Feature type cannot be empty',
    invalidCountryCode: 'Country codes must be two-letter ISO codes',
  },
  errors: {
    invalidRequest: (reason: string) => `Invalid request: ${reason}`,
    networkError: (detail: string) => `Network error: ${detail}`,
    invalidResponseFormat: 'Invalid response format',
    noCitiesFound: 'No cities found for your search query',
    noMockCitiesFound: (query: string) => `No mock cities found for query: ${query}`,
    simulatedNetworkError: (query: string) => `Simulated network error for query: ${query}`,
    searchAborted: 'Search was cancelled',
    serviceNotAvailable: (name: string) => `Service '${name}' is not available`,
    backendNotImplemented: (name: string) => `Search backend '${name}' is not implemented yet`,
    noSearchBackend: 'Backend registry requires an implemented default search backend.',
    openLocationFailed: 'Failed to open location in browser',
  },
  latitude: {
    outOfRange: 'Latitude must be between -90 and 90 degrees.',
  },
  longitude: {
    outOfRange: 'Longitude must be between -180 and 180 degrees.',
  },
}

export type Messages = typeof messages
