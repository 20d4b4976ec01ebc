import { env } from '@env/index'
import { BackendRegistry, type ServiceConfigurationInput } from '@providers/search-backend/backend-registry'
import { SearchSession } from '@use-cases/search-session'

export function makeSearchSession(backendName: string = env.SEARCH_BACKEND, backendConfig: ServiceConfigurationInput = {}) {
  const registry = new BackendRegistry()
  const backend = registry.create(registry.stringToKind(backendName), backendConfig)
  const searchSession = new SearchSession(backend, { registry, backendConfig })

  return searchSession
}
