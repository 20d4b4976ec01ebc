import axios, { type AxiosInstance } from 'axios'
import { acquireHttpsAgent, type AgentPoolOptions } from './agent-pool'

const DEFAULT_TIMEOUT_MS = 10000

export interface HttpClientConfig {
  baseURL: string
  userAgent: string
  timeoutMs?: number
  pool?: Partial<AgentPoolOptions>
}

/**
 * Axios instance for a geocoding API, backed by the shared keep-alive pool.
 * The request timeout is separate from the pool's socket timeout.
 */
export function createHttpClient({ baseURL, userAgent, timeoutMs, pool }: HttpClientConfig): AxiosInstance {
  return axios.create({
    baseURL,
    httpsAgent: acquireHttpsAgent(pool),
    timeout: timeoutMs ?? DEFAULT_TIMEOUT_MS,
    headers: {
      'User-Agent': userAgent,
      Accept: 'application/json',
    },
  })
}
