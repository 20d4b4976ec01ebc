import https from 'https'

export interface AgentPoolOptions {
  keepAliveMsecs: number
  maxSockets: number
  maxFreeSockets: number
  /** Socket inactivity timeout. */
  socketTimeoutMs: number
}

export const DEFAULT_POOL_OPTIONS: AgentPoolOptions = {
  keepAliveMsecs: 1000,
  maxSockets: 4,
  maxFreeSockets: 2,
  socketTimeoutMs: 60000,
}

const pool = new Map<string, https.Agent>()

function poolKey(options: AgentPoolOptions): string {
  return [options.keepAliveMsecs, options.maxSockets, options.maxFreeSockets, options.socketTimeoutMs].join(':')
}

/** Keep-alive agents are shared between clients created with the same pool options. */
export function acquireHttpsAgent(overrides: Partial<AgentPoolOptions> = {}): https.Agent {
  const options = { ...DEFAULT_POOL_OPTIONS, ...overrides }
  const key = poolKey(options)

  let agent = pool.get(key)
  if (!agent) {
    agent = new https.Agent({
      keepAlive: true,
      keepAliveMsecs: options.keepAliveMsecs,
      maxSockets: options.maxSockets,
      maxFreeSockets: options.maxFreeSockets,
      timeout: options.socketTimeoutMs,
      scheduling: 'lifo',
    })
    pool.set(key, agent)
  }

  return agent
}

export function destroyHttpsAgents(): void {
  for (const agent of pool.values()) {
    agent.destroy()
  }

  pool.clear()
}
