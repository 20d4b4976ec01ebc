import { z } from 'zod'

const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // App
  APP_NAME: z.string().default('City Search Engine'),

  // Search backend used by a fresh session (unknown names fall back to the registry default)
  SEARCH_BACKEND: z.string().default('Nominatim'),

  // Nominatim
  NOMINATIM_API_URL: z.url().default('https://nominatim.openstreetmap.org'),
  NOMINATIM_USER_AGENT: z.string().min(1).default('CitySearchEngine/1.0'),
  NOMINATIM_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // Map viewer used to open a location externally
  MAP_VIEWER_URL: z.url().default('https://www.openstreetmap.org'),
})

const _env = envSchema.safeParse(process.env)

if (!_env.success) {
  console.error('Invalid environment variables:', z.treeifyError(_env.error))

  throw new Error('Invalid environment variables. Please check your .env file or environment configuration.')
}

export const env = _env.data
