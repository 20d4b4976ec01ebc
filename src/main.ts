import { env } from '@env/index'
import { destroyHttpsAgents } from '@lib/http/agent-pool'
import { logger } from '@lib/logger'
import { logError } from '@lib/logger/helpers'
import { makeSearchSession } from '@use-cases/factories/make-search-session'

async function main(): Promise<void> {
  const query = process.argv.slice(2).join(' ')
  const session = makeSearchSession()

  logger.info({ backend: session.currentBackendName(), app: env.APP_NAME }, 'Search session ready')

  session.search(query)
  await session.waitUntilIdle()

  if (session.lastError) {
    logger.warn({ query, error: session.lastError }, 'Search finished with an error')
    process.exitCode = 1
    return
  }

  for (const city of session.results) {
    process.stdout.write(`${city.displayName}\t${city.latitude.toFixed(4)}\t${city.longitude.toFixed(4)}\n`)
  }

  logger.info({ query, resultCount: session.results.count() }, 'Search completed')
}

main()
  .catch((err) => {
    logError(err, {}, 'City search failed')
    process.exitCode = 1
  })
  .finally(destroyHttpsAgents)
