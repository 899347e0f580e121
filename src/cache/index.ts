import { Redis } from 'ioredis'
import type { Logger } from '../lib/logger.js'

/** Valkey client backing the session store. Connects on first command. */
export function createCache(valkeyUrl: string, logger: Logger) {
  const cache = new Redis(valkeyUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(times * 200, 2000),
    lazyConnect: true,
  })

  cache.on('error', (err: Error) => {
    logger.error({ err }, 'Valkey connection error')
  })
  cache.on('connect', () => {
    logger.info('Connected to Valkey')
  })

  return cache
}

export type Cache = ReturnType<typeof createCache>
