import { Redis } from 'ioredis'
import type { Logger } from '../lib/logger.js'

export function createCache(valkeyUrl: string, logger: Logger) {
  const cache = new Redis(valkeyUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      const delay = Math.min(times * 200, 2000)
      return delay
    },
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

/** The subset of the cache the protection services rely on. */
export type StatsCache = Pick<Cache, 'get' | 'set' | 'del'>
