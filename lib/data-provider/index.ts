/**
 * Data Provider Factory
 *
 * Returns the configured provider. nflverse is the only source today; the
 * DataProvider interface keeps the engine and routes unaware of it.
 */

import { getConfig } from '@/lib/config'
import { NflverseProvider } from './nflverse'
import type { DataProvider, ProviderConfig } from './types'

export * from './types'
export { NflverseProvider, parseCsv, seasonUrl } from './nflverse'
export { clearCache, getCacheStats, isCached } from './cache'

export function getDataProvider(config?: ProviderConfig): DataProvider {
  const app = getConfig()
  return new NflverseProvider({
    statsUrlTemplate: config?.statsUrlTemplate ?? app.statsUrlTemplate,
    scheduleUrlTemplate: config?.scheduleUrlTemplate ?? app.scheduleUrlTemplate,
    timeoutMs: config?.timeoutMs ?? app.fetchTimeoutMs,
    fetchFn: config?.fetchFn,
  })
}
