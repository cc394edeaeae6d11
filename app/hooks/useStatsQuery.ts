import { useEffect, useMemo, useState } from 'react'
import type { StatsErrorPayload } from '@/lib/stats/errors'
import { buildQueryString, fetchStats, type QueryParams } from '@/lib/stats/client'

export interface StatsQueryState<T> {
  data: T | null
  error: StatsErrorPayload | null
  isLoading: boolean
}

/**
 * Fetch one stats endpoint for the current filters.
 *
 * Changing a filter aborts the in-flight request, and its result is dropped even
 * if it already resolved, so a slow response never overwrites a newer one.
 * Pass `path = null` to skip fetching; the last result is cleared.
 */
export function useStatsQuery<T>(path: string | null, params: QueryParams, refreshKey = 0): StatsQueryState<T> {
  const [state, setState] = useState<StatsQueryState<T>>({ data: null, error: null, isLoading: false })

  // params objects are rebuilt every render; key the effect on the query string
  const query = buildQueryString(params)
  const stableParams = useMemo(() => params, [query]) // eslint-disable-line react-hooks/exhaustive-deps

  useEffect(() => {
    if (!path) {
      setState({ data: null, error: null, isLoading: false })
      return
    }
    const controller = new AbortController()
    setState((s) => ({ ...s, isLoading: true, error: null }))

    void fetchStats<T>(path, stableParams, controller.signal).then((result) => {
      if (controller.signal.aborted) return
      if (result.ok) {
        setState({ data: result.data, error: null, isLoading: false })
      } else {
        setState({ data: null, error: result.error, isLoading: false })
      }
    })

    return () => controller.abort()
  }, [path, stableParams, refreshKey])

  return state
}
