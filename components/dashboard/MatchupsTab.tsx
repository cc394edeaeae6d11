'use client'

import { useState } from 'react'
import StatsTable from '@/components/StatsTable'
import { useStatsQuery } from '@/app/hooks/useStatsQuery'
import type { MatchupsResponse } from '@/lib/stats/client'
import { MATCHUP_COLUMNS } from '@/lib/stats/columns'
import { MATCHUP_DEFAULTS } from '@/lib/stats/matchups'

type Props = {
  season: number
  week: number | null
  refreshKey: number
}

export default function MatchupsTab({ season, week, refreshKey }: Props) {
  const [favorableOnly, setFavorableOnly] = useState(true)
  const { data, error, isLoading } = useStatsQuery<MatchupsResponse>(
    '/api/stats/matchups',
    { season, week, favorableOnly },
    refreshKey
  )

  const caption = data
    ? `Week ${data.week} · ${data.games.length} games · favorable = opponent in the ${MATCHUP_DEFAULTS.weakDefenseCutoff} most vulnerable`
    : undefined

  return (
    <div className="grid gap-4">
      <label className="inline-flex items-center gap-2 text-xs text-white/70">
        <input
          type="checkbox"
          className="h-4 w-4 rounded border-white/20 bg-black/20"
          checked={favorableOnly}
          onChange={(e) => setFavorableOnly(e.target.checked)}
        />
        <span>Favorable matchups only</span>
      </label>
      <StatsTable
        title="This week's matchups"
        caption={caption}
        columns={MATCHUP_COLUMNS}
        rows={data?.rows ?? []}
        rowKey={(r) => `${r.gameId}:${r.position}:${r.playerId}`}
        isLoading={isLoading}
        error={error?.message}
        emptyMessage="No matchups for this week."
        highlight={(r) => r.favorable}
      />
    </div>
  )
}
