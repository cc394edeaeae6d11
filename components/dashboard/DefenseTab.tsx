'use client'

import StatsBarChart from '@/components/StatsBarChart'
import StatsTable from '@/components/StatsTable'
import { useStatsQuery } from '@/app/hooks/useStatsQuery'
import type { DefenseResponse } from '@/lib/stats/client'
import { DEFENSE_COLUMNS } from '@/lib/stats/columns'
import { scopeLabel } from '@/lib/stats/scope'
import type { Position, Scope } from '@/lib/stats/types'

const SHOWN = 10

type Props = {
  season: number
  week: number | null
  position: Position
  scope: Scope
  refreshKey: number
}

export default function DefenseTab({ season, week, position, scope, refreshKey }: Props) {
  const { data, error, isLoading } = useStatsQuery<DefenseResponse>(
    '/api/stats/defense',
    { season, week, position, scope },
    refreshKey
  )

  const rows = data?.rows ?? []
  const worst = rows.slice(0, SHOWN)
  // stingiest first: the ranking read from the bottom
  const best = rows.slice(-SHOWN).reverse()
  const caption = data ? `${data.season} · ${scopeLabel(data.scope, data.week)}` : undefined

  return (
    <div className="grid gap-5">
      <StatsBarChart
        title={`TDs allowed to ${position}`}
        data={worst.map((r) => ({ label: r.team, value: r.touchdowns }))}
        valueLabel="Touchdowns"
      />
      <div className="grid gap-5 lg:grid-cols-2">
        <StatsTable
          title={`Most vulnerable vs ${position}`}
          caption={caption}
          columns={DEFENSE_COLUMNS}
          rows={worst}
          rowKey={(r) => r.team}
          isLoading={isLoading}
          error={error?.message}
        />
        <StatsTable
          title={`Toughest vs ${position}`}
          caption={caption}
          columns={DEFENSE_COLUMNS}
          rows={best}
          rowKey={(r) => r.team}
          isLoading={isLoading}
          error={error?.message}
        />
      </div>
    </div>
  )
}
