'use client'

import { useState } from 'react'
import DashboardFilters from '@/components/DashboardFilters'
import { refreshSeason } from '@/lib/stats/client'
import type { Position, Scope } from '@/lib/stats/types'
import ConsistencyTab from './ConsistencyTab'
import DefenseTab from './DefenseTab'
import LeadersTab from './LeadersTab'
import MatchupsTab from './MatchupsTab'

const TABS = [
  { id: 'defense', label: 'Worst Defenses' },
  { id: 'matchups', label: "This Week's Matchups" },
  { id: 'leaders', label: 'Touchdown Leaders' },
  { id: 'consistency', label: 'Consistency' },
] as const

type TabId = (typeof TABS)[number]['id']

const MAX_WEEK = 18

type Props = {
  seasons: readonly number[]
  defaultSeason: number
  defaultWeek: number | null
}

export default function Dashboard({ seasons, defaultSeason, defaultWeek }: Props) {
  const [tab, setTab] = useState<TabId>('defense')
  const [season, setSeason] = useState(defaultSeason)
  const [week, setWeek] = useState<number | null>(defaultWeek)
  const [position, setPosition] = useState<Position>('WR')
  const [scope, setScope] = useState<Scope>('season')
  const [refreshKey, setRefreshKey] = useState(0)
  const [isRefreshing, setIsRefreshing] = useState(false)
  const [refreshError, setRefreshError] = useState<string | null>(null)

  async function onRefresh() {
    setIsRefreshing(true)
    setRefreshError(null)
    const result = await refreshSeason(season)
    if (result.ok) {
      setRefreshKey((k) => k + 1)
    } else {
      setRefreshError(result.error.message)
    }
    setIsRefreshing(false)
  }

  return (
    <div className="mx-auto max-w-6xl space-y-5 px-4 py-8">
      <div className="rounded-3xl border border-white/10 bg-gradient-to-br from-white/10 to-white/5 p-6 shadow-xl">
        <div className="text-sm uppercase tracking-[0.2em] text-white/50">NFL Matchup Analyzer</div>
        <h1 className="mt-1 text-3xl font-semibold text-white">Who gives up touchdowns, and who is next.</h1>
        <p className="mt-3 text-sm text-white/70">
          Defense weakness by position, weekly matchup scores, touchdown leaders and week-to-week consistency.
        </p>
      </div>

      <DashboardFilters
        seasons={seasons}
        season={season}
        week={week}
        maxWeek={MAX_WEEK}
        position={position}
        scope={scope}
        isRefreshing={isRefreshing}
        onChangeSeason={setSeason}
        onChangeWeek={setWeek}
        onChangePosition={setPosition}
        onChangeScope={setScope}
        onRefresh={() => void onRefresh()}
      />
      {refreshError && (
        <div role="alert" className="rounded-2xl border border-red-400/30 bg-red-500/10 px-4 py-3 text-sm text-red-200">
          Refresh failed: {refreshError}
        </div>
      )}

      <div role="tablist" className="flex flex-wrap gap-2">
        {TABS.map((t) => (
          <button
            key={t.id}
            type="button"
            role="tab"
            aria-selected={t.id === tab}
            onClick={() => setTab(t.id)}
            className={`rounded-2xl border px-4 py-2 text-sm transition ${t.id === tab ? 'border-blue-400/40 bg-blue-500/15 text-white' : 'border-white/10 bg-white/5 text-white/70 hover:bg-white/10'}`}
          >
            {t.label}
          </button>
        ))}
      </div>

      {tab === 'defense' && (
        <DefenseTab season={season} week={week} position={position} scope={scope} refreshKey={refreshKey} />
      )}
      {tab === 'matchups' && <MatchupsTab season={season} week={week} refreshKey={refreshKey} />}
      {tab === 'leaders' && (
        <LeadersTab season={season} week={week} position={position} scope={scope} refreshKey={refreshKey} />
      )}
      {tab === 'consistency' && <ConsistencyTab season={season} position={position} refreshKey={refreshKey} />}
    </div>
  )
}
