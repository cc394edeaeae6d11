import Dashboard from '@/components/dashboard/Dashboard'
import { availableSeasons, getConfig } from '@/lib/config'

export const dynamic = 'force-dynamic'

export default function HomePage() {
  const config = getConfig()
  return (
    <main className="min-h-screen">
      <Dashboard
        seasons={availableSeasons(config.season)}
        defaultSeason={config.season}
        defaultWeek={config.week}
      />
    </main>
  )
}
