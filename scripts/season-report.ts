#!/usr/bin/env tsx
/**
 * Print the season report for NFL_SEASON / NFL_WEEK
 * Run: npm run report
 */

import 'dotenv/config'
import { getConfig } from '@/lib/config'
import { getDataProvider } from '@/lib/data-provider'
import { createLogger } from '@/lib/logger'
import { runSeasonReport } from '@/lib/report/season-report'

const log = createLogger('season-report')

async function main() {
  const config = getConfig()
  log.info('Building report', { season: config.season, week: config.week ?? 'latest' })

  process.exitCode = await runSeasonReport({
    provider: getDataProvider(),
    season: config.season,
    week: config.week,
    write: (text) => process.stdout.write(`${text}\n`),
    writeError: (text) => process.stderr.write(`${text}\n`),
  })
}

main().catch((err: unknown) => {
  log.error('Unexpected failure', err)
  process.exitCode = 1
})
