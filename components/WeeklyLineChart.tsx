'use client'

import { memo } from 'react'
import { CartesianGrid, Line, LineChart, ReferenceLine, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import type { WeeklySeries } from '@/lib/stats/types'

type Props = {
  series: WeeklySeries
  valueLabel: string
}

function WeeklyLineChart({ series, valueLabel }: Props) {
  return (
    <div className="rounded-3xl border border-white/10 bg-white/5 p-5 shadow-xl">
      <div className="text-lg font-semibold text-white">
        {series.playerName} <span className="text-sm text-white/50">{series.team}</span>
      </div>
      <div className="mt-1 text-xs text-white/60">
        Average: {series.average} | Min: {series.min} | Max: {series.max}
      </div>
      <div className="mt-4 h-64">
        <ResponsiveContainer width="100%" height="100%">
          <LineChart data={series.points} margin={{ top: 8, right: 16, bottom: 8, left: 0 }}>
            <CartesianGrid stroke="#1f2735" strokeDasharray="4 4" vertical={false} />
            <XAxis dataKey="week" stroke="#9ca3af" tickLine={false} axisLine={false} fontSize={11} />
            <YAxis stroke="#9ca3af" tickLine={false} axisLine={false} fontSize={11} />
            <Tooltip
              contentStyle={{ backgroundColor: '#12121a', borderColor: '#1f2735', color: '#e5e7eb' }}
              labelFormatter={(week) => `Week ${week}`}
              formatter={(value) => [value, valueLabel]}
            />
            <ReferenceLine y={series.average} stroke="#10b981" strokeDasharray="6 4" />
            <Line type="monotone" dataKey="value" stroke="#3a7bfd" strokeWidth={2} dot isAnimationActive={false} />
          </LineChart>
        </ResponsiveContainer>
      </div>
    </div>
  )
}

export default memo(WeeklyLineChart)
