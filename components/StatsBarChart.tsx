'use client'

import { memo } from 'react'
import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'

export interface BarDatum {
  label: string
  value: number
}

type Props = {
  title: string
  data: readonly BarDatum[]
  valueLabel: string
}

function StatsBarChart({ title, data, valueLabel }: Props) {
  if (data.length === 0) return null

  return (
    <div className="rounded-3xl border border-white/10 bg-white/5 p-5 shadow-xl">
      <div className="text-lg font-semibold text-white">{title}</div>
      <div className="mt-4 h-72">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={[...data]} margin={{ top: 8, right: 16, bottom: 8, left: 0 }}>
            <CartesianGrid stroke="#1f2735" strokeDasharray="4 4" vertical={false} />
            <XAxis dataKey="label" stroke="#9ca3af" tickLine={false} axisLine={false} fontSize={11} />
            <YAxis stroke="#9ca3af" tickLine={false} axisLine={false} allowDecimals={false} fontSize={11} />
            <Tooltip
              cursor={{ fill: 'rgba(255,255,255,0.05)' }}
              contentStyle={{ backgroundColor: '#12121a', borderColor: '#1f2735', color: '#e5e7eb' }}
              formatter={(value) => [value, valueLabel]}
            />
            <Bar dataKey="value" fill="#3a7bfd" radius={[6, 6, 0, 0]} isAnimationActive={false} />
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  )
}

export default memo(StatsBarChart)
