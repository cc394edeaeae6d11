'use client'

import { formatCell, type Column } from '@/lib/stats/columns'

type Props<Row> = {
  title?: string
  caption?: string
  columns: readonly Column<Row>[]
  rows: readonly Row[]
  rowKey: (row: Row, index: number) => string
  isLoading?: boolean
  error?: string | null
  emptyMessage?: string
  highlight?: (row: Row) => boolean
}

export default function StatsTable<Row>({
  title,
  caption,
  columns,
  rows,
  rowKey,
  isLoading = false,
  error,
  emptyMessage = 'No data for this selection.',
  highlight,
}: Props<Row>) {
  return (
    <div className="rounded-3xl border border-white/10 bg-white/5 p-5 shadow-xl">
      {title && <div className="text-lg font-semibold text-white">{title}</div>}
      {caption && <div className="mt-1 text-xs text-white/50">{caption}</div>}

      {error ? (
        <div role="alert" className="mt-4 rounded-2xl border border-red-400/30 bg-red-500/10 px-4 py-3 text-sm text-red-200">
          {error}
        </div>
      ) : isLoading ? (
        <div role="status" className="py-6 text-center text-sm text-white/60">
          Loading…
        </div>
      ) : rows.length === 0 ? (
        <div role="status" className="py-6 text-center text-sm text-white/60">
          {emptyMessage}
        </div>
      ) : (
        <div className="mt-4 overflow-x-auto">
          <table className="w-full text-sm">
            <thead>
              <tr className="border-b border-white/10 text-[11px] uppercase tracking-wide text-white/50">
                {columns.map((c) => (
                  <th key={c.key} className={`px-2 py-2 font-medium ${c.align === 'right' ? 'text-right' : 'text-left'}`}>
                    {c.label}
                  </th>
                ))}
              </tr>
            </thead>
            <tbody>
              {rows.map((row, i) => (
                <tr
                  key={rowKey(row, i)}
                  className={`border-b border-white/5 ${highlight?.(row) ? 'bg-emerald-500/10' : ''}`}
                >
                  {columns.map((c) => (
                    <td
                      key={c.key}
                      className={`px-2 py-1.5 text-white/80 ${c.align === 'right' ? 'text-right font-mono' : 'text-left'}`}
                    >
                      {formatCell(c.value(row))}
                    </td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </div>
  )
}
